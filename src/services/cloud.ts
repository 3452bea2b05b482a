import fs from 'node:fs/promises';
import COS from 'cos-nodejs-sdk-v5';
import type { CosSettings, Publisher, StagedItem } from '../types';

export function createCosPublisher(settings: CosSettings): Publisher {
  const cosClient = new COS({
    SecretId: settings.secretId,
    SecretKey: settings.secretKey,
    AutoSwitchHost: false,
    ...(settings.proxy ? { Proxy: settings.proxy } : {})
  });

  function putObjectToCos(key: string, body: Buffer): Promise<void> {
    return new Promise((resolve, reject) => {
      cosClient.putObject(
        {
          Bucket: settings.bucket,
          Region: settings.region,
          Key: key,
          Body: body,
          ContentLength: body.length
        },
        error => {
          if (error) {
            const reason = extractCosErrorReason(error);
            reject(new Error(`上传到 COS 失败，key=${key}，原因：${reason}`));
            return;
          }
          resolve();
        }
      );
    });
  }

  return {
    async publish(localPath, key) {
      const fileContent = await fs.readFile(localPath);
      const objectKey = key.replace(/^\/+/, '');
      await putObjectToCos(objectKey, fileContent);
      return buildCosFileUrl(settings.publicBaseUrl, objectKey);
    }
  };
}

/** Uploads each staged file as `{period}/{fileName}`; failures are logged. */
export async function publishStagedItems(
  items: readonly StagedItem[],
  period: string,
  publisher: Publisher
): Promise<string[]> {
  const published: string[] = [];
  for (const item of items) {
    try {
      const url = await publisher.publish(item.path, `${period}/${item.fileName}`);
      console.log(`[publish] ${item.fileName} -> ${url}`);
      published.push(url);
    } catch (error) {
      console.error(`[publish] ${item.fileName} 上传失败：`, error);
    }
  }
  return published;
}

export function buildCosFileUrl(baseUrl: string, key: string): string {
  return `${baseUrl}/${key}`.replace(/([^:]\/)\/+/g, '$1');
}

function extractCosErrorReason(error: unknown): string {
  if (!error) {
    return '未知错误';
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object') {
    const nested = 'error' in error ? error.error : undefined;
    if (nested && typeof nested === 'object' && 'Message' in nested && typeof nested.Message === 'string') {
      return nested.Message;
    }
    if ('message' in error && typeof error.message === 'string') {
      return error.message;
    }
  }
  return '未知错误';
}
