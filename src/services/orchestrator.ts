import fs from 'node:fs/promises';
import { artifactPaths } from '../config';
import type {
  BoundaryPredicate,
  ConversionBatch,
  DocumentConverter,
  ItemOutcome,
  ItemStage,
  PipelineConfig,
  PipelineServices,
  StagedItem,
  SummaryRef
} from '../types';
import { pathExists, writeFileAtomic } from '../utils/fs';
import { runPool, withTimeout } from '../utils/pool';
import { DEFAULT_BOUNDARIES, cleanText } from './cleaner';
import { summarizeItem } from './summarizer';

export async function convertItem(
  item: StagedItem,
  config: PipelineConfig,
  convert: DocumentConverter
): Promise<string> {
  const { text } = artifactPaths(config.paths, item.itemId);
  if (await pathExists(text)) {
    console.log(`[skip] 文本已存在：${item.itemId}`);
    return text;
  }
  console.log(`[convert] 开始转换：${item.fileName}`);
  const content = await withTimeout(`转换 ${item.fileName}`, config.callTimeoutMs, signal =>
    convert(item.path, signal)
  );
  await writeFileAtomic(text, content);
  console.log(`[convert] 完成转换：${item.fileName}`);
  return text;
}

export async function cleanItem(
  itemId: string,
  config: PipelineConfig,
  boundaries: readonly BoundaryPredicate[] = DEFAULT_BOUNDARIES
): Promise<string> {
  const { text, cleaned } = artifactPaths(config.paths, itemId);
  if (await pathExists(cleaned)) {
    return cleaned;
  }
  const content = await fs.readFile(text, 'utf-8');
  await writeFileAtomic(cleaned, cleanText(content, boundaries));
  return cleaned;
}

/** Convert, clean and summarize one item. Never rejects. */
export async function processItem(
  item: StagedItem,
  config: PipelineConfig,
  services: PipelineServices
): Promise<ItemOutcome> {
  let stage: ItemStage = 'convert';
  try {
    await convertItem(item, config, services.convert);
    stage = 'clean';
    await cleanItem(item.itemId, config, services.boundaries);
    stage = 'summarize';
    const summaryPath = await summarizeItem(item.itemId, config, services.text);
    return { ok: true, itemId: item.itemId, fileName: item.fileName, summaryPath };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    console.error(`[failed] ${item.itemId} 在 ${stage} 阶段失败：${reason}`);
    return { ok: false, itemId: item.itemId, stage, reason };
  }
}

/**
 * Fans the items out over `config.poolSize` workers. `succeeded` is in
 * completion order.
 */
export async function runConversions(
  items: readonly StagedItem[],
  config: PipelineConfig,
  services: PipelineServices
): Promise<ConversionBatch> {
  console.log(`使用 ${config.poolSize} 个并发任务处理 ${items.length} 个文件`);
  const outcomes = await runPool(items, config.poolSize, item =>
    processItem(item, config, services)
  );
  const batch: ConversionBatch = { succeeded: [], failed: [] };
  for (const outcome of outcomes) {
    if (outcome.ok) {
      const ref: SummaryRef = {
        itemId: outcome.itemId,
        fileName: outcome.fileName,
        summaryPath: outcome.summaryPath
      };
      batch.succeeded.push(ref);
    } else {
      batch.failed.push(outcome);
    }
  }
  return batch;
}
