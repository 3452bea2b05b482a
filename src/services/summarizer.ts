import fs from 'node:fs/promises';
import { artifactPaths } from '../config';
import type { PipelineConfig, TextService } from '../types';
import { pathExists, writeFileAtomic } from '../utils/fs';
import { withTimeout } from '../utils/pool';

export function validateSummary(summary: string | undefined, minLength: number): string {
  if (!summary || summary.trim().length < minLength) {
    throw new Error(`摘要为空或过短（少于 ${minLength} 个字符）`);
  }
  return summary;
}

export async function summarizeItem(
  itemId: string,
  config: PipelineConfig,
  text: TextService
): Promise<string> {
  const { cleaned, summary } = artifactPaths(config.paths, itemId);
  if (await pathExists(summary)) {
    console.log(`[skip] 摘要已存在：${itemId}`);
    return summary;
  }
  const content = await fs.readFile(cleaned, 'utf-8');
  if (!content.trim()) {
    throw new Error('清理后内容为空');
  }
  console.log(`[summarize] 开始生成摘要：${itemId}`);
  const response = await withTimeout(`摘要 ${itemId}`, config.callTimeoutMs, signal =>
    text.complete(config.summaryPrompt, content, signal)
  );
  await writeFileAtomic(summary, validateSummary(response, config.minSummaryLength));
  console.log(`[summarize] 完成摘要：${itemId}`);
  return summary;
}
