import fs from 'node:fs/promises';
import path from 'node:path';
import { artifactPaths } from '../config';
import type {
  HighlightEntry,
  PipelineConfig,
  RenderOrder,
  StagedItem,
  SummaryRef
} from '../types';
import { listFiles, readTextIfExists, writeFileAtomic } from '../utils/fs';
import { toHighlightEntry } from './normalizer';
import { dedupeByItemId, extractItemId } from './stager';

export function highlightsPath(config: PipelineConfig): string {
  return path.join(config.paths.finalDir, `${config.period}_highlights.md`);
}

export function translatedHighlightsPath(config: PipelineConfig): string {
  return path.join(config.paths.finalDir, `${config.period}_highlights_translated.md`);
}

export function buildReportLink(baseUrl: string, period: string, fileName: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${period}/${encodeURIComponent(fileName)}`;
}

function compareText(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * `sorted` orders by date (newest first), then source, title and item id.
 * `completion` keeps the order the workers finished in, which differs from
 * run to run.
 */
export function orderEntries(entries: readonly HighlightEntry[], order: RenderOrder): HighlightEntry[] {
  if (order === 'completion') {
    return [...entries];
  }
  return [...entries].sort(
    (a, b) =>
      compareText(b.date, a.date) ||
      compareText(a.source, b.source) ||
      compareText(a.title, b.title) ||
      compareText(a.itemId, b.itemId)
  );
}

export function renderHighlights(
  entries: readonly HighlightEntry[],
  period: string,
  title: string
): string {
  const lines: string[] = [`# ${title} – ${period}`, ''];
  for (const entry of entries) {
    lines.push(`**${entry.header}**`, '');
    if (entry.bullets.length) {
      lines.push(...entry.bullets, '');
    }
    lines.push(`[Report Link](${entry.link})`, '');
  }
  return `${lines.join('\n').trimEnd()}\n`;
}

export async function loadHighlightEntries(
  refs: readonly SummaryRef[],
  config: PipelineConfig
): Promise<HighlightEntry[]> {
  const entries: HighlightEntry[] = [];
  for (const ref of refs) {
    let summary: string;
    try {
      summary = await fs.readFile(ref.summaryPath, 'utf-8');
    } catch (error) {
      console.error(`[assemble] 读取摘要失败 ${ref.summaryPath}：`, error);
      continue;
    }
    const cleanedText = await readTextIfExists(artifactPaths(config.paths, ref.itemId).cleaned);
    const link = buildReportLink(config.linkBaseUrl, config.period, ref.fileName);
    entries.push(
      toHighlightEntry(ref.itemId, summary, link, {
        referenceDate: config.period,
        windowDays: config.dateWindowDays,
        ...(cleanedText !== undefined ? { cleanedText } : {})
      })
    );
  }
  return entries;
}

/**
 * Renders and writes the final document. Returns its path, or `undefined`
 * when none of the summaries could be read.
 */
export async function assembleHighlights(
  refs: readonly SummaryRef[],
  config: PipelineConfig
): Promise<string | undefined> {
  const entries = await loadHighlightEntries(refs, config);
  if (!entries.length) {
    console.log('没有可用的摘要，跳过生成 highlights');
    return undefined;
  }
  const content = renderHighlights(
    orderEntries(entries, config.renderOrder),
    config.period,
    config.documentTitle
  );
  const target = highlightsPath(config);
  await writeFileAtomic(target, content);
  console.log(`[success] 已生成 highlights（${entries.length} 篇）：${target}`);
  return target;
}

export async function findStagedItems(config: PipelineConfig): Promise<StagedItem[]> {
  const extensions = config.documentExtensions;
  const names = await listFiles(config.paths.storeDir, name =>
    extensions.includes(path.extname(name).toLowerCase())
  );
  return dedupeByItemId(
    names.map(fileName => ({
      itemId: extractItemId(fileName),
      fileName,
      path: path.join(config.paths.storeDir, fileName),
      originalName: fileName
    }))
  );
}

/**
 * Summaries left by an earlier run, keyed back to the stored file they came
 * from so the report links stay correct.
 */
export async function findRecoverableSummaries(config: PipelineConfig): Promise<SummaryRef[]> {
  const names = await listFiles(config.paths.summaryDir, name => name.endsWith('.md'));
  const stored = new Map(
    (await findStagedItems(config)).map(item => [item.itemId, item.fileName] as const)
  );
  return names.map(name => {
    const itemId = name.slice(0, -'.md'.length);
    return {
      itemId,
      fileName: stored.get(itemId) ?? `${itemId}.pdf`,
      summaryPath: path.join(config.paths.summaryDir, name)
    };
  });
}
