import fs from 'node:fs/promises';
import path from 'node:path';
import { ARCHIVE_EXTENSIONS } from '../config';
import type { PipelineConfig, RawItem, StageResult, StagedItem } from '../types';
import {
  copyFileAtomic,
  ensureDir,
  listFiles,
  pathExists,
  readArchiveMembers,
  writeFileAtomic
} from '../utils/fs';

/**
 * `2025-04-14-Report-abc123.pdf` -> `abc123`. Falls back to the whole stem
 * when the name ends with a dash.
 */
export function extractItemId(fileName: string): string {
  const base = path.basename(fileName);
  const stem = base.slice(0, base.length - path.extname(base).length);
  const parts = stem.split('-');
  const last = parts[parts.length - 1];
  return last || stem;
}

function rawSortKey(name: string): string {
  return name.includes('-') ? name.split('-').slice(0, 3).join('-') : name;
}

export async function listRawItems(
  inboxDir: string,
  documentExtensions: readonly string[]
): Promise<RawItem[]> {
  const accepted = new Set([...documentExtensions, ...ARCHIVE_EXTENSIONS]);
  const names = await listFiles(inboxDir, name => accepted.has(path.extname(name).toLowerCase()));
  return names
    .sort((a, b) => {
      const left = rawSortKey(a);
      const right = rawSortKey(b);
      if (left === right) return a < b ? -1 : a > b ? 1 : 0;
      return left < right ? 1 : -1;
    })
    .map(name => ({ name, path: path.join(inboxDir, name) }));
}

/**
 * One entry per item id. A later entry replaces an earlier one, as its file
 * replaced the earlier copy in the store.
 */
export function dedupeByItemId(items: readonly StagedItem[]): StagedItem[] {
  const byId = new Map<string, StagedItem>();
  for (const item of items) {
    if (byId.has(item.itemId)) {
      console.warn(`[stage] 条目 ${item.itemId} 重复，使用 ${item.fileName}`);
      byId.delete(item.itemId);
    }
    byId.set(item.itemId, item);
  }
  return [...byId.values()];
}

export async function stageInbox(config: PipelineConfig): Promise<StageResult> {
  const { inboxDir, storeDir } = config.paths;
  const rawItems = await listRawItems(inboxDir, config.documentExtensions);
  const result: StageResult = { staged: [], failed: [] };
  if (!rawItems.length) {
    console.log(`收件箱中没有待处理的文件：${inboxDir}`);
    return result;
  }
  await ensureDir(storeDir);
  for (const raw of rawItems) {
    try {
      const staged = ARCHIVE_EXTENSIONS.includes(path.extname(raw.name).toLowerCase())
        ? await stageArchive(raw, storeDir, config.documentExtensions)
        : [await stageFile(raw, storeDir)];
      result.staged.push(...staged);
    } catch (error) {
      console.error(`[stage] ${raw.name} 暂存失败：`, error);
      result.failed.push(raw.name);
      continue;
    }
    await removeRaw(raw);
  }
  result.staged = dedupeByItemId(result.staged);
  return result;
}

async function stageFile(raw: RawItem, storeDir: string): Promise<StagedItem> {
  const itemId = extractItemId(raw.name);
  const fileName = `${itemId}${path.extname(raw.name).toLowerCase()}`;
  const target = path.join(storeDir, fileName);
  console.log(`[stage] ${raw.name} -> ${fileName}`);
  await copyFileAtomic(raw.path, target);
  return { itemId, fileName, path: target, originalName: raw.name };
}

async function stageArchive(
  raw: RawItem,
  storeDir: string,
  documentExtensions: readonly string[]
): Promise<StagedItem[]> {
  const members = readArchiveMembers(raw.path, documentExtensions);
  if (!members.length) {
    throw new Error(`压缩包中没有可处理的文档：${raw.name}`);
  }
  const staged: StagedItem[] = [];
  for (const member of members) {
    const itemId = extractItemId(member.name);
    const fileName = `${itemId}${path.extname(member.name).toLowerCase()}`;
    const target = path.join(storeDir, fileName);
    console.log(`[stage] ${raw.name}/${member.name} -> ${fileName}`);
    await writeFileAtomic(target, member.data);
    staged.push({ itemId, fileName, path: target, originalName: member.name });
  }
  return staged;
}

async function removeRaw(raw: RawItem): Promise<void> {
  try {
    await fs.unlink(raw.path);
  } catch (error) {
    console.warn(`[stage] 无法删除原始文件 ${raw.path}：`, error);
  }
}

/**
 * Deletes leftover files (e.g. `.DS_Store`) and then the inbox itself. An
 * inbox that still holds subdirectories is left as it is, and files named in
 * `keep` (items that failed to stage) are never deleted.
 */
export async function cleanupInbox(inboxDir: string, keep: readonly string[] = []): Promise<void> {
  try {
    if (!(await pathExists(inboxDir))) {
      return;
    }
    let leftover = await fs.readdir(inboxDir, { withFileTypes: true });
    if (leftover.some(entry => !entry.isFile())) {
      console.log(`收件箱仍有子目录，保留：${inboxDir}`);
      return;
    }
    for (const entry of leftover) {
      if (keep.includes(entry.name)) continue;
      const target = path.join(inboxDir, entry.name);
      try {
        await fs.unlink(target);
      } catch (error) {
        console.warn(`无法删除残留文件 ${target}：`, error);
      }
    }
    leftover = await fs.readdir(inboxDir, { withFileTypes: true });
    if (leftover.length) {
      console.log(`收件箱非空，保留：${inboxDir}`);
      return;
    }
    await fs.rmdir(inboxDir);
    console.log(`已移除空收件箱：${inboxDir}`);
  } catch (error) {
    console.warn(`清理收件箱出错 ${inboxDir}：`, error);
  }
}
