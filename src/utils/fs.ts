import fs from 'node:fs/promises';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import AdmZip from 'adm-zip';

export interface ArchiveMember {
  name: string;
  data: Buffer;
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await fs.access(targetPath);
    return true;
  } catch {
    return false;
  }
}

export async function readTextIfExists(filePath: string): Promise<string | undefined> {
  if (!(await pathExists(filePath))) {
    return undefined;
  }
  return fs.readFile(filePath, 'utf-8');
}

/**
 * Writes through a temporary sibling and renames it into place, so readers
 * only ever see a missing file or a complete one.
 */
export async function writeFileAtomic(filePath: string, data: string | Buffer): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tempPath = `${filePath}.${process.pid}-${randomUUID()}.tmp`;
  try {
    await fs.writeFile(tempPath, data);
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

export async function copyFileAtomic(source: string, target: string): Promise<void> {
  await ensureDir(path.dirname(target));
  const tempPath = `${target}.${process.pid}-${randomUUID()}.tmp`;
  try {
    await fs.copyFile(source, tempPath);
    await fs.rename(tempPath, target);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

export async function listFiles(
  dirPath: string,
  accept: (name: string) => boolean = () => true
): Promise<string[]> {
  if (!(await pathExists(dirPath))) {
    return [];
  }
  const entries = await fs.readdir(dirPath, { withFileTypes: true });
  return entries
    .filter(entry => entry.isFile() && !entry.name.endsWith('.tmp') && accept(entry.name))
    .map(entry => entry.name)
    .sort();
}

/** Deletes `.tmp` files left by writes that never reached their rename. */
export async function removeStaleTempFiles(dirPath: string): Promise<number> {
  if (!(await pathExists(dirPath))) {
    return 0;
  }
  const entries = await fs.readdir(dirPath, { withFileTypes: true });
  let removed = 0;
  for (const entry of entries) {
    if (entry.isFile() && entry.name.endsWith('.tmp')) {
      await fs.rm(path.join(dirPath, entry.name), { force: true });
      removed += 1;
    }
  }
  return removed;
}

/** True when `target` exists and was modified no earlier than `source`. */
export async function isUpToDate(source: string, target: string): Promise<boolean> {
  if (!(await pathExists(target))) {
    return false;
  }
  const [sourceStats, targetStats] = await Promise.all([fs.stat(source), fs.stat(target)]);
  return sourceStats.mtimeMs <= targetStats.mtimeMs;
}

export function readArchiveMembers(
  archivePath: string,
  extensions: readonly string[]
): ArchiveMember[] {
  const zip = new AdmZip(archivePath);
  const members: ArchiveMember[] = [];
  for (const entry of zip.getEntries()) {
    if (entry.isDirectory) continue;
    const name = path.posix.basename(entry.entryName.replace(/\\/g, '/'));
    if (!name || name.startsWith('.') || entry.entryName.includes('__MACOSX')) continue;
    if (!extensions.includes(path.extname(name).toLowerCase())) continue;
    members.push({ name, data: entry.getData() });
  }
  return members;
}
