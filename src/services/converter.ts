import fs from 'node:fs/promises';
import path from 'node:path';
import { createRequire } from 'node:module';
import type pdfParse from 'pdf-parse';
import type { DocumentConverter } from '../types';

// pdf-parse enters a self-test mode when loaded without a parent module,
// which is what an ESM import gives it.
const requireCjs = createRequire(import.meta.url);

const TEXT_EXTENSIONS = new Set(['.md', '.markdown', '.txt']);

async function extractPdfText(filePath: string): Promise<string> {
  const parse: typeof pdfParse = requireCjs('pdf-parse');
  const buffer = await fs.readFile(filePath);
  const result = await parse(buffer, { max: 0 });
  return result.text;
}

export const convertDocument: DocumentConverter = async (filePath, signal) => {
  const ext = path.extname(filePath).toLowerCase();
  if (ext === '.pdf') {
    return extractPdfText(filePath);
  }
  if (TEXT_EXTENSIONS.has(ext)) {
    return fs.readFile(filePath, { encoding: 'utf-8', signal });
  }
  throw new Error(`不支持的文件类型：${path.basename(filePath)}`);
};
