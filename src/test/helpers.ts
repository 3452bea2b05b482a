import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { vi } from 'vitest';
import { buildPaths } from '../config';
import type { DocumentConverter, PipelineConfig, PromptTemplate, TextService } from '../types';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'highlights-test-'));
}

export const summaryPrompt: PromptTemplate = {
  name: 'sellside_summary',
  text: 'Summarize the report.',
  model: 'test-model'
};

export const translationPrompt: PromptTemplate = {
  name: 'translation',
  text: 'Translate the document.',
  model: 'test-model'
};

export function makeConfig(rootDir: string, overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return {
    period: '2025-09-12',
    paths: buildPaths(path.join(rootDir, 'data'), '2025-09-12'),
    poolSize: 3,
    callTimeoutMs: 1000,
    dateWindowDays: 14,
    minSummaryLength: 10,
    linkBaseUrl: 'https://files.example.com',
    documentTitle: 'Sellside highlights for Week',
    renderOrder: 'sorted',
    documentExtensions: ['.pdf', '.md', '.markdown', '.txt'],
    summaryPrompt,
    translationPrompt,
    ...overrides
  };
}

export function fakeTextService(
  respond: (prompt: PromptTemplate, content: string) => string | Promise<string>
) {
  const complete = vi.fn(async (prompt: PromptTemplate, content: string) => respond(prompt, content));
  const service: TextService = { complete };
  return { service, complete };
}

/** Reads the staged file back as its "extracted" text. */
export function fakeConverter(
  override?: (filePath: string) => string | Promise<string>
) {
  const convert = vi.fn(async (filePath: string) =>
    override ? override(filePath) : fs.readFile(filePath, 'utf-8')
  );
  const converter: DocumentConverter = convert;
  return { converter, convert };
}

/** `YYYY-MM-DD` shifted by `days`, in UTC. */
export function addDays(date: string, days: number): string {
  const base = new Date(`${date}T00:00:00Z`);
  base.setUTCDate(base.getUTCDate() + days);
  return base.toISOString().slice(0, 10);
}

export async function writeFiles(dir: string, files: Record<string, string>): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
  for (const [name, content] of Object.entries(files)) {
    await fs.writeFile(path.join(dir, name), content);
  }
}
