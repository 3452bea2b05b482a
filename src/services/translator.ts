import fs from 'node:fs/promises';
import type { PromptTemplate, TextService, TranslationStatus } from '../types';
import { isUpToDate, pathExists, writeFileAtomic } from '../utils/fs';
import { withTimeout } from '../utils/pool';

export interface TranslateOptions {
  source: string;
  target: string;
  prompt: PromptTemplate;
  timeoutMs: number;
}

/**
 * Translates the whole highlights document in one call. Skips the call when
 * the translation is at least as new as the source. Never rejects: the
 * untranslated document stands on its own.
 */
export async function translateHighlights(
  service: TextService,
  options: TranslateOptions
): Promise<TranslationStatus> {
  const { source, target } = options;
  try {
    if (!(await pathExists(source))) {
      console.warn(`[translate] 找不到原文：${source}`);
      return 'failed';
    }
    if (await isUpToDate(source, target)) {
      console.log(`[skip] 译文已是最新：${target}`);
      return 'skipped';
    }
    const text = await fs.readFile(source, 'utf-8');
    const translated = await withTimeout('翻译 highlights', options.timeoutMs, signal =>
      service.complete(options.prompt, text, signal)
    );
    if (!translated.trim()) {
      console.warn('[translate] 翻译结果为空');
      return 'failed';
    }
    await writeFileAtomic(target, `${translated.trim()}\n`);
    console.log(`[success] 已生成译文：${target}`);
    return 'translated';
  } catch (error) {
    console.error('[translate] 翻译失败：', error);
    return 'failed';
  }
}
