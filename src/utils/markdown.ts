import fs from 'node:fs/promises';
import path from 'node:path';
import matter from 'gray-matter';
import { unified } from 'unified';
import remarkParse from 'remark-parse';
import remarkGfm from 'remark-gfm';
import { visit } from 'unist-util-visit';
import type { PromptTemplate } from '../types';

const processor = unified().use(remarkParse).use(remarkGfm);

/**
 * Reduces one line of Markdown to its visible text: emphasis, heading and
 * list markers, links and inline code fences are dropped.
 */
export function stripInlineMarkup(line: string): string {
  const tree = processor.parse(line);
  const parts: string[] = [];
  visit(tree, node => {
    if (node.type === 'text' || node.type === 'inlineCode') {
      parts.push(node.value);
    }
  });
  return parts.join('').replace(/\s+/g, ' ').trim();
}

export async function loadPromptTemplate(
  filePath: string,
  defaultModel: string
): Promise<PromptTemplate> {
  const raw = await fs.readFile(filePath, 'utf-8');
  const parsed = matter(raw);
  const text = parsed.content.trim();
  if (!text) {
    throw new Error(`提示词文件为空：${filePath}`);
  }
  const model =
    typeof parsed.data.model === 'string' && parsed.data.model.trim().length
      ? parsed.data.model.trim()
      : defaultModel;
  const minLength =
    typeof parsed.data.minLength === 'number' && Number.isInteger(parsed.data.minLength)
      ? parsed.data.minLength
      : undefined;
  return {
    name: path.basename(filePath, path.extname(filePath)),
    text,
    model,
    ...(minLength !== undefined ? { minLength } : {})
  };
}
