import type { HighlightEntry, NormalizedHeader, SplitSummary } from '../types';
import { isWithinWindow, parseDateFromText, stripLeadingDate } from '../utils/dates';
import { stripInlineMarkup } from '../utils/markdown';

const DATED_HEADER = /^\s*(\d{4}-\d{2}-\d{2})\s*[,，]?\s*([^:：]+?)\s*[:：]\s*(.+)$/;
const COLON_SPLIT = /^(.*?)\s*[:：]\s*(.*)$/;

export interface NormalizeOptions {
  referenceDate: string;
  windowDays: number;
  cleanedText?: string;
}

function trimCommas(value: string): string {
  return value.replace(/^[\s,，]+|[\s,，]+$/g, '');
}

function headerFromLine(line: string): string {
  if (line.length >= 4 && line.startsWith('**') && line.endsWith('**')) {
    return line.replace(/^\*+|\*+$/g, '').trim();
  }
  if (line.startsWith('- ') || line.startsWith('* ')) {
    return line.slice(2).trim();
  }
  return line.replace(/^#+\s*/, '').trim();
}

function toBullet(line: string): string | undefined {
  if (line.startsWith('- ')) {
    return line;
  }
  if (line.startsWith('* ')) {
    return `- ${line.slice(2).trim()}`;
  }
  const text = stripInlineMarkup(line);
  return text ? `- ${text}` : undefined;
}

/**
 * Splits a summary into its first non-blank line (the header) and the
 * remaining non-blank lines as `- ` bullets.
 */
export function splitSummary(text: string): SplitSummary {
  const lines = text
    .trim()
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(Boolean);
  if (!lines.length) {
    return { header: '', bullets: [] };
  }
  const [first, ...rest] = lines;
  const bullets: string[] = [];
  for (const line of rest) {
    const bullet = toBullet(line);
    if (bullet) bullets.push(bullet);
  }
  return { header: headerFromLine(first), bullets };
}

function reconcile(candidate: string | undefined, options: NormalizeOptions): string {
  if (candidate && isWithinWindow(candidate, options.referenceDate, options.windowDays)) {
    return candidate;
  }
  return options.referenceDate;
}

function compose(date: string, source: string, title: string): NormalizedHeader {
  let header = date;
  if (title) {
    header = `${date},${source}: ${title}`;
  } else if (source) {
    header = `${date},${source}`;
  }
  return { header, date, source, title };
}

/**
 * Rewrites a summary header to `YYYY-MM-DD,<source>: <title>`.
 *
 * The date is the first one found in the header, then the summary, then the
 * cleaned source text, and is only trusted when it lies within
 * `windowDays` of the reference date; otherwise the reference date is used.
 * Summaries often cite unrelated historical dates, which this guards against.
 */
export function normalizeHeader(
  header: string,
  summaryText: string,
  options: NormalizeOptions
): NormalizedHeader {
  const trimmed = header.trim();

  const dated = DATED_HEADER.exec(trimmed);
  if (dated) {
    return compose(reconcile(dated[1], options), trimCommas(dated[2]), dated[3].trim());
  }

  const candidate =
    parseDateFromText(trimmed) ??
    parseDateFromText(summaryText) ??
    parseDateFromText(options.cleanedText);
  const date = reconcile(candidate, options);

  let left = trimmed;
  let title = '';
  const split = COLON_SPLIT.exec(trimmed);
  if (split) {
    left = split[1];
    title = split[2].trim();
  }
  return compose(date, trimCommas(stripLeadingDate(left)), title);
}

export function toHighlightEntry(
  itemId: string,
  summaryText: string,
  link: string,
  options: NormalizeOptions
): HighlightEntry {
  const { header, bullets } = splitSummary(summaryText);
  return {
    itemId,
    ...normalizeHeader(header, summaryText, options),
    bullets,
    link
  };
}
