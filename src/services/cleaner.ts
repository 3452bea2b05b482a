import type { BoundaryPredicate } from '../types';

/** "Disclosures" headings, except cross references such as "see disclosures". */
export const disclosuresBoundary: BoundaryPredicate = line => {
  const low = line.toLowerCase();
  return low.includes('disclosures') && !low.includes('see');
};

/** 免责声明 headings, except "请阅读…免责声明" style references. */
export const disclaimerBoundary: BoundaryPredicate = line =>
  line.includes('免责声明') && !line.includes('阅读');

export const DEFAULT_BOUNDARIES: readonly BoundaryPredicate[] = [
  disclosuresBoundary,
  disclaimerBoundary
];

/**
 * Keeps every line up to and including the first one any predicate matches.
 * This is a heuristic cut: a few lines of boilerplate may survive, or a few
 * lines of content may be lost.
 */
export function cleanText(
  text: string,
  boundaries: readonly BoundaryPredicate[] = DEFAULT_BOUNDARIES
): string {
  const kept: string[] = [];
  for (const line of text.split('\n')) {
    kept.push(line);
    if (boundaries.some(isBoundary => isBoundary(line))) {
      break;
    }
  }
  return kept.join('\n');
}
