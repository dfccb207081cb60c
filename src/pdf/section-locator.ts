/**
 * Section Locator - find the page where a numbered section (e.g. "4.1") starts.
 *
 * Scans per-page text in order and returns the first page whose text contains the
 * section marker. Extraction failures and documents without the marker land on page 1.
 */

import { Memo, memoKey } from '../cache.js';
import { TextExtractor } from '../types.js';

export const DEFAULT_SECTION_LABEL = '4.1';

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Case-insensitive, word-bounded pattern for a section label. Each "." or "," in the
 * label matches either separator, so "4.1" also finds "4,1".
 */
export function buildSectionPattern(label: string): RegExp {
  const body = label
    .trim()
    .split(/[.,]/)
    .map(escapeRegExp)
    .join('[.,]');
  return new RegExp(`\\b${body}\\b`, 'i');
}

/** 1-based index of the first page matching `pattern`, or null. */
export function findMatchingPage(pages: string[], pattern: RegExp): number | null {
  for (let i = 0; i < pages.length; i++) {
    if (pattern.test(pages[i])) return i + 1;
  }
  return null;
}

export async function locateSectionPage(
  pdfPath: string,
  label: string = DEFAULT_SECTION_LABEL,
  extractor: TextExtractor,
): Promise<number> {
  const pattern = buildSectionPattern(label);
  let pages: string[];
  try {
    pages = await extractor.extractPages(pdfPath);
  } catch (error) {
    console.warn(`[SECTION] Text extraction failed for ${pdfPath}, opening page 1:`, error instanceof Error ? error.message : error);
    return 1;
  }

  const page = findMatchingPage(pages, pattern);
  if (page === null) {
    console.log(`[SECTION] "${label}" not found in ${pages.length} pages of ${pdfPath}, opening page 1`);
    return 1;
  }
  console.log(`[SECTION] "${label}" found on page ${page} of ${pdfPath}`);
  return page;
}

export class SectionLocator {
  private cache = new Memo<number>();

  constructor(
    private readonly extractor: TextExtractor,
    readonly defaultLabel: string = DEFAULT_SECTION_LABEL,
  ) {}

  locate(pdfPath: string, label: string = this.defaultLabel): Promise<number> {
    return this.cache.get(memoKey(pdfPath, label), () => locateSectionPage(pdfPath, label, this.extractor));
  }
}
