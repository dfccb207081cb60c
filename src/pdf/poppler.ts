import { PageCounter, PageRange, TextExtractor } from '../types.js';
import { ToolRunner } from './tools.js';

/**
 * Per-page text via `pdftotext -layout`. pdftotext ends every page with a form feed,
 * so stdout splits into one chunk per page (plus a trailing empty chunk).
 */
export class PdftotextExtractor implements TextExtractor {
  constructor(
    private readonly binary: string,
    private readonly run: ToolRunner,
  ) {}

  async extractPages(pdfPath: string, range?: PageRange): Promise<string[]> {
    const args = ['-layout'];
    if (range) {
      args.push('-f', String(range.first), '-l', String(range.last));
    }
    args.push(pdfPath, '-');

    const stdout = await this.run(this.binary, args);
    return stdout.split('\f');
  }
}

export function parsePdfinfoPages(output: string): number | null {
  for (const line of output.split(/\r?\n/)) {
    if (!line.toLowerCase().startsWith('pages:')) continue;
    const value = line.slice(line.indexOf(':') + 1).trim();
    if (!/^[+-]?\d+$/.test(value)) return null;
    return Math.max(1, parseInt(value, 10));
  }
  return null;
}

/**
 * Page count from `pdfinfo`. Anything unexpected (tool missing, non-zero exit,
 * no readable `Pages:` line) counts as a single page.
 */
export class PdfinfoPageCounter implements PageCounter {
  constructor(
    private readonly binary: string,
    private readonly run: ToolRunner,
  ) {}

  async countPages(pdfPath: string): Promise<number> {
    try {
      const stdout = await this.run(this.binary, [pdfPath]);
      const pages = parsePdfinfoPages(stdout);
      if (pages === null) {
        console.warn(`[TOOLS] pdfinfo gave no page count for ${pdfPath}, assuming 1`);
        return 1;
      }
      return pages;
    } catch (error) {
      console.warn(`[TOOLS] pdfinfo failed for ${pdfPath}, assuming 1 page:`, error instanceof Error ? error.message : error);
      return 1;
    }
  }
}
