/**
 * Catalog of result records and their source PDFs.
 *
 * results/<stem>.json is shown next to pdfs/<stem>.pdf.
 */
import fs from 'fs';
import path from 'path';
import { Memo } from './cache.js';
import { JsonNode, toJsonNode } from './types.js';

export const RESERVED_PREFIX = '_';

// Only one file whose name contains this may appear in the selection list.
export const SINGLE_ENTRY_SUBSTRING = 'преднизолон';

/**
 * Sorted selection list from raw file names: JSON files only, hidden and reserved names dropped,
 * and just the first name containing SINGLE_ENTRY_SUBSTRING (case-insensitive) kept.
 */
export function buildSelectionList(fileNames: string[]): string[] {
  const files = fileNames
    .filter(name => name.endsWith('.json') && !name.startsWith(RESERVED_PREFIX) && !name.startsWith('.'))
    .sort();

  const filtered: string[] = [];
  let singleEntryKept = false;
  for (const name of files) {
    if (name.toLowerCase().includes(SINGLE_ENTRY_SUBSTRING)) {
      if (singleEntryKept) continue;
      singleEntryKept = true;
    }
    filtered.push(name);
  }
  return filtered;
}

export function stemOf(fileName: string): string {
  return path.parse(fileName).name;
}

export interface DocumentPaths {
  item: string;
  stem: string;
  resultPath: string;
  pdfPath: string;
}

export type LoadedResult =
  | { status: 'ok'; record: JsonNode }
  | { status: 'missing'; path: string }
  | { status: 'unreadable'; path: string; error: string };

export class Catalog {
  private listing: string[] | null = null;
  private records = new Memo<JsonNode>();

  constructor(
    readonly resultsDir: string,
    readonly pdfDir: string,
  ) {}

  resultsDirExists(): boolean {
    return fs.existsSync(this.resultsDir);
  }

  /** Selection list, read once; `clear()` rereads it. */
  listResultFiles(): string[] {
    if (this.listing) return this.listing;
    if (!this.resultsDirExists()) {
      console.warn(`[CATALOG] Results directory not found: ${this.resultsDir}`);
      return [];
    }

    const entries = fs.readdirSync(this.resultsDir, { withFileTypes: true });
    const names = entries.filter(e => e.isFile()).map(e => e.name);
    this.listing = buildSelectionList(names);
    console.log(`[CATALOG] ${this.listing.length} result files in ${this.resultsDir}`);
    return this.listing;
  }

  has(item: string): boolean {
    return this.listResultFiles().includes(item);
  }

  paths(item: string): DocumentPaths {
    const stem = stemOf(item);
    return {
      item,
      stem,
      resultPath: path.join(this.resultsDir, item),
      pdfPath: path.join(this.pdfDir, `${stem}.pdf`),
    };
  }

  /** Item whose stem is `stem`, if it is in the selection list. */
  itemForStem(stem: string): string | undefined {
    return this.listResultFiles().find(item => stemOf(item) === stem);
  }

  async loadResult(item: string): Promise<LoadedResult> {
    const { resultPath } = this.paths(item);
    if (!fs.existsSync(resultPath)) return { status: 'missing', path: resultPath };

    try {
      const record = await this.records.get(resultPath, async () => {
        const text = await fs.promises.readFile(resultPath, 'utf8');
        return toJsonNode(JSON.parse(text));
      });
      return { status: 'ok', record };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`[CATALOG] Failed to load ${resultPath}:`, message);
      return { status: 'unreadable', path: resultPath, error: message };
    }
  }

  /** Raw parsed JSON of a result file, for the API. */
  async readRaw(item: string): Promise<unknown> {
    const { resultPath } = this.paths(item);
    const text = await fs.promises.readFile(resultPath, 'utf8');
    return JSON.parse(text);
  }

  clear(): void {
    this.listing = null;
    this.records.clear();
  }
}
