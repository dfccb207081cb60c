// Result records are arbitrary JSON; this is the closed set of shapes the renderer matches on.
export type JsonNode =
  | { kind: 'object'; entries: Array<[string, JsonNode]> }
  | { kind: 'array'; items: JsonNode[] }
  | { kind: 'string'; value: string }
  | { kind: 'number'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'null' };

export type ScalarNode = Extract<JsonNode, { kind: 'string' | 'number' | 'boolean' | 'null' }>;

export function isScalar(node: JsonNode): node is ScalarNode {
  return node.kind !== 'object' && node.kind !== 'array';
}

/**
 * Convert a parsed JSON value into a JsonNode tree.
 * Values JSON cannot carry (undefined, functions, NaN) become null.
 */
export function toJsonNode(value: unknown): JsonNode {
  if (value === null || value === undefined) return { kind: 'null' };
  if (typeof value === 'string') return { kind: 'string', value };
  if (typeof value === 'number') {
    return Number.isFinite(value) ? { kind: 'number', value } : { kind: 'null' };
  }
  if (typeof value === 'boolean') return { kind: 'boolean', value };
  if (Array.isArray(value)) return { kind: 'array', items: value.map(toJsonNode) };
  if (typeof value === 'object') {
    return {
      kind: 'object',
      entries: Object.entries(value).map(([key, child]): [string, JsonNode] => [key, toJsonNode(child)]),
    };
  }
  return { kind: 'null' };
}

// Inclusive 1-based page range
export interface PageRange {
  first: number;
  last: number;
}

export interface TextExtractor {
  extractPages(pdfPath: string, range?: PageRange): Promise<string[]>;
}

export interface PageCounter {
  countPages(pdfPath: string): Promise<number>;
}

export interface RenderedPage {
  pageNumber: number;
  png: Uint8Array;
  width: number;
  height: number;
}

export interface PageRasterizer {
  rasterize(pdfPath: string, page: number, dpi: number): Promise<RenderedPage | null>;
}
