/**
 * In-process PDF collaborators built on pdf-parse (pdf.js underneath).
 *
 * Rasterizing always goes through here; text extraction and page counting only when
 * PDF_BACKEND=pdf-parse.
 */
import fs from 'fs';
import { PDFParse } from 'pdf-parse';
import { PageCounter, PageRange, PageRasterizer, RenderedPage, TextExtractor } from '../types.js';

// pdf.js renders at 72 units per inch at scale 1
const PDF_UNITS_PER_INCH = 72;

async function withParser<T>(pdfPath: string, fn: (parser: PDFParse) => Promise<T>): Promise<T> {
  const buffer = await fs.promises.readFile(pdfPath);
  const parser = new PDFParse({ data: new Uint8Array(buffer) });
  try {
    return await fn(parser);
  } finally {
    await parser.destroy();
  }
}

function pagesInRange(range: PageRange): number[] {
  const pages: number[] = [];
  for (let page = range.first; page <= range.last; page++) pages.push(page);
  return pages;
}

export class PdfParseTextExtractor implements TextExtractor {
  async extractPages(pdfPath: string, range?: PageRange): Promise<string[]> {
    return withParser(pdfPath, async parser => {
      const result = await parser.getText(range ? { partial: pagesInRange(range) } : {});
      return result.pages.map(p => p.text);
    });
  }
}

export class PdfParsePageCounter implements PageCounter {
  async countPages(pdfPath: string): Promise<number> {
    try {
      const info = await withParser(pdfPath, parser => parser.getInfo());
      return Math.max(1, info.total);
    } catch (error) {
      console.warn(`[TOOLS] pdf-parse could not count pages of ${pdfPath}, assuming 1:`, error instanceof Error ? error.message : error);
      return 1;
    }
  }
}

export class PdfParseRasterizer implements PageRasterizer {
  async rasterize(pdfPath: string, page: number, dpi: number): Promise<RenderedPage | null> {
    return withParser(pdfPath, async parser => {
      const result = await parser.getScreenshot({
        partial: [page],
        scale: dpi / PDF_UNITS_PER_INCH,
        imageBuffer: true,
        imageDataUrl: false,
      });
      const shot = result.pages[0];
      if (!shot) return null;
      return {
        pageNumber: shot.pageNumber,
        png: shot.data,
        width: shot.width,
        height: shot.height,
      };
    });
  }
}
