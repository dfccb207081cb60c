import { Memo, memoKey } from '../cache.js';
import { PageRasterizer, RenderedPage } from '../types.js';

export const DEFAULT_RENDER_DPI = 120;

/**
 * Renders single PDF pages to PNG. Any rasterizer error yields null so the page view
 * can fall back to a link. Only successful renders are cached.
 */
export class PageRenderer {
  private cache = new Memo<RenderedPage>();

  constructor(
    private readonly rasterizer: PageRasterizer,
    readonly dpi: number = DEFAULT_RENDER_DPI,
  ) {}

  async render(pdfPath: string, page: number): Promise<RenderedPage | null> {
    try {
      return await this.cache.get(memoKey(pdfPath, page, this.dpi), async () => {
        const rendered = await this.rasterizer.rasterize(pdfPath, page, this.dpi);
        if (!rendered) throw new Error('rasterizer produced no image');
        return rendered;
      });
    } catch (error) {
      console.error(`[RENDER] Could not render page ${page} of ${pdfPath}:`, error instanceof Error ? error.message : error);
      return null;
    }
  }
}
