import { describe, it, expect, vi } from 'vitest';
import { PageRenderer } from './page-renderer.js';
import { PageRasterizer, RenderedPage } from '../types.js';

const PNG: RenderedPage = { pageNumber: 2, png: new Uint8Array([137, 80, 78, 71]), width: 992, height: 1403 };

describe('PageRenderer', () => {
  it('rasterizes at the configured resolution', async () => {
    const rasterize = vi.fn<PageRasterizer['rasterize']>(async () => PNG);
    const renderer = new PageRenderer({ rasterize });

    await expect(renderer.render('/pdfs/a.pdf', 2)).resolves.toBe(PNG);
    expect(rasterize).toHaveBeenCalledWith('/pdfs/a.pdf', 2, 120);
  });

  it('reuses earlier renders', async () => {
    const rasterize = vi.fn<PageRasterizer['rasterize']>(async () => PNG);
    const renderer = new PageRenderer({ rasterize }, 150);

    await renderer.render('/pdfs/a.pdf', 2);
    await renderer.render('/pdfs/a.pdf', 2);
    expect(rasterize).toHaveBeenCalledTimes(1);
    expect(rasterize).toHaveBeenCalledWith('/pdfs/a.pdf', 2, 150);
  });

  it('returns null when rasterizing throws, and retries next time', async () => {
    const rasterize = vi.fn<PageRasterizer['rasterize']>()
      .mockRejectedValueOnce(new Error('canvas unavailable'))
      .mockResolvedValueOnce(PNG);
    const renderer = new PageRenderer({ rasterize });

    await expect(renderer.render('/pdfs/a.pdf', 2)).resolves.toBeNull();
    await expect(renderer.render('/pdfs/a.pdf', 2)).resolves.toBe(PNG);
  });

  it('returns null when no image comes back', async () => {
    const renderer = new PageRenderer({ rasterize: async () => null });
    await expect(renderer.render('/pdfs/a.pdf', 1)).resolves.toBeNull();
  });
});
