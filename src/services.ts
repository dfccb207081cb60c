import { Catalog } from './catalog.js';
import { ViewerConfig } from './config.js';
import { PageRenderer } from './pdf/page-renderer.js';
import { PdfParsePageCounter, PdfParseRasterizer, PdfParseTextExtractor } from './pdf/pdf-parse-backend.js';
import { PdfinfoPageCounter, PdftotextExtractor } from './pdf/poppler.js';
import { SectionLocator } from './pdf/section-locator.js';
import { createToolRunner, resolveToolLocations } from './pdf/tools.js';
import { Memo } from './cache.js';
import { SessionStore } from './session-store.js';
import { PageCounter, PageRasterizer, TextExtractor } from './types.js';
import { Locale, loadLocale } from './render/locale.js';

export interface ViewerServices {
  catalog: Catalog;
  sections: SectionLocator;
  pages: PageCounts;
  renderer: PageRenderer;
  sessions: SessionStore;
  locale: Locale;
}

/** Memoised page counts per PDF path. */
export class PageCounts {
  private cache = new Memo<number>();

  constructor(private readonly counter: PageCounter) {}

  count(pdfPath: string): Promise<number> {
    return this.cache.get(pdfPath, () => this.counter.countPages(pdfPath));
  }
}

export interface Collaborators {
  extractor: TextExtractor;
  counter: PageCounter;
  rasterizer: PageRasterizer;
}

/** Pick the PDF collaborators for the configured backend. Tools resolve here, once. */
export function createCollaborators(config: ViewerConfig): Collaborators {
  const rasterizer = new PdfParseRasterizer();
  if (config.pdfBackend === 'pdf-parse') {
    console.log('[TOOLS] Using pdf-parse for text extraction and page counts');
    return { extractor: new PdfParseTextExtractor(), counter: new PdfParsePageCounter(), rasterizer };
  }

  const tools = resolveToolLocations(config);
  const run = createToolRunner(config.toolTimeoutMs);
  return {
    extractor: new PdftotextExtractor(tools.pdftotext, run),
    counter: new PdfinfoPageCounter(tools.pdfinfo, run),
    rasterizer,
  };
}

export function createServices(config: ViewerConfig, collaborators: Collaborators = createCollaborators(config)): ViewerServices {
  return {
    catalog: new Catalog(config.resultsDir, config.pdfDir),
    sections: new SectionLocator(collaborators.extractor, config.sectionLabel),
    pages: new PageCounts(collaborators.counter),
    renderer: new PageRenderer(collaborators.rasterizer, config.renderDpi),
    sessions: new SessionStore(config.sessionTtlSeconds),
    locale: loadLocale('ru'),
  };
}
