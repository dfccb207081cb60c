/**
 * Viewer HTTP app.
 *
 * Every viewer URL carries a session id; the session remembers the selected item and
 * the page shown for it. Page buttons POST and redirect back to the viewer.
 */

import express, { Request, Response } from 'express';
import cors from 'cors';
import fs from 'fs';
import path from 'path';
import { randomUUID } from 'crypto';
import { fileURLToPath } from 'url';
import { ViewerServices } from './services.js';
import { selectDocument } from './session-store.js';
import { PageAction, applyPageAction, currentPage, initPage, isPageAction } from './pagination.js';
import { renderNode } from './render/record.js';
import { PdfPanel, ResultPanel, renderErrorPage, renderViewerPage } from './render/page.js';
import { uiText } from './render/locale.js';
import { DocumentPaths } from './catalog.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const PUBLIC_DIR = path.join(__dirname, '../public');

export function pageImageUrl(stem: string, page: number): string {
  return `/documents/${encodeURIComponent(stem)}/pages/${page}`;
}

export function pdfFileUrl(stem: string): string {
  return `/documents/${encodeURIComponent(stem)}/pdf`;
}

function viewerUrl(sessionId: string, item?: string): string {
  const base = `/s/${encodeURIComponent(sessionId)}`;
  return item ? `${base}?item=${encodeURIComponent(item)}` : base;
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

export function createApp(services: ViewerServices): express.Express {
  const { catalog, sections, pages, renderer, sessions, locale } = services;
  const app = express();

  app.use(cors());
  app.use(express.urlencoded({ extended: false }));
  app.use(express.static(PUBLIC_DIR));

  async function resultPanel(item: string): Promise<ResultPanel> {
    const loaded = await catalog.loadResult(item);
    switch (loaded.status) {
      case 'ok':
        return { status: 'ok', instructions: renderNode(loaded.record, locale) };
      case 'missing':
        return { status: 'missing', path: loaded.path };
      case 'unreadable':
        return { status: 'unreadable', path: loaded.path };
    }
  }

  /**
   * Give the document a page in the session (the section start on first view), apply
   * `action` if any, and save. The session is read after the PDF lookups so a page
   * change saved by another request in the meantime is kept.
   */
  async function updatePages(
    sessionId: string,
    item: string,
    doc: DocumentPaths,
    action?: PageAction,
  ): Promise<{ page: number; totalPages: number }> {
    const totalPages = await pages.count(doc.pdfPath);
    const start = await sections.locate(doc.pdfPath);

    const session = selectDocument(await sessions.getOrCreateSession(sessionId), item);
    let state = initPage(session.pages, doc.stem, start, totalPages);
    if (action) state = applyPageAction(state, doc.stem, action, totalPages);
    await sessions.updateSession(sessionId, { selected: item, pages: state });

    return { page: currentPage(state, doc.stem, totalPages), totalPages };
  }

  async function pdfPanel(sessionId: string, item: string, doc: DocumentPaths): Promise<PdfPanel> {
    if (!fs.existsSync(doc.pdfPath)) {
      return { status: 'missing', pdfPath: doc.pdfPath };
    }

    const { page, totalPages } = await updatePages(sessionId, item, doc);
    const rendered = await renderer.render(doc.pdfPath, page);
    return {
      status: 'ok',
      fileName: path.basename(doc.pdfPath),
      page,
      totalPages,
      imageUrl: rendered ? pageImageUrl(doc.stem, page) : null,
      pdfUrl: pdfFileUrl(doc.stem),
    };
  }

  // Health check
  app.get('/health', (req: Request, res: Response) => {
    res.json({ status: 'ok', service: 'dosage-viewer' });
  });

  app.get('/', (req: Request, res: Response) => {
    res.redirect(viewerUrl(randomUUID()));
  });

  app.get('/s/:sessionId', async (req: Request, res: Response) => {
    const { sessionId } = req.params;

    try {
      const items = catalog.listResultFiles();
      if (items.length === 0) {
        res.status(500).send(renderErrorPage(uiText(locale, 'noResults', { dir: catalog.resultsDir }), locale));
        return;
      }

      const session = await sessions.getOrCreateSession(sessionId);
      const requested = queryString(req.query.item);
      if (requested && !items.includes(requested)) {
        console.warn(`[SERVER] Unknown item requested: ${requested}`);
      }

      const selected = [requested, session.selected].find(
        (item): item is string => item !== undefined && items.includes(item),
      ) ?? items[0];
      await sessions.saveSession(selectDocument(session, selected));

      const doc = catalog.paths(selected);
      const result = await resultPanel(selected);
      const pdf = await pdfPanel(sessionId, selected, doc);

      res.send(renderViewerPage({ sessionId, items, selected, result, pdf }, locale));
    } catch (error) {
      console.error('[SERVER] Viewer render failed:', error);
      res.status(500).send(renderErrorPage(error instanceof Error ? error.message : String(error), locale));
    }
  });

  app.post('/s/:sessionId/page', async (req: Request, res: Response) => {
    const { sessionId } = req.params;
    const item = queryString(req.body?.item);
    const action: unknown = req.body?.action;

    if (!item || !catalog.has(item)) {
      res.status(400).json({ error: 'Unknown item' });
      return;
    }
    if (!isPageAction(action)) {
      res.status(400).json({ error: 'action must be "next" or "prev"' });
      return;
    }

    try {
      const doc = catalog.paths(item);
      if (fs.existsSync(doc.pdfPath)) {
        await updatePages(sessionId, item, doc, action);
      } else {
        await sessions.saveSession(selectDocument(await sessions.getOrCreateSession(sessionId), item));
      }
      res.redirect(303, viewerUrl(sessionId, item));
    } catch (error) {
      console.error('[SERVER] Page change failed:', error);
      res.status(500).json({ error: 'Failed to change page' });
    }
  });

  app.get('/documents/:stem/pages/:page', async (req: Request, res: Response) => {
    const item = catalog.itemForStem(req.params.stem);
    const page = Number(req.params.page);
    if (!item || !Number.isInteger(page) || page < 1) {
      res.status(404).json({ error: 'Page not found' });
      return;
    }

    const { pdfPath } = catalog.paths(item);
    if (!fs.existsSync(pdfPath)) {
      res.status(404).json({ error: 'PDF not found' });
      return;
    }

    try {
      const totalPages = await pages.count(pdfPath);
      const rendered = page <= totalPages ? await renderer.render(pdfPath, page) : null;
      if (!rendered) {
        res.status(404).json({ error: 'Page could not be rendered' });
        return;
      }
      res.type('png').send(Buffer.from(rendered.png));
    } catch (error) {
      console.error('[SERVER] Page image failed:', error);
      res.status(500).json({ error: 'Failed to render page' });
    }
  });

  app.get('/documents/:stem/pdf', (req: Request, res: Response) => {
    const item = catalog.itemForStem(req.params.stem);
    if (!item) {
      res.status(404).json({ error: 'Document not found' });
      return;
    }
    const { pdfPath } = catalog.paths(item);
    if (!fs.existsSync(pdfPath)) {
      res.status(404).json({ error: 'PDF not found' });
      return;
    }
    res.type('pdf').sendFile(pdfPath);
  });

  app.get('/api/results', (req: Request, res: Response) => {
    const files = catalog.listResultFiles();
    res.json({ count: files.length, files });
  });

  app.get('/api/results/:name', async (req: Request, res: Response) => {
    const { name } = req.params;
    if (!catalog.has(name)) {
      res.status(404).json({ error: 'Result not found' });
      return;
    }

    try {
      res.json(await catalog.readRaw(name));
    } catch (error) {
      console.error(`[SERVER] Failed to read result ${name}:`, error);
      res.status(500).json({ error: 'Failed to load result' });
    }
  });

  app.get('/api/documents/:stem', async (req: Request, res: Response) => {
    const item = catalog.itemForStem(req.params.stem);
    if (!item) {
      res.status(404).json({ error: 'Document not found' });
      return;
    }
    const { pdfPath, stem } = catalog.paths(item);
    if (!fs.existsSync(pdfPath)) {
      res.status(404).json({ error: 'PDF not found' });
      return;
    }

    try {
      const totalPages = await pages.count(pdfPath);
      const sectionPage = Math.min(await sections.locate(pdfPath), totalPages);
      res.json({ item, stem, totalPages, sectionLabel: sections.defaultLabel, sectionPage });
    } catch (error) {
      console.error(`[SERVER] Failed to inspect ${pdfPath}:`, error);
      res.status(500).json({ error: 'Failed to inspect document' });
    }
  });

  return app;
}
