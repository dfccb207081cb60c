/**
 * Viewer page: result record on the left, source PDF page on the right.
 */
import { DisplayInstruction } from './record.js';
import { escapeHtml, renderInstructions } from './html.js';
import { Locale, uiText } from './locale.js';

export type ResultPanel =
  | { status: 'ok'; instructions: DisplayInstruction[] }
  | { status: 'missing'; path: string }
  | { status: 'unreadable'; path: string };

export type PdfPanel =
  | { status: 'missing'; pdfPath: string }
  | {
      status: 'ok';
      fileName: string;
      page: number;
      totalPages: number;
      imageUrl: string | null; // null when the page could not be rendered
      pdfUrl: string;
    };

export interface ViewerPageModel {
  sessionId: string;
  items: string[];
  selected: string;
  result: ResultPanel;
  pdf: PdfPanel;
}

function layout(locale: Locale, body: string): string {
  return `<!DOCTYPE html>
<html lang="ru">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${escapeHtml(uiText(locale, 'pageTitle'))}</title>
  <link rel="stylesheet" href="/styles.css">
</head>
<body>
${body}
</body>
</html>`;
}

function selector(model: ViewerPageModel, locale: Locale): string {
  const options = model.items
    .map(item => {
      const selected = item === model.selected ? ' selected' : '';
      return `<option value="${escapeHtml(item)}"${selected}>${escapeHtml(item)}</option>`;
    })
    .join('');
  return `<form class="selector" method="get" action="/s/${encodeURIComponent(model.sessionId)}">
  <label for="item">${escapeHtml(uiText(locale, 'selectLabel'))}</label>
  <select id="item" name="item" onchange="this.form.submit()">${options}</select>
  <noscript><button type="submit">${escapeHtml(uiText(locale, 'selectButton'))}</button></noscript>
</form>`;
}

function pageControl(model: ViewerPageModel, locale: Locale, page: number, totalPages: number, showCaption: boolean): string {
  const caption = showCaption
    ? `<div class="caption">${escapeHtml(uiText(locale, 'pageCaption', { page, total: totalPages }))}</div>`
    : '';
  return `${caption}<form class="page-control" method="post" action="/s/${encodeURIComponent(model.sessionId)}/page">
  <input type="hidden" name="item" value="${escapeHtml(model.selected)}">
  <button type="submit" name="action" value="prev">${escapeHtml(uiText(locale, 'prevButton'))}</button>
  <button type="submit" name="action" value="next">${escapeHtml(uiText(locale, 'nextButton'))}</button>
</form>`;
}

function resultPanel(panel: ResultPanel, locale: Locale): string {
  switch (panel.status) {
    case 'ok':
      return renderInstructions(panel.instructions);
    case 'missing':
      return `<div class="alert alert-error">${escapeHtml(uiText(locale, 'resultMissing', { path: panel.path }))}</div>`;
    case 'unreadable':
      return `<div class="alert alert-error">${escapeHtml(uiText(locale, 'resultUnreadable', { path: panel.path }))}</div>`;
  }
}

function pdfPanel(model: ViewerPageModel, locale: Locale): string {
  const panel = model.pdf;
  if (panel.status === 'missing') {
    return `<div class="alert alert-error">${escapeHtml(uiText(locale, 'pdfMissing', { path: panel.pdfPath }))}</div>`;
  }

  const top = pageControl(model, locale, panel.page, panel.totalPages, true);
  if (panel.imageUrl === null) {
    return `${top}
<div class="alert alert-warning">${escapeHtml(uiText(locale, 'renderFailed'))}</div>
<a class="fallback-link" href="${escapeHtml(panel.pdfUrl)}">${escapeHtml(uiText(locale, 'openPdf'))}</a>`;
  }

  const caption = uiText(locale, 'imageCaption', { file: panel.fileName, page: panel.page, total: panel.totalPages });
  return `${top}
<figure class="pdf-page">
  <img src="${escapeHtml(panel.imageUrl)}" alt="${escapeHtml(caption)}">
  <figcaption>${escapeHtml(caption)}</figcaption>
</figure>
${pageControl(model, locale, panel.page, panel.totalPages, false)}`;
}

export function renderViewerPage(model: ViewerPageModel, locale: Locale): string {
  return layout(locale, `${selector(model, locale)}
<main class="columns">
  <section class="panel panel-result">
    <h2>${escapeHtml(uiText(locale, 'resultHeading'))}</h2>
    <div class="panel-scroll">
${resultPanel(model.result, locale)}
    </div>
  </section>
  <div class="column-rule"></div>
  <section class="panel panel-source">
    <h2>${escapeHtml(uiText(locale, 'sourceHeading'))}</h2>
    <div class="panel-scroll">
${pdfPanel(model, locale)}
    </div>
  </section>
</main>`);
}

export function renderErrorPage(message: string, locale: Locale): string {
  return layout(locale, `<div class="alert alert-error">${escapeHtml(message)}</div>`);
}
