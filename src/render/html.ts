import { DisplayInstruction } from './record.js';

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

function renderInstruction(item: DisplayInstruction): string {
  switch (item.kind) {
    case 'subtitle':
      return `<div class="dense-subtitle">${escapeHtml(item.text)}</div>`;
    case 'line': {
      const valueClass = item.emphasis === 'regular' ? 'dense-value-regular' : 'dense-value';
      return `<div class="dense-line"><span class="dense-key">${escapeHtml(item.label)}:</span> <span class="${valueClass}">${escapeHtml(item.value)}</span></div>`;
    }
    case 'tags': {
      const chips = item.chips
        .map(chip => `<span class="tag-chip" style="background:${escapeHtml(chip.color)}">${escapeHtml(chip.text)}</span>`)
        .join('');
      return `<div class="tag-row"><strong>${escapeHtml(item.label)}:</strong> ${chips}</div>`;
    }
    case 'block': {
      const toneClass = item.tone === 'soft' ? 'block block-soft' : 'block';
      return `<div class="${toneClass}"><div class="block-title">${escapeHtml(item.title)}</div>${renderInstructions(item.children)}</div>`;
    }
    case 'divider':
      return '<hr class="divider">';
    case 'empty':
      return `<div class="caption">${escapeHtml(item.text)}</div>`;
    case 'bullet':
      return `<ul class="dense-list"><li>${escapeHtml(item.text)}</li></ul>`;
    case 'text':
      return `<p>${escapeHtml(item.text)}</p>`;
  }
}

export function renderInstructions(items: DisplayInstruction[]): string {
  return items.map(renderInstruction).join('\n');
}
