/**
 * Structured record renderer: turns a result record into a flat list of display
 * instructions (nested only through blocks). Pure; the HTML layer draws them.
 */
import { JsonNode, ScalarNode, isScalar } from '../types.js';
import { humanizeValue, formatScalar } from './humanize.js';
import { Locale, labelFor, uiText } from './locale.js';

export interface Chip {
  text: string;
  color: string;
}

export type DisplayInstruction =
  | { kind: 'subtitle'; text: string }
  | { kind: 'line'; label: string; value: string; emphasis: 'bold' | 'regular' }
  | { kind: 'tags'; label: string; chips: Chip[] }
  | { kind: 'block'; title: string; tone: 'plain' | 'soft'; children: DisplayInstruction[] }
  | { kind: 'divider' }
  | { kind: 'empty'; text: string }
  | { kind: 'bullet'; text: string }
  | { kind: 'text'; text: string };

export const TAGS_KEY = 'tags';
export const TAG_PALETTE = ['#E3F2FD', '#E8F5E9', '#FFF3E0', '#F3E5F5', '#E0F7FA'];

// Keys with their own layout
const UNTITLED_OBJECT_KEY = 'indication';
const SOFT_BLOCK_KEY = 'administration';
const DIVIDED_LIST_KEY = 'dosage';
const REGULAR_WEIGHT_KEY = 'schemaDescription';

export function splitTags(raw: string): string[] {
  return raw
    .split(';')
    .map(part => part.trim())
    .filter(part => part.length > 0);
}

export function tagChips(raw: string): Chip[] {
  return splitTags(raw).map((text, idx) => ({ text, color: TAG_PALETTE[idx % TAG_PALETTE.length] }));
}

function isBlank(node: ScalarNode): boolean {
  return node.kind === 'null' || (node.kind === 'string' && node.value.trim() === '');
}

function scalarText(node: ScalarNode, locale: Locale): string {
  return node.kind === 'null' ? '' : formatScalar(node.value, locale);
}

/** "label: value" for one scalar entry; blank values produce nothing. */
export function renderScalarEntry(key: string, node: ScalarNode, locale: Locale): DisplayInstruction[] {
  if (node.kind === 'null' || isBlank(node)) return [];

  if (key === TAGS_KEY) {
    const chips = tagChips(formatScalar(node.value, locale));
    return chips.length > 0 ? [{ kind: 'tags', label: labelFor(locale, TAGS_KEY), chips }] : [];
  }

  return [{
    kind: 'line',
    label: labelFor(locale, key),
    value: humanizeValue(key, node.value, locale),
    emphasis: key === REGULAR_WEIGHT_KEY ? 'regular' : 'bold',
  }];
}

function schemeBlock(index: number, node: JsonNode, locale: Locale): DisplayInstruction {
  return {
    kind: 'block',
    title: uiText(locale, 'schemeBlock', { n: index }),
    tone: 'plain',
    children: renderNode(node, locale),
  };
}

function renderList(key: string, items: JsonNode[], locale: Locale): DisplayInstruction[] {
  const out: DisplayInstruction[] = [];
  if (key === DIVIDED_LIST_KEY) out.push({ kind: 'divider' });
  out.push({ kind: 'subtitle', text: labelFor(locale, key) });

  if (items.length === 0) {
    out.push({ kind: 'empty', text: uiText(locale, 'emptyList') });
    return out;
  }

  items.forEach((item, idx) => {
    if (isScalar(item)) {
      if (!isBlank(item)) out.push({ kind: 'bullet', text: scalarText(item, locale) });
    } else {
      out.push(schemeBlock(idx + 1, item, locale));
    }
  });
  return out;
}

function renderEntry(key: string, value: JsonNode, locale: Locale): DisplayInstruction[] {
  switch (value.kind) {
    case 'object':
      if (key === SOFT_BLOCK_KEY) {
        return [{ kind: 'block', title: labelFor(locale, key), tone: 'soft', children: renderNode(value, locale) }];
      }
      if (key === UNTITLED_OBJECT_KEY) return renderNode(value, locale);
      return [{ kind: 'subtitle', text: labelFor(locale, key) }, ...renderNode(value, locale)];
    case 'array':
      return renderList(key, value.items, locale);
    default:
      return renderScalarEntry(key, value, locale);
  }
}

/** Render any record node. Top-level lists become numbered blocks. */
export function renderNode(node: JsonNode, locale: Locale): DisplayInstruction[] {
  switch (node.kind) {
    case 'object':
      return node.entries.flatMap(([key, value]) => renderEntry(key, value, locale));
    case 'array':
      return node.items.map((item, idx) => schemeBlock(idx + 1, item, locale));
    case 'null':
      return [];
    default:
      return [{ kind: 'text', text: scalarText(node, locale) }];
  }
}
