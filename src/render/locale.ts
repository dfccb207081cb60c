/**
 * Display strings: key labels, unit names and UI text, read from locales/<lang>.json.
 */
import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const LOCALES_DIR = path.join(__dirname, '../../locales');

export interface DurationUnits {
  years: string;
  months: string;
  weeks: string;
  days: string;
}

export const UI_KEYS = [
  'pageTitle',
  'selectLabel',
  'selectButton',
  'resultHeading',
  'sourceHeading',
  'schemeBlock',
  'emptyList',
  'pageCaption',
  'imageCaption',
  'prevButton',
  'nextButton',
  'renderFailed',
  'openPdf',
  'pdfMissing',
  'resultMissing',
  'resultUnreadable',
  'noResults',
] as const;

export type UiKey = (typeof UI_KEYS)[number];

export interface Locale {
  labels: Record<string, string>;
  intervalUnits: Record<string, string>;
  durationUnits: DurationUnits;
  booleans: { true: string; false: string };
  // every UiKey is present; checked in parseLocale
  ui: Record<string, string>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringMap(value: unknown, field: string): Record<string, string> {
  if (!isRecord(value)) throw new Error(`locale field "${field}" must be an object`);
  const out: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') throw new Error(`locale field "${field}.${key}" must be a string`);
    out[key] = entry;
  }
  return out;
}

function required(map: Record<string, string>, key: string, field: string): string {
  const value = map[key];
  if (value === undefined) throw new Error(`locale field "${field}.${key}" is missing`);
  return value;
}

export function parseLocale(raw: unknown): Locale {
  if (!isRecord(raw)) throw new Error('locale must be a JSON object');

  const durations = stringMap(raw.durationUnits, 'durationUnits');
  const booleans = stringMap(raw.booleans, 'booleans');
  const ui = stringMap(raw.ui, 'ui');
  for (const key of UI_KEYS) required(ui, key, 'ui');

  return {
    labels: stringMap(raw.labels, 'labels'),
    intervalUnits: stringMap(raw.intervalUnits, 'intervalUnits'),
    durationUnits: {
      years: required(durations, 'years', 'durationUnits'),
      months: required(durations, 'months', 'durationUnits'),
      weeks: required(durations, 'weeks', 'durationUnits'),
      days: required(durations, 'days', 'durationUnits'),
    },
    booleans: {
      true: required(booleans, 'true', 'booleans'),
      false: required(booleans, 'false', 'booleans'),
    },
    ui,
  };
}

const loaded = new Map<string, Locale>();

export function loadLocale(lang: string = 'ru', dir: string = LOCALES_DIR): Locale {
  const file = path.join(dir, `${lang}.json`);
  const cached = loaded.get(file);
  if (cached) return cached;

  const locale = parseLocale(JSON.parse(fs.readFileSync(file, 'utf8')));
  loaded.set(file, locale);
  return locale;
}

/** Display label for a record key; unknown keys are shown as-is. */
export function labelFor(locale: Locale, key: string): string {
  return Object.hasOwn(locale.labels, key) ? locale.labels[key] : key;
}

/** Fill `{name}` placeholders in a UI template. */
export function formatText(template: string, vars: Record<string, string | number>): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) =>
    Object.hasOwn(vars, name) ? String(vars[name]) : match,
  );
}

export function uiText(locale: Locale, key: UiKey, vars: Record<string, string | number> = {}): string {
  return formatText(locale.ui[key], vars);
}
