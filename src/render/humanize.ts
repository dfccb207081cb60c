import { Locale, DurationUnits } from './locale.js';

export const DURATION_KEYS: ReadonlySet<string> = new Set(['courseDurationMin', 'courseDurationMax', 'courseDuration']);
export const INTERVAL_UNIT_KEY = 'intervalUnit';

// ISO-8601 durations restricted to years, months, weeks and days
const ISO_DURATION = /^P(?:(\d+)Y)?(?:(\d+)M)?(?:(\d+)W)?(?:(\d+)D)?$/;

/**
 * "P1M2W" -> "1 мес. 2 нед.". Strings outside the Y/M/W/D subset, and durations that
 * are all zero, come back unchanged.
 */
export function humanizeIsoDuration(value: string, units: DurationUnits): string {
  const match = ISO_DURATION.exec(value.trim());
  if (!match) return value;

  const amounts: Array<[string | undefined, string]> = [
    [match[1], units.years],
    [match[2], units.months],
    [match[3], units.weeks],
    [match[4], units.days],
  ];

  const parts: string[] = [];
  for (const [raw, unit] of amounts) {
    const amount = raw ? parseInt(raw, 10) : 0;
    if (amount) parts.push(`${amount} ${unit}`);
  }
  return parts.length > 0 ? parts.join(' ') : value;
}

export function humanizeIntervalUnit(value: string, locale: Locale): string {
  return Object.hasOwn(locale.intervalUnits, value) ? locale.intervalUnits[value] : value;
}

export type ScalarValue = string | number | boolean;

/** Display text for a scalar under a given record key. */
export function humanizeValue(key: string, value: ScalarValue, locale: Locale): string {
  if (typeof value === 'string' && DURATION_KEYS.has(key)) {
    return humanizeIsoDuration(value, locale.durationUnits);
  }
  if (key === INTERVAL_UNIT_KEY) {
    return humanizeIntervalUnit(formatScalar(value, locale), locale);
  }
  return formatScalar(value, locale);
}

export function formatScalar(value: ScalarValue, locale: Locale): string {
  if (typeof value === 'boolean') return value ? locale.booleans.true : locale.booleans.false;
  return String(value);
}
