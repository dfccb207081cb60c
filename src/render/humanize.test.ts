import { describe, it, expect } from 'vitest';
import { humanizeIsoDuration, humanizeValue } from './humanize.js';
import { loadLocale } from './locale.js';

const locale = loadLocale('ru');
const units = locale.durationUnits;

describe('humanizeIsoDuration', () => {
  it('lists present units in year, month, week, day order', () => {
    expect(humanizeIsoDuration('P1Y2M3W4D', units)).toBe('1 г. 2 мес. 3 нед. 4 дн.');
    expect(humanizeIsoDuration('P2W', units)).toBe('2 нед.');
    expect(humanizeIsoDuration('P6M10D', units)).toBe('6 мес. 10 дн.');
  });

  it('skips zero amounts', () => {
    expect(humanizeIsoDuration('P0Y3M', units)).toBe('3 мес.');
  });

  it('trims surrounding whitespace before matching', () => {
    expect(humanizeIsoDuration('  P5D ', units)).toBe('5 дн.');
  });

  it('returns strings outside the supported subset unchanged', () => {
    expect(humanizeIsoDuration('PT12H', units)).toBe('PT12H');
    expect(humanizeIsoDuration('P1D2W', units)).toBe('P1D2W');
    expect(humanizeIsoDuration('7 days', units)).toBe('7 days');
    expect(humanizeIsoDuration(' bad ', units)).toBe(' bad ');
  });

  it('returns all-zero and empty durations unchanged', () => {
    expect(humanizeIsoDuration('P', units)).toBe('P');
    expect(humanizeIsoDuration('P0D', units)).toBe('P0D');
  });

  it('is idempotent on input it cannot parse', () => {
    const once = humanizeIsoDuration('P1X', units);
    expect(humanizeIsoDuration(once, units)).toBe(once);
  });
});

describe('humanizeValue', () => {
  it('humanizes course duration keys only', () => {
    expect(humanizeValue('courseDurationMax', 'P1M', locale)).toBe('1 мес.');
    expect(humanizeValue('courseDuration', 'P10D', locale)).toBe('10 дн.');
    expect(humanizeValue('dose', 'P1M', locale)).toBe('P1M');
  });

  it('maps interval unit codes and passes unknown codes through', () => {
    expect(humanizeValue('intervalUnit', 'WEEK', locale)).toBe('неделя');
    expect(humanizeValue('intervalUnit', 'HOUR', locale)).toBe('HOUR');
  });

  it('formats numbers and booleans', () => {
    expect(humanizeValue('dose', 2.5, locale)).toBe('2.5');
    expect(humanizeValue('loading_dose', true, locale)).toBe('да');
    expect(humanizeValue('loading_dose', false, locale)).toBe('нет');
  });
});
