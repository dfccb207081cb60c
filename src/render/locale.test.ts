import { describe, it, expect } from 'vitest';
import { formatText, labelFor, loadLocale, parseLocale, uiText } from './locale.js';

const locale = loadLocale('ru');

describe('locale', () => {
  it('labels known keys and passes unknown keys through', () => {
    expect(labelFor(locale, 'intakeCount')).toBe('Кратность приема');
    expect(labelFor(locale, 'toString')).toBe('toString');
  });

  it('fills placeholders and leaves unknown ones', () => {
    expect(formatText('{page} / {total} {x}', { page: 2, total: 7 })).toBe('2 / 7 {x}');
    expect(uiText(locale, 'pageCaption', { page: 1, total: 4 })).toBe('Страница 1 из 4');
  });

  it('rejects a locale without the UI strings', () => {
    expect(() =>
      parseLocale({
        labels: {},
        intervalUnits: {},
        durationUnits: { years: 'y', months: 'm', weeks: 'w', days: 'd' },
        booleans: { true: 'yes', false: 'no' },
        ui: { pageTitle: 'Viewer' },
      }),
    ).toThrow('locale field "ui.selectLabel" is missing');
  });
});
