import { describe, it, expect, vi } from 'vitest';
import { SectionLocator, buildSectionPattern, findMatchingPage, locateSectionPage } from './section-locator.js';
import { TextExtractor } from '../types.js';

function extractorReturning(pages: string[]): TextExtractor {
  return { extractPages: vi.fn(async () => pages) };
}

function failingExtractor(): TextExtractor {
  return { extractPages: vi.fn(async () => { throw new Error('pdftotext: not found'); }) };
}

describe('buildSectionPattern', () => {
  it('accepts either decimal separator', () => {
    const pattern = buildSectionPattern('4.1');
    expect(pattern.test('4.1 Показания к применению')).toBe(true);
    expect(pattern.test('4,1 Показания')).toBe(true);
  });

  it('matches whole section numbers only', () => {
    const pattern = buildSectionPattern('4.1');
    expect(pattern.test('see 14.1')).toBe(false);
    expect(pattern.test('4.12 Other')).toBe(false);
    expect(pattern.test('4x1')).toBe(false);
  });

  it('is case-insensitive and escapes other characters', () => {
    const pattern = buildSectionPattern('A+.2');
    expect(pattern.source).toBe('\\bA\\+[.,]2\\b');
    expect(pattern.flags).toContain('i');
  });
});

describe('findMatchingPage', () => {
  it('returns the first matching page, 1-based', () => {
    expect(findMatchingPage(['intro', 'text 4.1', 'again 4.1'], /4\.1/)).toBe(2);
  });

  it('returns null when nothing matches', () => {
    expect(findMatchingPage(['a', 'b'], /4\.1/)).toBeNull();
  });
});

describe('locateSectionPage', () => {
  it('finds the first page mentioning the section', async () => {
    const extractor = extractorReturning(['Title page', 'Contents', '4,1 Показания', '4.1 again']);
    await expect(locateSectionPage('/pdfs/a.pdf', '4.1', extractor)).resolves.toBe(3);
  });

  it('falls back to page 1 when no page matches', async () => {
    const extractor = extractorReturning(['one', 'two', '']);
    await expect(locateSectionPage('/pdfs/a.pdf', '4.1', extractor)).resolves.toBe(1);
  });

  it('falls back to page 1 when extraction fails', async () => {
    await expect(locateSectionPage('/pdfs/a.pdf', '4.1', failingExtractor())).resolves.toBe(1);
  });
});

describe('SectionLocator', () => {
  it('extracts each document once per label', async () => {
    const extractor = extractorReturning(['x', 'section 4.1']);
    const locator = new SectionLocator(extractor);

    expect(await locator.locate('/pdfs/a.pdf')).toBe(2);
    expect(await locator.locate('/pdfs/a.pdf')).toBe(2);
    expect(extractor.extractPages).toHaveBeenCalledTimes(1);

    expect(await locator.locate('/pdfs/a.pdf', '5.2')).toBe(1);
    expect(extractor.extractPages).toHaveBeenCalledTimes(2);
  });

  it('uses its configured default label', async () => {
    const locator = new SectionLocator(extractorReturning(['4.1', '2.3 Dosage']), '2.3');
    expect(await locator.locate('/pdfs/b.pdf')).toBe(2);
  });
});
