import { describe, expect, test } from 'vitest';

import { NumberExtractor } from './number-extractor';

describe('NumberExtractor', () => {
  const extractor = new NumberExtractor();

  test('returns no matches for blank text', () => {
    expect(extractor.extract('')).toEqual([]);
    expect(extractor.extract('   \n ')).toEqual([]);
  });

  test('recognizes every format in a mixed sentence', () => {
    const matches = extractor.extract(
      'Revenue $1,500.00 increased 25.5% to 1.23e6 units from 1,200 previously.',
    );
    const formats = new Set(matches.map((match) => match.format));

    expect(formats).toContain('currency');
    expect(formats).toContain('percentage');
    expect(formats).toContain('scientific_notation');
    expect(formats).toContain('integer');

    const currency = matches.find((match) => match.format === 'currency');
    expect(currency?.originalText).toBe('$1,500.00');
    expect(currency?.value).toBe(1500);
    expect(currency?.currency).toBe('USD');

    const scientific = matches.find(
      (match) => match.format === 'scientific_notation',
    );
    expect(scientific?.value).toBe(1230000);
  });

  test('reports overlapping formats for the same token', () => {
    const matches = extractor.extract('$1,500.00');

    expect(
      matches.map((match) => [match.format, match.originalText]),
    ).toEqual([
      ['currency', '$1,500.00'],
      ['decimal', '500.00'],
      ['integer', '1,500'],
      ['integer', '00'],
    ]);
  });

  test('matches a percentage at the end of the text', () => {
    const matches = extractor.extract('Margin grew 25%');
    const percentage = matches.find((match) => match.format === 'percentage');

    expect(percentage).toMatchObject({
      originalText: '25%',
      value: 25,
      unit: 'percent',
      currency: null,
      extractionMethod: 'regex_pattern',
    });
    expect(percentage?.confidence).toBeCloseTo(1);
  });

  test('takes context from a window around the match', () => {
    const narrow = new NumberExtractor({ contextWindow: 5 });
    const [match] = narrow.extract('abcdefghij 42 klmnopqrst');

    expect(match.originalText).toBe('42');
    expect(match.context).toBe('ghij 42 klmn');
  });

  test('raises confidence for grouped integers and business terms', () => {
    const matches = extractor.extract('Total $2,000');

    expect(matches.map((match) => match.format)).toEqual([
      'currency',
      'integer',
    ]);
    expect(matches[0].confidence).toBeCloseTo(1);
    expect(matches[1].originalText).toBe('2,000');
    expect(matches[1].confidence).toBeCloseTo(0.9);
  });

  test('lowers confidence near navigation terms, capped at three', () => {
    expect(extractor.extract('See page 12')[0].confidence).toBeCloseTo(0.6);

    const [first] = extractor.extract(
      'Figure 3 on page 4 of section 2 in chapter 1 table',
    );
    expect(first.originalText).toBe('3');
    expect(first.confidence).toBeCloseTo(0.4);
  });

  test('infers a unit from context', () => {
    const [match] = extractor.extract('Sales reached 45 million');

    expect(match.unit).toBe('million');
    expect(match.confidence).toBeCloseTo(0.8);
  });

  test('leaves unit empty when the context names none', () => {
    expect(extractor.extract('See page 12')[0].unit).toBeNull();
  });

  describe('parseNumericValue', () => {
    test('strips currency, grouping and percent symbols', () => {
      expect(NumberExtractor.parseNumericValue('$ 1,234.50')).toBe(1234.5);
      expect(NumberExtractor.parseNumericValue('12%')).toBe(12);
    });

    test('yields 0 for unparseable tokens', () => {
      expect(NumberExtractor.parseNumericValue('1.2.3')).toBe(0);
      expect(NumberExtractor.parseNumericValue('$')).toBe(0);
    });
  });
});
