import type { NumberFormat, NumberMatch } from '@tallyfold/model';

import type { NumberExtractorConfig } from '../config/pipeline-config';

import { NUMBER_EXTRACTOR_DEFAULTS } from '../config/constants';
import numberTerms from '../data/number-terms.json';

/**
 * Patterns in the order they are applied. Each one scans the whole text on
 * its own, so a token can be reported under several formats.
 */
const NUMBER_PATTERNS: ReadonlyArray<{ format: NumberFormat; source: string }> =
  [
    { format: 'currency', source: String.raw`\$\s*\d{1,3}(?:,\d{3})*(?:\.\d{2})?` },
    { format: 'percentage', source: String.raw`\b\d+(?:\.\d+)?%` },
    { format: 'decimal', source: String.raw`\b\d+\.\d+\b` },
    {
      format: 'scientific_notation',
      source: String.raw`\b\d+(?:\.\d+)?[eE][+-]?\d+\b`,
    },
    { format: 'integer', source: String.raw`\b\d{1,3}(?:,\d{3})*\b` },
  ];

const UNIT_PATTERNS = numberTerms.units.map(({ pattern, unit }) => ({
  regex: new RegExp(pattern),
  unit,
}));

/**
 * NumberExtractor
 *
 * Finds numeric literals in raw text. Pure: no page or document knowledge,
 * and a token that fails to parse still yields a match with value 0.
 */
export class NumberExtractor {
  private readonly contextWindow: number;

  constructor(config: Partial<NumberExtractorConfig> = {}) {
    this.contextWindow =
      config.contextWindow ?? NUMBER_EXTRACTOR_DEFAULTS.CONTEXT_WINDOW;
  }

  extract(text: string): NumberMatch[] {
    if (!text.trim()) {
      return [];
    }

    const matches: NumberMatch[] = [];
    for (const { format, source } of NUMBER_PATTERNS) {
      for (const match of text.matchAll(new RegExp(source, 'g'))) {
        const start = match.index ?? 0;
        const originalText = match[0];
        const context = text.slice(
          Math.max(0, start - this.contextWindow),
          start + originalText.length + this.contextWindow,
        );

        matches.push({
          value: NumberExtractor.parseNumericValue(originalText),
          originalText,
          context,
          format,
          confidence: this.scoreConfidence(originalText, format, context),
          currency: format === 'currency' ? 'USD' : null,
          unit: this.detectUnit(format, context),
          extractionMethod: 'regex_pattern',
        });
      }
    }
    return matches;
  }

  /**
   * Strip `$`, `,` and `%`, then parse. Unparseable input yields 0.
   */
  static parseNumericValue(token: string): number {
    const cleaned = token.replace(/[$,%]/g, '').trim();
    const value = Number(cleaned);
    return cleaned === '' || Number.isNaN(value) ? 0 : value;
  }

  private scoreConfidence(
    originalText: string,
    format: NumberFormat,
    context: string,
  ): number {
    let confidence: number = NUMBER_EXTRACTOR_DEFAULTS.BASE_CONFIDENCE;

    if (
      (format === 'currency' && originalText.includes('$')) ||
      (format === 'percentage' && originalText.includes('%'))
    ) {
      confidence += 0.2;
    } else if (format === 'integer' && originalText.includes(',')) {
      confidence += 0.1;
    }

    const lowered = context.toLowerCase();
    const businessHits = numberTerms.businessTerms.filter((term) =>
      lowered.includes(term),
    ).length;
    const navigationHits = numberTerms.navigationTerms.filter((term) =>
      lowered.includes(term),
    ).length;

    confidence += Math.min(0.2, businessHits * 0.1);
    confidence -= Math.min(0.3, navigationHits * 0.1);

    return Math.min(1, Math.max(0, confidence));
  }

  private detectUnit(format: NumberFormat, context: string): string | null {
    if (format === 'percentage') {
      return 'percent';
    }

    const lowered = context.toLowerCase();
    return UNIT_PATTERNS.find(({ regex }) => regex.test(lowered))?.unit ?? null;
  }
}
