import { describe, expect, test } from 'vitest';

import { AiExtractionSchema } from './ai-extraction-schema';

describe('AiExtractionSchema', () => {
  test('fills defaults for omitted lists and nullable fields', () => {
    const parsed = AiExtractionSchema.parse({
      tables: [{ pageNumber: 2, rows: [['a', '1']] }],
      pages: [
        {
          pageNumber: 2,
          sections: [
            {
              content: 'Up 5%',
              numbers: [{ value: 5, originalText: '5%', format: 'percentage' }],
            },
          ],
        },
        { pageNumber: 3 },
      ],
    });

    expect(parsed).toEqual({
      tables: [{ pageNumber: 2, title: null, headers: [], rows: [['a', '1']] }],
      pages: [
        {
          pageNumber: 2,
          sections: [
            {
              title: null,
              content: 'Up 5%',
              numbers: [
                {
                  value: 5,
                  originalText: '5%',
                  format: 'percentage',
                  currency: null,
                  unit: null,
                },
              ],
            },
          ],
        },
        { pageNumber: 3, sections: [] },
      ],
    });
  });

  test('accepts an empty object', () => {
    expect(AiExtractionSchema.parse({})).toEqual({ tables: [], pages: [] });
  });

  test('rejects unknown number formats', () => {
    const result = AiExtractionSchema.safeParse({
      pages: [
        {
          pageNumber: 1,
          sections: [
            {
              content: 'x',
              numbers: [{ value: 1, originalText: '1', format: 'roman' }],
            },
          ],
        },
      ],
    });

    expect(result.success).toBe(false);
  });

  test('rejects page numbers below one', () => {
    expect(AiExtractionSchema.safeParse({ pages: [{ pageNumber: 0 }] }).success).toBe(false);
  });
});
