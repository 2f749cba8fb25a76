import type {
  NumberMatch,
  PageResult,
  ProcessingSummary,
  Section,
  Table,
} from '@tallyfold/model';

import type { AiExtractionResponse } from '../clients/ai-extraction-client';

import { z } from 'zod';

import { LLM_CLIENT_DEFAULTS, ROUTER_DEFAULTS } from '../config/constants';
import { countWords } from '../processors/section-builder';

/**
 * AI response with every optional field defaulted
 */
export interface NormalizedAiResponse {
  tables: Table[];
  pages: PageResult[];
  processingSummary: ProcessingSummary;
}

export interface NormalizeOptions {
  /** When given, pages with other numbers are dropped */
  pageNumbers?: ReadonlySet<number>;
}

const responseNumberSchema = z.object({
  value: z.number(),
  originalText: z.string(),
  context: z.string().catch(''),
  format: z.enum([
    'currency',
    'percentage',
    'decimal',
    'scientific_notation',
    'integer',
  ]),
  confidence: z
    .number()
    .min(0)
    .max(1)
    .catch(LLM_CLIENT_DEFAULTS.NUMBER_CONFIDENCE),
  currency: z.string().nullable().catch(null),
  unit: z.string().nullable().catch(null),
  extractionMethod: z
    .enum(['regex_pattern', 'ai_extraction'])
    .catch('ai_extraction'),
});

const responseSectionSchema = z.object({
  sectionId: z.string().optional().catch(undefined),
  title: z.string().nullable().catch(null),
  content: z.string().catch(''),
  wordCount: z.number().int().nonnegative().optional().catch(undefined),
  llmReady: z.boolean().catch(true),
  numbers: z.array(z.unknown()).catch([]),
});

const responsePageSchema = z.object({
  pageNumber: z.number().int().positive(),
  sections: z.array(z.unknown()).catch([]),
});

const responseSummarySchema = z.object({
  tablesExtracted: z.number().int().nonnegative().optional().catch(undefined),
  textSections: z.number().int().nonnegative().optional().catch(undefined),
  numbersFound: z.number().int().nonnegative().optional().catch(undefined),
  overallQualityScore: z.number().min(0).max(1).optional().catch(undefined),
  processingErrors: z.array(z.string()).optional().catch(undefined),
});

function normalizeNumbers(numbers: readonly unknown[]): NumberMatch[] {
  return numbers.flatMap((number) => {
    const parsed = responseNumberSchema.safeParse(number);
    return parsed.success ? [parsed.data] : [];
  });
}

function normalizeSection(
  section: unknown,
  pageNumber: number,
  position: number,
): Section | null {
  const parsed = responseSectionSchema.safeParse(section);
  if (!parsed.success) {
    return null;
  }

  const { sectionId, title, content, wordCount, llmReady, numbers } =
    parsed.data;
  return {
    sectionId: sectionId ?? `p${pageNumber}_s${position}`,
    sectionType: 'paragraph',
    title,
    content,
    wordCount: wordCount ?? countWords(content),
    llmReady,
    numbers: normalizeNumbers(numbers),
  };
}

function normalizePage(page: unknown): PageResult | null {
  const parsed = responsePageSchema.safeParse(page);
  if (!parsed.success) {
    return null;
  }

  const { pageNumber } = parsed.data;
  return {
    pageNumber,
    sections: parsed.data.sections.flatMap(
      (section, i) => normalizeSection(section, pageNumber, i + 1) ?? [],
    ),
  };
}

/**
 * Apply defaults to a client response. Missing `tables`, `pages` and page
 * `sections` become empty lists; section fields are checked one by one
 * (non-object sections and numbers that lack a value are dropped) and a
 * missing summary, or missing summary fields, are derived from the content.
 * Pages without a positive integer page number are dropped.
 *
 * @returns null when the response is not an object at all
 */
export function normalizeAiResponse(
  response: AiExtractionResponse | null | undefined,
  options: NormalizeOptions = {},
): NormalizedAiResponse | null {
  if (
    response === null ||
    typeof response !== 'object' ||
    Array.isArray(response)
  ) {
    return null;
  }

  const { pageNumbers } = options;
  const tables = (Array.isArray(response.tables) ? response.tables : []).filter(
    (table) => typeof table === 'object' && table !== null,
  );
  const pages = (Array.isArray(response.pages) ? response.pages : [])
    .flatMap((page) => normalizePage(page) ?? [])
    .filter((page) => !pageNumbers || pageNumbers.has(page.pageNumber));

  const sections = pages.flatMap((page) => page.sections);
  const summary = responseSummarySchema.safeParse(
    response.processingSummary,
  ).data;
  const processingSummary: ProcessingSummary = {
    tablesExtracted: summary?.tablesExtracted ?? tables.length,
    textSections: summary?.textSections ?? sections.length,
    numbersFound:
      summary?.numbersFound ??
      sections.reduce((sum, section) => sum + section.numbers.length, 0),
    overallQualityScore:
      summary?.overallQualityScore ?? ROUTER_DEFAULTS.AI_QUALITY_SCORE,
    processingErrors: summary?.processingErrors ?? [],
  };

  return { tables, pages, processingSummary };
}
