import { z } from 'zod';

/**
 * Schema for a number the model reports inside a section
 */
export const AiNumberSchema = z.object({
  value: z.number().describe('Numeric value with symbols and separators removed'),
  originalText: z
    .string()
    .describe('The number exactly as written in the page text'),
  format: z
    .enum(['currency', 'percentage', 'decimal', 'scientific_notation', 'integer'])
    .describe('Literal format of the number'),
  currency: z
    .string()
    .nullable()
    .default(null)
    .describe('ISO currency code for monetary values'),
  unit: z
    .string()
    .nullable()
    .default(null)
    .describe('Unit such as "percent", "million" or "days"'),
});

export const AiSectionSchema = z.object({
  title: z.string().nullable().default(null).describe('Heading, if any'),
  content: z.string().describe('Section text copied from the page'),
  numbers: z
    .array(AiNumberSchema)
    .default([])
    .describe('Numbers that appear in the section content'),
});

export const AiTableSchema = z.object({
  pageNumber: z.number().int().min(1).describe('Page the table appears on'),
  title: z.string().nullable().default(null).describe('Table caption'),
  headers: z
    .array(z.string())
    .default([])
    .describe('Column headers, empty when the table has none'),
  rows: z.array(z.array(z.string())).describe('Data rows, one string per cell'),
});

/**
 * Schema for LLM response
 */
export const AiExtractionSchema = z.object({
  tables: z.array(AiTableSchema).default([]).describe('Tables found'),
  pages: z
    .array(
      z.object({
        pageNumber: z.number().int().min(1),
        sections: z.array(AiSectionSchema).default([]),
      }),
    )
    .default([])
    .describe('Text sections per page'),
});

export type AiExtractionOutput = z.infer<typeof AiExtractionSchema>;
export type AiTableOutput = z.infer<typeof AiTableSchema>;
export type AiSectionOutput = z.infer<typeof AiSectionSchema>;
