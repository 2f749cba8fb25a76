import type { LoggerMethods } from '@tallyfold/logger';
import type { NumberMatch, Table } from '@tallyfold/model';
import type { LanguageModel } from 'ai';

import type {
  AiSectionOutput,
  AiTableOutput,
} from '../types/ai-extraction-schema';
import type {
  AiExtractOptions,
  AiExtractionClient,
  AiExtractionResponse,
  AiPagePayload,
} from './ai-extraction-client';

import { LLMCaller } from '@tallyfold/shared';

import { createAiModelsFromEnv } from '../config/ai-models';
import {
  EXTRACTION_METHODS,
  LLM_CLIENT_DEFAULTS,
  NUMBER_EXTRACTOR_DEFAULTS,
} from '../config/constants';
import { buildSection } from '../processors/section-builder';
import { AiExtractionSchema } from '../types/ai-extraction-schema';

export interface LlmExtractionClientOptions {
  /** Primary model. The client reports itself unavailable without one. */
  model?: LanguageModel;
  fallbackModel?: LanguageModel;
  maxRetries?: number;
  temperature?: number;
}

const SYSTEM_PROMPT = `You extract structured content from document pages.

For every page you receive:
- Copy each coherent block of prose into a section, keeping the original wording.
- List every number that appears in a section's content, with its literal text.
- Report each table with its column headers and data rows as plain strings.

Only report what is present in the page text. Do not compute or infer values.`;

/**
 * LlmExtractionClient
 *
 * AI extraction client backed by a language model through the AI SDK.
 * Pages of a group are sent in one structured-output call and the
 * validated result is mapped onto tables and page sections.
 */
export class LlmExtractionClient implements AiExtractionClient {
  readonly supportsLayoutInput = true;

  private readonly model?: LanguageModel;
  private readonly fallbackModel?: LanguageModel;
  private readonly maxRetries: number;
  private readonly temperature: number;

  constructor(
    private readonly logger: LoggerMethods,
    options: LlmExtractionClientOptions = {},
  ) {
    this.model = options.model;
    this.fallbackModel = options.fallbackModel;
    this.maxRetries = options.maxRetries ?? LLM_CLIENT_DEFAULTS.MAX_RETRIES;
    this.temperature = options.temperature ?? LLM_CLIENT_DEFAULTS.TEMPERATURE;
  }

  /**
   * Create a client from `ANTHROPIC_API_KEY` and related variables.
   */
  static fromEnv(
    logger: LoggerMethods,
    env: NodeJS.ProcessEnv = process.env,
  ): LlmExtractionClient {
    return new LlmExtractionClient(logger, createAiModelsFromEnv(env));
  }

  isAvailable(): boolean {
    return this.model !== undefined;
  }

  async extract(
    pages: AiPagePayload[],
    options: AiExtractOptions,
  ): Promise<AiExtractionResponse> {
    if (!this.model) {
      throw new Error('[LlmExtractionClient] No language model configured');
    }

    const pageNumbers = pages.map((page) => page.pageNumber);
    this.logger.debug(
      `[LlmExtractionClient] Extracting pages ${pageNumbers.join(', ')}`,
    );

    const result = await LLMCaller.call({
      schema: AiExtractionSchema,
      systemPrompt: SYSTEM_PROMPT,
      userPrompt: this.buildUserPrompt(pages),
      primaryModel: this.model,
      fallbackModel: this.fallbackModel,
      maxRetries: this.maxRetries,
      temperature: this.temperature,
      abortSignal: options.abortSignal,
      component: 'LlmExtractionClient',
      phase: 'group-extraction',
    });

    this.logger.info(
      `[LlmExtractionClient] Extracted ${result.output.tables.length} tables from ${pages.length} pages (${result.usage.modelName}, ${result.usage.totalTokens} tokens${result.usedFallback ? ', fallback model' : ''})`,
    );

    const requested = new Set(pageNumbers);
    const tableCounts = new Map<number, number>();

    return {
      tables: result.output.tables
        .filter((table) => requested.has(table.pageNumber))
        .map((table) => {
          const position = (tableCounts.get(table.pageNumber) ?? 0) + 1;
          tableCounts.set(table.pageNumber, position);
          return this.toTable(table, position);
        }),
      pages: result.output.pages
        .filter((page) => requested.has(page.pageNumber))
        .map((page) => ({
          pageNumber: page.pageNumber,
          sections: page.sections.map((section, i) =>
            buildSection(
              page.pageNumber,
              i + 1,
              section.content,
              this.toNumbers(section),
              section.title,
            ),
          ),
        })),
    };
  }

  private buildUserPrompt(pages: readonly AiPagePayload[]): string {
    return pages
      .map((page) => {
        const parts = [`--- Page ${page.pageNumber} ---`, page.text];
        if (page.words && page.words.length > 0) {
          parts.push(
            'Word positions (x0, y0, text):',
            ...page.words.map(
              (word) =>
                `${Math.round(word.x0)}, ${Math.round(word.y0)}, ${word.text}`,
            ),
          );
        }
        return parts.join('\n');
      })
      .join('\n\n');
  }

  private toTable(table: AiTableOutput, position: number): Table {
    const hasHeader = table.headers.length > 0;
    const grid = hasHeader ? [table.headers, ...table.rows] : table.rows;
    const columnCount = Math.max(0, ...grid.map((cells) => cells.length));

    return {
      tableId: `p${table.pageNumber}_t${position}`,
      name: table.title ?? `Page ${table.pageNumber} Table ${position}`,
      region: {
        pageNumber: table.pageNumber,
        boundingBox: [0, 0, 0, 0],
        detectionMethod: EXTRACTION_METHODS.AI,
      },
      headerInfo: {
        headerRows: hasHeader ? [1] : [],
        headerColumns: [],
        dataStartRow: hasHeader ? 2 : 1,
        dataStartCol: 1,
      },
      columns: Array.from({ length: columnCount }, (_, i) => ({
        columnIndex: i + 1,
        columnLabel: table.headers[i] || `Column ${i + 1}`,
        isHeaderColumn: false,
      })),
      rows: grid.map((cells, i) => ({
        rowIndex: i + 1,
        rowLabel: cells[0] || `Row ${i + 1}`,
        isHeaderRow: hasHeader && i === 0,
        cells,
      })),
      metadata: {
        detectionMethod: EXTRACTION_METHODS.AI,
        cellCount: grid.length * Math.max(1, columnCount),
        hasMergedCells: false,
        confidence: LLM_CLIENT_DEFAULTS.TABLE_CONFIDENCE,
      },
    };
  }

  /**
   * Map reported numbers, taking each context from the section content.
   */
  private toNumbers(section: AiSectionOutput): NumberMatch[] {
    const contextWindow = NUMBER_EXTRACTOR_DEFAULTS.CONTEXT_WINDOW;

    return section.numbers.map((match): NumberMatch => {
      const start = section.content.indexOf(match.originalText);
      const context =
        start === -1
          ? ''
          : section.content.slice(
              Math.max(0, start - contextWindow),
              start + match.originalText.length + contextWindow,
            );

      return {
        value: match.value,
        originalText: match.originalText,
        context,
        format: match.format,
        confidence: LLM_CLIENT_DEFAULTS.NUMBER_CONFIDENCE,
        currency: match.currency,
        unit: match.unit,
        extractionMethod: 'ai_extraction',
      };
    });
  }
}
