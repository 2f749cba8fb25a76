import type { LoggerMethods } from '@tallyfold/logger';
import type {
  BatchResult,
  DocumentResult,
  PageContent,
  PageGroup,
  PageResult,
  PaginatedDocument,
  Table,
} from '@tallyfold/model';

import type { AiExtractionClient } from '../clients/ai-extraction-client';
import type { PipelineConfigOverrides } from '../config/pipeline-config';
import type { LayoutSignalProvider } from '../analyzers/layout-signal';
import type { GroupRouter } from '../processors/ai-failover-router';
import type { DocumentSource } from '../sources/document-source';

import { GridLayoutSignal, NullLayoutSignal } from '../analyzers/layout-signal';
import { PageComplexityAnalyzer } from '../analyzers/page-complexity-analyzer';
import { LlmExtractionClient } from '../clients/llm-extraction-client';
import { EXTRACTION_METHODS } from '../config/constants';
import { resolvePipelineConfig } from '../config/pipeline-config';
import { createAbortError } from '../errors/abort-error';
import { AiFailoverRouter } from '../processors/ai-failover-router';
import { GeometricTableDetector } from '../processors/geometric-table-detector';
import { NumberExtractor } from '../processors/number-extractor';
import { ResultReconstructor } from '../processors/result-reconstructor';
import { buildLocalPage } from '../processors/section-builder';
import { createEmptyDocument } from '../sources/document-source';

/**
 * Stages a document passes through, in order
 */
export type PipelineStage =
  | 'analyzed'
  | 'routed'
  | 'detected'
  | 'reconstructed'
  | 'finalized';

export interface FailoverPipelineOptions {
  /** Threshold and tolerance overrides, validated on creation */
  config?: PipelineConfigOverrides;
  /** AI client; defaults to an LLM client configured from the environment */
  client?: AiExtractionClient;
  /** Layout signal for the analyzer (default: 'none') */
  layoutSignal?: 'none' | 'grid';
}

export interface ProcessOptions {
  abortSignal?: AbortSignal;
  /** Filename for the result metadata; defaults to the source name */
  filename?: string;
  /** Fired as each stage completes */
  onStage?: (stage: PipelineStage) => void;
}

/**
 * FailoverPipeline
 *
 * Execution order:
 * 1. PageComplexityAnalyzer - classify pages and group numeric runs
 * 2. GroupRouter - AI extraction per group, local fallback on failure
 * 3. GeometricTableDetector - only when no batch produced a table
 * 4. ResultReconstructor - merge batches, code-only pages and tables
 * 5. Attach document metadata
 *
 * `process` always resolves with a document, except when cancelled.
 */
export class FailoverPipeline {
  constructor(
    private readonly logger: LoggerMethods,
    private readonly numberExtractor: NumberExtractor,
    private readonly analyzer: PageComplexityAnalyzer,
    private readonly router: GroupRouter,
    private readonly detector: GeometricTableDetector,
    private readonly reconstructor: ResultReconstructor,
  ) {}

  /**
   * Factory method for creating a FailoverPipeline with default sub-components.
   *
   * @throws PipelineConfigError when `options.config` is invalid
   */
  static create(
    logger: LoggerMethods,
    options: FailoverPipelineOptions = {},
  ): FailoverPipeline {
    const config = resolvePipelineConfig(options.config);
    const numberExtractor = new NumberExtractor(config.numberExtractor);
    const detector = new GeometricTableDetector(logger, config.detector);
    const layoutSignal: LayoutSignalProvider =
      options.layoutSignal === 'grid'
        ? new GridLayoutSignal(detector)
        : new NullLayoutSignal();
    const client = options.client ?? LlmExtractionClient.fromEnv(logger);

    return new FailoverPipeline(
      logger,
      numberExtractor,
      new PageComplexityAnalyzer(
        logger,
        numberExtractor,
        layoutSignal,
        config.analyzer,
      ),
      new AiFailoverRouter(logger, client, numberExtractor, config.router),
      detector,
      new ResultReconstructor(logger),
    );
  }

  /**
   * Process one document.
   *
   * @throws {Error} with name 'AbortError' if aborted
   */
  async process(
    source: DocumentSource,
    options: ProcessOptions = {},
  ): Promise<DocumentResult> {
    const { abortSignal, onStage } = options;
    const advance = (stage: PipelineStage): void => {
      this.logger.debug(`[FailoverPipeline] Stage: ${stage}`);
      onStage?.(stage);
    };

    this.checkAborted(abortSignal);
    this.logger.info(`[FailoverPipeline] Processing ${source.name}`);

    const document = await this.openSource(source);
    this.checkAborted(abortSignal);

    const metrics = this.analyzer.analyzePages(document);
    const groups = this.analyzer.groupNumericPages(metrics);
    advance('analyzed');

    const batches = await this.router.processGroups(document, groups, {
      abortSignal,
    });
    advance('routed');
    this.checkAborted(abortSignal);

    const codeOnlyPages = this.buildCodeOnlyPages(document, groups, batches);

    let nativeTables: Table[] = [];
    if (!batches.some((batch) => batch.tables.length > 0)) {
      const numericIndices = new Set(
        metrics
          .filter((metric) => metric.numberCount > 0)
          .map((metric) => metric.pageIndex),
      );
      const candidates =
        groups.length > 0
          ? this.pagesInGroups(document, groups)
          : document.pages.filter((page) => numericIndices.has(page.index));
      nativeTables = this.detectTables(candidates);
    }
    advance('detected');

    const merged = this.reconstructor.merge(
      batches,
      codeOnlyPages,
      nativeTables,
    );
    advance('reconstructed');

    const extractionMethods: string[] = [EXTRACTION_METHODS.ROUTING];
    if (batches.some((batch) => batch.source === 'ai')) {
      extractionMethods.push(EXTRACTION_METHODS.AI);
    }
    if (
      codeOnlyPages.length > 0 ||
      batches.some((batch) => batch.source === 'fallback')
    ) {
      extractionMethods.push(EXTRACTION_METHODS.LOCAL_NUMBERS);
    }
    if (nativeTables.length > 0) {
      extractionMethods.push(EXTRACTION_METHODS.GEOMETRIC_GRID);
    }

    const result: DocumentResult = {
      ...merged,
      documentMetadata: {
        filename: options.filename ?? document.filename,
        totalPages: document.pages.length,
        extractionMethods,
      },
    };
    advance('finalized');

    this.logger.info(
      `[FailoverPipeline] Completed ${source.name}: ${result.textContent.pages.length} pages, ${result.tables.tables.length} tables, ${result.processingSummary.numbersFound} numbers`,
    );
    return result;
  }

  private async openSource(source: DocumentSource): Promise<PaginatedDocument> {
    try {
      return await source.open();
    } catch (error) {
      this.logger.warn(
        `[FailoverPipeline] Source ${source.name} unavailable, continuing with an empty document`,
        error,
      );
      return createEmptyDocument(source.name);
    }
  }

  /**
   * Pages outside every group. When the router produced no pages at all,
   * every page is rebuilt locally so none is dropped.
   */
  private buildCodeOnlyPages(
    document: PaginatedDocument,
    groups: readonly PageGroup[],
    batches: readonly BatchResult[],
  ): PageResult[] {
    const routedPages = batches.reduce(
      (sum, batch) => sum + batch.pages.length,
      0,
    );
    const grouped = new Set(
      this.pagesInGroups(document, groups).map((page) => page.index),
    );
    const pages =
      routedPages === 0
        ? document.pages
        : document.pages.filter((page) => !grouped.has(page.index));

    return pages.map((page) =>
      buildLocalPage(page.index + 1, page.text, this.numberExtractor),
    );
  }

  private pagesInGroups(
    document: PaginatedDocument,
    groups: readonly PageGroup[],
  ): PageContent[] {
    return document.pages.filter((page) =>
      groups.some(
        (group) => page.index >= group.startPage && page.index <= group.endPage,
      ),
    );
  }

  private detectTables(pages: readonly PageContent[]): Table[] {
    const tables: Table[] = [];
    for (const page of pages) {
      if (!page.words || page.words.length === 0) {
        continue;
      }
      tables.push(...this.detector.detectTables(page.words, page.index + 1));
    }
    this.logger.info(
      `[FailoverPipeline] Geometric detection found ${tables.length} tables on ${pages.length} pages`,
    );
    return tables;
  }

  private checkAborted(abortSignal?: AbortSignal): void {
    if (abortSignal?.aborted) {
      const error = createAbortError('Document processing was aborted');
      this.logger.info('[FailoverPipeline] Processing aborted');
      throw error;
    }
  }
}
