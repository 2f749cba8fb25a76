import type { LoggerMethods } from '@tallyfold/logger';
import type {
  BatchResult,
  PageContent,
  PageGroup,
  PaginatedDocument,
} from '@tallyfold/model';

import type {
  AiExtractionClient,
  AiPagePayload,
} from '../clients/ai-extraction-client';
import type { RouterConfig } from '../config/pipeline-config';
import type { NormalizedAiResponse } from '../validators/ai-response-normalizer';
import type { NumberExtractor } from './number-extractor';

import { ConcurrentPool } from '@tallyfold/shared';

import { ROUTER_DEFAULTS } from '../config/constants';
import { createAbortError } from '../errors/abort-error';
import { AiAdapterTimeoutError } from '../errors/ai-adapter-timeout-error';
import { normalizeAiResponse } from '../validators/ai-response-normalizer';
import { buildLocalPage } from './section-builder';

/**
 * Why a group could not use the AI client
 */
export type FallbackReason = 'unavailable' | 'timeout' | 'failed' | 'malformed';

/**
 * Result of one AI client call
 */
export type ClientCallOutcome =
  | { ok: true; response: NormalizedAiResponse }
  | { ok: false; reason: FallbackReason; error?: unknown };

export interface ProcessGroupsOptions {
  abortSignal?: AbortSignal;
}

/**
 * Turns page groups into batch results
 */
export interface GroupRouter {
  processGroups(
    document: PaginatedDocument,
    groups: readonly PageGroup[],
    options?: ProcessGroupsOptions,
  ): Promise<BatchResult[]>;
}

/**
 * AiFailoverRouter
 *
 * Sends each page group to the AI extraction client and falls back to
 * local number extraction whenever the client is unavailable, times out,
 * fails or returns something unusable. Only caller cancellation rejects.
 */
export class AiFailoverRouter implements GroupRouter {
  private readonly config: RouterConfig;

  constructor(
    private readonly logger: LoggerMethods,
    private readonly client: AiExtractionClient,
    private readonly numberExtractor: NumberExtractor,
    config: Partial<RouterConfig> = {},
  ) {
    this.config = {
      enabled: config.enabled ?? ROUTER_DEFAULTS.ENABLED,
      useVisionIfAvailable:
        config.useVisionIfAvailable ?? ROUTER_DEFAULTS.USE_VISION_IF_AVAILABLE,
      maxConcurrentGroups:
        config.maxConcurrentGroups ?? ROUTER_DEFAULTS.MAX_CONCURRENT_GROUPS,
      requestTimeoutMs:
        config.requestTimeoutMs ?? ROUTER_DEFAULTS.REQUEST_TIMEOUT_MS,
      maxSectionChars:
        config.maxSectionChars ?? ROUTER_DEFAULTS.MAX_SECTION_CHARS,
    };
  }

  /**
   * Process every group, at most `maxConcurrentGroups` at a time.
   * Results follow group order whatever order the calls finish in.
   *
   * @throws {Error} with name 'AbortError' if aborted
   */
  async processGroups(
    document: PaginatedDocument,
    groups: readonly PageGroup[],
    options: ProcessGroupsOptions = {},
  ): Promise<BatchResult[]> {
    if (!this.config.enabled) {
      this.logger.info('[AiFailoverRouter] Routing disabled, skipping groups');
      return [];
    }

    const { abortSignal } = options;
    this.logger.info(
      `[AiFailoverRouter] Routing ${groups.length} groups (concurrency: ${this.config.maxConcurrentGroups})`,
    );

    try {
      return await ConcurrentPool.run(
        groups,
        this.config.maxConcurrentGroups,
        (group) => this.processGroup(document, group, abortSignal),
        { abortSignal },
      );
    } catch (error) {
      if (abortSignal?.aborted) {
        this.logger.info('[AiFailoverRouter] Routing aborted');
        throw createAbortError('Group routing was aborted');
      }
      throw error;
    }
  }

  private async processGroup(
    document: PaginatedDocument,
    group: PageGroup,
    abortSignal?: AbortSignal,
  ): Promise<BatchResult> {
    const pages = document.pages.filter(
      (page) => page.index >= group.startPage && page.index <= group.endPage,
    );
    const outcome = await this.callClient(
      pages.map((page) => this.buildPayload(page)),
      abortSignal,
    );

    if (outcome.ok) {
      this.logger.debug(
        `[AiFailoverRouter] Group ${group.startPage}-${group.endPage}: AI returned ${outcome.response.pages.length} pages, ${outcome.response.tables.length} tables`,
      );
      return { group, source: 'ai', ...outcome.response };
    }

    const detail =
      outcome.error instanceof Error ? `: ${outcome.error.message}` : '';
    this.logger.warn(
      `[AiFailoverRouter] Group ${group.startPage}-${group.endPage}: falling back to local extraction (${outcome.reason}${detail})`,
    );
    return this.buildFallback(group, pages, outcome.reason);
  }

  private buildPayload(page: PageContent): AiPagePayload {
    const payload: AiPagePayload = {
      pageNumber: page.index + 1,
      text: page.text,
    };
    if (
      this.config.useVisionIfAvailable &&
      this.client.supportsLayoutInput &&
      page.words
    ) {
      payload.words = page.words;
    }
    return payload;
  }

  /**
   * Call the client under a per-call timeout. The availability check is a
   * hint: a throwing check counts as unavailable and a failing call after a
   * positive check still falls back.
   */
  private async callClient(
    pages: AiPagePayload[],
    abortSignal?: AbortSignal,
  ): Promise<ClientCallOutcome> {
    let available: boolean;
    try {
      available = this.client.isAvailable();
    } catch (error) {
      return { ok: false, reason: 'unavailable', error };
    }
    if (!available) {
      return { ok: false, reason: 'unavailable' };
    }

    abortSignal?.throwIfAborted();

    const controller = new AbortController();
    const forwardAbort = (): void => controller.abort(abortSignal?.reason);
    abortSignal?.addEventListener('abort', forwardAbort, { once: true });
    const timer = setTimeout(
      () =>
        controller.abort(new AiAdapterTimeoutError(this.config.requestTimeoutMs)),
      this.config.requestTimeoutMs,
    );
    const aborted = new Promise<never>((_, reject) => {
      controller.signal.addEventListener(
        'abort',
        () => reject(controller.signal.reason),
        { once: true },
      );
    });

    try {
      const response = await Promise.race([
        this.client.extract(pages, { abortSignal: controller.signal }),
        aborted,
      ]);
      // pages the group did not ask for are dropped
      const normalized = normalizeAiResponse(response, {
        pageNumbers: new Set(pages.map((page) => page.pageNumber)),
      });
      return normalized
        ? { ok: true, response: normalized }
        : { ok: false, reason: 'malformed' };
    } catch (error) {
      if (abortSignal?.aborted) {
        throw createAbortError('Group routing was aborted');
      }
      if (controller.signal.reason instanceof AiAdapterTimeoutError) {
        return { ok: false, reason: 'timeout', error: controller.signal.reason };
      }
      return { ok: false, reason: 'failed', error };
    } finally {
      clearTimeout(timer);
      abortSignal?.removeEventListener('abort', forwardAbort);
    }
  }

  private buildFallback(
    group: PageGroup,
    pages: readonly PageContent[],
    reason: FallbackReason,
  ): BatchResult {
    const results = pages.map((page) =>
      buildLocalPage(
        page.index + 1,
        page.text,
        this.numberExtractor,
        this.config.maxSectionChars,
      ),
    );
    const sections = results.flatMap((page) => page.sections);

    return {
      group,
      source: 'fallback',
      tables: [],
      pages: results,
      processingSummary: {
        tablesExtracted: 0,
        textSections: sections.length,
        numbersFound: sections.reduce(
          (sum, section) => sum + section.numbers.length,
          0,
        ),
        overallQualityScore: ROUTER_DEFAULTS.FALLBACK_QUALITY_SCORE,
        processingErrors: [],
      },
      fallbackReason: reason,
    };
  }
}
