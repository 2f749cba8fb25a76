import type {
  PositionedWord,
  ProcessingSummary,
  Section,
  Table,
} from '@tallyfold/model';

/**
 * One page sent to the AI extraction capability
 */
export interface AiPagePayload {
  /** 1-based page number */
  pageNumber: number;
  text: string;
  /** Present only when the client accepts layout input */
  words?: PositionedWord[];
}

/**
 * Page content as returned by a client. Missing sections mean none.
 */
export interface AiPageResponse {
  pageNumber: number;
  sections?: Section[];
}

/**
 * Raw client response. Every field may be missing; the router normalizes
 * it once right after the call.
 */
export interface AiExtractionResponse {
  tables?: Table[];
  pages?: AiPageResponse[];
  processingSummary?: Partial<ProcessingSummary>;
}

export interface AiExtractOptions {
  abortSignal?: AbortSignal;
}

/**
 * Boundary to an external AI extraction capability.
 *
 * `isAvailable()` is a hint only: the capability may still fail when
 * `extract` is called.
 */
export interface AiExtractionClient {
  isAvailable(): boolean;

  /** Whether positioned words may be included in the payload */
  readonly supportsLayoutInput?: boolean;

  extract(
    pages: AiPagePayload[],
    options: AiExtractOptions,
  ): Promise<AiExtractionResponse | null | undefined>;
}
