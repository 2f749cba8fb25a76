import type {
  PageContent,
  PaginatedDocument,
  PositionedWord,
} from '@tallyfold/model';

/**
 * Supplies the pages of one document.
 *
 * `open` rejects with `SourceUnavailableError` when the document cannot be
 * read at all.
 */
export interface DocumentSource {
  /** Name used as the result filename and in log messages */
  readonly name: string;
  open(): Promise<PaginatedDocument>;
}

/**
 * Page given to {@link InMemoryDocumentSource}: plain text, or text with
 * positioned words.
 */
export type InMemoryPage = string | { text: string; words?: PositionedWord[] };

/**
 * Document source over pages already held in memory.
 */
export class InMemoryDocumentSource implements DocumentSource {
  constructor(
    readonly name: string,
    private readonly pages: readonly InMemoryPage[],
  ) {}

  async open(): Promise<PaginatedDocument> {
    return {
      filename: this.name,
      pages: this.pages.map((page, index): PageContent =>
        typeof page === 'string'
          ? { index, text: page }
          : { index, text: page.text, words: page.words },
      ),
    };
  }
}

/**
 * Stand-in for a document that could not be opened: a single empty page.
 */
export function createEmptyDocument(filename: string): PaginatedDocument {
  return { filename, pages: [{ index: 0, text: '' }] };
}
