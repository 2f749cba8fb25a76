import type { LoggerMethods } from '@tallyfold/logger';
import type {
  PageContent,
  PaginatedDocument,
  PositionedWord,
} from '@tallyfold/model';
import type { PDFDocumentProxy } from 'pdfjs-dist/legacy/build/pdf.mjs';

import type { DocumentSource } from './document-source';

import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';

import { SourceUnavailableError } from '../errors/source-unavailable-error';

export interface PdfjsDocumentSourceOptions {
  /** Display name; defaults to the file's base name, or "document.pdf" */
  name?: string;
  /** Largest vertical distance (page units) between items on one line */
  lineTolerance?: number;
}

const DEFAULT_LINE_TOLERANCE = 3;

/**
 * Text item with its box converted to top-left page coordinates
 */
interface PlacedItem {
  text: string;
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

/**
 * PdfjsDocumentSource
 *
 * Reads a PDF with pdfjs-dist. Each text item becomes a positioned word;
 * items whose vertical centers lie within `lineTolerance` share a line id.
 * Page text is the words joined by line in reading order.
 */
export class PdfjsDocumentSource implements DocumentSource {
  readonly name: string;
  private readonly lineTolerance: number;

  /**
   * @param input - Path to a PDF file, or its bytes
   */
  constructor(
    private readonly logger: LoggerMethods,
    private readonly input: string | Uint8Array,
    options: PdfjsDocumentSourceOptions = {},
  ) {
    this.name =
      options.name ??
      (typeof input === 'string' ? basename(input) : 'document.pdf');
    this.lineTolerance = options.lineTolerance ?? DEFAULT_LINE_TOLERANCE;
  }

  async open(): Promise<PaginatedDocument> {
    let pdf: PDFDocumentProxy;
    try {
      // pdfjs detaches the buffer it is given, so hand it a copy
      const data =
        typeof this.input === 'string'
          ? new Uint8Array(await readFile(this.input))
          : this.input.slice();
      pdf = await getDocument({
        data,
        useSystemFonts: true,
        disableFontFace: true,
      }).promise;
    } catch (error) {
      throw new SourceUnavailableError(this.name, error);
    }

    this.logger.info(
      `[PdfjsDocumentSource] Opened ${this.name} (${pdf.numPages} pages)`,
    );

    try {
      const pages: PageContent[] = [];
      for (let index = 0; index < pdf.numPages; index++) {
        pages.push(await this.readPage(pdf, index));
      }
      return { filename: this.name, pages };
    } finally {
      await pdf.destroy();
    }
  }

  private async readPage(
    pdf: PDFDocumentProxy,
    index: number,
  ): Promise<PageContent> {
    let items: PlacedItem[];
    try {
      const page = await pdf.getPage(index + 1);
      const { height } = page.getViewport({ scale: 1 });
      const content = await page.getTextContent();

      items = [];
      for (const item of content.items) {
        if (!('str' in item) || !item.str.trim()) {
          continue;
        }
        const [, , , , x, baseline]: number[] = item.transform;
        const y1 = height - baseline;
        items.push({
          text: item.str.trim(),
          x0: x,
          y0: y1 - item.height,
          x1: x + item.width,
          y1,
        });
      }
    } catch (error) {
      this.logger.warn(
        `[PdfjsDocumentSource] Page ${index + 1}: text could not be read, using empty text`,
        error,
      );
      return { index, text: '' };
    }

    const words = this.assignLines(items);
    return { index, text: this.joinLines(words), words };
  }

  private assignLines(items: readonly PlacedItem[]): PositionedWord[] {
    const center = (item: PlacedItem): number => (item.y0 + item.y1) / 2;
    const sorted = [...items].sort(
      (a, b) => center(a) - center(b) || a.x0 - b.x0,
    );

    const words: PositionedWord[] = [];
    let lineId = -1;
    let lineCenter = Number.NEGATIVE_INFINITY;
    for (const item of sorted) {
      if (center(item) - lineCenter > this.lineTolerance) {
        lineId++;
        lineCenter = center(item);
      }
      words.push({ ...item, lineId });
    }
    return words;
  }

  private joinLines(words: readonly PositionedWord[]): string {
    const lines = new Map<number, PositionedWord[]>();
    for (const word of words) {
      lines.set(word.lineId, [...(lines.get(word.lineId) ?? []), word]);
    }
    return [...lines.values()]
      .map((line) =>
        [...line]
          .sort((a, b) => a.x0 - b.x0)
          .map((word) => word.text)
          .join(' '),
      )
      .join('\n');
  }
}
