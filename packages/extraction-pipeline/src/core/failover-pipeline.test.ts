import type {
  BatchResult,
  PageGroup,
  PaginatedDocument,
  PositionedWord,
  Table,
} from '@tallyfold/model';

import type {
  AiExtractionClient,
  AiExtractionResponse,
  AiPagePayload,
} from '../clients/ai-extraction-client';
import type { GroupRouter } from '../processors/ai-failover-router';
import type { DocumentSource } from '../sources/document-source';

import { beforeEach, describe, expect, test, vi } from 'vitest';

import { PageComplexityAnalyzer } from '../analyzers/page-complexity-analyzer';
import { PipelineConfigError } from '../errors/pipeline-config-error';
import { SourceUnavailableError } from '../errors/source-unavailable-error';
import { GeometricTableDetector } from '../processors/geometric-table-detector';
import { NumberExtractor } from '../processors/number-extractor';
import { ResultReconstructor } from '../processors/result-reconstructor';
import { buildSection } from '../processors/section-builder';
import { InMemoryDocumentSource } from '../sources/document-source';
import { FailoverPipeline } from './failover-pipeline';

class NoBatchRouter implements GroupRouter {
  calls: PageGroup[][] = [];

  async processGroups(
    _document: PaginatedDocument,
    groups: readonly PageGroup[],
  ): Promise<BatchResult[]> {
    this.calls.push([...groups]);
    return [];
  }
}

class FakeClient implements AiExtractionClient {
  available = false;
  respond: (
    pages: AiPagePayload[],
  ) => Promise<AiExtractionResponse | null | undefined> = async () => ({});

  isAvailable(): boolean {
    return this.available;
  }

  extract(pages: AiPagePayload[]): Promise<AiExtractionResponse | null | undefined> {
    return this.respond(pages);
  }
}

function gridWords(rows: string[][]): PositionedWord[] {
  return rows.flatMap((cells, lineId) =>
    cells.map((text, column) => ({
      x0: 10 + column * 90,
      y0: 10 + lineId * 20,
      x1: 40 + column * 90,
      y1: 20 + lineId * 20,
      text,
      lineId,
    })),
  );
}

const aiTable: Table = {
  tableId: 'p2_t1',
  name: 'Sales',
  region: {
    pageNumber: 2,
    boundingBox: [0, 0, 0, 0],
    detectionMethod: 'ai_extraction',
  },
  headerInfo: {
    headerRows: [1],
    headerColumns: [],
    dataStartRow: 2,
    dataStartCol: 1,
  },
  columns: [],
  rows: [],
  metadata: {
    detectionMethod: 'ai_extraction',
    cellCount: 0,
    hasMergedCells: false,
    confidence: 0.8,
  },
};

describe('FailoverPipeline', () => {
  const mockLogger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
  let client: FakeClient;

  beforeEach(() => {
    client = new FakeClient();
  });

  function createWithRouter(router: GroupRouter): FailoverPipeline {
    const extractor = new NumberExtractor();
    return new FailoverPipeline(
      mockLogger,
      extractor,
      new PageComplexityAnalyzer(mockLogger, extractor),
      router,
      new GeometricTableDetector(mockLogger, { minRows: 2 }),
      new ResultReconstructor(mockLogger),
    );
  }

  const threePages = new InMemoryDocumentSource('three.pdf', [
    'Revenue 100 200 300',
    'Introduction and background',
    'Costs 4 5 6',
  ]);

  test('keeps every page when the router returns no batches', async () => {
    const router = new NoBatchRouter();
    const pipeline = createWithRouter(router);

    const result = await pipeline.process(threePages);

    expect(router.calls).toEqual([
      [
        { startPage: 0, endPage: 0 },
        { startPage: 2, endPage: 2 },
      ],
    ]);
    expect(result.textContent.pages.map((page) => page.pageNumber)).toEqual([
      1, 2, 3,
    ]);
    expect(result.documentMetadata).toEqual({
      filename: 'three.pdf',
      totalPages: 3,
      extractionMethods: ['ai_failover_routing', 'local_number_extraction'],
    });
    expect(result.processingSummary).toEqual({
      tablesExtracted: 0,
      textSections: 3,
      numbersFound: 6,
      overallQualityScore: 0.5,
      processingErrors: [],
    });
  });

  test('reports stages in order', async () => {
    const stages: string[] = [];

    await createWithRouter(new NoBatchRouter()).process(threePages, {
      onStage: (stage) => stages.push(stage),
    });

    expect(stages).toEqual([
      'analyzed',
      'routed',
      'detected',
      'reconstructed',
      'finalized',
    ]);
  });

  test('substitutes an empty document for an unopenable source', async () => {
    const failing: DocumentSource = {
      name: 'broken.pdf',
      open: async () => {
        throw new SourceUnavailableError('broken.pdf', new Error('bad header'));
      },
    };
    const pipeline = FailoverPipeline.create(mockLogger, { client });

    const result = await pipeline.process(failing);

    expect(result.documentMetadata).toEqual({
      filename: 'broken.pdf',
      totalPages: 1,
      extractionMethods: ['ai_failover_routing', 'local_number_extraction'],
    });
    expect(result.textContent.pages).toHaveLength(1);
    expect(result.textContent.pages[0].pageNumber).toBe(1);
    expect(result.textContent.pages[0].sections[0].content).toBe('');
    expect(result.tables.tables).toEqual([]);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      '[FailoverPipeline] Source broken.pdf unavailable, continuing with an empty document',
      expect.any(SourceUnavailableError),
    );
  });

  test('detects tables geometrically when no batch produced one', async () => {
    const source = new InMemoryDocumentSource('grid.pdf', [
      {
        text: 'Item Cost\nRent 900\nTax 50',
        words: gridWords([
          ['Item', 'Cost'],
          ['Rent', '900'],
          ['Tax', '50'],
        ]),
      },
    ]);
    const pipeline = FailoverPipeline.create(mockLogger, { client });

    const result = await pipeline.process(source);

    expect(result.tables.tables).toHaveLength(1);
    expect(result.tables.tables[0].tableId).toBe('p1_t1');
    expect(result.tables.tables[0].region.pageNumber).toBe(1);
    expect(result.tables.tables[0].rows.map((row) => row.cells)).toEqual([
      ['Item', 'Cost'],
      ['Rent', '900'],
      ['Tax', '50'],
    ]);
    expect(result.documentMetadata.extractionMethods).toEqual([
      'ai_failover_routing',
      'local_number_extraction',
      'geometric_grid',
    ]);
    expect(result.textContent.pages).toHaveLength(1);
    expect(result.processingSummary.tablesExtracted).toBe(1);
  });

  test('detects tables on numeric pages when nothing was grouped', async () => {
    const source = new InMemoryDocumentSource('sparse.pdf', [
      {
        text: 'Item Cost Rent 900',
        words: gridWords([
          ['Item', 'Cost'],
          ['Rent', '900'],
        ]),
      },
    ]);
    const pipeline = FailoverPipeline.create(mockLogger, {
      client,
      config: { analyzer: { minNumberDensity: 1000 } },
    });

    const result = await pipeline.process(source);

    expect(result.tables.tables.map((table) => table.tableId)).toEqual([
      'p1_t1',
    ]);
    expect(result.textContent.pages.map((page) => page.pageNumber)).toEqual([
      1,
    ]);
  });

  test('merges AI pages with code-only pages and skips detection', async () => {
    client.available = true;
    client.respond = async (pages) => ({
      tables: [aiTable],
      pages: pages.map((page) => ({
        pageNumber: page.pageNumber,
        sections: [buildSection(page.pageNumber, 1, `ai ${page.text}`, [])],
      })),
    });
    const source = new InMemoryDocumentSource('mixed.pdf', [
      { text: 'Intro only words', words: gridWords([['a', 'b'], ['c', 'd']]) },
      'Sales 10 20 30',
      'Closing remarks',
    ]);
    const pipeline = FailoverPipeline.create(mockLogger, { client });

    const result = await pipeline.process(source, { filename: 'override.pdf' });

    expect(
      result.textContent.pages.map((page) => [
        page.pageNumber,
        page.sections[0].content,
      ]),
    ).toEqual([
      [1, 'Intro only words'],
      [2, 'ai Sales 10 20 30'],
      [3, 'Closing remarks'],
    ]);
    expect(result.tables.tables).toEqual([aiTable]);
    expect(result.documentMetadata).toEqual({
      filename: 'override.pdf',
      totalPages: 3,
      extractionMethods: [
        'ai_failover_routing',
        'ai_extraction',
        'local_number_extraction',
      ],
    });
    expect(result.processingSummary.overallQualityScore).toBe(0.6);
  });

  test('completes when AI sections leave out fields', async () => {
    client.available = true;
    client.respond = async () =>
      ({
        pages: [
          { pageNumber: 1, sections: [{ sectionId: 'x', content: 'c' }] },
        ],
        processingSummary: { numbersFound: 0 },
      }) as unknown as AiExtractionResponse;
    const source = new InMemoryDocumentSource('partial.pdf', ['Totals 1 2 3']);
    const pipeline = FailoverPipeline.create(mockLogger, { client });

    const result = await pipeline.process(source);

    expect(result.textContent.pages).toEqual([
      {
        pageNumber: 1,
        sections: [
          {
            sectionId: 'x',
            sectionType: 'paragraph',
            title: null,
            content: 'c',
            wordCount: 1,
            llmReady: true,
            numbers: [],
          },
        ],
      },
    ]);
    expect(result.processingSummary.numbersFound).toBe(0);
  });

  test('rejects with AbortError when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const stages: string[] = [];

    await expect(
      createWithRouter(new NoBatchRouter()).process(threePages, {
        abortSignal: controller.signal,
        onStage: (stage) => stages.push(stage),
      }),
    ).rejects.toMatchObject({ name: 'AbortError' });
    expect(stages).toEqual([]);
  });

  test('rejects with AbortError when aborted while routing', async () => {
    client.available = true;
    client.respond = () => new Promise(() => {});
    const controller = new AbortController();
    const pipeline = FailoverPipeline.create(mockLogger, { client });

    const running = pipeline.process(threePages, {
      abortSignal: controller.signal,
    });
    controller.abort();

    await expect(running).rejects.toMatchObject({ name: 'AbortError' });
  });

  test('rejects invalid configuration on creation', () => {
    expect(() =>
      FailoverPipeline.create(mockLogger, {
        client,
        config: { router: { maxConcurrentGroups: 0 } },
      }),
    ).toThrow(PipelineConfigError);
  });

  test('uses the grid layout signal when requested', async () => {
    const stages: string[] = [];
    const source = new InMemoryDocumentSource('grid.pdf', [
      {
        text: 'Item Cost\nRent 900\nTax 50',
        words: gridWords([
          ['Item', 'Cost'],
          ['Rent', '900'],
          ['Tax', '50'],
        ]),
      },
    ]);
    const pipeline = FailoverPipeline.create(mockLogger, {
      client,
      layoutSignal: 'grid',
    });

    const result = await pipeline.process(source, {
      onStage: (stage) => stages.push(stage),
    });

    expect(stages).toHaveLength(5);
    expect(result.tables.tables).toHaveLength(1);
  });
});
