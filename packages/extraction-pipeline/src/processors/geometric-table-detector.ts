import type { LoggerMethods } from '@tallyfold/logger';
import type {
  BoundingBox,
  PositionedWord,
  Table,
  TableColumn,
  TableRow,
} from '@tallyfold/model';

import type { DetectorConfig } from '../config/pipeline-config';

import { DETECTOR_DEFAULTS, EXTRACTION_METHODS } from '../config/constants';

/**
 * Adjacent words of one line merged into a single cell
 */
interface GridCell {
  x0: number;
  text: string;
  box: BoundingBox;
}

/**
 * One line of the page mapped onto the column positions
 */
export interface GridRow {
  /** Cell text per column, '' where the line has nothing */
  cells: string[];
  box: BoundingBox;
}

/**
 * Grid reconstructed from positioned words, before acceptance filtering
 */
export interface PageGrid {
  /** Left-x of each column, ascending */
  columnPositions: number[];
  /** Non-empty rows in line order */
  rows: GridRow[];
}

/**
 * GeometricTableDetector
 *
 * Rebuilds row/column structure from positioned words by clustering
 * cell left edges. Emits at most one table per page.
 *
 * ## Algorithm
 *
 * 1. Bucket words by line id and sort each line by left-x
 * 2. Merge consecutive words whose gap is within `xTolerance` into cells
 * 3. Cluster every cell's left-x into column positions (single-link at
 *    `2 × xTolerance`, upper-median representative)
 * 4. Assign each cell to its nearest column, joining collisions with a space
 * 5. Drop empty rows and apply the acceptance filter
 */
export class GeometricTableDetector {
  private readonly minRows: number;
  private readonly minCols: number;
  private readonly xTolerance: number;

  constructor(
    private readonly logger: LoggerMethods,
    config: Partial<DetectorConfig> = {},
  ) {
    this.minRows = config.minRows ?? DETECTOR_DEFAULTS.MIN_ROWS;
    this.minCols = config.minCols ?? DETECTOR_DEFAULTS.MIN_COLS;
    this.xTolerance = config.xTolerance ?? DETECTOR_DEFAULTS.X_TOLERANCE;
  }

  /**
   * Minimum non-empty cells for a row to count as tabular
   */
  get minColumns(): number {
    return this.minCols;
  }

  /**
   * Detect tables on one page.
   *
   * @param pageNumber - 1-based page number recorded in the table region
   */
  detectTables(words: readonly PositionedWord[], pageNumber: number): Table[] {
    if (words.length === 0) {
      return [];
    }

    const grid = this.analyzeGrid(words);
    const columnCount = grid.columnPositions.length;
    const denseRows = grid.rows.filter(
      (row) => this.countFilled(row) >= this.minCols,
    ).length;

    if (
      grid.rows.length < this.minRows ||
      columnCount < this.minCols ||
      denseRows < Math.max(2, this.minRows - 1)
    ) {
      this.logger.debug(
        `[GeometricTableDetector] Page ${pageNumber}: rejected grid (${grid.rows.length} rows, ${columnCount} columns, ${denseRows} dense)`,
      );
      return [];
    }

    this.logger.debug(
      `[GeometricTableDetector] Page ${pageNumber}: accepted ${grid.rows.length}x${columnCount} grid`,
    );
    return [this.buildTable(grid, pageNumber)];
  }

  /**
   * Reconstruct the page grid without applying the acceptance filter.
   */
  analyzeGrid(words: readonly PositionedWord[]): PageGrid {
    const lines = this.groupLines(words).map((line) => this.mergeCells(line));
    const columnPositions = this.clusterColumns(
      lines.flatMap((cells) => cells.map((cell) => cell.x0)),
    );

    const rows: GridRow[] = [];
    for (const cells of lines) {
      if (cells.length === 0) {
        continue;
      }
      const row = this.assignCells(cells, columnPositions);
      if (row.cells.some((text) => text.trim() !== '')) {
        rows.push(row);
      }
    }

    return { columnPositions, rows };
  }

  countFilled(row: GridRow): number {
    return row.cells.filter((text) => text.trim() !== '').length;
  }

  private groupLines(words: readonly PositionedWord[]): PositionedWord[][] {
    const byLine = new Map<number, PositionedWord[]>();
    for (const word of words) {
      const line = byLine.get(word.lineId);
      if (line) {
        line.push(word);
      } else {
        byLine.set(word.lineId, [word]);
      }
    }

    return [...byLine.entries()]
      .sort(([a], [b]) => a - b)
      .map(([, line]) => [...line].sort((a, b) => a.x0 - b.x0));
  }

  private mergeCells(line: readonly PositionedWord[]): GridCell[] {
    const cells: GridCell[] = [];
    let current: GridCell | undefined;
    // gap is measured from the previous word, not the merged cell
    let previousX1 = Number.NEGATIVE_INFINITY;

    for (const word of line) {
      const gap = word.x0 - previousX1;
      previousX1 = word.x1;
      if (current && gap <= this.xTolerance) {
        current.text = `${current.text} ${word.text}`;
        current.box = unionBox(current.box, [word.x0, word.y0, word.x1, word.y1]);
        continue;
      }
      current = {
        x0: word.x0,
        text: word.text,
        box: [word.x0, word.y0, word.x1, word.y1],
      };
      cells.push(current);
    }

    return cells;
  }

  private clusterColumns(positions: number[]): number[] {
    const sorted = [...positions].sort((a, b) => a - b);
    const clusters: number[][] = [];
    const tolerance = this.xTolerance * 2;

    for (const x of sorted) {
      const last = clusters[clusters.length - 1];
      if (last && x - last[last.length - 1] <= tolerance) {
        last.push(x);
      } else {
        clusters.push([x]);
      }
    }

    return clusters.map(median);
  }

  private assignCells(
    cells: readonly GridCell[],
    columnPositions: readonly number[],
  ): GridRow {
    const texts: string[] = columnPositions.map(() => '');
    let box = cells[0].box;

    for (const cell of cells) {
      let nearest = 0;
      for (let i = 1; i < columnPositions.length; i++) {
        if (
          Math.abs(cell.x0 - columnPositions[i]) <
          Math.abs(cell.x0 - columnPositions[nearest])
        ) {
          nearest = i;
        }
      }
      texts[nearest] = texts[nearest] ? `${texts[nearest]} ${cell.text}` : cell.text;
      box = unionBox(box, cell.box);
    }

    return { cells: texts, box };
  }

  private buildTable(grid: PageGrid, pageNumber: number): Table {
    const columnCount = grid.columnPositions.length;
    const header = grid.rows[0];

    const columns: TableColumn[] = grid.columnPositions.map((_, i) => ({
      columnIndex: i + 1,
      columnLabel: header.cells[i].trim() || `Column ${i + 1}`,
      isHeaderColumn: false,
    }));

    const rows: TableRow[] = grid.rows.map((row, i) => ({
      rowIndex: i + 1,
      rowLabel: row.cells[0].trim() || `Row ${i + 1}`,
      isHeaderRow: i === 0,
      cells: row.cells,
    }));

    const boundingBox = grid.rows
      .slice(1)
      .reduce((box, row) => unionBox(box, row.box), header.box);

    return {
      tableId: `p${pageNumber}_t1`,
      name: `Page ${pageNumber} Table 1`,
      region: {
        pageNumber,
        boundingBox,
        detectionMethod: EXTRACTION_METHODS.GEOMETRIC_GRID,
      },
      headerInfo: {
        headerRows: [1],
        headerColumns: [],
        dataStartRow: 2,
        dataStartCol: 1,
      },
      columns,
      rows,
      metadata: {
        detectionMethod: EXTRACTION_METHODS.GEOMETRIC_GRID,
        cellCount: rows.length * Math.max(1, columnCount),
        hasMergedCells: false,
        confidence: DETECTOR_DEFAULTS.CONFIDENCE,
      },
    };
  }
}

function unionBox(a: BoundingBox, b: BoundingBox): BoundingBox {
  return [
    Math.min(a[0], b[0]),
    Math.min(a[1], b[1]),
    Math.max(a[2], b[2]),
    Math.max(a[3], b[3]),
  ];
}

/**
 * Middle element of sorted values; the upper one for even counts.
 */
function median(values: readonly number[]): number {
  return values[Math.floor(values.length / 2)];
}
