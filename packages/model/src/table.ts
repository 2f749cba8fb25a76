/**
 * Axis-aligned box `[x0, y0, x1, y1]` in page coordinates.
 */
export type BoundingBox = [number, number, number, number];

/**
 * Where a table sits and which detector found it
 */
export interface TableRegion {
  /** 1-based page number */
  pageNumber: number;
  boundingBox: BoundingBox;
  detectionMethod: string;
}

/**
 * Header layout of a table. Row and column indices are 1-based.
 */
export interface TableHeaderInfo {
  headerRows: number[];
  headerColumns: number[];
  dataStartRow: number;
  dataStartCol: number;
}

export interface TableColumn {
  /** 1-based column index */
  columnIndex: number;
  columnLabel: string;
  isHeaderColumn: boolean;
}

export interface TableRow {
  /** 1-based row index */
  rowIndex: number;
  rowLabel: string;
  isHeaderRow: boolean;
  /** Cell text per column, '' for empty cells */
  cells: string[];
}

export interface TableMetadata {
  detectionMethod: string;
  cellCount: number;
  hasMergedCells: boolean;
  /** Detector confidence in [0, 1] */
  confidence: number;
}

/**
 * A table reconstructed from one page
 *
 * Each table is produced by exactly one detector or extractor. Tables from
 * different sources may coexist for the same document.
 *
 * @interface Table
 */
export interface Table {
  /** Identifier such as "p4_t1". Not deduplicated across sources. */
  tableId: string;
  name: string;
  region: TableRegion;
  headerInfo: TableHeaderInfo;
  columns: TableColumn[];
  rows: TableRow[];
  metadata: TableMetadata;
}
