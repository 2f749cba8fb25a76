import type { PageContent } from '@tallyfold/model';

import type { GeometricTableDetector } from '../processors/geometric-table-detector';

/**
 * Computes how table-like a page layout is, in [0, 1].
 */
export interface LayoutSignalProvider {
  tableLikeness(page: PageContent): number;
}

/**
 * Layout signal that reports no structure, leaving classification to the
 * numeric thresholds alone.
 */
export class NullLayoutSignal implements LayoutSignalProvider {
  tableLikeness(_page: PageContent): number {
    return 0;
  }
}

/**
 * Layout signal based on the detector's grid reconstruction: the share of
 * rows holding at least the detector's minimum number of filled columns.
 */
export class GridLayoutSignal implements LayoutSignalProvider {
  constructor(private readonly detector: GeometricTableDetector) {}

  tableLikeness(page: PageContent): number {
    if (!page.words || page.words.length === 0) {
      return 0;
    }

    const grid = this.detector.analyzeGrid(page.words);
    const minCols = this.detector.minColumns;
    if (grid.rows.length === 0 || grid.columnPositions.length < minCols) {
      return 0;
    }

    const denseRows = grid.rows.filter(
      (row) => this.detector.countFilled(row) >= minCols,
    ).length;
    return denseRows / grid.rows.length;
  }
}
