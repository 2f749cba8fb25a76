export type {
  BatchResult,
  DocumentMetadata,
  DocumentResult,
  ProcessingSummary,
} from './document-result';
export type { NumberFormat, NumberMatch } from './number-match';
export type { PageResult, Section } from './page-content';
export type {
  LayoutSignals,
  PageCategory,
  PageGroup,
  PageMetric,
} from './page-metric';
export type {
  PageContent,
  PaginatedDocument,
  PositionedWord,
} from './paginated-document';
export type {
  BoundingBox,
  Table,
  TableColumn,
  TableHeaderInfo,
  TableMetadata,
  TableRegion,
  TableRow,
} from './table';
