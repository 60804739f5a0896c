/**
 * Reconciliation module - row-level comparison of two kline artifacts
 *
 * A reference dump (JSON wire rows) and a canonical export (CSV) are aligned
 * on open time and compared column by column. Divergent rows carry their
 * position in the aligned table and their line in the canonical file.
 *
 * Key components:
 * - compareArtifacts: load both files and reconcile them
 * - compareTables: pure comparison of two already-loaded tables
 * - renderReport: human-readable lines for a result
 */

export { compareArtifacts, compareTables, type CompareOptions } from './compare';
export {
  buildLineMap,
  loadCanonicalArtifact,
  loadReferenceArtifact,
  type LoaderOptions,
} from './loaders';
export { renderReport, type RenderOptions } from './report';
export type {
  CellDifference,
  CellValue,
  ComparisonSizes,
  DivergentRow,
  LineMap,
  ReconciliationResult,
} from './types';
