import type { CanonicalColumn } from '@klinecheck/schemas';

/** A single cell as held in a KlineRecord */
export type CellValue = Date | number | null;

/** Row counts seen by one comparison (after any trailing-row drop) */
export interface ComparisonSizes {
  reference: number;
  canonical: number;
  /** Open times present in both inputs */
  common: number;
}

/** One column whose value differs between the two inputs */
export interface CellDifference {
  column: CanonicalColumn;
  reference: CellValue;
  canonical: CellValue;
}

/** A shared open time whose rows differ in at least one column */
export interface DivergentRow {
  openTime: Date;
  /** 1-based position within the intersected, sorted table */
  position: number;
  /** 1-based line in the canonical file (header is line 1); null when unknown */
  line: number | null;
  differences: CellDifference[];
}

/**
 * Outcome of reconciling a reference artifact against a canonical one.
 * None of these is an error; load failures throw instead.
 */
export type ReconciliationResult =
  | { outcome: 'no-common-timestamps'; sizes: ComparisonSizes }
  | { outcome: 'match'; sizes: ComparisonSizes; sizeMismatch: boolean }
  | {
      outcome: 'divergent';
      sizes: ComparisonSizes;
      sizeMismatch: boolean;
      rows: DivergentRow[];
    };

/** open time (epoch ms) → 1-based line in the canonical file */
export type LineMap = Map<number, number>;
