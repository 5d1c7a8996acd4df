import type { PersistenceError } from '../utils/errors.js';

/** Reference to the record loaded for edit/delete, by stable id. `null` when nothing is selected. */
export type Selection = string | null;

/** Asks the user whether a destructive operation may proceed. */
export type Confirmer<T> = (record: T) => boolean | Promise<boolean>;

export interface LoadResult<T> {
  records: T[];
  warning?: PersistenceError;
}

/**
 * Result of a mutating operation. The in-memory change is kept even when
 * saving failed; `persistError` is then set.
 */
export interface MutationOutcome<T> {
  result: T;
  persistError?: PersistenceError;
}

export interface ImportSummary {
  added: number;
  skippedInvalid: number;
  skippedDuplicates: number;
}

export type ExportFormat = 'json' | 'csv' | 'vcf';

export interface SimilarField {
  field: 'name' | 'phone' | 'email';
  valueA: string;
  valueB: string;
  similarity: number;
  matchType: 'exact' | 'fuzzy' | 'normalized';
}

export interface SimilarPair {
  idA: string;
  idB: string;
  confidence: number;
  matchedFields: SimilarField[];
}
