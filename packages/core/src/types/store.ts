/**
 * Tabular Store contract
 *
 * An append-only table keyed by item URL whose remaining columns are the
 * metric schema labels. Implementations live in @reelscope/result-store.
 */

/**
 * One stored row
 */
export interface StoreRow {
  key: string;
  /** Values keyed by metric label; labels missing from a row read as '' */
  fields: Record<string, string>;
}

export interface TabularStore {
  /** Metric labels in column order */
  readonly schema: readonly string[];

  /** Latest row appended for the key */
  readRow(key: string): Promise<StoreRow | undefined>;

  /** Every row stored for the key, oldest first */
  readRows(key: string): Promise<StoreRow[]>;

  /** Append one row; never rewrites earlier rows */
  appendRow(key: string, fields: Record<string, string>): Promise<void>;

  keyExists(key: string): Promise<boolean>;

  /** All rows, oldest first */
  rows(): Promise<StoreRow[]>;

  /** Re-read the backing storage so decisions see rows written by other runs */
  reload(): Promise<void>;
}
