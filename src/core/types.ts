/**
 * Shared value and result types.
 */

/** A value as SQLite hands it back. */
export type SqlValue = string | number | bigint | Buffer | null;

/** A value bound into a statement. Everything the CLI supplies is text. */
export type SqlParam = string | number | bigint | Buffer | null;

/** One result row, keyed by column name. */
export type Row = Record<string, SqlValue>;

/** Columns (in statement order) and the rows a SELECT produced. */
export interface QueryResult {
  columns: string[];
  rows: Row[];
}

/** SQL text plus the parameters bound to its `?` placeholders. */
export interface Statement {
  sql: string;
  params: SqlParam[];
}

/** A `column:value` pair given to add-row. */
export interface ColumnValue {
  column: string;
  value: string;
}

/** A `column=value` assignment given to modify-row. */
export interface Assignment {
  column: string;
  value: string;
}
