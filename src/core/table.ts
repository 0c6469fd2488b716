/**
 * Table operations against one open database.
 *
 * Column and table existence are checked here so the caller gets a typed
 * error instead of SQLite's message; everything else is left to SQLite.
 */
import type { DatabaseBackend } from "../db/backend.js";
import {
  addColumnStatement,
  assertNames,
  createTableStatement,
  deleteStatement,
  dropColumnStatement,
  insertRowStatement,
  renameColumnStatement,
  sameIdentifier,
  selectStatement,
  tableColumnsStatement,
  tableExistsStatement,
  updateStatement,
} from "../db/statements.js";
import { silentLogger, type Logger } from "../logger.js";
import {
  ColumnAlreadyExistsError,
  ColumnNotFoundError,
  InvalidArgumentsError,
  TableAlreadyExistsError,
  TableNotFoundError,
} from "./exceptions.js";
import type { Assignment, ColumnValue, QueryResult } from "./types.js";

export class TableService {
  private db: DatabaseBackend;
  private table: string;
  private logger: Logger;

  constructor(db: DatabaseBackend, table: string, logger?: Logger) {
    this.db = db;
    this.table = table;
    this.logger = logger ?? silentLogger();
  }

  // ------------------------------------------------------------------
  // Headers
  // ------------------------------------------------------------------

  async exists(): Promise<boolean> {
    const result = await this.db.query(tableExistsStatement(this.table));
    return result.rows.length > 0;
  }

  /** Column names in table order. */
  async headers(): Promise<string[]> {
    await this.requireTable();
    return this.columnNames();
  }

  async createTable(headers: string[]): Promise<void> {
    const statement = createTableStatement(this.table, headers);
    if (await this.exists()) {
      throw new TableAlreadyExistsError(this.table);
    }
    await this.db.execute(statement);
    this.logger.debug({ table: this.table, headers }, "table created");
  }

  /** Append columns; existing rows read them as NULL. */
  async addHeaders(headers: string[]): Promise<void> {
    assertNames("header", headers);
    const columns = await this.headers();
    for (const header of headers) {
      if (columns.some((c) => sameIdentifier(c, header))) {
        throw new ColumnAlreadyExistsError(header);
      }
    }
    for (const header of headers) {
      await this.db.execute(addColumnStatement(this.table, header));
    }
  }

  async renameHeader(from: string, to: string): Promise<void> {
    const statement = renameColumnStatement(this.table, from, to);
    const columns = await this.headers();
    if (!columns.some((c) => sameIdentifier(c, from))) {
      throw new ColumnNotFoundError(from);
    }
    // Renaming to a different spelling of the same column is allowed.
    if (columns.some((c) => sameIdentifier(c, to) && !sameIdentifier(c, from))) {
      throw new ColumnAlreadyExistsError(to);
    }
    await this.db.execute(statement);
  }

  async removeHeader(column: string): Promise<void> {
    const statement = dropColumnStatement(this.table, column);
    await this.requireColumns([column]);
    const columns = await this.columnNames();
    if (columns.length === 1) {
      throw new InvalidArgumentsError(
        `Cannot remove '${column}': it is the table's last header`,
      );
    }
    await this.db.execute(statement);
  }

  // ------------------------------------------------------------------
  // Rows
  // ------------------------------------------------------------------

  async addRow(pairs: ColumnValue[]): Promise<void> {
    const statement = insertRowStatement(this.table, pairs);
    await this.requireColumns(pairs.map((p) => p.column));
    await this.db.execute(statement);
  }

  async search(predicate?: string): Promise<QueryResult> {
    const statement = selectStatement(this.table, predicate);
    await this.requireTable();
    const result = await this.db.query(statement);
    this.logger.debug({ table: this.table, rows: result.rows.length }, "search");
    return result;
  }

  /** Returns the number of rows updated. */
  async modifyRows(predicate: string, assignments: Assignment[]): Promise<number> {
    const statement = updateStatement(this.table, assignments, predicate);
    await this.requireColumns(assignments.map((a) => a.column));
    const changed = await this.db.execute(statement);
    this.logger.debug({ table: this.table, changed }, "rows modified");
    return changed;
  }

  /** Returns the number of rows deleted. */
  async removeRows(predicate: string): Promise<number> {
    const statement = deleteStatement(this.table, predicate);
    await this.requireTable();
    const removed = await this.db.execute(statement);
    this.logger.debug({ table: this.table, removed }, "rows removed");
    return removed;
  }

  // ------------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------------

  private async columnNames(): Promise<string[]> {
    const result = await this.db.query(tableColumnsStatement(this.table));
    return result.rows.map((row) => String(row.name));
  }

  private async requireTable(): Promise<void> {
    if (!(await this.exists())) {
      throw new TableNotFoundError(this.table);
    }
  }

  private async requireColumns(wanted: string[]): Promise<void> {
    const columns = await this.headers();
    for (const column of wanted) {
      if (!columns.some((c) => sameIdentifier(c, column))) {
        throw new ColumnNotFoundError(column);
      }
    }
  }
}
