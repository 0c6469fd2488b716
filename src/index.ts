/**
 * dbee – a single-table SQLite front end with password file locking.
 */
import { lockFile, unlockFile } from "./cipher/file-cipher.js";
import { parseConfig, type Config, type RawConfig } from "./config.js";
import { TableService } from "./core/table.js";
import type { Assignment, ColumnValue, QueryResult } from "./core/types.js";
import { createDatabaseFile, withDatabase } from "./db/sqlite.js";
import { silentLogger, type Logger } from "./logger.js";

export * from "./core/exceptions.js";
export type * from "./core/types.js";
export type { Config, RawConfig } from "./config.js";
export { renderTable, NO_RESULTS } from "./output/table.js";

export class Dbee {
  private config: Config;
  private logger: Logger;

  constructor(config: Config, logger?: Logger) {
    this.config = config;
    this.logger = logger ?? silentLogger();
  }

  /** Construct from a raw configuration object (validates with Zod). */
  static fromConfig(raw: RawConfig = {}, logger?: Logger): Dbee {
    return new Dbee(parseConfig(raw), logger);
  }

  // ------------------------------------------------------------------
  // Database and headers
  // ------------------------------------------------------------------

  async makeDatabase(path: string): Promise<void> {
    await createDatabaseFile(path, this.logger);
    this.logger.debug({ path }, "database created");
  }

  async createTable(path: string, headers: string[]): Promise<void> {
    await this.withTable(path, (t) => t.createTable(headers));
  }

  async listHeaders(path: string): Promise<string[]> {
    return this.withTable(path, (t) => t.headers());
  }

  async addHeaders(path: string, headers: string[]): Promise<void> {
    await this.withTable(path, (t) => t.addHeaders(headers));
  }

  async modifyHeader(path: string, from: string, to: string): Promise<void> {
    await this.withTable(path, (t) => t.renameHeader(from, to));
  }

  async removeHeader(path: string, column: string): Promise<void> {
    await this.withTable(path, (t) => t.removeHeader(column));
  }

  // ------------------------------------------------------------------
  // Rows
  // ------------------------------------------------------------------

  async addRow(path: string, pairs: ColumnValue[]): Promise<void> {
    await this.withTable(path, (t) => t.addRow(pairs));
  }

  async search(path: string, predicate?: string): Promise<QueryResult> {
    return this.withTable(path, (t) => t.search(predicate));
  }

  async modifyRows(
    path: string,
    predicate: string,
    assignments: Assignment[],
  ): Promise<number> {
    return this.withTable(path, (t) => t.modifyRows(predicate, assignments));
  }

  async removeRows(path: string, predicate: string): Promise<number> {
    return this.withTable(path, (t) => t.removeRows(predicate));
  }

  // ------------------------------------------------------------------
  // Locking
  // ------------------------------------------------------------------

  async lock(path: string, password: string, confirm: string): Promise<void> {
    await lockFile(path, password, confirm, {
      kdf: this.config.kdf,
      logger: this.logger,
    });
  }

  async unlock(path: string, password: string): Promise<void> {
    await unlockFile(path, password, { logger: this.logger });
  }

  // ------------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------------

  private withTable<T>(path: string, fn: (table: TableService) => Promise<T>): Promise<T> {
    return withDatabase(
      path,
      (db) => fn(new TableService(db, this.config.table, this.logger)),
      this.logger,
    );
  }
}
