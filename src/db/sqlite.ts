/**
 * SQLite database backend using better-sqlite3.
 */
import Database from "better-sqlite3";
import { existsSync } from "node:fs";
import { z } from "zod";
import { isLockedFile } from "../cipher/file-cipher.js";
import {
  DatabaseLockedError,
  EngineError,
  FileAlreadyExistsError,
  FileNotFoundError,
} from "../core/exceptions.js";
import type { QueryResult, Statement } from "../core/types.js";
import { silentLogger, type Logger } from "../logger.js";
import type { DatabaseBackend } from "./backend.js";

/** Written into the header of every database `makedb` creates ("dbee"). */
export const APPLICATION_ID = 0x64626565;

const SqlValueSchema = z.union([
  z.string(),
  z.number(),
  z.bigint(),
  z.instanceof(Buffer),
  z.null(),
]);

const RowSchema = z.record(z.string(), SqlValueSchema);

function toEngineError(err: unknown): unknown {
  if (err instanceof Database.SqliteError) {
    return new EngineError(err.message, err.code);
  }
  if (err instanceof TypeError || err instanceof RangeError) {
    // better-sqlite3 reports bad bindings and unusable paths this way.
    return new EngineError(err.message);
  }
  return err;
}

function openHandle(path: string, create: boolean): Database.Database {
  try {
    return new Database(path, { fileMustExist: !create });
  } catch (err) {
    throw toEngineError(err);
  }
}

export class SQLiteBackend implements DatabaseBackend {
  private db: Database.Database;
  private logger: Logger;

  constructor(
    path: string = ":memory:",
    opts: { create?: boolean; logger?: Logger } = {},
  ) {
    this.db = openHandle(path, opts.create ?? true);
    this.logger = opts.logger ?? silentLogger();
  }

  /** Mark the file as a dbee database; this also forces SQLite to write its header page. */
  async stamp(): Promise<void> {
    try {
      this.db.pragma(`application_id = ${APPLICATION_ID}`);
    } catch (err) {
      throw toEngineError(err);
    }
  }

  async execute(statement: Statement): Promise<number> {
    this.logger.debug({ sql: statement.sql, params: statement.params.length }, "execute");
    try {
      const info = this.db.prepare(statement.sql).run(...statement.params);
      return info.changes;
    } catch (err) {
      throw toEngineError(err);
    }
  }

  async query(statement: Statement): Promise<QueryResult> {
    this.logger.debug({ sql: statement.sql, params: statement.params.length }, "query");
    try {
      const prepared = this.db.prepare(statement.sql);
      const columns = prepared.columns().map((c) => c.name);
      const rows = prepared.all(...statement.params).map((row) => RowSchema.parse(row));
      return { columns, rows };
    } catch (err) {
      throw toEngineError(err);
    }
  }

  async close(): Promise<void> {
    this.db.close();
  }
}

// ---------------------------------------------------------------------------
// Scoped connections
// ---------------------------------------------------------------------------

/**
 * Create a new, empty database file. Fails if anything already exists at `path`.
 */
export async function createDatabaseFile(path: string, logger?: Logger): Promise<void> {
  if (existsSync(path)) {
    throw new FileAlreadyExistsError(path);
  }
  const backend = new SQLiteBackend(path, { create: true, logger });
  try {
    await backend.stamp();
  } finally {
    await backend.close();
  }
}

/**
 * Open an existing, unlocked database file, run `fn` against it and close the
 * connection whether `fn` resolves or throws.
 */
export async function withDatabase<T>(
  path: string,
  fn: (db: DatabaseBackend) => Promise<T>,
  logger?: Logger,
): Promise<T> {
  if (!existsSync(path)) {
    throw new FileNotFoundError(path);
  }
  if (await isLockedFile(path)) {
    throw new DatabaseLockedError(path);
  }

  const backend = new SQLiteBackend(path, { create: false, logger });
  try {
    return await fn(backend);
  } finally {
    await backend.close();
  }
}
