/**
 * Database backend interface.
 *
 * One backend is one open connection, owned by a single command.
 */
import type { QueryResult, Statement } from "../core/types.js";

export interface DatabaseBackend {
  /** Run a write statement (CREATE, ALTER, INSERT, UPDATE, DELETE) and return the number of rows changed. */
  execute(statement: Statement): Promise<number>;

  /** Run a SELECT and return its columns and every matching row. */
  query(statement: Statement): Promise<QueryResult>;

  /** Close the connection / release resources. */
  close(): Promise<void>;
}
