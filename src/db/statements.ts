/**
 * Statement builder: turns table operations into SQL text and bound parameters.
 *
 * Identifiers are always double-quoted and values always bound, so only the
 * predicate reaches SQLite as raw text. Predicates are checked for structure
 * here; their meaning is left to SQLite's expression evaluator.
 */
import { InvalidArgumentsError } from "../core/exceptions.js";
import type { Assignment, ColumnValue, Statement } from "../core/types.js";

// ---------------------------------------------------------------------------
// Guards
// ---------------------------------------------------------------------------

export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

/** Fold A-Z only; SQLite leaves non-ASCII letters as they are when comparing names. */
export function foldIdentifier(name: string): string {
  return name.replace(/[A-Z]/g, (c) => c.toLowerCase());
}

export function sameIdentifier(a: string, b: string): boolean {
  return foldIdentifier(a) === foldIdentifier(b);
}

/** Reject an empty list, blank names, and names that collide in SQLite. */
export function assertNames(kind: string, names: string[]): void {
  if (names.length === 0) {
    throw new InvalidArgumentsError(`At least one ${kind} is required`);
  }
  const seen = new Set<string>();
  for (const name of names) {
    if (name.trim() === "") {
      throw new InvalidArgumentsError(`Empty ${kind} name`);
    }
    const key = foldIdentifier(name);
    if (seen.has(key)) {
      throw new InvalidArgumentsError(`Duplicate ${kind}: ${name}`);
    }
    seen.add(key);
  }
}

/**
 * Check that a predicate is a single, well-formed expression fragment:
 * non-empty, quotes closed, and no `;` outside a quoted section or comment.
 * Returns the trimmed predicate.
 */
export function assertPredicate(predicate: string): string {
  const trimmed = predicate.trim();
  if (trimmed === "") {
    throw new InvalidArgumentsError("Predicate must not be empty");
  }

  let quote: string | null = null;
  for (let i = 0; i < trimmed.length; i++) {
    const ch = trimmed[i];
    if (quote) {
      if (ch === quote) {
        // A doubled quote is an escaped quote character.
        if (trimmed[i + 1] === quote) {
          i++;
        } else {
          quote = null;
        }
      }
      continue;
    }
    if (ch === "-" && trimmed[i + 1] === "-") {
      const eol = trimmed.indexOf("\n", i + 2);
      i = eol === -1 ? trimmed.length : eol;
      continue;
    }
    if (ch === "/" && trimmed[i + 1] === "*") {
      // SQLite also accepts a block comment left open at the end of input.
      const close = trimmed.indexOf("*/", i + 2);
      i = close === -1 ? trimmed.length : close + 1;
      continue;
    }
    if (ch === "'" || ch === '"' || ch === "`") {
      quote = ch;
    } else if (ch === ";") {
      throw new InvalidArgumentsError(
        `Predicate must be a single expression: ${predicate}`,
      );
    }
  }

  if (quote) {
    throw new InvalidArgumentsError(`Unterminated ${quote} in predicate: ${predicate}`);
  }
  return trimmed;
}

// ---------------------------------------------------------------------------
// Schema statements
// ---------------------------------------------------------------------------

export function tableExistsStatement(table: string): Statement {
  return {
    sql: "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ? COLLATE NOCASE",
    params: [table],
  };
}

export function tableColumnsStatement(table: string): Statement {
  return {
    sql: "SELECT name FROM pragma_table_info(?) ORDER BY cid",
    params: [table],
  };
}

export function createTableStatement(table: string, headers: string[]): Statement {
  assertNames("header", headers);
  const columns = headers.map(quoteIdentifier).join(", ");
  return {
    sql: `CREATE TABLE ${quoteIdentifier(table)} (${columns})`,
    params: [],
  };
}

export function addColumnStatement(table: string, column: string): Statement {
  assertNames("header", [column]);
  return {
    sql: `ALTER TABLE ${quoteIdentifier(table)} ADD COLUMN ${quoteIdentifier(column)}`,
    params: [],
  };
}

export function renameColumnStatement(
  table: string,
  from: string,
  to: string,
): Statement {
  assertNames("header", [from]);
  assertNames("header", [to]);
  return {
    sql: `ALTER TABLE ${quoteIdentifier(table)} RENAME COLUMN ${quoteIdentifier(from)} TO ${quoteIdentifier(to)}`,
    params: [],
  };
}

export function dropColumnStatement(table: string, column: string): Statement {
  assertNames("header", [column]);
  return {
    sql: `ALTER TABLE ${quoteIdentifier(table)} DROP COLUMN ${quoteIdentifier(column)}`,
    params: [],
  };
}

// ---------------------------------------------------------------------------
// Row statements
// ---------------------------------------------------------------------------

export function insertRowStatement(table: string, pairs: ColumnValue[]): Statement {
  assertNames("column", pairs.map((p) => p.column));
  const columns = pairs.map((p) => quoteIdentifier(p.column)).join(", ");
  const placeholders = pairs.map(() => "?").join(", ");
  return {
    sql: `INSERT INTO ${quoteIdentifier(table)} (${columns}) VALUES (${placeholders})`,
    params: pairs.map((p) => p.value),
  };
}

export function selectStatement(table: string, predicate?: string): Statement {
  const base = `SELECT * FROM ${quoteIdentifier(table)}`;
  if (predicate === undefined) {
    return { sql: base, params: [] };
  }
  return { sql: `${base} WHERE ${assertPredicate(predicate)}`, params: [] };
}

export function updateStatement(
  table: string,
  assignments: Assignment[],
  predicate: string,
): Statement {
  assertNames("assignment", assignments.map((a) => a.column));
  const where = assertPredicate(predicate);
  const set = assignments.map((a) => `${quoteIdentifier(a.column)} = ?`).join(", ");
  return {
    sql: `UPDATE ${quoteIdentifier(table)} SET ${set} WHERE ${where}`,
    params: assignments.map((a) => a.value),
  };
}

export function deleteStatement(table: string, predicate: string): Statement {
  return {
    sql: `DELETE FROM ${quoteIdentifier(table)} WHERE ${assertPredicate(predicate)}`,
    params: [],
  };
}
