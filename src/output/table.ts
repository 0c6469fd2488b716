/**
 * Plain-text table rendering for query results.
 */
import stringWidth from "string-width";
import type { Row, SqlValue } from "../core/types.js";

export const NO_RESULTS = "No matching rows found.";

const COLUMN_GAP = "  ";
const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

export function formatCell(value: SqlValue): string {
  if (value === null) return "";
  if (Buffer.isBuffer(value)) return `<blob ${value.length} bytes>`;
  return String(value);
}

function isNumeric(value: SqlValue): boolean {
  if (typeof value === "number" || typeof value === "bigint") return true;
  return typeof value === "string" && NUMERIC.test(value.trim());
}

/** Pad by terminal columns, so wide and combining characters line up. */
function pad(text: string, width: number, right: boolean): string {
  const fill = " ".repeat(Math.max(0, width - stringWidth(text)));
  return right ? fill + text : text + fill;
}

/**
 * Render rows under a header line and a dashed rule. A column whose
 * non-empty values are all numeric is right-aligned.
 */
export function renderTable(columns: string[], rows: Row[]): string {
  if (rows.length === 0) return NO_RESULTS;

  const cells = rows.map((row) => columns.map((c) => formatCell(row[c] ?? null)));
  const widths = columns.map((c, i) =>
    Math.max(stringWidth(c), ...cells.map((line) => stringWidth(line[i]))),
  );
  const rightAligned = columns.map((c) => {
    const values = rows.map((row) => row[c] ?? null).filter((v) => v !== null);
    return values.length > 0 && values.every(isNumeric);
  });

  const line = (parts: string[]): string =>
    parts
      .map((part, i) => pad(part, widths[i], rightAligned[i]))
      .join(COLUMN_GAP)
      .trimEnd();

  return [
    line(columns),
    widths.map((w) => "-".repeat(w)).join(COLUMN_GAP),
    ...cells.map(line),
  ].join("\n");
}
