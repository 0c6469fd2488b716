/**
 * Typed command schema: each subcommand validates its positional arguments
 * with a zod schema before its handler runs.
 */
import { z } from "zod";
import { InvalidArgumentsError } from "../core/exceptions.js";
import type { Assignment, ColumnValue } from "../core/types.js";
import type { Dbee } from "../index.js";

// ---------------------------------------------------------------------------
// Command shape
// ---------------------------------------------------------------------------

export interface CommandContext {
  dbee: Dbee;
}

export interface Command {
  name: string;
  usage: string;
  summary: string;
  /** Validate `argv` (everything after the subcommand name) and run. Returns output lines. */
  run(ctx: CommandContext, argv: string[]): Promise<string[]>;
}

export interface CommandDefinition<A> {
  name: string;
  /** Argument synopsis, without the command name. */
  usage: string;
  summary: string;
  args: z.ZodType<A, z.ZodTypeDef, unknown>;
  handler(ctx: CommandContext, args: A): Promise<string[]>;
}

function describeIssue(issue: z.ZodIssue): string {
  if (issue.code === "too_small" && issue.type === "array") return "missing arguments";
  if (issue.code === "too_big" && issue.type === "array") return "too many arguments";
  return issue.message;
}

export function defineCommand<A>(def: CommandDefinition<A>): Command {
  const usage = `${def.name} ${def.usage}`;
  return {
    name: def.name,
    usage,
    summary: def.summary,
    async run(ctx, argv) {
      const parsed = def.args.safeParse(argv);
      if (!parsed.success) {
        throw new InvalidArgumentsError(
          `${def.name}: ${describeIssue(parsed.error.issues[0])}`,
          usage,
        );
      }
      return def.handler(ctx, parsed.data);
    },
  };
}

// ---------------------------------------------------------------------------
// Argument parsers
// ---------------------------------------------------------------------------

/** Strip one pair of matching outer quotes, undoubling inner ones as SQL does. */
export function unquote(value: string): string {
  const first = value[0];
  if (value.length >= 2 && (first === "'" || first === '"') && value.endsWith(first)) {
    return value.slice(1, -1).split(first + first).join(first);
  }
  return value;
}

function splitPair(raw: string, separator: string): [string, string] | null {
  const at = raw.indexOf(separator);
  if (at <= 0) return null;
  return [raw.slice(0, at).trim(), raw.slice(at + separator.length)];
}

export const filePath = z.string().min(1, "file path must not be empty");

export const text = z.string();

/** `column:value`, split at the first colon. The value is kept verbatim. */
export const columnValue = z.string().transform((raw, ctx): ColumnValue => {
  const pair = splitPair(raw, ":");
  if (!pair) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `expected column:value, got '${raw}'`,
    });
    return z.NEVER;
  }
  return { column: pair[0], value: pair[1] };
});

/** `column=value`, split at the first `=`. Surrounding quotes on the value are removed. */
export const assignment = z.string().transform((raw, ctx): Assignment => {
  const pair = splitPair(raw, "=");
  if (!pair) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `expected column=value, got '${raw}'`,
    });
    return z.NEVER;
  }
  return { column: pair[0], value: unquote(pair[1].trim()) };
});
