/**
 * CLI for dbee.
 *
 * Usage:
 *   dbee makedb people.db
 *   dbee insert_th people.db No Title
 *   dbee add_td people.db "No:1" "Title:X"
 *   dbee search people.db "No = '1'"
 */
import { parseArgs } from "node:util";
import { COMMANDS, dispatch } from "./commands/registry.js";
import { parseConfig } from "./config.js";
import { DbeeError, InvalidArgumentsError } from "./core/exceptions.js";
import { Dbee } from "./index.js";
import { createLogger, type Logger } from "./logger.js";

const COMMAND_HELP = COMMANDS.map(
  (c) => `  ${c.usage.padEnd(40)} ${c.summary}`,
).join("\n");

export const USAGE = `
dbee — a SQLite table from the command line

Usage:
  dbee [options] <command> <file> [arguments...]

Commands:
${COMMAND_HELP}

Options:
  --table <name>      Table to operate on   (default: data)
  --kdf-cost <n>      scrypt cost as log2 N for lock_db (default: 15)
  -v, --verbose       Debug logging on stderr
  -h, --help          Show this help

Use -- before arguments that start with a dash.
`.trim();

export interface CliIO {
  out(text: string): void;
  err(text: string): void;
}

const consoleIO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text),
};

function parseCliArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        table: { type: "string" },
        "kdf-cost": { type: "string" },
        verbose: { type: "boolean", short: "v", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
      allowPositionals: true,
      strict: true,
    });
  } catch (err) {
    throw new InvalidArgumentsError(err instanceof Error ? err.message : String(err));
  }
}

/**
 * Run one command. Output goes to `io.out`, errors to `io.err`.
 * Resolves with the process exit status.
 */
export async function runCli(
  argv: string[],
  opts: { io?: CliIO; logger?: Logger } = {},
): Promise<number> {
  const io = opts.io ?? consoleIO;

  try {
    const { values, positionals } = parseCliArgs(argv);

    if (values.help) {
      io.out(USAGE);
      return 0;
    }
    if (positionals.length === 0) {
      io.err(USAGE);
      return 2;
    }

    const config = parseConfig({
      table: values.table,
      logLevel: values.verbose ? "debug" : "warn",
      kdf:
        values["kdf-cost"] !== undefined
          ? { cost: Number(values["kdf-cost"]) }
          : undefined,
    });
    const logger = opts.logger ?? createLogger(config.logLevel);
    const dbee = new Dbee(config, logger);

    const [name, ...rest] = positionals;
    logger.debug({ command: name, table: config.table }, "dispatch");
    const lines = await dispatch({ dbee }, name, rest);
    for (const line of lines) io.out(line);
    return 0;
  } catch (err) {
    if (err instanceof DbeeError) {
      io.err(`Error: ${err.message}`);
      if (err instanceof InvalidArgumentsError && err.usage) {
        io.err(`Usage: dbee ${err.usage}`);
      }
      return err.exitCode;
    }
    io.err(`Error: ${err instanceof Error ? err.message : String(err)}`);
    return 1;
  }
}
