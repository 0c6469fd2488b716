/**
 * Command registry – maps subcommand names to their schema and handler.
 */
import { z } from "zod";
import { UnknownCommandError } from "../core/exceptions.js";
import { renderTable } from "../output/table.js";
import {
  assignment,
  columnValue,
  defineCommand,
  filePath,
  text,
  type Command,
  type CommandContext,
} from "./schema.js";

function countLine(count: number, verb: string): string {
  if (count === 0) return "No rows matched.";
  return `${count} row${count === 1 ? "" : "s"} ${verb}.`;
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

const makeDatabase = defineCommand({
  name: "makedb",
  usage: "<file>",
  summary: "Create a new database file",
  args: z.tuple([filePath]).transform(([file]) => ({ file })),
  async handler({ dbee }, { file }) {
    await dbee.makeDatabase(file);
    return [`Database '${file}' created successfully.`];
  },
});

const insertTableHeader = defineCommand({
  name: "insert_th",
  usage: "<file> <header>...",
  summary: "Create the table with the given headers",
  args: z
    .tuple([filePath, text])
    .rest(text)
    .transform(([file, ...headers]) => ({ file, headers })),
  async handler({ dbee }, { file, headers }) {
    await dbee.createTable(file, headers);
    return [`Table header with columns ${headers.join(", ")} created successfully.`];
  },
});

const addTableHeader = defineCommand({
  name: "add_th",
  usage: "<file> <header>...",
  summary: "Add headers to an existing table",
  args: z
    .tuple([filePath, text])
    .rest(text)
    .transform(([file, ...headers]) => ({ file, headers })),
  async handler({ dbee }, { file, headers }) {
    await dbee.addHeaders(file, headers);
    return [`Table headers ${headers.join(", ")} added successfully.`];
  },
});

const listTableHeaders = defineCommand({
  name: "list_th",
  usage: "<file>",
  summary: "List the table's headers",
  args: z.tuple([filePath]).transform(([file]) => ({ file })),
  async handler({ dbee }, { file }) {
    return dbee.listHeaders(file);
  },
});

const addTableData = defineCommand({
  name: "add_td",
  usage: "<file> <column:value>...",
  summary: "Add one row",
  args: z
    .tuple([filePath, columnValue])
    .rest(columnValue)
    .transform(([file, ...pairs]) => ({ file, pairs })),
  async handler({ dbee }, { file, pairs }) {
    await dbee.addRow(file, pairs);
    return ["Row added successfully."];
  },
});

const search = defineCommand({
  name: "search",
  usage: "<file> [predicate]",
  summary: "Print every row, or the rows matching the predicate",
  args: z
    .tuple([filePath])
    .rest(text)
    .refine((argv) => argv.length <= 2, { message: "too many arguments" })
    .transform(([file, ...rest]) => ({
      file,
      predicate: rest.length > 0 ? rest[0] : undefined,
    })),
  async handler({ dbee }, { file, predicate }) {
    const result = await dbee.search(file, predicate);
    return [renderTable(result.columns, result.rows)];
  },
});

const modifyTableData = defineCommand({
  name: "modify_td",
  usage: "<file> <predicate> <column=value>...",
  summary: "Update the rows matching the predicate",
  args: z
    .tuple([filePath, text, assignment])
    .rest(assignment)
    .transform(([file, predicate, ...assignments]) => ({
      file,
      predicate,
      assignments,
    })),
  async handler({ dbee }, { file, predicate, assignments }) {
    const changed = await dbee.modifyRows(file, predicate, assignments);
    return [countLine(changed, "modified")];
  },
});

const removeTableData = defineCommand({
  name: "remove_td",
  usage: "<file> <predicate>",
  summary: "Delete the rows matching the predicate",
  args: z
    .tuple([filePath, text])
    .transform(([file, predicate]) => ({ file, predicate })),
  async handler({ dbee }, { file, predicate }) {
    const removed = await dbee.removeRows(file, predicate);
    return [countLine(removed, "removed")];
  },
});

const modifyTableHeader = defineCommand({
  name: "modify_th",
  usage: "<file> <old> <new>",
  summary: "Rename a header",
  args: z
    .tuple([filePath, text, text])
    .transform(([file, from, to]) => ({ file, from, to })),
  async handler({ dbee }, { file, from, to }) {
    await dbee.modifyHeader(file, from, to);
    return [`Table header name '${from}' changed to '${to}' successfully.`];
  },
});

const removeTableHeader = defineCommand({
  name: "remove_th",
  usage: "<file> <header>",
  summary: "Drop a header and its data",
  args: z
    .tuple([filePath, text])
    .transform(([file, column]) => ({ file, column })),
  async handler({ dbee }, { file, column }) {
    await dbee.removeHeader(file, column);
    return [`Table header '${column}' and its data removed successfully.`];
  },
});

const lockDatabase = defineCommand({
  name: "lock_db",
  usage: "<file> <password> <confirm>",
  summary: "Encrypt the database file with a password",
  args: z
    .tuple([filePath, text, text])
    .transform(([file, password, confirm]) => ({ file, password, confirm })),
  async handler({ dbee }, { file, password, confirm }) {
    await dbee.lock(file, password, confirm);
    return [`Database '${file}' locked.`];
  },
});

const unlockDatabase = defineCommand({
  name: "unlock_db",
  usage: "<file> <password>",
  summary: "Decrypt a locked database file",
  args: z
    .tuple([filePath, text])
    .transform(([file, password]) => ({ file, password })),
  async handler({ dbee }, { file, password }) {
    await dbee.unlock(file, password);
    return [`Database '${file}' unlocked.`];
  },
});

// ---------------------------------------------------------------------------
// Registry
// ---------------------------------------------------------------------------

export const COMMANDS: Command[] = [
  makeDatabase,
  insertTableHeader,
  addTableHeader,
  listTableHeaders,
  addTableData,
  search,
  modifyTableData,
  removeTableData,
  modifyTableHeader,
  removeTableHeader,
  lockDatabase,
  unlockDatabase,
];

export const COMMAND_REGISTRY: Record<string, Command> = Object.fromEntries(
  COMMANDS.map((command) => [command.name, command]),
);

export function getCommand(name: string): Command {
  const command = Object.hasOwn(COMMAND_REGISTRY, name) ? COMMAND_REGISTRY[name] : undefined;
  if (!command) throw new UnknownCommandError(name);
  return command;
}

/** Route a subcommand and its arguments to the matching handler. */
export async function dispatch(
  ctx: CommandContext,
  name: string,
  argv: string[],
): Promise<string[]> {
  return getCommand(name).run(ctx, argv);
}
