/**
 * Unit tests for the command schema and dispatcher.
 */
import { describe, test, expect } from "vitest";
import { COMMAND_REGISTRY, dispatch, getCommand } from "../src/commands/registry.js";
import { assignment, columnValue, unquote } from "../src/commands/schema.js";
import { InvalidArgumentsError, UnknownCommandError } from "../src/core/exceptions.js";
import { makeDbee } from "./fixtures.js";

const ctx = { dbee: makeDbee() };

describe("registry", () => {
  test("every subcommand is registered", () => {
    expect(Object.keys(COMMAND_REGISTRY).sort()).toEqual([
      "add_td",
      "add_th",
      "insert_th",
      "list_th",
      "lock_db",
      "makedb",
      "modify_td",
      "modify_th",
      "remove_td",
      "remove_th",
      "search",
      "unlock_db",
    ]);
  });

  test("unknown command", () => {
    expect(() => getCommand("drop_db")).toThrow(UnknownCommandError);
    expect(() => getCommand("toString")).toThrow("Unknown command: toString");
  });

  test("usage includes the command name", () => {
    expect(getCommand("modify_th").usage).toBe("modify_th <file> <old> <new>");
  });
});

describe("argument validation", () => {
  test("missing arguments", async () => {
    const err = await dispatch(ctx, "insert_th", ["t.db"]).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(InvalidArgumentsError);
    expect(err).toMatchObject({
      message: "insert_th: missing arguments",
      usage: "insert_th <file> <header>...",
    });
  });

  test("too many arguments", async () => {
    await expect(dispatch(ctx, "remove_th", ["t.db", "A", "B"])).rejects.toThrow(
      "remove_th: too many arguments",
    );
    await expect(dispatch(ctx, "search", ["t.db", "A = 1", "B = 2"])).rejects.toThrow(
      "search: too many arguments",
    );
  });

  test("malformed column:value pair", async () => {
    await expect(dispatch(ctx, "add_td", ["t.db", "No1"])).rejects.toThrow(
      "add_td: expected column:value, got 'No1'",
    );
  });

  test("malformed assignment", async () => {
    await expect(dispatch(ctx, "modify_td", ["t.db", "No = '1'", "Title"])).rejects.toThrow(
      "modify_td: expected column=value, got 'Title'",
    );
  });

  test("empty file path", async () => {
    await expect(dispatch(ctx, "makedb", [""])).rejects.toThrow(
      "makedb: file path must not be empty",
    );
  });
});

describe("parsers", () => {
  test("column:value splits at the first colon", () => {
    expect(columnValue.parse("Time:12:30")).toEqual({ column: "Time", value: "12:30" });
    expect(columnValue.parse(" No :1")).toEqual({ column: "No", value: "1" });
  });

  test("assignment strips surrounding quotes", () => {
    expect(assignment.parse("Title='Y'")).toEqual({ column: "Title", value: "Y" });
    expect(assignment.parse("Title = Y")).toEqual({ column: "Title", value: "Y" });
    expect(assignment.parse("Note='a=b'")).toEqual({ column: "Note", value: "a=b" });
  });

  test("unquote", () => {
    expect(unquote("'O''Brien'")).toBe("O'Brien");
    expect(unquote('"say ""hi"""')).toBe('say "hi"');
    expect(unquote("'unbalanced")).toBe("'unbalanced");
    expect(unquote("'")).toBe("'");
  });
});
