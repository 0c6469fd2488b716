/**
 * Unit tests for configuration parsing.
 */
import { describe, test, expect } from "vitest";
import { parseConfig } from "../src/config.js";
import { InvalidArgumentsError } from "../src/core/exceptions.js";

describe("parseConfig", () => {
  test("defaults", () => {
    expect(parseConfig()).toEqual({
      table: "data",
      logLevel: "warn",
      kdf: { cost: 15, blockSize: 8, parallelization: 1 },
    });
  });

  test("partial kdf keeps the other defaults", () => {
    expect(parseConfig({ kdf: { cost: 12 } }).kdf).toEqual({
      cost: 12,
      blockSize: 8,
      parallelization: 1,
    });
  });

  test("rejects a blank table name", () => {
    expect(() => parseConfig({ table: "  " })).toThrow(InvalidArgumentsError);
  });

  test("rejects an out-of-range cost", () => {
    expect(() => parseConfig({ kdf: { cost: 5 } })).toThrow(
      "Invalid configuration: kdf.cost: Number must be greater than or equal to 10",
    );
  });
});
