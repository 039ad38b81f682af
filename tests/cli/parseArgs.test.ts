import { describe, it, expect } from "vitest";
import * as path from "path";
import { DEFAULT_STATUS_LIMIT, parseArgs } from "../../src/cli/parseArgs";
import { UsageError } from "../../src/lib/errors";

const argv = (...args: string[]) => ["node", "passlink", ...args];

describe("parseArgs", () => {
  it("parses run with and without an env file", () => {
    expect(parseArgs(argv("run"))).toEqual({ command: "run", envFile: null });
    expect(parseArgs(argv("run", "--env", "station.env"))).toEqual({
      command: "run",
      envFile: path.resolve("station.env"),
    });
  });

  it("parses validate with a resolved directory", () => {
    expect(parseArgs(argv("validate", "data/pass1"))).toEqual({
      command: "validate",
      passDir: path.resolve("data/pass1"),
    });
  });

  it("parses status options", () => {
    expect(parseArgs(argv("status"))).toEqual({
      command: "status",
      limit: DEFAULT_STATUS_LIMIT,
      envFile: null,
    });
    expect(parseArgs(argv("status", "--limit", "5", "--env", ".env.local"))).toEqual({
      command: "status",
      limit: 5,
      envFile: path.resolve(".env.local"),
    });
  });

  it("parses version", () => {
    expect(parseArgs(argv("version"))).toEqual({ command: "version" });
    expect(parseArgs(argv("--version"))).toEqual({ command: "version" });
  });

  it("rejects a missing command", () => {
    expect(() => parseArgs(argv())).toThrow(UsageError);
    expect(() => parseArgs(argv())).toThrow("No command provided.");
  });

  it("rejects unknown commands and flags", () => {
    expect(() => parseArgs(argv("frobnicate"))).toThrow('Unknown command "frobnicate"');
    expect(() => parseArgs(argv("--nope"))).toThrow('Unknown flag "--nope"');
    expect(() => parseArgs(argv("run", "--fast"))).toThrow('Unknown argument "--fast"');
  });

  it("requires values for flags", () => {
    expect(() => parseArgs(argv("run", "--env"))).toThrow("--env requires a value");
    expect(() => parseArgs(argv("status", "--limit", "--env", "x"))).toThrow("--limit requires a value");
  });

  it("validates the status limit", () => {
    expect(() => parseArgs(argv("status", "--limit", "0"))).toThrow(
      '--limit must be a positive whole number, got "0"'
    );
  });

  it("validate needs exactly one directory", () => {
    expect(() => parseArgs(argv("validate"))).toThrow("'validate' requires a pass directory path.");
    expect(() => parseArgs(argv("validate", "a", "b"))).toThrow(
      "'validate' does not accept additional arguments."
    );
  });
});
