import * as path from "path";
import { UsageError } from "../lib/errors";

// --- CLI Arg Types ---

export interface RunArgs {
  command: "run";
  envFile: string | null;
}

export interface ValidateArgs {
  command: "validate";
  passDir: string;
}

export interface StatusArgs {
  command: "status";
  limit: number;
  envFile: string | null;
}

export interface VersionArgs {
  command: "version";
}

export type ParsedArgs = RunArgs | ValidateArgs | StatusArgs | VersionArgs;

// --- Constants ---

export const DEFAULT_STATUS_LIMIT = 20;

export const USAGE = [
  "Usage:",
  "  passlink run [--env <file>]",
  "  passlink validate <pass_dir>",
  "  passlink status [--limit <n>] [--env <file>]",
  "  passlink version",
].join("\n");

// --- CLI Parsing ---

function takeValue(args: string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined || value.startsWith("--")) {
    throw new UsageError(`${flag} requires a value`);
  }
  return value;
}

function unknownArgument(arg: string): UsageError {
  return new UsageError(`Unknown argument "${arg}"`);
}

/** Parse `process.argv`. Throws UsageError on anything it does not accept. */
export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const firstArg = args[0];

  if (firstArg === undefined) {
    throw new UsageError("No command provided.");
  }

  if (firstArg === "run") {
    let envFile: string | null = null;
    for (let i = 1; i < args.length; i++) {
      if (args[i] === "--env") {
        envFile = path.resolve(takeValue(args, i, "--env"));
        i++;
      } else {
        throw unknownArgument(args[i]);
      }
    }
    return { command: "run", envFile };
  }

  if (firstArg === "validate") {
    const target = args[1];
    if (target === undefined || target.startsWith("--")) {
      throw new UsageError("'validate' requires a pass directory path.");
    }
    if (args.length > 2) {
      throw new UsageError("'validate' does not accept additional arguments.");
    }
    return { command: "validate", passDir: path.resolve(target) };
  }

  if (firstArg === "status") {
    let limit = DEFAULT_STATUS_LIMIT;
    let envFile: string | null = null;
    for (let i = 1; i < args.length; i++) {
      if (args[i] === "--limit") {
        const raw = takeValue(args, i, "--limit");
        const n = Number(raw);
        if (!Number.isInteger(n) || n <= 0) {
          throw new UsageError(`--limit must be a positive whole number, got "${raw}"`);
        }
        limit = n;
        i++;
      } else if (args[i] === "--env") {
        envFile = path.resolve(takeValue(args, i, "--env"));
        i++;
      } else {
        throw unknownArgument(args[i]);
      }
    }
    return { command: "status", limit, envFile };
  }

  if (firstArg === "version" || firstArg === "--version") {
    return { command: "version" };
  }

  if (firstArg.startsWith("--")) {
    throw new UsageError(`Unknown flag "${firstArg}"`);
  }
  throw new UsageError(`Unknown command "${firstArg}"`);
}
