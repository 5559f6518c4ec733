import { PathwayError } from "../../core/errors.js";
import type { WhitespaceMode } from "../../core/types.js";
import { WHITESPACE_MODES, isWhitespaceMode } from "../../core/whitespace.js";

const SWITCHES = new Set(["local-names", "verbose"]);

export interface ParsedFlags {
  values: Record<string, string[]>;
  switches: Set<string>;
}

export interface SelectionArgs {
  file: string;
  patterns: string[];
  whitespace: WhitespaceMode | undefined;
  limit: number | null;
  localNames: boolean;
  verbose: boolean;
}

export const parseFlags = (args: string[]): ParsedFlags => {
  const values: Record<string, string[]> = {};
  const switches = new Set<string>();
  for (let i = 0; i < args.length; i += 1) {
    const token = args[i];
    if (!token.startsWith("--")) {
      throw new PathwayError("CLI_ARG_FORMAT", `Unexpected argument: ${token}`);
    }
    const name = token.slice(2);
    if (SWITCHES.has(name)) {
      switches.add(name);
      continue;
    }
    const value = args[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new PathwayError("CLI_ARG_MISSING", `Missing value for --${name}`);
    }
    (values[name] ??= []).push(value);
    i += 1;
  }
  return { values, switches };
};

const getLastFlag = (flags: ParsedFlags, name: string): string | undefined => {
  const all = flags.values[name];
  return all ? all[all.length - 1] : undefined;
};

const getRequiredFlag = (flags: ParsedFlags, name: string): string => {
  const value = getLastFlag(flags, name);
  if (value === undefined) {
    throw new PathwayError("CLI_ARG_REQUIRED", `Missing required argument --${name}`);
  }
  return value;
};

const parseLimit = (raw: string | undefined): number | null => {
  if (raw === undefined) {
    return null;
  }
  const limit = Number.parseInt(raw, 10);
  if (Number.isNaN(limit) || limit < 1 || String(limit) !== raw.trim()) {
    throw new PathwayError("CLI_LIMIT_PARSE", `Invalid match limit: ${raw}`);
  }
  return limit;
};

const parseWhitespace = (raw: string | undefined): WhitespaceMode | undefined => {
  if (raw === undefined) {
    return undefined;
  }
  if (!isWhitespaceMode(raw)) {
    throw new PathwayError(
      "CLI_WHITESPACE_INVALID",
      `Invalid whitespace mode: ${raw}. Use one of ${WHITESPACE_MODES.join("/")}.`
    );
  }
  return raw;
};

export const parseSelectionArgs = (argv: string[]): SelectionArgs => {
  const flags = parseFlags(argv);
  const file = getRequiredFlag(flags, "file");
  const patterns = [...new Set(flags.values.pattern ?? [])];
  if (patterns.length === 0) {
    throw new PathwayError("CLI_ARG_REQUIRED", "Missing required argument --pattern");
  }
  for (const name of Object.keys(flags.values)) {
    if (!["file", "pattern", "whitespace", "limit"].includes(name)) {
      throw new PathwayError("CLI_ARG_FORMAT", `Unknown argument: --${name}`);
    }
  }
  return {
    file,
    patterns,
    whitespace: parseWhitespace(getLastFlag(flags, "whitespace")),
    limit: parseLimit(getLastFlag(flags, "limit")),
    localNames: flags.switches.has("local-names"),
    verbose: flags.switches.has("verbose"),
  };
};
