import assert from "node:assert/strict";
import { test } from "vitest";

import { parseFlags, parseSelectionArgs } from "../../../../src/cli/core/args.js";
import { PathwayError } from "../../../../src/core/errors.js";

const expectCode = (argv: string[], code: string, message?: string): void => {
  assert.throws(() => parseSelectionArgs(argv), (error: unknown) => {
    assert.ok(error instanceof PathwayError);
    assert.equal(error.code, code);
    if (message !== undefined) {
      assert.equal(error.message, message);
    }
    return true;
  });
};

test("parseFlags separates switches from repeated values", () => {
  const flags = parseFlags(["--verbose", "--pattern", "a", "--pattern", "b"]);
  assert.deepEqual([...flags.switches], ["verbose"]);
  assert.deepEqual(flags.values, { pattern: ["a", "b"] });
});

test("parseSelectionArgs reads every option", () => {
  const args = parseSelectionArgs([
    "--file",
    "feed.xml",
    "--pattern",
    "i",
    "--pattern",
    "r/i",
    "--pattern",
    "i",
    "--limit",
    "5",
    "--whitespace",
    "keep",
    "--local-names",
  ]);
  assert.deepEqual(args, {
    file: "feed.xml",
    patterns: ["i", "r/i"],
    whitespace: "keep",
    limit: 5,
    localNames: true,
    verbose: false,
  });
});

test("parseSelectionArgs leaves optional settings unset", () => {
  const args = parseSelectionArgs(["--file", "a.xml", "--pattern", "i", "--verbose"]);
  assert.equal(args.whitespace, undefined);
  assert.equal(args.limit, null);
  assert.equal(args.localNames, false);
  assert.equal(args.verbose, true);
});

test("parseSelectionArgs validates its input", () => {
  expectCode(["a.xml"], "CLI_ARG_FORMAT", "Unexpected argument: a.xml");
  expectCode(["--file"], "CLI_ARG_MISSING", "Missing value for --file");
  expectCode(["--file", "--pattern", "i"], "CLI_ARG_MISSING");
  expectCode(["--pattern", "i"], "CLI_ARG_REQUIRED", "Missing required argument --file");
  expectCode(["--file", "a.xml"], "CLI_ARG_REQUIRED", "Missing required argument --pattern");
  expectCode(["--file", "a.xml", "--pattern", "i", "--color", "red"], "CLI_ARG_FORMAT", "Unknown argument: --color");
});

test("parseSelectionArgs rejects bad limits and whitespace modes", () => {
  const base = ["--file", "a.xml", "--pattern", "i"];
  expectCode([...base, "--limit", "0"], "CLI_LIMIT_PARSE", "Invalid match limit: 0");
  expectCode([...base, "--limit", "2x"], "CLI_LIMIT_PARSE");
  expectCode([...base, "--limit", "-1"], "CLI_LIMIT_PARSE");
  expectCode(
    [...base, "--whitespace", "squash"],
    "CLI_WHITESPACE_INVALID",
    "Invalid whitespace mode: squash. Use one of normalize/trim/collapse/keep."
  );
});
