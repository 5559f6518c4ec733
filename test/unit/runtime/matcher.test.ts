import assert from "node:assert/strict";
import { test } from "vitest";

import { compilePattern } from "../../../src/compiler/pattern.js";
import {
  advance,
  canReachDeeper,
  initialStates,
  isAccepting,
  matchesPath,
} from "../../../src/runtime/matcher.js";

const matches = (pattern: string, path: string): boolean =>
  matchesPath(compilePattern(pattern), path.split("/"));

test("floating patterns match at any depth", () => {
  assert.equal(matches("alpha/foo", "alpha/foo"), true);
  assert.equal(matches("alpha/foo", "x/alpha/foo"), true);
  assert.equal(matches("alpha/foo", "alpha/x/foo"), false);
  assert.equal(matches("foo", "a/b/foo"), true);
  assert.equal(matches("foo", "foo/a"), false);
});

test("anchored patterns start at the root", () => {
  assert.equal(matches("/alpha/foo", "alpha/foo"), true);
  assert.equal(matches("/alpha/foo", "x/alpha/foo"), false);
  assert.equal(matches("/*", "a"), true);
  assert.equal(matches("/*", "a/b"), false);
});

test("descendant segments match zero or more levels", () => {
  assert.equal(matches("alpha//foo", "alpha/foo"), true);
  assert.equal(matches("alpha//foo", "alpha/x/y/foo"), true);
  assert.equal(matches("alpha//foo", "foo"), false);
  assert.equal(matches("//foo", "a/b/foo"), true);
  assert.equal(matches("alpha//", "alpha"), true);
  assert.equal(matches("alpha//", "alpha/b/c"), true);
  assert.equal(matches("alpha//", "beta"), false);
  assert.equal(matches("//", "any/thing"), true);
});

test("single wildcards match exactly one level", () => {
  assert.equal(matches("alpha/*", "alpha/x"), true);
  assert.equal(matches("alpha/*", "alpha"), false);
  assert.equal(matches("/alpha/*/c", "alpha/b/c"), true);
  assert.equal(matches("/alpha/*/c", "alpha/b/b/c"), false);
});

test("an empty path matches nothing", () => {
  assert.equal(matchesPath(compilePattern("//"), []), false);
});

test("states report acceptance and remaining reach", () => {
  const pattern = compilePattern("/a/b");
  const start = initialStates(pattern);
  assert.deepEqual(start, [0]);
  const afterA = advance(pattern, start, "a");
  assert.deepEqual(afterA, [1]);
  assert.equal(isAccepting(pattern, afterA), false);
  assert.equal(canReachDeeper(pattern, afterA), true);
  const afterB = advance(pattern, afterA, "b");
  assert.equal(isAccepting(pattern, afterB), true);
  assert.equal(canReachDeeper(pattern, afterB), false);
  assert.deepEqual(advance(pattern, afterA, "x"), []);
});
