import assert from "node:assert/strict";
import { test } from "vitest";

import { MalformedInputError } from "../../../src/core/errors.js";
import type { TokenEvent } from "../../../src/core/types.js";
import { XmlTokenizer, type XmlTokenizerOptions } from "../../../src/source/tokenizer.js";

const tokenize = (chunks: string[], options: XmlTokenizerOptions = {}): TokenEvent[] => {
  const events: TokenEvent[] = [];
  const tokenizer = new XmlTokenizer((event) => events.push(event), options);
  for (const chunk of chunks) {
    tokenizer.write(chunk);
  }
  tokenizer.close();
  return events;
};

const structure = (events: TokenEvent[]): string[] =>
  events.flatMap((event) => (event.kind === "text" ? [] : [`${event.kind}:${event.name}:${event.depth}`]));

const textAt = (events: TokenEvent[], depth: number): string =>
  events
    .map((event) => (event.kind === "text" && event.depth === depth ? event.text : ""))
    .join("");

test("tokenizer reports elements with depths and decoded text", () => {
  const events = tokenize(['<r a="1">x &amp; y<![CDATA[<z>]]><i/></r>']);
  assert.deepEqual(structure(events), ["open:r:1", "open:i:2", "close:i:2", "close:r:1"]);
  assert.equal(textAt(events, 1), "x & y<z>");
  const first = events[0];
  assert.ok(first.kind === "open");
  assert.deepEqual(first.attributes, { a: "1" });
});

test("tokenizer accepts elements split across chunks", () => {
  const events = tokenize(["<r><it", "em>va", "lue</item></r>"]);
  assert.deepEqual(structure(events), ["open:r:1", "open:item:2", "close:item:2", "close:r:1"]);
  assert.equal(textAt(events, 2), "value");
});

test("tokenizer drops text outside the root element", () => {
  const events = tokenize(["<?xml version=\"1.0\"?>\n<r/>\n"]);
  assert.deepEqual(structure(events), ["open:r:1", "close:r:1"]);
  assert.equal(events.length, 2);
});

test("tokenizer strips namespace prefixes on request", () => {
  const xml = '<a:r xmlns:a="urn:test"><a:i/><j/></a:r>';
  assert.deepEqual(structure(tokenize([xml])), [
    "open:a:r:1",
    "open:a:i:2",
    "close:a:i:2",
    "open:j:2",
    "close:j:2",
    "close:a:r:1",
  ]);
  assert.deepEqual(structure(tokenize([xml], { localNames: true })), [
    "open:r:1",
    "open:i:2",
    "close:i:2",
    "open:j:2",
    "close:j:2",
    "close:r:1",
  ]);
});

test("tokenizer raises the first syntax error with its line", () => {
  assert.throws(() => tokenize(["<r>\n<i>\n</r>"]), (error: unknown) => {
    assert.ok(error instanceof MalformedInputError);
    assert.equal(error.code, "XML_MALFORMED");
    assert.equal(error.line, 3);
    return true;
  });
});

test("tokenizer rejects input without a root element", () => {
  assert.throws(() => tokenize(["  \n"]), (error: unknown) => {
    assert.ok(error instanceof MalformedInputError);
    assert.equal(error.code, "XML_EMPTY");
    return true;
  });
});

test("tokenizer rejects unclosed documents on close", () => {
  assert.throws(() => tokenize(["<r><i>"]), (error: unknown) => {
    assert.ok(error instanceof MalformedInputError);
    assert.equal(error.code, "XML_MALFORMED");
    return true;
  });
});

test("a halted tokenizer forwards nothing and ignores later errors", () => {
  const events: TokenEvent[] = [];
  const tokenizer = new XmlTokenizer((event) => {
    events.push(event);
    if (event.kind === "close") {
      tokenizer.halt();
    }
  });
  const xml = `<r><i/>${"<j/>".repeat(100)}</oops>`;
  tokenizer.write(xml);
  tokenizer.write("<more/>");
  tokenizer.close();
  assert.deepEqual(structure(events), ["open:r:1", "open:i:2", "close:i:2"]);
  assert.ok(tokenizer.position < "<r><i/><j/>".length);
});
