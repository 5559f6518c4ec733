import assert from "node:assert/strict";
import { test } from "vitest";

import { PatternRegistry } from "../../../src/compiler/registry.js";
import { InterestTracker, type OpenFrame } from "../../../src/runtime/interest.js";
import type { ElementNode } from "../../../src/runtime/node.js";
import { TreeBuilder } from "../../../src/runtime/tree-builder.js";

const frameFor = (tracker: InterestTracker, parent: OpenFrame | null, name: string): OpenFrame =>
  tracker.enter(parent, name, {});

test("TreeBuilder buffers text until a flush and drops empty segments", () => {
  const tracker = new InterestTracker(new PatternRegistry().registerAll({ "/r": () => {} }).ranked());
  const builder = new TreeBuilder();
  const frame = frameFor(tracker, null, "r");
  const node = builder.begin(frame);

  builder.text(frame, "  a ");
  builder.text(frame, " b  ");
  assert.deepEqual(node.contents, []);
  builder.flush(frame);
  assert.deepEqual(node.contents, ["a b"]);

  builder.text(frame, "   ");
  builder.flush(frame);
  assert.deepEqual(node.contents, ["a b"]);
  assert.equal(frame.textBuffer, "");
});

test("TreeBuilder ignores text for frames without a node", () => {
  const tracker = new InterestTracker(new PatternRegistry().registerAll({ "/r/i": () => {} }).ranked());
  const builder = new TreeBuilder();
  const frame = frameFor(tracker, null, "r");
  builder.text(frame, "x");
  assert.equal(frame.textBuffer, "");
  assert.equal(builder.nodesBuilt, 0);
});

test("TreeBuilder adopts into materializing parents and releases whole subtrees", () => {
  const built: string[] = [];
  const released: string[] = [];
  const tracker = new InterestTracker(new PatternRegistry().registerAll({ "/r": () => {} }).ranked());
  const builder = new TreeBuilder({
    onNodeBuilt: (node) => built.push(node.name),
    onNodeReleased: (node) => released.push(node.name),
  });
  const root = frameFor(tracker, null, "r");
  const rootNode = builder.begin(root);
  const child = frameFor(tracker, root, "a");
  const childNode = builder.begin(child);
  const grandchild = frameFor(tracker, child, "b");
  const grandchildNode = builder.begin(grandchild);

  assert.equal(builder.adopt(child, grandchildNode), true);
  assert.equal(builder.adopt(root, childNode), true);
  builder.release(rootNode);

  assert.deepEqual(built, ["r", "a", "b"]);
  assert.deepEqual(released, ["r", "a", "b"]);
  assert.equal(builder.nodesBuilt, 3);
  assert.equal(builder.nodesReleased, 3);
});

test("TreeBuilder refuses adoption by frames without a node", () => {
  const tracker = new InterestTracker(new PatternRegistry().registerAll({ "/r/i": () => {} }).ranked());
  const builder = new TreeBuilder();
  const root = frameFor(tracker, null, "r");
  const item = frameFor(tracker, root, "i");
  const node: ElementNode = builder.begin(item);
  assert.equal(builder.adopt(root, node), false);
});
