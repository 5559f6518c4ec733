import { applyWhitespace } from "../core/whitespace.js";
import type { OpenFrame } from "./interest.js";
import { ElementNode } from "./node.js";

export interface TreeBuilderHooks {
  onNodeBuilt?: (node: ElementNode) => void;
  onNodeReleased?: (node: ElementNode) => void;
}

export class TreeBuilder {
  private readonly hooks: TreeBuilderHooks;
  nodesBuilt = 0;
  nodesReleased = 0;

  constructor(hooks: TreeBuilderHooks = {}) {
    this.hooks = hooks;
  }

  begin(frame: OpenFrame): ElementNode {
    const node = new ElementNode({
      name: frame.name,
      path: frame.path,
      attributes: frame.attributes,
      position: frame.position,
    });
    frame.node = node;
    this.nodesBuilt += 1;
    this.hooks.onNodeBuilt?.(node);
    return node;
  }

  text(frame: OpenFrame, text: string): void {
    if (frame.node) {
      frame.textBuffer += text;
    }
  }

  /** Turns buffered text into one normalized segment; called before a child opens and on close. */
  flush(frame: OpenFrame): void {
    if (!frame.node || frame.textBuffer.length === 0) {
      return;
    }
    const segment = applyWhitespace(frame.textBuffer, frame.whitespace);
    frame.textBuffer = "";
    if (segment.length > 0) {
      frame.node.appendText(segment);
    }
  }

  adopt(parent: OpenFrame, child: ElementNode): boolean {
    if (!parent.node) {
      return false;
    }
    parent.node.appendChild(child);
    return true;
  }

  /** Drops a node together with every node its contents hold. */
  release(root: ElementNode): void {
    const queue: ElementNode[] = [root];
    let node = queue.pop();
    while (node) {
      this.nodesReleased += 1;
      this.hooks.onNodeReleased?.(node);
      for (const item of node.contents) {
        if (typeof item !== "string") queue.push(item);
      }
      node = queue.pop();
    }
  }
}
