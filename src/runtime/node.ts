export type NodeContent = string | ElementNode;

const NO_CHILDREN: readonly ElementNode[] = Object.freeze([]);

export interface ElementNodeInit {
  name: string;
  path: string;
  attributes: Readonly<Record<string, string>>;
  position: number;
}

/**
 * An assembled element: attributes, interleaved text and child elements in document
 * order, plus per-name child indices. Handlers receive it read-only; only the tree
 * builder appends to it, and only while the element is still open.
 */
export class ElementNode {
  readonly name: string;
  readonly path: string;
  readonly attributes: Readonly<Record<string, string>>;
  /** 1-based position among same-named siblings. */
  readonly position: number;

  private readonly items: NodeContent[] = [];
  private readonly lastByName = new Map<string, ElementNode>();
  private readonly allByName = new Map<string, ElementNode[]>();
  private textCache: string | null = "";

  constructor(init: ElementNodeInit) {
    this.name = init.name;
    this.path = init.path;
    this.attributes = init.attributes;
    this.position = init.position;
  }

  get contents(): readonly NodeContent[] {
    return this.items;
  }

  /**
   * Concatenation of the text segments directly inside this element. Each segment is
   * cleaned on its own, so under `normalize` the text of `<p>a <b/> c</p>` is `ac`.
   * Read `contents` to keep the boundaries.
   */
  get text(): string {
    if (this.textCache === null) {
      let text = "";
      for (const item of this.items) {
        if (typeof item === "string") {
          text += item;
        }
      }
      this.textCache = text;
    }
    return this.textCache;
  }

  get elements(): ElementNode[] {
    return this.items.filter((item): item is ElementNode => typeof item !== "string");
  }

  /** Last child element with the given name. */
  child(name: string): ElementNode | undefined {
    return this.lastByName.get(name);
  }

  /** Every child element with the given name, in document order. */
  children(name: string): readonly ElementNode[] {
    return this.allByName.get(name) ?? NO_CHILDREN;
  }

  attr(name: string): string | undefined {
    return this.attributes[name];
  }

  /** @internal */
  appendText(text: string): void {
    const last = this.items.length - 1;
    const previous = this.items[last];
    if (typeof previous === "string") {
      this.items[last] = previous + text;
    } else {
      this.items.push(text);
    }
    this.textCache = null;
  }

  /** @internal */
  appendChild(child: ElementNode): void {
    this.items.push(child);
    this.lastByName.set(child.name, child);
    const sameName = this.allByName.get(child.name);
    if (sameName) {
      sameName.push(child);
    } else {
      this.allByName.set(child.name, [child]);
    }
  }
}
