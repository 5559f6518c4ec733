import { SaxesParser } from "saxes";

import { MalformedInputError } from "../core/errors.js";
import type { TokenEvent } from "../core/types.js";

export interface XmlTokenizerOptions {
  /** Strip namespace prefixes (`ns:item` becomes `item`). */
  localNames?: boolean;
}

export type TokenSink = (event: TokenEvent) => void;

/** Thrown through saxes to end the current `write` once the tokenizer is halted. */
class HaltSignal extends Error {}

const toLocalName = (name: string): string => {
  const colonIdx = name.indexOf(":");
  return colonIdx >= 0 ? name.slice(colonIdx + 1) : name;
};

/**
 * Turns XML text into open/text/close events on top of saxes. Entities arrive decoded,
 * CDATA sections arrive as text. The first tokenizer error is raised from `write`/`close`
 * as a MalformedInputError and no further events are forwarded after it. Halting from
 * inside the sink stops saxes in the middle of the chunk.
 */
export class XmlTokenizer {
  private readonly parser = new SaxesParser({ xmlns: false });
  private readonly sink: TokenSink;
  private readonly nameOf: (name: string) => string;
  private depth = 0;
  private sawRoot = false;
  private halted = false;
  private failure: MalformedInputError | null = null;

  constructor(sink: TokenSink, options: XmlTokenizerOptions = {}) {
    this.sink = sink;
    this.nameOf = options.localNames ? toLocalName : (name) => name;

    this.parser.on("error", (error) => {
      if (this.halted) {
        return;
      }
      this.failure ??= new MalformedInputError(
        "XML_MALFORMED",
        error.message,
        this.parser.line,
        this.parser.column
      );
    });

    this.parser.on("opentag", (tag) => {
      if (this.halted || this.failure) {
        return;
      }
      this.sawRoot = true;
      this.depth += 1;
      this.forward({
        kind: "open",
        name: this.nameOf(tag.name),
        attributes: Object.fromEntries(
          Object.entries(tag.attributes).map(([k, v]) => [k, String(v)])
        ),
        depth: this.depth,
      });
    });

    this.parser.on("text", (text) => {
      this.emitText(text);
    });

    this.parser.on("cdata", (text) => {
      this.emitText(text);
    });

    this.parser.on("closetag", (tag) => {
      if (this.halted || this.failure) {
        return;
      }
      this.depth -= 1;
      this.forward({ kind: "close", name: this.nameOf(tag.name), depth: this.depth + 1 });
    });
  }

  /** Ignore the rest of the input, including errors in it. */
  halt(): void {
    this.halted = true;
  }

  /** Characters saxes has consumed so far. */
  get position(): number {
    return this.parser.position;
  }

  write(chunk: string): void {
    if (this.halted) {
      return;
    }
    try {
      this.parser.write(chunk);
    } catch (error) {
      if (error instanceof HaltSignal) {
        return;
      }
      throw error;
    }
    this.rethrow();
  }

  close(): void {
    if (this.halted) {
      return;
    }
    this.rethrow();
    if (!this.sawRoot) {
      throw new MalformedInputError("XML_EMPTY", "XML document has no root element.", 1, 1);
    }
    this.parser.close();
    this.rethrow();
  }

  private emitText(text: string): void {
    if (this.halted || this.failure || this.depth === 0 || text.length === 0) {
      return;
    }
    this.forward({ kind: "text", text, depth: this.depth });
  }

  private forward(event: TokenEvent): void {
    this.sink(event);
    if (this.halted) {
      throw new HaltSignal("tokenizer halted");
    }
  }

  private rethrow(): void {
    if (this.failure) {
      throw this.failure;
    }
  }
}
