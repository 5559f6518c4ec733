import type { PatternRegistry } from "../compiler/registry.js";
import { HandlerError, MalformedInputError, PathwayError, type HandlerPhase } from "../core/errors.js";
import { silentLogger, type Logger } from "../core/logger.js";
import type {
  DriveResult,
  EngineStats,
  HandlerContext,
  EngineOptions,
  RegisteredRule,
  TokenEvent,
} from "../core/types.js";
import { InterestTracker, type OpenFrame } from "./interest.js";
import { TreeBuilder } from "./tree-builder.js";

export class PathwayEngine {
  private readonly tracker: InterestTracker;
  private readonly builder: TreeBuilder;
  private readonly logger: Logger;

  private readonly frames: OpenFrame[] = [];
  private skipDepth = 0;
  private framesSkipped = 0;
  private events = 0;
  private dispatching = false;
  private stopRequested = false;
  private ended = false;
  private aborted = false;
  private finished = false;

  constructor(registry: PatternRegistry, options: EngineOptions = {}) {
    registry.freeze();
    const ranked = registry.ranked();
    this.tracker = new InterestTracker(ranked);
    this.builder = new TreeBuilder({
      onNodeBuilt: options.onNodeBuilt,
      onNodeReleased: options.onNodeReleased,
    });
    this.logger = options.logger ?? silentLogger;
    this.logger.debug("engine ready", ranked.map((rule) => rule.pattern.source));
  }

  /** True once the parse completed, was stopped by a handler, or aborted. */
  get stopped(): boolean {
    return this.ended || this.stopRequested;
  }

  /** Names of the open elements from the root down. */
  get path(): string[] {
    return this.frames.map((frame) => frame.name);
  }

  stats(): EngineStats {
    return {
      events: this.events,
      nodesBuilt: this.builder.nodesBuilt,
      nodesReleased: this.builder.nodesReleased,
      framesSkipped: this.framesSkipped,
    };
  }

  feed(event: TokenEvent): void {
    if (this.dispatching) {
      throw new PathwayError("ENGINE_REENTRANT", "Handlers cannot feed events into the parse that runs them.");
    }
    if (this.finished) {
      throw new PathwayError("ENGINE_FINISHED", "The engine already finished its parse.");
    }
    if (this.stopped) {
      return;
    }
    this.events += 1;
    if (event.kind === "open") {
      this.open(event.name, event.attributes);
    } else if (event.kind === "text") {
      this.text(event.text);
    } else {
      this.close();
    }
  }

  finish(): DriveResult {
    if (!this.stopped && this.frames.length > 0) {
      const open = this.path.join("/");
      this.abort();
      throw new MalformedInputError("XML_UNCLOSED", `Input ended inside open elements: ${open}`, 0, 0);
    }
    const completed = !this.stopRequested && !this.aborted;
    this.ended = true;
    this.finished = true;
    return { completed, stats: this.stats() };
  }

  /** Releases every open frame without running close handlers. A later `finish()` reports the parse as incomplete. */
  abort(): void {
    if (this.frames.length > 0) {
      this.logger.debug("releasing open frames", this.frames.length);
    }
    let frame = this.frames.pop();
    while (frame) {
      if (frame.node) {
        this.builder.release(frame.node);
        frame.node = null;
      }
      frame = this.frames.pop();
    }
    this.skipDepth = 0;
    this.ended = true;
    this.aborted = true;
  }

  private get top(): OpenFrame | null {
    return this.frames.length > 0 ? this.frames[this.frames.length - 1] : null;
  }

  private open(name: string, attributes: Record<string, string>): void {
    const parent = this.top;
    if (this.skipDepth > 0 || (parent && this.tracker.isDead(parent))) {
      this.skipDepth += 1;
      this.framesSkipped += 1;
      return;
    }
    if (parent) {
      this.builder.flush(parent);
    }
    const frame = this.tracker.enter(parent, name, attributes);
    this.frames.push(frame);
    if (frame.materializing) {
      this.builder.begin(frame);
    }

    for (const rule of frame.matches) {
      if (!rule.onOpen) {
        continue;
      }
      const handler = rule.onOpen;
      const match = {
        name: frame.name,
        path: frame.path,
        attributes: frame.attributes,
        position: frame.position,
        depth: frame.depth,
      };
      this.dispatch(frame, rule, "open", (context) => handler(match, context));
      if (this.stopRequested) {
        this.abort();
        return;
      }
    }
  }

  private text(text: string): void {
    if (this.skipDepth > 0) {
      return;
    }
    const frame = this.top;
    if (frame) {
      this.builder.text(frame, text);
    }
  }

  private close(): void {
    if (this.skipDepth > 0) {
      this.skipDepth -= 1;
      return;
    }
    const frame = this.frames.pop();
    if (!frame) {
      return;
    }
    const node = frame.node;
    if (!node) {
      return;
    }
    this.builder.flush(frame);

    for (const rule of frame.matches) {
      if (!rule.onClose) {
        continue;
      }
      const handler = rule.onClose;
      this.dispatch(frame, rule, "close", (context) => handler(node, context));
      if (this.stopRequested) {
        this.builder.release(node);
        this.abort();
        return;
      }
    }

    const parent = this.top;
    if (!parent || !this.builder.adopt(parent, node)) {
      this.builder.release(node);
    }
  }

  private dispatch(
    frame: OpenFrame,
    rule: RegisteredRule,
    phase: HandlerPhase,
    invoke: (context: HandlerContext) => void
  ): void {
    const context: HandlerContext = {
      pattern: rule.pattern.source,
      path: frame.path,
      depth: frame.depth,
      stop: () => {
        if (!this.stopRequested) {
          this.logger.debug("stop requested", frame.path);
        }
        this.stopRequested = true;
      },
    };
    this.dispatching = true;
    try {
      invoke(context);
    } catch (error) {
      if (frame.node && !this.frames.includes(frame)) {
        this.builder.release(frame.node);
      }
      this.abort();
      this.logger.debug("handler failed", frame.path, rule.pattern.source);
      throw new HandlerError(
        { path: frame.path, elementName: frame.name, pattern: rule.pattern.source, phase },
        error
      );
    } finally {
      this.dispatching = false;
    }
  }
}
