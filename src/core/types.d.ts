import type { ElementNode } from "../runtime/node.js";
import type { Logger } from "./logger.js";

export type WhitespaceMode = "normalize" | "trim" | "collapse" | "keep";

export type PatternSegment =
  | { kind: "literal"; name: string }
  | { kind: "any" }
  | { kind: "descendant" };

export interface CompiledPattern {
  source: string;
  anchored: boolean;
  /** Segments as written, without the implicit leading descendant of unanchored patterns. */
  segments: readonly PatternSegment[];
  /** Segments the automaton runs over; unanchored patterns start with a descendant. */
  steps: readonly PatternSegment[];
  literalCount: number;
  anyCount: number;
  sequence: number;
}

export interface OpenMatch {
  name: string;
  path: string;
  attributes: Readonly<Record<string, string>>;
  position: number;
  depth: number;
}

export interface HandlerContext {
  /** Source text of the pattern whose handler is running. */
  pattern: string;
  path: string;
  depth: number;
  stop(): void;
}

export type OpenHandler = (match: OpenMatch, context: HandlerContext) => void;
export type CloseHandler = (node: ElementNode, context: HandlerContext) => void;

export interface HandlerConfig {
  onOpen?: OpenHandler;
  onClose?: CloseHandler;
  whitespace?: WhitespaceMode;
}

export type HandlerSpec = CloseHandler | HandlerConfig;

export type RuleInput = Record<string, HandlerSpec> | ReadonlyArray<readonly [string, HandlerSpec]>;

export interface RegisteredRule {
  pattern: CompiledPattern;
  onOpen: OpenHandler | null;
  onClose: CloseHandler | null;
  whitespace: WhitespaceMode;
}

export type TokenEvent =
  | { kind: "open"; name: string; attributes: Record<string, string>; depth: number }
  | { kind: "text"; text: string; depth: number }
  | { kind: "close"; name: string; depth: number };

export interface EngineStats {
  events: number;
  nodesBuilt: number;
  nodesReleased: number;
  framesSkipped: number;
}

export interface PathwayOptions {
  logger?: Logger;
  /** Mode applied to function-only specs and configs without `whitespace`. */
  defaultWhitespace?: WhitespaceMode;
  /** Strip namespace prefixes from element names before matching. */
  localNames?: boolean;
  onNodeBuilt?: (node: ElementNode) => void;
  onNodeReleased?: (node: ElementNode) => void;
}

/** Options the engine reads; whitespace defaults belong to the registry, name handling to the tokenizer. */
export type EngineOptions = Omit<PathwayOptions, "defaultWhitespace" | "localNames">;

export interface DriveResult {
  /** False when a handler stopped the parse early. */
  completed: boolean;
  stats: EngineStats;
}
