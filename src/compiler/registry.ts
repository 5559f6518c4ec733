import { InvalidPatternError } from "../core/errors.js";
import type {
  CompiledPattern,
  HandlerSpec,
  RegisteredRule,
  RuleInput,
  WhitespaceMode,
} from "../core/types.js";
import { isWhitespaceMode } from "../core/whitespace.js";
import { compilePattern } from "./pattern.js";

export interface PatternRegistryOptions {
  defaultWhitespace?: WhitespaceMode;
}

/**
 * Most specific first: more literal segments, then more single-level wildcards,
 * then anchored before floating, then registration order.
 */
export const compareSpecificity = (a: CompiledPattern, b: CompiledPattern): number => {
  if (a.literalCount !== b.literalCount) {
    return b.literalCount - a.literalCount;
  }
  if (a.anyCount !== b.anyCount) {
    return b.anyCount - a.anyCount;
  }
  if (a.anchored !== b.anchored) {
    return a.anchored ? -1 : 1;
  }
  return a.sequence - b.sequence;
};

const isFunction = (value: unknown): value is (...args: never[]) => unknown => typeof value === "function";

type RuleEntry = readonly [string, HandlerSpec];

const isRuleList = (rules: RuleInput): rules is ReadonlyArray<RuleEntry> => Array.isArray(rules);

const toRuleEntries = (rules: RuleInput): RuleEntry[] => {
  if (isRuleList(rules)) {
    return [...rules];
  }
  return Object.entries(rules);
};

export class PatternRegistry {
  private readonly rules: RegisteredRule[] = [];
  private readonly defaultWhitespace: WhitespaceMode;
  private nextSequence = 0;
  private frozen = false;

  constructor(options: PatternRegistryOptions = {}) {
    const defaultWhitespace = options.defaultWhitespace ?? "normalize";
    if (!isWhitespaceMode(defaultWhitespace)) {
      throw new InvalidPatternError(
        "RULE_WHITESPACE_INVALID",
        "",
        `Unknown default whitespace mode "${String(defaultWhitespace)}".`
      );
    }
    this.defaultWhitespace = defaultWhitespace;
  }

  get size(): number {
    return this.rules.length;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  register(pattern: string, spec: HandlerSpec): RegisteredRule {
    if (this.frozen) {
      throw new InvalidPatternError(
        "REGISTRY_FROZEN",
        pattern,
        `Cannot register "${pattern}" after parsing has started.`
      );
    }
    const compiled = compilePattern(pattern, this.nextSequence);
    const rule = this.toRule(compiled, spec);
    this.nextSequence += 1;
    this.rules.push(rule);
    return rule;
  }

  registerAll(rules: RuleInput): this {
    for (const [pattern, spec] of toRuleEntries(rules)) {
      this.register(pattern, spec);
    }
    return this;
  }

  ranked(): RegisteredRule[] {
    return [...this.rules].sort((a, b) => compareSpecificity(a.pattern, b.pattern));
  }

  freeze(): void {
    this.frozen = true;
  }

  private toRule(pattern: CompiledPattern, spec: HandlerSpec): RegisteredRule {
    if (isFunction(spec)) {
      return { pattern, onOpen: null, onClose: spec, whitespace: this.defaultWhitespace };
    }
    if (spec === null || typeof spec !== "object") {
      throw new InvalidPatternError(
        "RULE_HANDLER_MISSING",
        pattern.source,
        `Rule "${pattern.source}" needs a close handler function or a handler config.`
      );
    }
    const onOpen = isFunction(spec.onOpen) ? spec.onOpen : null;
    const onClose = isFunction(spec.onClose) ? spec.onClose : null;
    if (!onOpen && !onClose) {
      throw new InvalidPatternError(
        "RULE_HANDLER_MISSING",
        pattern.source,
        `Rule "${pattern.source}" declares neither onOpen nor onClose.`
      );
    }
    const whitespace = spec.whitespace ?? this.defaultWhitespace;
    if (!isWhitespaceMode(whitespace)) {
      throw new InvalidPatternError(
        "RULE_WHITESPACE_INVALID",
        pattern.source,
        `Rule "${pattern.source}" has unknown whitespace mode "${String(whitespace)}".`
      );
    }
    return { pattern, onOpen, onClose, whitespace };
  }
}
