import type { RegisteredRule, WhitespaceMode } from "../core/types.js";
import { mergeWhitespaceModes } from "../core/whitespace.js";
import { advance, canReachDeeper, initialStates, isAccepting, type MatchStates } from "./matcher.js";
import type { ElementNode } from "./node.js";

export interface RuleProgress {
  rule: RegisteredRule;
  states: MatchStates;
}

export interface OpenFrame {
  name: string;
  path: string;
  depth: number;
  /** Frozen; shared by open matches and the element node. */
  attributes: Readonly<Record<string, string>>;
  position: number;
  /** Rules that could still match a descendant of this element. */
  pending: RuleProgress[];
  /** Rules matching this element, most specific first. */
  matches: RegisteredRule[];
  materializing: boolean;
  whitespace: WhitespaceMode;
  node: ElementNode | null;
  textBuffer: string;
  siblingCounts: Map<string, number> | null;
}

const nextPosition = (counts: Map<string, number>, name: string): number => {
  const position = (counts.get(name) ?? 0) + 1;
  counts.set(name, position);
  return position;
};

export class InterestTracker {
  private readonly initial: RuleProgress[];
  private readonly rootCounts = new Map<string, number>();

  constructor(rankedRules: readonly RegisteredRule[]) {
    this.initial = rankedRules.map((rule) => ({ rule, states: initialStates(rule.pattern) }));
  }

  /** A frame whose subtree no rule can reach and whose parent needs no node from it. */
  isDead(frame: OpenFrame): boolean {
    return frame.pending.length === 0 && !frame.materializing;
  }

  enter(parent: OpenFrame | null, name: string, attributes: Record<string, string>): OpenFrame {
    const pending: RuleProgress[] = [];
    const matches: RegisteredRule[] = [];
    for (const progress of parent ? parent.pending : this.initial) {
      const { pattern } = progress.rule;
      const states = advance(pattern, progress.states, name);
      if (states.length === 0) {
        continue;
      }
      if (isAccepting(pattern, states)) {
        matches.push(progress.rule);
      }
      if (canReachDeeper(pattern, states)) {
        pending.push({ rule: progress.rule, states });
      }
    }

    const inheritsNode = parent !== null && parent.materializing;
    let materializing = inheritsNode;
    let whitespace: WhitespaceMode = inheritsNode ? parent.whitespace : "keep";
    for (const rule of matches) {
      if (rule.onClose) {
        materializing = true;
        whitespace = mergeWhitespaceModes(whitespace, rule.whitespace);
      }
    }

    const siblingCounts = parent
      ? (parent.siblingCounts ??= new Map<string, number>())
      : this.rootCounts;

    return {
      name,
      path: parent ? `${parent.path}/${name}` : `/${name}`,
      depth: parent ? parent.depth + 1 : 1,
      attributes: Object.freeze({ ...attributes }),
      position: nextPosition(siblingCounts, name),
      pending,
      matches,
      materializing,
      whitespace,
      node: null,
      textBuffer: "",
      siblingCounts: null,
    };
  }
}
