import type { CompiledPattern, PatternSegment } from "../core/types.js";

/**
 * Automaton states are indices into `pattern.steps`. Index `steps.length` is the accepting state.
 */
export type MatchStates = readonly number[];

const closeOver = (steps: readonly PatternSegment[], seeds: Iterable<number>): number[] => {
  const states = new Set<number>();
  for (const seed of seeds) {
    let index = seed;
    states.add(index);
    // A descendant step may match zero names.
    while (steps[index]?.kind === "descendant") {
      index += 1;
      states.add(index);
    }
  }
  return [...states];
};

export const initialStates = (pattern: CompiledPattern): MatchStates => closeOver(pattern.steps, [0]);

export const advance = (pattern: CompiledPattern, states: MatchStates, name: string): MatchStates => {
  const next: number[] = [];
  for (const index of states) {
    const step = pattern.steps[index];
    if (!step) {
      continue;
    }
    if (step.kind === "descendant") {
      next.push(index);
    } else if (step.kind === "any" || step.name === name) {
      next.push(index + 1);
    }
  }
  return next.length === 0 ? next : closeOver(pattern.steps, next);
};

export const isAccepting = (pattern: CompiledPattern, states: MatchStates): boolean => {
  return states.includes(pattern.steps.length);
};

/** Whether some state still has a step to consume, i.e. a descendant could match. */
export const canReachDeeper = (pattern: CompiledPattern, states: MatchStates): boolean => {
  return states.some((index) => index < pattern.steps.length);
};

export const matchesPath = (pattern: CompiledPattern, path: readonly string[]): boolean => {
  if (path.length === 0) {
    return false;
  }
  let states = initialStates(pattern);
  for (const name of path) {
    states = advance(pattern, states, name);
    if (states.length === 0) {
      return false;
    }
  }
  return isAccepting(pattern, states);
};
