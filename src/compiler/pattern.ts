import { InvalidPatternError } from "../core/errors.js";
import type { CompiledPattern, PatternSegment } from "../core/types.js";

const WILDCARD = "*";
const SEPARATOR = "/";
const ELEMENT_NAME_PATTERN = /^[A-Za-z_:\u00C0-\uFFFF][-A-Za-z0-9_:.\u00B7\u00C0-\uFFFF]*$/;

const DESCENDANT: PatternSegment = { kind: "descendant" };
const ANY: PatternSegment = { kind: "any" };

const toSegment = (source: string, part: string): PatternSegment => {
  if (part === WILDCARD) {
    return ANY;
  }
  if (!ELEMENT_NAME_PATTERN.test(part)) {
    throw new InvalidPatternError(
      "PATTERN_INVALID_NAME",
      source,
      `Pattern "${source}" has an invalid element name "${part}".`
    );
  }
  return { kind: "literal", name: part };
};

/**
 * Compiles a path pattern such as `alpha/beta`, `/alpha/beta`, `alpha//foo` or `alpha/*`.
 *
 * A leading `/` anchors the pattern at the document root. Any run of empty segments
 * (`//`, `///`) becomes a single descendant segment matching zero or more levels.
 */
export const compilePattern = (source: string, sequence = 0): CompiledPattern => {
  if (source.trim().length === 0) {
    throw new InvalidPatternError("PATTERN_EMPTY", source, "Pattern cannot be empty.");
  }

  const anchored = source.startsWith(SEPARATOR);
  const body = anchored ? source.slice(1) : source;
  if (body.length === 0) {
    throw new InvalidPatternError("PATTERN_EMPTY", source, `Pattern "${source}" has no segments.`);
  }

  const parts = body.split(SEPARATOR);
  const segments: PatternSegment[] = [];
  for (let i = 0; i < parts.length; i += 1) {
    const part = parts[i];
    if (part.length > 0) {
      segments.push(toSegment(source, part));
      continue;
    }
    const isLast = i === parts.length - 1;
    if (isLast && i > 0 && parts[i - 1].length > 0) {
      throw new InvalidPatternError(
        "PATTERN_TRAILING_SEPARATOR",
        source,
        `Pattern "${source}" ends with a separator. Use "//" to match a whole subtree.`
      );
    }
    if (segments[segments.length - 1]?.kind !== "descendant") {
      segments.push(DESCENDANT);
    }
  }

  let literalCount = 0;
  let anyCount = 0;
  for (const segment of segments) {
    if (segment.kind === "literal") literalCount += 1;
    if (segment.kind === "any") anyCount += 1;
  }

  return {
    source,
    anchored,
    segments,
    steps: anchored ? segments : [DESCENDANT, ...segments],
    literalCount,
    anyCount,
    sequence,
  };
};
