import type { WhitespaceMode } from "./types.js";

export const WHITESPACE_MODES: readonly WhitespaceMode[] = ["normalize", "trim", "collapse", "keep"];

const XML_SPACE_RUN = /[ \t\r\n]+/g;
const XML_SPACE_EDGES = /^[ \t\r\n]+|[ \t\r\n]+$/g;

export const isWhitespaceMode = (value: unknown): value is WhitespaceMode => {
  return typeof value === "string" && WHITESPACE_MODES.some((mode) => mode === value);
};

export const applyWhitespace = (text: string, mode: WhitespaceMode): string => {
  switch (mode) {
    case "keep":
      return text;
    case "trim":
      return text.replace(XML_SPACE_EDGES, "");
    case "collapse":
      return text.replace(XML_SPACE_RUN, " ");
    case "normalize":
      return text.replace(XML_SPACE_RUN, " ").replace(XML_SPACE_EDGES, "");
  }
};

const trims = (mode: WhitespaceMode): boolean => mode === "trim" || mode === "normalize";
const collapses = (mode: WhitespaceMode): boolean => mode === "collapse" || mode === "normalize";

/**
 * Combines two requested modes into the most aggressive one. `trim` and `collapse`
 * are independent, so requesting both yields `normalize`.
 */
export const mergeWhitespaceModes = (a: WhitespaceMode, b: WhitespaceMode): WhitespaceMode => {
  const trim = trims(a) || trims(b);
  const collapse = collapses(a) || collapses(b);
  if (trim && collapse) return "normalize";
  if (trim) return "trim";
  if (collapse) return "collapse";
  return "keep";
};
