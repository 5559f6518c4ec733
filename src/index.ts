export const XML_PATHWAY_VERSION = "0.1.0";

export * from "./core/errors.js";
export * from "./core/logger.js";
export * from "./core/whitespace.js";
export type * from "./core/types.js";
export * from "./compiler/index.js";
export * from "./runtime/index.js";
export { XmlTokenizer, type XmlTokenizerOptions, type TokenSink } from "./source/tokenizer.js";
export * from "./api.js";
