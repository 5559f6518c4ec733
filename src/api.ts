import { PatternRegistry } from "./compiler/registry.js";
import { InvalidPatternError } from "./core/errors.js";
import type { DriveResult, PathwayOptions, RuleInput } from "./core/types.js";
import { PathwayEngine } from "./runtime/engine.js";
import { XmlTokenizer } from "./source/tokenizer.js";

export type RuleSource = RuleInput | PatternRegistry;

/**
 * A ready-made registry already fixed its rules' whitespace modes, so it cannot be
 * combined with `defaultWhitespace`.
 */
export const createRegistry = (
  rules: RuleSource,
  options: Pick<PathwayOptions, "defaultWhitespace"> = {}
): PatternRegistry => {
  if (rules instanceof PatternRegistry) {
    if (options.defaultWhitespace !== undefined) {
      throw new InvalidPatternError(
        "RULE_WHITESPACE_CONFLICT",
        "",
        "defaultWhitespace applies when rules are registered; set it on the PatternRegistry instead."
      );
    }
    return rules;
  }
  return new PatternRegistry({ defaultWhitespace: options.defaultWhitespace }).registerAll(rules);
};

export const createEngine = (rules: RuleSource, options: PathwayOptions = {}): PathwayEngine => {
  return new PathwayEngine(createRegistry(rules, options), options);
};

interface Drive {
  engine: PathwayEngine;
  tokenizer: XmlTokenizer;
}

const startDrive = (rules: RuleSource, options: PathwayOptions): Drive => {
  const engine = createEngine(rules, options);
  const tokenizer = new XmlTokenizer(
    (event) => {
      engine.feed(event);
      if (engine.stopped) {
        tokenizer.halt();
      }
    },
    { localNames: options.localNames }
  );
  return { engine, tokenizer };
};

const endDrive = ({ engine, tokenizer }: Drive): DriveResult => {
  if (!engine.stopped) {
    tokenizer.close();
  }
  return engine.finish();
};

/**
 * Feeds chunks to the tokenizer until the input ends or a handler calls `stop()`.
 * Errors from the tokenizer or from handlers abort the engine before they propagate.
 */
export const parseXmlChunksWithRules = (
  chunks: Iterable<string>,
  rules: RuleSource,
  options: PathwayOptions = {}
): DriveResult => {
  const drive = startDrive(rules, options);
  try {
    for (const chunk of chunks) {
      if (drive.engine.stopped) {
        break;
      }
      drive.tokenizer.write(chunk);
    }
    return endDrive(drive);
  } catch (error) {
    drive.engine.abort();
    throw error;
  }
};

export const parseXmlWithRules = (
  xml: string,
  rules: RuleSource,
  options: PathwayOptions = {}
): DriveResult => {
  return parseXmlChunksWithRules([xml], rules, options);
};

/** Byte chunks are decoded as UTF-8, including sequences split across chunks. */
export const streamXmlWithRules = async (
  stream: AsyncIterable<string | Uint8Array>,
  rules: RuleSource,
  options: PathwayOptions = {}
): Promise<DriveResult> => {
  const drive = startDrive(rules, options);
  const decoder = new TextDecoder("utf-8");
  try {
    for await (const chunk of stream) {
      drive.tokenizer.write(typeof chunk === "string" ? chunk : decoder.decode(chunk, { stream: true }));
      if (drive.engine.stopped) {
        break;
      }
    }
    if (!drive.engine.stopped) {
      const rest = decoder.decode();
      if (rest.length > 0) {
        drive.tokenizer.write(rest);
      }
    }
    return endDrive(drive);
  } catch (error) {
    drive.engine.abort();
    throw error;
  }
};
