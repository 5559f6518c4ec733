import { streamXmlWithRules } from "../../api.js";
import type { Logger } from "../../core/logger.js";
import type { EngineStats, HandlerConfig, WhitespaceMode } from "../../core/types.js";

export interface MatchRecord {
  pattern: string;
  path: string;
  position: number;
  text: string;
}

export interface MatchRunOptions {
  patterns: string[];
  whitespace?: WhitespaceMode;
  /** Stop the parse after this many matches. */
  limit?: number | null;
  localNames?: boolean;
  logger?: Logger;
  onMatch: (record: MatchRecord) => void;
}

export interface MatchRunResult {
  count: number;
  completed: boolean;
  stats: EngineStats;
}

export const runMatches = async (
  input: AsyncIterable<string | Uint8Array>,
  options: MatchRunOptions
): Promise<MatchRunResult> => {
  const limit = options.limit ?? null;
  let count = 0;
  const rule: HandlerConfig = {
    whitespace: options.whitespace,
    onClose: (node, context) => {
      count += 1;
      options.onMatch({
        pattern: context.pattern,
        path: node.path,
        position: node.position,
        text: node.text,
      });
      if (limit !== null && count >= limit) {
        context.stop();
      }
    },
  };
  const result = await streamXmlWithRules(
    input,
    options.patterns.map((pattern) => [pattern, rule] as const),
    {
      logger: options.logger,
      localNames: options.localNames,
    }
  );
  return { count, ...result };
};
