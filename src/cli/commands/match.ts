import { PathwayError } from "../../core/errors.js";
import { parseSelectionArgs } from "../core/args.js";
import { createCliLogger } from "../core/logging.js";
import { runMatches } from "../core/match-runner.js";
import { openInput } from "../core/source-loader.js";

type WriteLine = (line: string) => void;

const emitError = (writeLine: WriteLine, error: unknown): number => {
  const code = error instanceof PathwayError ? error.code : "CLI_ERROR";
  const message = error instanceof Error ? error.message : "Unknown CLI error.";
  writeLine("RESULT:ERROR");
  writeLine(`ERROR_CODE:${code}`);
  writeLine(`ERROR_MSG_JSON:${JSON.stringify(message)}`);
  return 1;
};

export const runMatchCommand = async (
  argv: string[],
  writeLine: WriteLine = (line) => {
    process.stdout.write(`${line}\n`);
  }
): Promise<number> => {
  try {
    const args = parseSelectionArgs(argv);
    const lines: string[] = [];
    const result = await runMatches(openInput(args.file), {
      patterns: args.patterns,
      whitespace: args.whitespace,
      limit: args.limit,
      localNames: args.localNames,
      logger: createCliLogger(args.verbose),
      onMatch: (record) => {
        lines.push(`MATCH:${record.pattern}|${record.path}|${record.position}`);
        lines.push(`TEXT_JSON:${JSON.stringify(record.text)}`);
      },
    });

    writeLine("RESULT:OK");
    for (let i = 0; i < lines.length; i += 1) {
      writeLine(lines[i]);
    }
    writeLine(`COUNT:${result.count}`);
    writeLine(`COMPLETED:${result.completed}`);
    return 0;
  } catch (error) {
    return emitError(writeLine, error);
  }
};
