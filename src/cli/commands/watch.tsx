import { useEffect, useState } from "react";
import { Box, Text, render, useApp, useInput } from "ink";

import type { EngineStats } from "../../core/types.js";
import { parseSelectionArgs, type SelectionArgs } from "../core/args.js";
import { createCliLogger } from "../core/logging.js";
import { runMatches, type MatchRecord } from "../core/match-runner.js";
import { openInput, resolveInputFile } from "../core/source-loader.js";

const REFRESH_MS = 100;
const COUNT_WIDTH = 8;
const ELLIPSIS = "…";

export interface WatchRow {
  pattern: string;
  count: number;
  lastPath: string | null;
}

export const truncateToWidth = (value: string, width: number): string => {
  if (width <= 0) {
    return "";
  }
  if (value.length <= width) {
    return value;
  }
  if (width === 1) {
    return ELLIPSIS;
  }
  return `${value.slice(0, width - 1)}${ELLIPSIS}`;
};

export const createWatchRows = (patterns: string[]): WatchRow[] => {
  return patterns.map((pattern) => ({ pattern, count: 0, lastPath: null }));
};

export const recordMatch = (rows: WatchRow[], record: MatchRecord): WatchRow[] => {
  return rows.map((row) =>
    row.pattern === record.pattern ? { ...row, count: row.count + 1, lastPath: record.path } : row
  );
};

export const formatWatchRow = (row: WatchRow, patternWidth: number, width: number): string => {
  const pattern = truncateToWidth(row.pattern, patternWidth).padEnd(patternWidth);
  const count = String(row.count).padStart(COUNT_WIDTH);
  return truncateToWidth(`${pattern} ${count}  ${row.lastPath ?? "-"}`, width);
};

export const formatWatchHeader = (patternWidth: number, width: number): string => {
  return truncateToWidth(`${"pattern".padEnd(patternWidth)} ${"count".padStart(COUNT_WIDTH)}  last path`, width);
};

export const formatStats = (stats: EngineStats): string => {
  return `events ${stats.events} | nodes built ${stats.nodesBuilt} | released ${stats.nodesReleased} | skipped ${stats.framesSkipped}`;
};

const WatchApp = ({ args }: { args: SelectionArgs }) => {
  const { exit } = useApp();
  const [rows, setRows] = useState(() => createWatchRows(args.patterns));
  const [status, setStatus] = useState("streaming");
  const [stats, setStats] = useState<EngineStats | null>(null);
  const [columns, setColumns] = useState(process.stdout.columns ?? 80);

  useEffect(() => {
    const updateColumns = (): void => {
      setColumns(process.stdout.columns ?? 80);
    };
    process.stdout.on("resize", updateColumns);
    return () => {
      process.stdout.off("resize", updateColumns);
    };
  }, []);

  useEffect(() => {
    let active = true;
    let pending: MatchRecord[] = [];
    const flush = (): void => {
      if (pending.length === 0) {
        return;
      }
      const batch = pending;
      pending = [];
      setRows((prev) => batch.reduce(recordMatch, prev));
    };
    const timer = globalThis.setInterval(flush, REFRESH_MS);
    const input = openInput(args.file);

    void runMatches(input, {
      patterns: args.patterns,
      whitespace: args.whitespace,
      limit: args.limit,
      localNames: args.localNames,
      logger: createCliLogger(args.verbose),
      onMatch: (record) => {
        pending.push(record);
      },
    })
      .then((result) => {
        if (!active) return;
        flush();
        setStats(result.stats);
        setStatus(result.completed ? "done" : `stopped after ${result.count} matches`);
      })
      .catch((error: unknown) => {
        if (!active) return;
        flush();
        setStatus(`error: ${error instanceof Error ? error.message : "unknown error"}`);
      })
      .finally(() => {
        globalThis.clearInterval(timer);
      });

    return () => {
      active = false;
      globalThis.clearInterval(timer);
      input.destroy();
    };
  }, [args]);

  useInput((input, key) => {
    if (key.escape || input === "q") {
      exit();
    }
  });

  const contentWidth = Math.max(16, columns - 2);
  const patternWidth = Math.min(
    Math.max(...args.patterns.map((pattern) => pattern.length), 7),
    Math.floor(contentWidth / 2)
  );
  const headerText = truncateToWidth(`xml-pathway watch | ${args.file}`, contentWidth);
  const titleText = formatWatchHeader(patternWidth, contentWidth);

  return (
    <Box flexDirection="column" paddingX={1}>
      <Text>{headerText}</Text>
      <Text color="gray">{truncateToWidth(`status: ${status}`, contentWidth)}</Text>
      <Text color="gray">{"─".repeat(contentWidth)}</Text>
      <Text color="cyan">{titleText}</Text>
      {rows.map((row) => (
        <Text key={row.pattern}>{formatWatchRow(row, patternWidth, contentWidth)}</Text>
      ))}
      {stats && <Text color="gray">{truncateToWidth(formatStats(stats), contentWidth)}</Text>}
      <Text color="yellow">keys: q quit</Text>
    </Box>
  );
};

export const runWatchCommand = async (argv: string[]): Promise<number> => {
  try {
    const args = parseSelectionArgs(argv);
    resolveInputFile(args.file);
    const app = render(<WatchApp args={args} />);
    await app.waitUntilExit();
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : "Unknown watch error.";
    process.stderr.write(`${message}\n`);
    return 1;
  }
};
