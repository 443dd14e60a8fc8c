import { Console } from 'node:console';

import {
  configure,
  getConsoleSink,
  getLogger as getLogTapeLogger,
  type Logger,
  type LogLevel,
  type LogRecord,
  reset,
} from '@logtape/logtape';

export type { Logger, LogLevel };

export const ROOT_CATEGORY = 'motorpool';

export type LoggingOptions = {
  level: LogLevel;
  /** Defaults to stderr: stdout belongs to the MCP stdio transport. */
  stream?: NodeJS.WritableStream;
};

function formatRecord(record: LogRecord): readonly unknown[] {
  const timestamp = new Date(record.timestamp).toISOString();
  const category = record.category.join('.');
  const level = record.level.toUpperCase().padEnd(7);
  const message = record.message
    .map((part: unknown) => (typeof part === 'string' ? part : JSON.stringify(part)))
    .join('');
  return [`[${timestamp}] [${category}] ${level} ${message}`];
}

/** Applications call this once at startup; library code only asks for loggers. */
export async function configureLogging(options: LoggingOptions): Promise<void> {
  const stream = options.stream ?? process.stderr;
  await configure({
    reset: true,
    sinks: {
      console: getConsoleSink({
        console: new Console({ stdout: stream, stderr: stream }),
        formatter: formatRecord,
      }),
    },
    loggers: [
      { category: [ROOT_CATEGORY], lowestLevel: options.level, sinks: ['console'] },
      { category: ['logtape', 'meta'], lowestLevel: 'warning', sinks: ['console'] },
    ],
  });
}

export async function resetLogging(): Promise<void> {
  await reset();
}

export function getLogger(...category: string[]): Logger {
  return getLogTapeLogger([ROOT_CATEGORY, ...category]);
}
