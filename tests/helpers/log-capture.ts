/**
 * Captures structured log lines written through the shared logger.
 */

import { configureLogger } from '../../src/utils/logger.js';

export interface LogLine {
  level: string;
  msg: string;
  component?: string;
  [key: string]: unknown;
}

export interface LogCapture {
  lines: LogLine[];
  byLevel(level: string): LogLine[];
  restore(): void;
}

export function captureLogs(): LogCapture {
  const lines: LogLine[] = [];

  configureLogger({
    level: 'debug',
    prettyPrint: false,
    destination: {
      write(chunk: string) {
        for (const raw of chunk.split('\n')) {
          if (raw.trim()) {
            const line: LogLine = JSON.parse(raw);
            lines.push(line);
          }
        }
      },
    },
  });

  return {
    lines,
    byLevel: (level) => lines.filter((line) => line.level === level),
    restore: () => configureLogger({ level: 'silent', prettyPrint: false }),
  };
}
