/**
 * Shared test fixtures and helpers.
 */

import { mkdirSync, mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { ContextLogger } from '../src/observability/context-logger.js';
import type { LogLevel } from '../src/observability/context-logger.js';

export function createBufferOutput() {
  const lines: string[] = [];
  return {
    output: { write: (s: string) => { lines.push(s); } },
    lines,
  };
}

export interface LogRecord {
  level: string;
  message: string;
  trace_id: string | null;
  logger: string;
  extra: Record<string, unknown> | null;
}

export function createTestLogger(level: LogLevel = 'info') {
  const { output, lines } = createBufferOutput();
  const logger = new ContextLogger({ name: 'test', level, output });
  const records = (): LogRecord[] => lines.map((line) => JSON.parse(line));
  return { logger, lines, records };
}

export function makeTempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function writeFile(root: string, relativePath: string, content: string | Buffer): string {
  const full = join(root, relativePath);
  mkdirSync(dirname(full), { recursive: true });
  writeFileSync(full, content);
  return full;
}
