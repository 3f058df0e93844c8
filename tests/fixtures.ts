import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { Logger, LogLevel } from '../src/utils/logger';

export type TreeSpec = { [name: string]: string | Buffer | TreeSpec };

function writeTree(dir: string, spec: TreeSpec): void {
  for (const [name, value] of Object.entries(spec)) {
    const target = path.join(dir, name);
    if (typeof value === 'string' || Buffer.isBuffer(value)) {
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, value);
    } else {
      fs.mkdirSync(target, { recursive: true });
      writeTree(target, value);
    }
  }
}

/** Writes `spec` under a fresh temp directory and returns its real path. */
export function createTempTree(spec: TreeSpec): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'context-studio-'));
  writeTree(root, spec);
  return fs.realpathSync(root);
}

export function removeTempTree(root: string): void {
  fs.rmSync(root, { recursive: true, force: true });
}

export interface LogEntry {
  level: LogLevel;
  message: string;
}

export function createRecordingLogger(): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const record = (level: LogLevel) => (message: string) => {
    entries.push({ level, message });
  };
  return {
    entries,
    logger: {
      debug: record('debug'),
      info: record('info'),
      warn: record('warn'),
      error: record('error'),
    },
  };
}

// root bypasses file permission bits, so chmod-based tests cannot fail a read
export const runsAsRoot = typeof process.getuid === 'function' && process.getuid() === 0;

export const canSymlink = process.platform !== 'win32';

const ANSI_PATTERN = /\u001B\[[0-9;]*m/g;

export const stripAnsi = (text: string): string => text.replace(ANSI_PATTERN, '');
