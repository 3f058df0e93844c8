import { DEFAULT_EXCLUDED_DIRS, DEFAULT_LOG_FILE, LOG_LEVEL_ENV_VAR } from '../config';
import { isLogLevel, type LogLevel } from './logger';

export interface CliOptions {
  rootPath: string | null;
  logFile: string;
  logLevel: LogLevel;
  excludedDirNames: string[];
}

export type CliParseResult =
  | { kind: 'run'; options: CliOptions }
  | { kind: 'help' }
  | { kind: 'error'; message: string };

export const USAGE = `Usage: context-studio [path] [options]

Options:
  --exclude <name>     Also skip directories with this name (repeatable)
  --log-file <file>    Append diagnostics to this file (default: ${DEFAULT_LOG_FILE})
  --log-level <level>  debug, info, warn or error (default: info)
  -h, --help           Show this help`;

/**
 * Reads `process.argv.slice(2)`-style arguments. A missing path means the
 * current directory is loaded.
 */
export function parseCliArgs(
  args: readonly string[],
  env: NodeJS.ProcessEnv = process.env
): CliParseResult {
  const envLevel = env[LOG_LEVEL_ENV_VAR];
  const options: CliOptions = {
    rootPath: null,
    logFile: DEFAULT_LOG_FILE,
    logLevel: envLevel && isLogLevel(envLevel) ? envLevel : 'info',
    excludedDirNames: [...DEFAULT_EXCLUDED_DIRS],
  };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];

    if (arg === '-h' || arg === '--help') {
      return { kind: 'help' };
    }

    if (arg === '--exclude' || arg === '--log-file' || arg === '--log-level') {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        return { kind: 'error', message: `Missing value for ${arg}` };
      }
      i += 1;

      if (arg === '--exclude') {
        if (!options.excludedDirNames.includes(value)) {
          options.excludedDirNames.push(value);
        }
      } else if (arg === '--log-file') {
        options.logFile = value;
      } else if (isLogLevel(value)) {
        options.logLevel = value;
      } else {
        return { kind: 'error', message: `Invalid log level: ${value}` };
      }
      continue;
    }

    if (arg.startsWith('-')) {
      return { kind: 'error', message: `Unknown option: ${arg}` };
    }
    if (options.rootPath !== null) {
      return { kind: 'error', message: `Unexpected argument: ${arg}` };
    }
    options.rootPath = arg;
  }

  return { kind: 'run', options };
}
