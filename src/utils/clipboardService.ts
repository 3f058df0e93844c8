import clipboard from 'clipboardy';
import type { CopyResult } from '../types/FileTypes';
import { getErrorCode, getErrorMessage } from './errors';
import { type Logger, silentLogger } from './logger';

export type ClipboardWriter = (text: string) => Promise<void>;

export const COPY_MESSAGES = {
  empty: 'Nothing to copy.',
  copied: 'Copied to clipboard!',
  missingDependency: 'Clipboard failed: Missing system dependency (install xclip or xsel).',
  generic: 'Clipboard error occurred.',
} as const;

// clipboardy's wording when no helper program can be spawned
const MISSING_HELPER_PATTERN = /couldn't find the `[^`]+` binary/i;

/**
 * True when the failure means the platform's clipboard helper program is not
 * installed, as opposed to the helper running and failing.
 */
export function isMissingDependencyError(error: unknown): boolean {
  if (getErrorCode(error) === 'ENOENT') {
    return true;
  }
  return MISSING_HELPER_PATTERN.test(getErrorMessage(error));
}

const defaultWriter: ClipboardWriter = (text) => clipboard.write(text);

/**
 * Copies `text` to the system clipboard. Never rejects: every outcome is a
 * `{ success, message }` pair whose message can be shown to the user as is.
 */
export async function copyText(
  text: string,
  write: ClipboardWriter = defaultWriter,
  logger: Logger = silentLogger
): Promise<CopyResult> {
  if (!text) {
    logger.warn('Clipboard copy aborted: Input text is empty.');
    return { success: false, message: COPY_MESSAGES.empty };
  }

  try {
    await write(text);
    logger.info('Text successfully copied to clipboard.');
    return { success: true, message: COPY_MESSAGES.copied };
  } catch (error) {
    if (isMissingDependencyError(error)) {
      logger.error(`${COPY_MESSAGES.missingDependency} Details: ${getErrorMessage(error)}`);
      return { success: false, message: COPY_MESSAGES.missingDependency };
    }
    logger.error(`Clipboard failed: ${getErrorMessage(error)}`, error);
    return { success: false, message: COPY_MESSAGES.generic };
  }
}
