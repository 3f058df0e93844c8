import * as path from 'node:path';

/**
 * Fence tag for a code block: the lower-cased extension without its dot, or
 * `text` for files without one. Dotfiles such as `.gitignore` have no extension.
 */
export function getLanguageFromFilename(filePath: string): string {
  return path.extname(filePath).slice(1).toLowerCase() || 'text';
}
