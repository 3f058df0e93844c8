/**
 * Fixed defaults for scanning, reading and the document format.
 * The header/footer names are part of the output contract and are not configurable.
 */

export const DEFAULT_EXCLUDED_DIRS: readonly string[] = [
  '.git',
  '__pycache__',
  'venv',
  'node_modules',
  '.idea',
  '.vscode',
];

// Files above this size are replaced by a placeholder instead of being read
export const MAX_FILE_SIZE_BYTES = 1_000_000;

export const HEADER_FILENAME = 'context_header.md';
export const FOOTER_FILENAME = 'context_footer.md';

export const DEFAULT_LOG_FILE = 'context_studio.log';
export const LOG_LEVEL_ENV_VAR = 'CONTEXT_STUDIO_LOG_LEVEL';

export const STATUS_MESSAGE_DURATION_MS = 3000;
