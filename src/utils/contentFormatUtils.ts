import * as fs from 'node:fs';
import * as path from 'node:path';
import { FOOTER_FILENAME, HEADER_FILENAME } from '../config';
import type { ContextDocument, FailedFile } from '../types/FileTypes';
import { readFileSafe, renderReadResult } from './fileReader';
import { getLanguageFromFilename } from './languageUtils';
import { type Logger, silentLogger } from './logger';
import { relativePosixPath } from './pathUtils';
import { estimateTokenCount } from './tokenUtils';

export interface BuildContextOptions {
  logger?: Logger;
  maxBytes?: number;
}

const PREAMBLE: readonly string[] = [
  '# Context Injection\n',
  'The following codebase context was automatically defined as important for this prompt:\n',
];

export function formatFileBlock(relativePath: string, language: string, body: string): string {
  return `## File: ${relativePath}\n\`\`\`${language}\n${body}\n\`\`\`\n`;
}

/**
 * Header and footer are optional decorations: anything other than readable,
 * non-blank text leaves them out without a trace in the document.
 */
function readDecoration(filePath: string, options: BuildContextOptions): string | null {
  try {
    if (!fs.statSync(filePath, { throwIfNoEntry: false })?.isFile()) {
      return null;
    }
  } catch {
    return null;
  }

  const result = readFileSafe(filePath, options);
  if (result.kind !== 'content') {
    return null;
  }
  const trimmed = result.text.trim();
  return trimmed || null;
}

function displayPath(rootPath: string, filePath: string, logger: Logger): string {
  const relative = relativePosixPath(rootPath, filePath);
  if (relative === null) {
    logger.error(`File ${filePath} is not relative to root ${rootPath}`);
    return path.basename(filePath);
  }
  return relative;
}

/**
 * Builds the context document for `selectedFiles`, in the order given.
 *
 * Layout: preamble, the root's `context_header.md`, one fenced block per file
 * (`## File: <relative path>`), then `context_footer.md`. Files whose text is
 * empty (zero bytes, or a lone UTF-8 byte-order mark) are left out entirely;
 * files that cannot be read show their error placeholder inside the block.
 * Never throws for file-level problems.
 */
export function buildContext(
  rootPath: string,
  selectedFiles: readonly string[],
  options: BuildContextOptions = {}
): ContextDocument {
  const logger = options.logger ?? silentLogger;
  const root = path.resolve(rootPath);
  const headerPath = path.join(root, HEADER_FILENAME);
  const footerPath = path.join(root, FOOTER_FILENAME);

  const parts: string[] = [...PREAMBLE];
  const includedFiles: string[] = [];
  const omittedEmptyFiles: string[] = [];
  const failedFiles: FailedFile[] = [];

  const header = readDecoration(headerPath, options);
  if (header) {
    parts.push(`${header}\n`);
  }

  for (const filePath of selectedFiles) {
    const resolved = path.resolve(root, filePath);
    if (resolved === headerPath || resolved === footerPath) {
      // already placed outside the code blocks
      continue;
    }

    const result = readFileSafe(resolved, options);
    const body = renderReadResult(result);
    if (!body) {
      omittedEmptyFiles.push(filePath);
      continue;
    }
    if (result.kind === 'error') {
      failedFiles.push({ path: filePath, reason: result.reason });
    }

    parts.push(
      formatFileBlock(displayPath(root, resolved, logger), getLanguageFromFilename(resolved), body)
    );
    includedFiles.push(filePath);
  }

  const footer = readDecoration(footerPath, options);
  if (footer) {
    parts.push(`\n${footer}`);
  }

  const content = parts.join('\n');
  logger.debug(
    `Built context from ${includedFiles.length} files (${omittedEmptyFiles.length} empty, ${failedFiles.length} failed)`
  );

  return {
    content,
    tokenEstimate: estimateTokenCount(content),
    includedFiles,
    omittedEmptyFiles,
    failedFiles,
  };
}
