import * as fs from 'node:fs';
import * as path from 'node:path';
import { DEFAULT_EXCLUDED_DIRS } from '../config';
import type { NodeKind, ScanNode, ScanResult } from '../types/FileTypes';
import { getErrorCode, getErrorMessage, InvalidRootError } from './errors';
import { type Logger, silentLogger } from './logger';

export interface ScanOptions {
  /** Directory names skipped wherever they appear; defaults to DEFAULT_EXCLUDED_DIRS */
  excludedDirNames?: Iterable<string>;
  logger?: Logger;
}

/** Identities of the directories between the root and the one being listed */
interface IdentityChain {
  identity: string;
  parent: IdentityChain | null;
}

interface PendingDirectory {
  node: ScanNode;
  ancestors: IdentityChain | null;
}

interface ScanCounters {
  fileCount: number;
  directoryCount: number;
  skippedCount: number;
}

type EntryKind = NodeKind | 'other';

const createNode = (absolutePath: string, kind: NodeKind): ScanNode => ({
  name: path.basename(absolutePath),
  absolutePath,
  kind,
  children: [],
});

const isPermissionError = (error: unknown): boolean => {
  const code = getErrorCode(error);
  return code === 'EACCES' || code === 'EPERM';
};

/**
 * Validates the root before anything is traversed and returns its real path.
 */
function resolveRoot(rootPath: string, logger: Logger): string {
  const resolved = path.resolve(rootPath);
  let stats: fs.Stats | undefined;
  try {
    stats = fs.statSync(resolved, { throwIfNoEntry: false });
  } catch (error) {
    // a file used as an intermediate path segment
    if (getErrorCode(error) !== 'ENOTDIR') throw error;
  }

  if (!stats) {
    logger.error(`Root path does not exist: ${resolved}`);
    throw new InvalidRootError(resolved, 'missing');
  }
  if (!stats.isDirectory()) {
    logger.error(`Root path is not a directory: ${resolved}`);
    throw new InvalidRootError(resolved, 'not-a-directory');
  }

  return fs.realpathSync(resolved);
}

/**
 * Device and inode of a directory, following symlinks. Falls back to the real
 * path where the platform reports no inode. Returns null when the directory
 * cannot be stat'ed; it is then listed without loop protection.
 */
function directoryIdentity(dirPath: string, logger: Logger): string | null {
  try {
    const stats = fs.statSync(dirPath, { bigint: true });
    if (stats.ino === 0n) {
      return `path:${fs.realpathSync(dirPath)}`;
    }
    return `${stats.dev}:${stats.ino}`;
  } catch (error) {
    logger.warn(`Could not read identity of ${dirPath}: ${getErrorMessage(error)}`);
    return null;
  }
}

function chainIncludes(chain: IdentityChain | null, identity: string): boolean {
  for (let link = chain; link; link = link.parent) {
    if (link.identity === identity) {
      return true;
    }
  }
  return false;
}

function listEntries(dirPath: string, logger: Logger): fs.Dirent[] {
  try {
    return fs.readdirSync(dirPath, { withFileTypes: true });
  } catch (error) {
    if (isPermissionError(error)) {
      logger.error(`Permission denied for directory: ${dirPath}`);
    } else {
      logger.error(`OS error scanning directory ${dirPath}: ${getErrorMessage(error)}`);
    }
    return [];
  }
}

// Symlinks are classified by what they point at
function classifyEntry(entry: fs.Dirent, entryPath: string): EntryKind {
  if (entry.isDirectory()) return 'directory';
  if (entry.isFile()) return 'file';
  if (entry.isSymbolicLink()) {
    const target = fs.statSync(entryPath);
    if (target.isDirectory()) return 'directory';
    if (target.isFile()) return 'file';
  }
  return 'other';
}

function walk(
  root: ScanNode,
  excluded: ReadonlySet<string>,
  counters: ScanCounters,
  logger: Logger
): void {
  const stack: PendingDirectory[] = [{ node: root, ancestors: null }];

  for (let next = stack.pop(); next; next = stack.pop()) {
    const { node, ancestors } = next;

    const identity = directoryIdentity(node.absolutePath, logger);
    if (identity !== null && chainIncludes(ancestors, identity)) {
      logger.warn(`Symlink loop detected at ${node.absolutePath}. Skipping.`);
      continue;
    }
    const chain = identity === null ? ancestors : { identity, parent: ancestors };

    for (const entry of listEntries(node.absolutePath, logger)) {
      const entryPath = path.join(node.absolutePath, entry.name);
      try {
        const kind = classifyEntry(entry, entryPath);

        if (kind === 'directory') {
          if (excluded.has(entry.name)) {
            logger.debug(`Skipping excluded directory: ${entryPath}`);
            continue;
          }
          const child = createNode(entryPath, 'directory');
          node.children.push(child);
          counters.directoryCount += 1;
          stack.push({ node: child, ancestors: chain });
        } else if (kind === 'file') {
          node.children.push(createNode(entryPath, 'file'));
          counters.fileCount += 1;
        } else {
          logger.debug(`Skipping special file: ${entryPath}`);
          counters.skippedCount += 1;
        }
      } catch (error) {
        counters.skippedCount += 1;
        if (isPermissionError(error)) {
          logger.warn(`Permission denied accessing entry: ${entryPath}`);
        } else if (getErrorCode(error) === 'ENOENT') {
          logger.warn(`Broken link or vanished entry: ${entryPath}`);
        } else {
          logger.error(`OS error accessing ${entryPath}: ${getErrorMessage(error)}`);
        }
      }
    }
  }
}

/**
 * Walks `rootPath` depth-first and returns the tree of directories and files
 * below it, minus excluded directory names.
 *
 * Only an invalid root is reported by throwing. Unreadable directories and
 * entries are logged and left out, and a directory that leads back to one of
 * its own ancestors through a symlink is returned empty.
 */
export function scanDirectory(rootPath: string, options: ScanOptions = {}): ScanResult {
  const logger = options.logger ?? silentLogger;
  const excluded = new Set(options.excludedDirNames ?? DEFAULT_EXCLUDED_DIRS);
  const resolvedRoot = resolveRoot(rootPath, logger);

  logger.info(`Starting scan at ${resolvedRoot}`);
  const root = createNode(resolvedRoot, 'directory');
  const counters: ScanCounters = { fileCount: 0, directoryCount: 0, skippedCount: 0 };

  try {
    walk(root, excluded, counters, logger);
  } catch (error) {
    logger.error(`Fatal error during directory scan: ${getErrorMessage(error)}`, error);
    return {
      root: createNode(resolvedRoot, 'directory'),
      fileCount: 0,
      directoryCount: 0,
      skippedCount: 0,
    };
  }

  logger.info(
    `Scan finished: ${counters.fileCount} files, ${counters.directoryCount} directories, ${counters.skippedCount} skipped`
  );
  return { root, ...counters };
}

export function scanTree(
  rootPath: string,
  excludedDirNames: Iterable<string> = DEFAULT_EXCLUDED_DIRS,
  logger: Logger = silentLogger
): ScanNode {
  return scanDirectory(rootPath, { excludedDirNames, logger }).root;
}
