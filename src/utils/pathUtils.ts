import * as path from 'node:path';

/** Forward slashes on every platform */
export function normalizePath(filePath: string): string {
  return filePath.split(path.sep).join('/');
}

/** True when `child` lies strictly inside `parent` (both absolute). */
export function isSubPath(parent: string, child: string): boolean {
  const relative = path.relative(parent, child);
  return (
    relative !== '' &&
    relative !== '..' &&
    !relative.startsWith(`..${path.sep}`) &&
    !path.isAbsolute(relative)
  );
}

/**
 * Path of `filePath` relative to `rootPath` with forward slashes, or null when
 * the file is not inside the root.
 */
export function relativePosixPath(rootPath: string, filePath: string): string | null {
  if (!isSubPath(rootPath, filePath)) {
    return null;
  }
  return normalizePath(path.relative(rootPath, filePath));
}
