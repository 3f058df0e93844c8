export type InvalidRootReason = 'missing' | 'not-a-directory';

/** The path given as project root does not exist or is not a directory. */
export class InvalidRootError extends Error {
  readonly rootPath: string;
  readonly reason: InvalidRootReason;

  constructor(rootPath: string, reason: InvalidRootReason) {
    super(
      reason === 'missing'
        ? `Path does not exist: ${rootPath}`
        : `Path is not a directory: ${rootPath}`
    );
    this.name = 'InvalidRootError';
    this.rootPath = rootPath;
    this.reason = reason;
  }
}

export class UnknownNodeError extends Error {
  readonly nodeId: number;

  constructor(nodeId: number) {
    super(`No node with id ${nodeId} in the selection tree`);
    this.name = 'UnknownNodeError';
    this.nodeId = nodeId;
  }
}

/** Narrows an unknown thrown value to a Node.js system error code, if it has one. */
export function getErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
