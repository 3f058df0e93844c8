export type NodeKind = 'directory' | 'file';

export type CheckState = 'unchecked' | 'checked' | 'partial';

/** A state a caller may request; `partial` only ever results from propagation. */
export type ToggleState = Exclude<CheckState, 'partial'>;

/**
 * Plain tree produced by the scanner. Children are in enumeration order;
 * the selection tree sorts them.
 */
export interface ScanNode {
  name: string;
  absolutePath: string; // unique within a scan
  kind: NodeKind;
  children: ScanNode[];
}

export interface ScanResult {
  root: ScanNode;
  fileCount: number;
  /** Directories below the root */
  directoryCount: number;
  /** Entries left out because they were unreadable, dangling or special files */
  skippedCount: number;
}

/** Read-only view of a selection tree node; only the tree's toggle routine mutates state. */
export interface SelectionNode {
  readonly id: number;
  readonly name: string;
  readonly absolutePath: string;
  readonly kind: NodeKind;
  /** Parent is referenced by id, the tree owns nodes top-down */
  readonly parentId: number | null;
  readonly childIds: readonly number[];
  readonly depth: number;
  readonly checkState: CheckState;
}

export interface SelectionCounts {
  files: number;
  directories: number;
  checkedFiles: number;
}

export interface SelectionChange {
  /** Node whose toggle produced this change, `null` for bulk operations on the root */
  toggledId: number | null;
  /** Every node whose state differs from before the toggle */
  changedIds: number[];
}

export type SelectionListener = (change: SelectionChange) => void;

export type ReadErrorReason =
  | 'not-found'
  | 'metadata'
  | 'too-large'
  | 'permission-denied'
  | 'binary'
  | 'system';

export type TextEncodingName = 'utf-8' | 'utf-8-bom' | 'latin1';

export type ReadResult =
  | { kind: 'content'; text: string; encoding: TextEncodingName }
  | { kind: 'empty' }
  | { kind: 'error'; reason: ReadErrorReason; placeholder: string };

export interface FailedFile {
  path: string;
  reason: ReadErrorReason;
}

export interface ContextDocument {
  content: string;
  tokenEstimate: number;
  /** Selected files that produced a code block, content or placeholder */
  includedFiles: string[];
  /** Zero-byte files, left out of the document entirely */
  omittedEmptyFiles: string[];
  failedFiles: FailedFile[];
}

export interface CopyResult {
  success: boolean;
  message: string;
}
