import { DEFAULT_EXCLUDED_DIRS } from '../config';
import type { CopyResult, FailedFile, ToggleState } from '../types/FileTypes';
import { type ClipboardWriter, copyText } from './clipboardService';
import { buildContext } from './contentFormatUtils';
import { getErrorMessage } from './errors';
import { scanDirectory } from './fileScanner';
import { createLogger, type Logger } from './logger';
import { SelectionTree } from './selectionTree';

export interface SessionError {
  title: string;
  message: string;
}

export interface SessionState {
  readonly rootPath: string | null;
  readonly tree: SelectionTree | null;
  readonly document: string;
  readonly tokenEstimate: number;
  readonly selectedCount: number;
  readonly failedFiles: readonly FailedFile[];
  /** Transient confirmation, cleared by the view after a while */
  readonly status: string | null;
  readonly error: SessionError | null;
  /** Bumped on every change, including check state changes inside `tree` */
  readonly revision: number;
}

export interface ProjectSessionOptions {
  excludedDirNames?: Iterable<string>;
  loggerFactory?: (scope: string) => Logger;
  clipboardWriter?: ClipboardWriter;
}

const INITIAL_STATE: SessionState = {
  rootPath: null,
  tree: null,
  document: '',
  tokenEstimate: 0,
  selectedCount: 0,
  failedFiles: [],
  status: null,
  error: null,
  revision: 0,
};

/**
 * Holds the one active project and is the boundary for everything the user
 * triggers. Loads, toggles and copies never throw out of here: failures
 * become `state.error` and the previous project and document stay in place.
 */
export class ProjectSession {
  private state: SessionState = INITIAL_STATE;
  private readonly listeners = new Set<() => void>();
  private readonly excludedDirNames: string[];
  private readonly clipboardWriter: ClipboardWriter | undefined;
  private readonly logger: Logger;
  private readonly scannerLogger: Logger;
  private readonly builderLogger: Logger;
  private readonly clipboardLogger: Logger;
  private detachTree: (() => void) | null = null;

  constructor(options: ProjectSessionOptions = {}) {
    const loggerFactory = options.loggerFactory ?? createLogger;
    this.excludedDirNames = [...(options.excludedDirNames ?? DEFAULT_EXCLUDED_DIRS)];
    this.clipboardWriter = options.clipboardWriter;
    this.logger = loggerFactory('session');
    this.scannerLogger = loggerFactory('scanner');
    this.builderLogger = loggerFactory('context-builder');
    this.clipboardLogger = loggerFactory('clipboard');
  }

  snapshot = (): SessionState => this.state;

  subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  /**
   * Scans `rootPath` and replaces the current project with it. Returns false,
   * with `state.error` set, when the root is invalid or the load fails.
   */
  load(rootPath: string): boolean {
    this.logger.info(`Loading project: ${rootPath}`);
    try {
      const scan = scanDirectory(rootPath, {
        excludedDirNames: this.excludedDirNames,
        logger: this.scannerLogger,
      });
      const tree = SelectionTree.build(scan.root);

      this.detachTree?.();
      this.detachTree = tree.subscribe(() => this.regenerate());

      this.update({
        rootPath: scan.root.absolutePath,
        tree,
        document: '',
        tokenEstimate: 0,
        selectedCount: 0,
        failedFiles: [],
        error: null,
        status: `Loaded ${scan.fileCount} files`,
      });
      return true;
    } catch (error) {
      this.logger.error(`Failed to load project: ${getErrorMessage(error)}`, error);
      this.update({
        error: { title: 'Load Failed', message: `Could not load project:\n${getErrorMessage(error)}` },
      });
      return false;
    }
  }

  /**
   * Applies a toggle. Without `state` the node flips the way a click does.
   * The document is rebuilt from the tree's settled notification.
   */
  toggle(nodeId: number, state?: ToggleState): void {
    const { tree } = this.state;
    if (!tree) return;
    this.safeExecute(() => {
      if (state) {
        tree.toggle(nodeId, state);
      } else {
        tree.toggleNode(nodeId);
      }
    });
  }

  selectAll(): void {
    const { tree } = this.state;
    if (!tree) return;
    this.safeExecute(() => tree.setAll('checked'));
  }

  deselectAll(): void {
    const { tree } = this.state;
    if (!tree) return;
    this.safeExecute(() => tree.setAll('unchecked'));
  }

  async copy(): Promise<CopyResult> {
    const result = await copyText(this.state.document, this.clipboardWriter, this.clipboardLogger);
    if (result.success) {
      this.update({ status: result.message });
    } else {
      this.update({ error: { title: 'Copy Failed', message: result.message } });
    }
    return result;
  }

  dismissError(): void {
    if (this.state.error) this.update({ error: null });
  }

  clearStatus(): void {
    if (this.state.status) this.update({ status: null });
  }

  dispose(): void {
    this.detachTree?.();
    this.detachTree = null;
    this.listeners.clear();
  }

  private regenerate(): void {
    const { tree, rootPath } = this.state;
    if (!tree || !rootPath) return;

    this.safeExecute(() => {
      const selectedFiles = tree.checkedFiles();
      const context = buildContext(rootPath, selectedFiles, { logger: this.builderLogger });
      this.update({
        document: context.content,
        tokenEstimate: context.tokenEstimate,
        selectedCount: selectedFiles.length,
        failedFiles: context.failedFiles,
      });
    });
  }

  private safeExecute(action: () => void): void {
    try {
      action();
    } catch (error) {
      this.logger.error(`Error during user action: ${getErrorMessage(error)}`, error);
      this.update({
        error: {
          title: 'Application Error',
          message: `An unexpected error occurred: ${getErrorMessage(error)}`,
        },
      });
    }
  }

  private update(patch: Partial<Omit<SessionState, 'revision'>>): void {
    this.state = { ...this.state, ...patch, revision: this.state.revision + 1 };
    for (const listener of [...this.listeners]) {
      listener();
    }
  }
}
