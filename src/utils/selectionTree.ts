import type {
  CheckState,
  NodeKind,
  ScanNode,
  SelectionChange,
  SelectionCounts,
  SelectionListener,
  SelectionNode,
  ToggleState,
} from '../types/FileTypes';
import { UnknownNodeError } from './errors';

interface ArenaNode {
  id: number;
  name: string;
  absolutePath: string;
  kind: NodeKind;
  parentId: number | null;
  childIds: number[];
  depth: number;
  checkState: CheckState;
}

interface PendingScanNode {
  scan: ScanNode;
  parentId: number | null;
  depth: number;
}

/**
 * Directories before files, then case-insensitive name. Names are compared by
 * code point rather than locale so the order is the same on every machine.
 */
export function compareScanNodes(a: ScanNode, b: ScanNode): number {
  if (a.kind !== b.kind) {
    return a.kind === 'directory' ? -1 : 1;
  }
  const aName = a.name.toLowerCase();
  const bName = b.name.toLowerCase();
  if (aName !== bName) {
    return aName < bName ? -1 : 1;
  }
  if (a.name === b.name) return 0;
  return a.name < b.name ? -1 : 1;
}

/**
 * Tri-state selection over a scanned tree.
 *
 * Nodes live in a flat arena indexed by id and point at their parent by id.
 * Ids are assigned in presentation order (pre-order over the sorted tree), so
 * a node's id never changes while the tree exists.
 *
 * `toggle` is the only writer of check states. It pushes the requested state
 * down the whole subtree, recomputes ancestors from their direct children
 * until one is unchanged, and only then notifies subscribers, once.
 */
export class SelectionTree {
  private readonly nodes: ArenaNode[];
  private readonly pathIndex = new Map<string, number>();
  private readonly listeners = new Set<SelectionListener>();

  private constructor(nodes: ArenaNode[]) {
    this.nodes = nodes;
    for (const node of nodes) {
      if (!this.pathIndex.has(node.absolutePath)) {
        this.pathIndex.set(node.absolutePath, node.id);
      }
    }
  }

  static build(scanRoot: ScanNode): SelectionTree {
    const nodes: ArenaNode[] = [];
    const pending: PendingScanNode[] = [{ scan: scanRoot, parentId: null, depth: 0 }];

    for (let next = pending.pop(); next; next = pending.pop()) {
      const { scan, parentId, depth } = next;
      const id = nodes.length;
      nodes.push({
        id,
        name: scan.name,
        absolutePath: scan.absolutePath,
        kind: scan.kind,
        parentId,
        childIds: [],
        depth,
        checkState: 'unchecked',
      });
      if (parentId !== null) {
        nodes[parentId].childIds.push(id);
      }

      const sorted = [...scan.children].sort(compareScanNodes);
      // reversed so the first child is popped, and numbered, first
      for (let i = sorted.length - 1; i >= 0; i -= 1) {
        pending.push({ scan: sorted[i], parentId: id, depth: depth + 1 });
      }
    }

    return new SelectionTree(nodes);
  }

  get root(): SelectionNode {
    return this.nodes[0];
  }

  get size(): number {
    return this.nodes.length;
  }

  getNode(nodeId: number): SelectionNode {
    return this.requireNode(nodeId);
  }

  findByPath(absolutePath: string): SelectionNode | undefined {
    const id = this.pathIndex.get(absolutePath);
    return id === undefined ? undefined : this.nodes[id];
  }

  children(nodeId: number): SelectionNode[] {
    return this.requireNode(nodeId).childIds.map((childId) => this.nodes[childId]);
  }

  /** Ids of every directory, root included */
  directoryIds(): number[] {
    return this.nodes.filter((node) => node.kind === 'directory').map((node) => node.id);
  }

  subscribe(listener: SelectionListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Sets `nodeId` and its whole subtree to `requestedState`, then settles the
   * ancestors. Subscribers are notified exactly once, after the tree is
   * consistent again.
   */
  toggle(nodeId: number, requestedState: ToggleState): SelectionChange {
    const node = this.requireNode(nodeId);
    const changedIds: number[] = [];

    this.pushDown(node, requestedState, changedIds);
    this.pullUp(node.parentId, changedIds);

    const change: SelectionChange = { toggledId: nodeId, changedIds };
    this.notify(change);
    return change;
  }

  /** Click behaviour: a checked node unchecks, anything else checks */
  toggleNode(nodeId: number): SelectionChange {
    const node = this.requireNode(nodeId);
    return this.toggle(nodeId, node.checkState === 'checked' ? 'unchecked' : 'checked');
  }

  setAll(state: ToggleState): SelectionChange {
    return this.toggle(this.root.id, state);
  }

  /**
   * Absolute paths of checked files in presentation order. Iterative so deep
   * trees cannot exhaust the call stack; unchecked subtrees are not entered
   * because they cannot hold a checked file.
   */
  checkedFiles(): string[] {
    const result: string[] = [];
    const stack: number[] = [this.root.id];

    for (let id = stack.pop(); id !== undefined; id = stack.pop()) {
      const node = this.nodes[id];
      if (node.checkState === 'unchecked') {
        continue;
      }
      if (node.kind === 'file') {
        if (node.checkState === 'checked') {
          result.push(node.absolutePath);
        }
        continue;
      }
      for (let i = node.childIds.length - 1; i >= 0; i -= 1) {
        stack.push(node.childIds[i]);
      }
    }

    return result;
  }

  counts(): SelectionCounts {
    let files = 0;
    let directories = 0;
    let checkedFiles = 0;
    for (const node of this.nodes) {
      if (node.kind === 'file') {
        files += 1;
        if (node.checkState === 'checked') checkedFiles += 1;
      } else {
        directories += 1;
      }
    }
    return { files, directories, checkedFiles };
  }

  /**
   * Rows for a tree view: pre-order, entering only the directories whose ids
   * are in `expandedIds`.
   */
  visibleNodes(expandedIds: ReadonlySet<number>, includeRoot = true): SelectionNode[] {
    const rows: SelectionNode[] = [];
    const stack: number[] = includeRoot
      ? [this.root.id]
      : [...this.root.childIds].reverse();

    for (let id = stack.pop(); id !== undefined; id = stack.pop()) {
      const node = this.nodes[id];
      rows.push(node);
      if (node.kind === 'directory' && expandedIds.has(id)) {
        for (let i = node.childIds.length - 1; i >= 0; i -= 1) {
          stack.push(node.childIds[i]);
        }
      }
    }

    return rows;
  }

  private requireNode(nodeId: number): ArenaNode {
    const node = Number.isInteger(nodeId) ? this.nodes[nodeId] : undefined;
    if (!node) {
      throw new UnknownNodeError(nodeId);
    }
    return node;
  }

  private pushDown(start: ArenaNode, state: ToggleState, changedIds: number[]): void {
    const stack: ArenaNode[] = [start];
    for (let node = stack.pop(); node; node = stack.pop()) {
      if (node.checkState !== state) {
        node.checkState = state;
        changedIds.push(node.id);
      }
      for (const childId of node.childIds) {
        stack.push(this.nodes[childId]);
      }
    }
  }

  private pullUp(fromId: number | null, changedIds: number[]): void {
    for (let id = fromId; id !== null; ) {
      const node = this.nodes[id];
      const next = this.stateFromChildren(node);
      if (next === node.checkState) {
        // nothing above can change either
        return;
      }
      node.checkState = next;
      changedIds.push(id);
      id = node.parentId;
    }
  }

  private stateFromChildren(node: ArenaNode): CheckState {
    if (node.childIds.length === 0) {
      return node.checkState;
    }
    let checked = 0;
    let unchecked = 0;
    for (const childId of node.childIds) {
      const state = this.nodes[childId].checkState;
      if (state === 'checked') checked += 1;
      else if (state === 'unchecked') unchecked += 1;
    }
    if (checked === node.childIds.length) return 'checked';
    if (unchecked === node.childIds.length) return 'unchecked';
    return 'partial';
  }

  private notify(change: SelectionChange): void {
    for (const listener of [...this.listeners]) {
      listener(change);
    }
  }
}
