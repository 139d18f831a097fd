/**
 * Execution Tree.
 *
 * Records the branch structure discovered so far and which subtrees are fully
 * explored. Nodes live in one growable arena; child links and cursors are
 * arena indices. Slots released by pruning are reused through a free list.
 *
 * Children are always explored lowest index first, so a node's first
 * non-Done child is the next one to visit.
 */

import {
  ChoiceNode,
  NodeId,
  NodeState,
  ObservedChoice,
  TreeSnapshot,
  TreeStats,
  isBranch,
} from '../domain/choice-node';
import {
  ConsistencyFault,
  ExplorationError,
  branchCountMismatchError,
  branchExhaustedError,
  doneNodeReenteredError,
  invalidChoiceCountError,
} from '../domain/errors';

export class ExecutionTree {
  private nodes: ChoiceNode[] = [];
  private freeSlots: NodeId[] = [];
  readonly root: NodeId;

  constructor() {
    this.root = this.allocate();
  }

  /**
   * Resolve one choice of the running program.
   *
   * Single-option choices are not recorded: the cursor stays where it is.
   * Throws ConsistencyFault when the program disagrees with what earlier runs
   * recorded at this position; the tree is left untouched in that case.
   */
  observeChoice(cursor: NodeId, n: number): ObservedChoice {
    if (!Number.isInteger(n) || n < 1) {
      throw new ExplorationError(invalidChoiceCountError(n));
    }

    const node = this.nodeAt(cursor);
    if (node.state === NodeState.Done) {
      throw new ConsistencyFault(doneNodeReenteredError(cursor));
    }

    if (n === 1) {
      return { cursor, index: 0 };
    }

    if (node.state === NodeState.Unexplored) {
      const children: NodeId[] = [];
      for (let i = 0; i < n; i++) {
        children.push(this.allocate());
      }
      this.nodes[cursor] = { state: NodeState.Branch, children };
      return { cursor: children[0], index: 0 };
    }

    if (node.children.length !== n) {
      throw new ConsistencyFault(branchCountMismatchError(cursor, node.children.length, n));
    }

    const index = node.children.findIndex((child) => this.nodeAt(child).state !== NodeState.Done);
    if (index === -1) {
      throw new ConsistencyFault(branchExhaustedError(cursor, n));
    }
    return { cursor: node.children[index], index };
  }

  /** Force a node to Done, releasing anything below it. */
  markDone(id: NodeId): void {
    const node = this.nodeAt(id);
    if (isBranch(node)) {
      for (const child of node.children) this.release(child);
    }
    this.nodes[id] = { state: NodeState.Done };
  }

  /** Collapse every Branch whose children are all Done. Idempotent. */
  prune(): void {
    this.pruneFrom(this.root);
  }

  /**
   * Collapse the given nodes bottom-up, stopping at the first one that still
   * has work below it. `path` runs from the root to a leaf.
   */
  prunePath(path: readonly NodeId[]): void {
    for (let i = path.length - 1; i >= 0; i--) {
      if (!this.collapseIfComplete(path[i])) return;
    }
  }

  isDone(): boolean {
    return this.nodeAt(this.root).state === NodeState.Done;
  }

  stateOf(id: NodeId): NodeState {
    return this.nodeAt(id).state;
  }

  /** Child ids of a Branch; empty for any other node. */
  childrenOf(id: NodeId): readonly NodeId[] {
    const node = this.nodeAt(id);
    return isBranch(node) ? node.children : [];
  }

  snapshot(id: NodeId = this.root): TreeSnapshot {
    const node = this.nodeAt(id);
    if (!isBranch(node)) return { state: node.state };
    return { state: NodeState.Branch, children: node.children.map((child) => this.snapshot(child)) };
  }

  stats(): TreeStats {
    const stats: TreeStats = {
      allocated: this.nodes.length,
      live: 0,
      unexplored: 0,
      branch: 0,
      done: 0,
      depth: 0,
    };
    const pending: Array<[NodeId, number]> = [[this.root, 0]];
    while (pending.length > 0) {
      const next = pending.pop();
      if (!next) break;
      const [id, depth] = next;
      const node = this.nodeAt(id);
      stats.live++;
      stats.depth = Math.max(stats.depth, depth);
      if (node.state === NodeState.Unexplored) stats.unexplored++;
      else if (node.state === NodeState.Done) stats.done++;
      else {
        stats.branch++;
        for (const child of node.children) pending.push([child, depth + 1]);
      }
    }
    return stats;
  }

  private pruneFrom(id: NodeId): void {
    const node = this.nodeAt(id);
    if (!isBranch(node)) return;
    for (const child of node.children) this.pruneFrom(child);
    this.collapseIfComplete(id);
  }

  /** Returns true when the node is Done afterwards. */
  private collapseIfComplete(id: NodeId): boolean {
    const node = this.nodeAt(id);
    if (node.state === NodeState.Done) return true;
    if (!isBranch(node)) return false;
    if (!node.children.every((child) => this.nodeAt(child).state === NodeState.Done)) return false;
    this.markDone(id);
    return true;
  }

  private allocate(): NodeId {
    const reused = this.freeSlots.pop();
    if (reused !== undefined) {
      this.nodes[reused] = { state: NodeState.Unexplored };
      return reused;
    }
    this.nodes.push({ state: NodeState.Unexplored });
    return this.nodes.length - 1;
  }

  private release(id: NodeId): void {
    const node = this.nodeAt(id);
    if (isBranch(node)) {
      for (const child of node.children) this.release(child);
    }
    this.nodes[id] = { state: NodeState.Done };
    this.freeSlots.push(id);
  }

  private nodeAt(id: NodeId): ChoiceNode {
    const node = this.nodes[id];
    if (!node) {
      throw new RangeError(`No node with id ${id}`);
    }
    return node;
  }
}
