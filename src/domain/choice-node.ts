/**
 * Choice node domain model.
 *
 * The execution tree stores its nodes in an arena; a node refers to its
 * children, and the running program's cursor refers to a node, by NodeId.
 */

/** Index of a node slot in the tree arena. */
export type NodeId = number;

/** Lifecycle states of a choice node. */
export enum NodeState {
  /** Reached by no run yet, or reached only as the end of an unfinished path. */
  Unexplored = 'unexplored',
  /** Every path through this node has been executed. */
  Done = 'done',
  /** A choice point with a fixed, ordered set of children. */
  Branch = 'branch',
}

export type ChoiceNode =
  | { state: NodeState.Unexplored }
  | { state: NodeState.Done }
  | { state: NodeState.Branch; children: NodeId[] };

/** Plain nested view of the live tree. */
export type TreeSnapshot =
  | { state: NodeState.Unexplored }
  | { state: NodeState.Done }
  | { state: NodeState.Branch; children: TreeSnapshot[] };

/** Counts describing the tree's current shape. */
export interface TreeStats {
  /** Arena slots ever allocated (live or free). */
  allocated: number;
  /** Nodes reachable from the root. */
  live: number;
  unexplored: number;
  branch: number;
  done: number;
  /** Depth of the deepest live node; the root is depth 0. */
  depth: number;
}

/** Result of resolving one choice against the tree. */
export interface ObservedChoice {
  /** Node the program is at after this choice. */
  cursor: NodeId;
  /** Option index handed back to the program. */
  index: number;
}

export function isBranch(node: ChoiceNode): node is { state: NodeState.Branch; children: NodeId[] } {
  return node.state === NodeState.Branch;
}
