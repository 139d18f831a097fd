/**
 * Per-run state: the cursor into the execution tree and the choice port the
 * program calls. A context is created at the root for every run and closed
 * when the run ends; nothing outside the run reads or moves its cursor.
 */

import { NodeId, ObservedChoice } from '../domain/choice-node';
import { ChoicePort, ChoiceRecord } from '../domain/exploration';
import { ConsistencyFault, ExplorationError, staleChoicePortError } from '../domain/errors';
import { ExecutionTree } from './execution-tree';

export class RunContext {
  private current: NodeId;
  private closed = false;
  private consistencyFault?: ConsistencyFault;
  /** Node ids walked from the root, one per recorded choice plus the root. */
  readonly visited: NodeId[];
  readonly choices: ChoiceRecord[] = [];
  readonly path: number[] = [];

  constructor(
    private tree: ExecutionTree,
    readonly runId: string,
  ) {
    this.current = tree.root;
    this.visited = [tree.root];
  }

  /** The choice port handed to the program for this run. */
  readonly choose: ChoicePort = (n: number): number => {
    if (this.closed) {
      throw new ExplorationError(staleChoicePortError(this.runId));
    }
    let observed: ObservedChoice;
    try {
      observed = this.tree.observeChoice(this.current, n);
    } catch (err) {
      // Kept so the driver still sees the fault if the program swallows it.
      if (err instanceof ConsistencyFault && !this.consistencyFault) {
        this.consistencyFault = err;
      }
      throw err;
    }
    this.choices.push({ n, index: observed.index });
    if (n > 1) {
      this.path.push(observed.index);
      this.visited.push(observed.cursor);
    }
    this.current = observed.cursor;
    return observed.index;
  };

  get cursor(): NodeId {
    return this.current;
  }

  get fault(): ConsistencyFault | undefined {
    return this.consistencyFault;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  close(): void {
    this.closed = true;
  }
}
