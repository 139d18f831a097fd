import { RunContext } from '../../src/engine/run-context';
import { ExecutionTree } from '../../src/engine/execution-tree';
import { ConsistencyFault, ExplorationError } from '../../src/domain/errors';
import { expectThrown } from '../helpers/errors';

describe('RunContext', () => {
  test('starts at the root with nothing recorded', () => {
    const tree = new ExecutionTree();
    const context = new RunContext(tree, 'run_1');

    expect(context.cursor).toBe(tree.root);
    expect(context.visited).toEqual([tree.root]);
    expect(context.choices).toEqual([]);
    expect(context.path).toEqual([]);
    expect(context.isClosed).toBe(false);
  });

  test('records every call but only real choice points in the path', () => {
    const tree = new ExecutionTree();
    const context = new RunContext(tree, 'run_1');

    expect(context.choose(2)).toBe(0);
    expect(context.choose(1)).toBe(0);
    expect(context.choose(3)).toBe(0);

    const [first] = tree.childrenOf(tree.root);
    const [second] = tree.childrenOf(first);
    expect(context.choices).toEqual([
      { n: 2, index: 0 },
      { n: 1, index: 0 },
      { n: 3, index: 0 },
    ]);
    expect(context.path).toEqual([0, 0]);
    expect(context.visited).toEqual([tree.root, first, second]);
    expect(context.cursor).toBe(second);
  });

  test('remembers a consistency fault even if the caller catches it', () => {
    const tree = new ExecutionTree();
    tree.markDone(tree.root);
    const context = new RunContext(tree, 'run_1');

    expectThrown(() => context.choose(2), ConsistencyFault);
    expect(context.fault?.code).toBe('CONSISTENCY.DONE_NODE_REENTERED');
    expect(context.choices).toEqual([]);
  });

  test('invalid option counts are not remembered as faults', () => {
    const context = new RunContext(new ExecutionTree(), 'run_1');

    expectThrown(() => context.choose(0), ExplorationError);
    expect(context.fault).toBeUndefined();
  });

  test('the port is unusable once the run is closed', () => {
    const context = new RunContext(new ExecutionTree(), 'run_7');
    context.close();

    const err = expectThrown(() => context.choose(2), ExplorationError);
    expect(err.code).toBe('EXPLORATION.STALE_CHOICE_PORT');
    expect(err.typedError.runId).toBe('run_7');
  });
});
