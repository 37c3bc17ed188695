import { DataFlowEngine } from '../lib/pinflow/src/engine/data-flow-engine';
import { computeEvaluationOrder } from '../lib/pinflow/src/engine/evaluation-order';
import { HookManager } from '../lib/pinflow/src/engine/hook-manager';
import { NodeGraph } from '../lib/pinflow/src/model/node-graph';
import { EngineEventType } from '../lib/pinflow/src/types/engine-hooks';
import { RunStatus } from '../lib/pinflow/src/types/engine-result';
import { NodeGraphCategory } from '../lib/pinflow/src/types/graph-category';
import { CyclicDependencyError, NodeExecutionError } from '../lib/pinflow/src/utils/errors';
import {
  AddNode,
  ConstantNode,
  DisplayNode,
  PlusOneNode,
  TextNode,
  ThrowingDataNode,
} from './utils/test-nodes';

function dataGraph(id = 'g'): NodeGraph {
  return new NodeGraph({ id, category: NodeGraphCategory.DATA_FLOW });
}

describe('DataFlowEngine', () => {
  let hooks: HookManager;
  let engine: DataFlowEngine;

  beforeEach(() => {
    hooks = new HookManager();
    engine = new DataFlowEngine({}, hooks);
  });

  it('should evaluate a constant into plus-one', async () => {
    const graph = dataGraph();
    const constant = new ConstantNode(1);
    const plus = new PlusOneNode();
    graph.connect(constant.y, plus.x);

    const result = await engine.executeAsync(graph);

    expect(result.category).toBe(NodeGraphCategory.DATA_FLOW);
    expect(result.status).toBe(RunStatus.COMPLETED);
    expect(result.evaluationOrder).toEqual([constant.id, plus.id]);
    expect(result.executedNodeIds).toEqual([constant.id, plus.id]);
    expect(plus.x.value).toBe(1);
    expect([...result.sinkOutputs.keys()]).toEqual([plus.id]);
    expect(result.sinkOutputs.get(plus.id)).toEqual({ y: 2 });
  });

  it('should order by dependencies before insertion order', async () => {
    const graph = dataGraph();
    const add = new AddNode();
    const constant = new ConstantNode(1);
    const left = new PlusOneNode('left');
    const right = new PlusOneNode('right');
    graph.addNode(add);
    graph.connect(constant.y, left.x);
    graph.connect(constant.y, right.x);
    graph.connect(left.y, add.a);
    graph.connect(right.y, add.b);

    const result = await engine.executeAsync(graph);

    expect(result.evaluationOrder).toEqual([constant.id, left.id, right.id, add.id]);
    expect(constant.executions).toBe(1);
    expect(result.sinkOutputs.get(add.id)).toEqual({ sum: 4 });
  });

  it('should keep defaults on unconnected inputs', async () => {
    const graph = dataGraph();
    const plus = new PlusOneNode();
    const text = new TextNode();
    graph.addNode(plus);
    graph.addNode(text);

    const result = await engine.executeAsync(graph);

    expect(result.sinkOutputs.get(plus.id)).toEqual({ y: 1 });
    expect(result.sinkOutputs.get(text.id)).toEqual({ text: 'hello' });
  });

  it('should report input values of sinks without outputs', async () => {
    const graph = dataGraph();
    const text = new TextNode();
    const display = new DisplayNode();
    graph.connect(text.text, display.input);
    graph.setMainNode(display);

    const result = await engine.executeAsync(graph);

    expect(display.received).toEqual(['hello']);
    expect([...result.sinkOutputs.entries()]).toEqual([[display.id, { value: 'hello' }]]);
  });

  it('should fail on a cycle before evaluating anything', async () => {
    const graph = dataGraph();
    const constant = new ConstantNode();
    const first = new PlusOneNode('first');
    const second = new PlusOneNode('second');
    graph.addNode(constant);
    graph.connect(first.y, second.x);
    graph.connect(second.y, first.x);
    const started = jest.fn();
    hooks.on(EngineEventType.RUN_STARTED, started);

    const run = engine.executeAsync(graph);

    await expect(run).rejects.toThrow(CyclicDependencyError);
    await expect(run).rejects.toMatchObject({ nodeIds: [first.id, second.id], graphId: 'g' });
    expect(constant.executions).toBe(0);
    expect(first.executions).toBe(0);
    expect(started).not.toHaveBeenCalled();
  });

  it('should fail the run when a node throws', async () => {
    const graph = dataGraph();
    const constant = new ConstantNode();
    const throwing = new ThrowingDataNode();
    const display = new DisplayNode();
    graph.connect(constant.y, throwing.x);
    graph.connect(throwing.y, display.input);
    const completed = jest.fn();
    hooks.on(EngineEventType.RUN_COMPLETED, completed);

    const run = engine.executeAsync(graph);

    await expect(run).rejects.toThrow(NodeExecutionError);
    await expect(run).rejects.toMatchObject({
      nodeId: throwing.id,
      path: [constant.id, throwing.id],
      message: `Node ${throwing.id} (test.throwingData) failed: bad input`,
    });
    expect(display.received).toEqual([]);
    expect(completed).not.toHaveBeenCalled();
  });

  it('should skip disabled nodes', async () => {
    const graph = dataGraph();
    const constant = new ConstantNode();
    const plus = new PlusOneNode();
    graph.connect(constant.y, plus.x);
    plus.isEnabled = false;
    const skipped = jest.fn();
    hooks.on(EngineEventType.NODE_SKIPPED, skipped);

    const result = await engine.executeAsync(graph);

    expect(result.executedNodeIds).toEqual([constant.id]);
    expect(result.sinkOutputs.size).toBe(0);
    expect(plus.executions).toBe(0);
    expect(skipped).toHaveBeenCalledWith(plus.id);
  });

  describe('main node', () => {
    it('should reject a main node that is not a sink', async () => {
      const graph = dataGraph();
      const plus = new PlusOneNode();
      graph.addNode(plus);
      graph.setMainNode(plus);

      await expect(engine.executeAsync(graph)).rejects.toThrow(
        `Node ${plus.id} is not eligible as DataFlow main node`
      );
    });

    it('should reject a control-flow graph', async () => {
      const graph = new NodeGraph({ id: 'g' });

      await expect(engine.executeAsync(graph)).rejects.toThrow('Graph g is a ControlFlow graph, expected DataFlow');
    });
  });

  describe('cancellation', () => {
    it('should return partial results when aborted between nodes', async () => {
      const controller = new AbortController();
      const graph = dataGraph();
      const constant = new ConstantNode();
      const plus = new PlusOneNode();
      graph.connect(constant.y, plus.x);
      hooks.on(EngineEventType.NODE_EXECUTED, () => controller.abort());
      const cancelled = jest.fn();
      hooks.on(EngineEventType.RUN_CANCELLED, cancelled);

      const result = await engine.executeAsync(graph, controller.signal);

      expect(result.status).toBe(RunStatus.CANCELLED);
      expect(result.executedNodeIds).toEqual([constant.id]);
      expect(result.evaluationOrder).toEqual([constant.id, plus.id]);
      expect(result.sinkOutputs.size).toBe(0);
      expect(plus.executions).toBe(0);
      expect(cancelled).toHaveBeenCalledWith('g', result);
    });
  });
});

describe('computeEvaluationOrder', () => {
  it('should keep insertion order among independent nodes', () => {
    const graph = dataGraph();
    const b = new ConstantNode();
    const a = new ConstantNode();
    graph.addNode(b);
    graph.addNode(a);

    expect(computeEvaluationOrder(graph)).toEqual([b, a]);
  });
});
