import { ControlFlowEngine } from '../lib/pinflow/src/engine/control-flow-engine';
import { HookManager } from '../lib/pinflow/src/engine/hook-manager';
import { NodeGraph } from '../lib/pinflow/src/model/node-graph';
import { EngineEventType } from '../lib/pinflow/src/types/engine-hooks';
import { RunStatus } from '../lib/pinflow/src/types/engine-result';
import { NodeGraphCategory } from '../lib/pinflow/src/types/graph-category';
import { LogLevel } from '../lib/pinflow/src/types/logger';
import { NodeState } from '../lib/pinflow/src/types/node-state';
import { GraphPreconditionError, StepLimitExceededError } from '../lib/pinflow/src/utils/errors';
import { TestLoggerAdapter } from './utils/test-logger-adapter';
import {
  AbortingStepNode,
  BranchNode,
  ContextRecorderNode,
  FailingStepNode,
  MergeNode,
  StartNode,
  StepNode,
} from './utils/test-nodes';

describe('ControlFlowEngine', () => {
  let hooks: HookManager;
  let engine: ControlFlowEngine;
  let trace: string[];

  beforeEach(() => {
    hooks = new HookManager();
    engine = new ControlFlowEngine({}, hooks);
    trace = [];
  });

  it('should run the main node and then its flow targets, once each', async () => {
    const graph = new NodeGraph({ id: 'g' });
    const a = new StartNode('a', trace);
    const b = new StepNode('b', trace);
    graph.connect(a.flowOut, b.flowIn);
    graph.setMainNode(a);

    const result = await engine.executeAsync(graph);

    expect(trace).toEqual(['a', 'b']);
    expect(result.category).toBe(NodeGraphCategory.CONTROL_FLOW);
    expect(result.graphId).toBe('g');
    expect(result.status).toBe(RunStatus.COMPLETED);
    expect(result.executedNodeIds).toEqual([a.id, b.id]);
    expect(result.steps).toBe(2);
    expect(result.errors).toEqual([]);
    expect(b.state).toBe(NodeState.SUCCESS);
  });

  it('should finish a target and its continuation before the next sibling', async () => {
    const graph = new NodeGraph();
    const start = new StartNode('start', trace);
    const first = new StepNode('first', trace);
    const firstNext = new StepNode('first-next', trace);
    const second = new StepNode('second', trace);
    graph.connect(start.flowOut, first.flowIn);
    graph.connect(start.flowOut, second.flowIn);
    graph.connect(first.flowOut, firstNext.flowIn);
    graph.setMainNode(start);

    await engine.executeAsync(graph);

    expect(trace).toEqual(['start', 'first', 'first-next', 'second']);
  });

  it('should follow only the fired branch', async () => {
    const graph = new NodeGraph();
    const start = new StartNode('start', trace);
    const branch = new BranchNode(trace);
    const yes = new StepNode('yes', trace);
    const no = new StepNode('no', trace);
    graph.connect(start.flowOut, branch.flowIn);
    graph.connect(branch.whenTrue, yes.flowIn);
    graph.connect(branch.whenFalse, no.flowIn);
    graph.setMainNode(start);

    branch.condition.value = true;
    await engine.executeAsync(graph);
    expect(trace).toEqual(['start', 'branch', 'yes']);

    trace.length = 0;
    branch.condition.value = false;
    await engine.executeAsync(graph);
    expect(trace).toEqual(['start', 'branch', 'no']);
  });

  it('should report events with the path from the entry', async () => {
    const graph = new NodeGraph({ id: 'g' });
    const a = new StartNode('a');
    const b = new StepNode('b');
    graph.connect(a.flowOut, b.flowIn);
    graph.setMainNode(a);

    const started = jest.fn();
    const executing = jest.fn();
    const executed = jest.fn();
    const completed = jest.fn();
    hooks.on(EngineEventType.RUN_STARTED, started);
    hooks.on(EngineEventType.NODE_EXECUTING, executing);
    hooks.on(EngineEventType.NODE_EXECUTED, executed);
    hooks.on(EngineEventType.RUN_COMPLETED, completed);

    const result = await engine.executeAsync(graph);

    expect(started).toHaveBeenCalledWith('g', NodeGraphCategory.CONTROL_FLOW);
    expect(executing.mock.calls).toEqual([
      [a.id, [a.id]],
      [b.id, [a.id, b.id]],
    ]);
    expect(executed).toHaveBeenCalledTimes(2);
    expect(executed).toHaveBeenCalledWith(b.id, expect.any(Number));
    expect(completed).toHaveBeenCalledWith('g', result);
  });

  describe('faults', () => {
    function buildFaultingGraph(): { graph: NodeGraph; start: StartNode; failing: FailingStepNode; after: StepNode; sibling: StepNode } {
      const graph = new NodeGraph({ id: 'g' });
      const start = new StartNode('start', trace);
      const failing = new FailingStepNode();
      const after = new StepNode('after', trace);
      const sibling = new StepNode('sibling', trace);
      graph.connect(start.flowOut, failing.flowIn);
      graph.connect(failing.flowOut, after.flowIn);
      graph.connect(start.flowOut, sibling.flowIn);
      graph.setMainNode(start);
      return { graph, start, failing, after, sibling };
    }

    it('should abort the failing path only and keep running siblings', async () => {
      const { graph, start, failing, after, sibling } = buildFaultingGraph();
      const failed = jest.fn();
      hooks.on(EngineEventType.NODE_FAILED, failed);

      const result = await engine.executeAsync(graph);

      expect(trace).toEqual(['start', 'sibling']);
      expect(after.executions).toBe(0);
      expect(result.status).toBe(RunStatus.FAULTED);
      expect(result.executedNodeIds).toEqual([start.id, sibling.id]);
      expect(result.steps).toBe(3);
      expect(result.errors).toHaveLength(1);

      const [error] = result.errors;
      expect(error.nodeId).toBe(failing.id);
      expect(error.path).toEqual([start.id, failing.id]);
      expect(error.graphId).toBe('g');
      expect(error.message).toBe(`Node ${failing.id} (test.failingStep) failed: boom`);
      expect(error.originalError?.message).toBe('boom');
      expect(failing.state).toBe(NodeState.ERROR);
      expect(failed).toHaveBeenCalledWith(failing.id, error);
    });

    it('should log faults unless silenced', async () => {
      const logger = new TestLoggerAdapter();
      const { graph, failing } = buildFaultingGraph();

      await new ControlFlowEngine({ logger }).executeAsync(graph);
      expect(logger.getMessages(LogLevel.ERROR)).toEqual([`Node ${failing.id} (test.failingStep) failed: boom`]);

      logger.clear();
      await new ControlFlowEngine({ logger, silentErrors: true }).executeAsync(graph);
      expect(logger.getMessages(LogLevel.ERROR)).toEqual([]);
    });
  });

  describe('limits', () => {
    function buildLoop(): { graph: NodeGraph; merge: MergeNode; step: StepNode } {
      const graph = new NodeGraph({ id: 'loop' });
      const start = new StartNode('start', trace);
      const merge = new MergeNode(trace);
      const step = new StepNode('step', trace);
      graph.connect(start.flowOut, merge.flowIn);
      graph.connect(merge.flowOut, step.flowIn);
      graph.connect(step.flowOut, merge.loopIn);
      graph.setMainNode(start);
      return { graph, merge, step };
    }

    it('should stop a loop at the per-node visit bound', async () => {
      const { graph, merge } = buildLoop();
      const limitReached = jest.fn();
      engine = new ControlFlowEngine({ maxVisitsPerNode: 3 }, hooks);
      hooks.on(EngineEventType.STEP_LIMIT_REACHED, limitReached);

      const result = await engine.executeAsync(graph);

      expect(trace).toEqual(['start', 'merge', 'step', 'merge', 'step', 'merge', 'step']);
      expect(result.status).toBe(RunStatus.STEP_LIMIT_REACHED);
      expect(result.steps).toBe(7);
      expect(limitReached).toHaveBeenCalledWith({ graphId: 'loop', nodeId: merge.id, steps: 7 });
    });

    it('should stop at the total step bound', async () => {
      const { graph, step } = buildLoop();
      const logger = new TestLoggerAdapter();
      engine = new ControlFlowEngine({ maxSteps: 4, logger }, hooks);

      const result = await engine.executeAsync(graph);

      expect(trace).toEqual(['start', 'merge', 'step', 'merge']);
      expect(result.status).toBe(RunStatus.STEP_LIMIT_REACHED);
      expect(logger.getMessages(LogLevel.WARN)).toEqual([`Step limit reached at node ${step.id} after 4 steps`]);
    });

    it('should throw when failOnStepLimit is set', async () => {
      const { graph, step } = buildLoop();
      const completed = jest.fn();
      engine = new ControlFlowEngine({ maxSteps: 4, failOnStepLimit: true }, hooks);
      hooks.on(EngineEventType.RUN_COMPLETED, completed);

      const run = engine.executeAsync(graph);

      await expect(run).rejects.toThrow(StepLimitExceededError);
      await expect(run).rejects.toMatchObject({ nodeId: step.id, steps: 4, graphId: 'loop' });
      expect(completed).not.toHaveBeenCalled();
    });
  });

  describe('preconditions', () => {
    it('should reject a graph without main node', async () => {
      const graph = new NodeGraph({ id: 'g' });
      graph.addNode(new StartNode());

      await expect(engine.executeAsync(graph)).rejects.toThrow(new GraphPreconditionError('Graph g has no main node'));
    });

    it('should reject a main node that is not an entry', async () => {
      const graph = new NodeGraph({ id: 'g' });
      const step = new StepNode();
      graph.addNode(step);
      graph.setMainNode(step);

      await expect(engine.executeAsync(graph)).rejects.toThrow(
        `Node ${step.id} is not eligible as ControlFlow main node`
      );
      expect(step.executions).toBe(0);
    });

    it('should reject a data-flow graph', async () => {
      const graph = new NodeGraph({ id: 'g', category: NodeGraphCategory.DATA_FLOW });
      const started = jest.fn();
      hooks.on(EngineEventType.RUN_STARTED, started);

      await expect(engine.executeAsync(graph)).rejects.toThrow('Graph g is a DataFlow graph, expected ControlFlow');
      expect(started).not.toHaveBeenCalled();
    });
  });

  describe('cancellation', () => {
    it('should stop with partial results when the signal aborts mid-run', async () => {
      const controller = new AbortController();
      const graph = new NodeGraph({ id: 'g' });
      const start = new StartNode('start', trace);
      const aborting = new AbortingStepNode(controller);
      const after = new StepNode('after', trace);
      graph.connect(start.flowOut, aborting.flowIn);
      graph.connect(aborting.flowOut, after.flowIn);
      graph.setMainNode(start);
      const cancelled = jest.fn();
      hooks.on(EngineEventType.RUN_CANCELLED, cancelled);

      const result = await engine.executeAsync(graph, controller.signal);

      expect(result.status).toBe(RunStatus.CANCELLED);
      expect(result.executedNodeIds).toEqual([start.id, aborting.id]);
      expect(after.executions).toBe(0);
      expect(cancelled).toHaveBeenCalledWith('g', result);
    });

    it('should run nothing with an already aborted signal', async () => {
      const controller = new AbortController();
      controller.abort();
      const graph = new NodeGraph();
      const start = new StartNode();
      graph.addNode(start);
      graph.setMainNode(start);

      const result = await engine.executeAsync(graph, controller.signal);

      expect(result.status).toBe(RunStatus.CANCELLED);
      expect(result.steps).toBe(0);
      expect(start.executions).toBe(0);
    });
  });

  it('should skip disabled nodes without following their outputs', async () => {
    const graph = new NodeGraph();
    const start = new StartNode('start', trace);
    const disabled = new StepNode('disabled', trace);
    const after = new StepNode('after', trace);
    graph.connect(start.flowOut, disabled.flowIn);
    graph.connect(disabled.flowOut, after.flowIn);
    graph.setMainNode(start);
    disabled.isEnabled = false;
    const skipped = jest.fn();
    hooks.on(EngineEventType.NODE_SKIPPED, skipped);

    const result = await engine.executeAsync(graph);

    expect(trace).toEqual(['start']);
    expect(result.steps).toBe(1);
    expect(result.status).toBe(RunStatus.COMPLETED);
    expect(skipped).toHaveBeenCalledWith(disabled.id);
  });

  it('should hand the run context to async nodes', async () => {
    const controller = new AbortController();
    const graph = new NodeGraph({ id: 'g' });
    const start = new StartNode();
    const recorder = new ContextRecorderNode();
    graph.connect(start.flowOut, recorder.flowIn);
    graph.setMainNode(start);

    await engine.executeAsync(graph, controller.signal);

    expect(recorder.contexts).toHaveLength(1);
    expect(recorder.contexts[0]).toMatchObject({
      graphId: 'g',
      category: NodeGraphCategory.CONTROL_FLOW,
      signal: controller.signal,
    });
  });
});
