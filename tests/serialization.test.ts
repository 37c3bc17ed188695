import { NodeGraph } from '../lib/pinflow/src/model/node-graph';
import { NodeGroup } from '../lib/pinflow/src/model/node-group';
import { deserializeGraph, serializeGraph } from '../lib/pinflow/src/serialization/serializer';
import { isSerializable, snapshotGraph } from '../lib/pinflow/src/serialization/snapshot';
import { NodeGraphCategory } from '../lib/pinflow/src/types/graph-category';
import {
  BranchNode,
  ConstantNode,
  DisplayNode,
  PlusOneNode,
  StartNode,
  StepNode,
  createTestRegistry,
} from './utils/test-nodes';

function buildControlFlowGraph(): { graph: NodeGraph; outer: NodeGroup; inner: NodeGroup; step: StepNode; branch: BranchNode } {
  const graph = new NodeGraph({ id: 'cf', name: 'sample' });
  const start = new StartNode();
  const step = new StepNode();
  const branch = new BranchNode();
  const outer = new NodeGroup('outer', { x: 0, y: 0, width: 400, height: 300 });
  const inner = new NodeGroup('inner', { x: 10, y: 10, width: 100, height: 100 });
  outer.addChild(inner);

  start.position = { x: 20, y: 40 };
  graph.connect(start.flowOut, step.flowIn);
  graph.connect(step.flowOut, branch.flowIn);
  graph.moveNodeToGroup(start, outer);
  graph.moveNodeToGroup(step, inner);
  graph.setMainNode(start);
  branch.condition.value = true;
  return { graph, outer, inner, step, branch };
}

function wrap(graph: unknown): string {
  return JSON.stringify({ format: 'pinflow-graph', formatVersion: 1, graph });
}

describe('graph serialization', () => {
  it('should restore identifiers, structure and values', () => {
    const { graph, outer, inner, step, branch } = buildControlFlowGraph();

    const { graph: restored, errors, warnings } = deserializeGraph(serializeGraph(graph), createTestRegistry());

    expect(errors).toEqual([]);
    expect(warnings).toEqual([]);
    if (!restored) {
      throw new Error('graph expected');
    }
    expect(restored.id).toBe('cf');
    expect(restored.name).toBe('sample');
    expect(restored.category).toBe(NodeGraphCategory.CONTROL_FLOW);
    expect(restored.nodes.map(node => node.id)).toEqual(graph.nodes.map(node => node.id));
    expect(restored.connections.map(connection => connection.id)).toEqual(
      graph.connections.map(connection => connection.id)
    );
    expect(restored.getAllGroupsRecursive().map(group => group.id)).toEqual([outer.id, inner.id]);
    expect(restored.findNode(step.id)?.group?.id).toBe(inner.id);
    expect(restored.findNode(step.id)?.group?.parent?.id).toBe(outer.id);
    expect(restored.mainNodeId).toBe(graph.mainNodeId);
    expect(restored.findNode(branch.id)?.findInputPin('condition')?.value).toBe(true);
    expect(restored.validate()).toBe(true);
    expect(snapshotGraph(restored)).toEqual(snapshotGraph(graph));
  });

  it('should carry data values across connections on load', () => {
    const graph = new NodeGraph({ category: NodeGraphCategory.DATA_FLOW });
    const constant = new ConstantNode(7);
    const plus = new PlusOneNode();
    graph.connect(constant.y, plus.x);
    constant.y.value = 7;

    const { graph: restored } = deserializeGraph(serializeGraph(graph, false), createTestRegistry());

    expect(restored?.findNode(plus.id)?.findInputPin('x')?.value).toBe(7);
    expect(restored?.findNode(constant.id)?.findOutputPin('y')?.value).toBe(7);
  });

  it('should leave out values that are not JSON data', () => {
    const graph = new NodeGraph({ category: NodeGraphCategory.DATA_FLOW });
    const display = new DisplayNode();
    graph.addNode(display);
    display.input.value = new Map([['k', 1]]);

    const [pin] = snapshotGraph(graph).nodes[0].inputs;

    expect(pin).toEqual({
      id: display.input.id,
      name: 'value',
      direction: 'input',
      dataType: 'any',
      isFlowPin: false,
    });
    expect(isSerializable({ list: [1, 'a', null] })).toBe(true);
    expect(isSerializable(Number.NaN)).toBe(false);
  });

  it('should restore dangling references and report them as warnings', () => {
    const json = wrap({
      id: 'g',
      name: 'loaded',
      category: 'ControlFlow',
      mainNodeId: 'missing',
      nodes: [
        {
          id: 'n1',
          type: 'test.start',
          name: 'entry',
          position: { x: 1, y: 2 },
          isEnabled: true,
          groupId: 'gone',
          inputs: [],
          outputs: [{ id: 'p1', name: 'Out', direction: 'output', dataType: 'any', isFlowPin: true }],
        },
        { id: 'n2', type: 'test.unknown', inputs: [], outputs: [] },
      ],
      connections: [{ id: 'c1', sourcePinId: 'p1', targetPinId: 'ghost' }],
      groups: [],
    });

    const { graph, errors, warnings } = deserializeGraph(json, createTestRegistry());

    expect(errors).toEqual([]);
    expect(warnings).toEqual([
      'Node n2 skipped: Unknown node type: test.unknown',
      'Connection c1 is unresolved',
      'Main node missing not found',
    ]);
    const entry = graph?.findNode('n1');
    expect(entry?.name).toBe('entry');
    expect(entry?.position).toEqual({ x: 1, y: 2 });
    expect(entry?.group).toBeUndefined();
    expect(entry?.outputPins[0].id).toBe('p1');
    expect(graph?.connections.map(connection => connection.isResolved)).toEqual([false]);
    expect(graph?.validate()).toBe(false);
  });

  it('should warn about stored pins the node type no longer has', () => {
    const json = wrap({
      id: 'g',
      category: 'ControlFlow',
      nodes: [
        {
          id: 'n1',
          type: 'test.start',
          inputs: [{ id: 'p0', name: 'Old', direction: 'input', isFlowPin: true }],
          outputs: [],
        },
      ],
    });

    const { warnings } = deserializeGraph(json, createTestRegistry());

    expect(warnings).toEqual(["Node n1 (test.start) has no input pin 'Old'"]);
  });

  describe('malformed input', () => {
    const registry = createTestRegistry();

    it.each([
      ['[]', 'Invalid file: expected a JSON object'],
      ['{"format":"other"}', 'Invalid file format: expected "pinflow-graph"'],
      ['{"format":"pinflow-graph","formatVersion":2}', 'Unsupported format version: 2 (expected 1)'],
      ['{"format":"pinflow-graph","formatVersion":1}', 'Missing graph data in file'],
      [wrap({ id: 'g', category: 'Other' }), 'Graph g: unknown category Other'],
      [wrap({ id: 'g', category: 'DataFlow', nodes: {} }), 'Graph field "nodes" must be an array'],
    ])('should reject %s', (json, message) => {
      const result = deserializeGraph(json, registry);

      expect(result.graph).toBeNull();
      expect(result.errors).toEqual([message]);
    });

    it('should report unparsable JSON', () => {
      const result = deserializeGraph('{not json', registry);

      expect(result.graph).toBeNull();
      expect(result.errors).toHaveLength(1);
      expect(result.errors[0]).toMatch(/^JSON parse error: /);
    });

    it('should reject duplicate ids', () => {
      const node = { id: 'n1', type: 'test.start', inputs: [], outputs: [] };

      const result = deserializeGraph(wrap({ id: 'g', category: 'ControlFlow', nodes: [node, node] }), registry);

      expect(result.graph).toBeNull();
      expect(result.errors).toEqual(['Duplicate node id: n1']);
    });
  });
});
