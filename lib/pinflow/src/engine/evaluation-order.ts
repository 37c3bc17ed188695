import type { Node } from '../model/node';
import type { NodeGraph } from '../model/node-graph';
import { CyclicDependencyError } from '../utils/errors';

/**
 * Nodes feeding the data inputs of each node. Flow pins and connections
 * from outside the graph are ignored.
 */
export function collectDataDependencies(graph: NodeGraph): Map<Node, Set<Node>> {
  const dependencies = new Map<Node, Set<Node>>();
  for (const node of graph.nodes) {
    const sources = new Set<Node>();
    for (const pin of node.inputPins) {
      if (pin.isFlowPin) {
        continue;
      }
      const source = graph.getIncomingConnection(pin)?.sourcePin?.parentNode;
      if (source && graph.hasNode(source)) {
        sources.add(source);
      }
    }
    dependencies.set(node, sources);
  }
  return dependencies;
}

/**
 * Topological order over data dependencies. Among nodes ready at the same
 * time the one added to the graph first wins.
 *
 * @throws CyclicDependencyError naming the nodes that can never become ready
 */
export function computeEvaluationOrder(graph: NodeGraph): Node[] {
  const dependencies = collectDataDependencies(graph);
  const pending = [...graph.nodes];
  const done = new Set<Node>();
  const order: Node[] = [];

  while (pending.length > 0) {
    const index = pending.findIndex(node => {
      const sources = dependencies.get(node);
      return !sources || [...sources].every(source => done.has(source));
    });

    if (index < 0) {
      throw new CyclicDependencyError(
        pending.map(node => node.id),
        graph.id
      );
    }

    const [node] = pending.splice(index, 1);
    done.add(node);
    order.push(node);
  }

  return order;
}
