import type { Node } from '../model/node';
import type { NodeGraph } from '../model/node-graph';
import { EngineEventType } from '../types/engine-hooks';
import { ControlFlowResult, RunStatus } from '../types/engine-result';
import { NodeGraphCategory } from '../types/graph-category';
import {
  GraphPreconditionError,
  NodeExecutionError,
  StepLimitExceededError,
  isNodeExecutionError,
} from '../utils/errors';
import { GraphEngine } from './graph-engine';

/**
 * Pending visit. The parent chain gives the entry-to-node path.
 */
interface Frame {
  readonly node: Node;
  readonly parent: Frame | undefined;
}

function pathOf(frame: Frame): string[] {
  const path: string[] = [];
  for (let current: Frame | undefined = frame; current; current = current.parent) {
    path.push(current.node.id);
  }
  return path.reverse();
}

/**
 * Imperative scheduler. Starts at the main node and follows fired flow outputs
 * depth first: a target and its whole continuation run before the next sibling.
 *
 * Nodes may be revisited (loops); `maxSteps` and `maxVisitsPerNode` bound the run.
 * A faulting node ends its own path only.
 */
export class ControlFlowEngine extends GraphEngine<ControlFlowResult> {
  readonly category = NodeGraphCategory.CONTROL_FLOW;

  async executeAsync(graph: NodeGraph, signal?: AbortSignal): Promise<ControlFlowResult> {
    this.assertCategory(graph);
    if (graph.mainNodeId === undefined) {
      throw new GraphPreconditionError(`Graph ${graph.id} has no main node`, graph.id);
    }
    const entry = this.resolveMainNode(graph, graph.mainNodeId);

    const startedAt = Date.now();
    const context = this.createContext(graph, signal);
    const executed: string[] = [];
    const errors: NodeExecutionError[] = [];
    const visits = new Map<Node, number>();
    const stack: Frame[] = [{ node: entry, parent: undefined }];
    let steps = 0;
    let status = RunStatus.COMPLETED;

    this.emit(EngineEventType.RUN_STARTED, graph.id, this.category);
    this.logger.logEvent('control-flow', 'run-started', { graphId: graph.id, entryNodeId: entry.id });

    while (stack.length > 0) {
      if (signal?.aborted) {
        status = RunStatus.CANCELLED;
        break;
      }

      const frame = stack.pop();
      if (!frame) {
        break;
      }
      const { node } = frame;

      const nodeVisits = visits.get(node) ?? 0;
      if (steps >= this.options.maxSteps || nodeVisits >= this.options.maxVisitsPerNode) {
        this.emit(EngineEventType.STEP_LIMIT_REACHED, { graphId: graph.id, nodeId: node.id, steps });
        const message = `Step limit reached at node ${node.id} after ${steps} steps`;
        if (this.options.failOnStepLimit) {
          throw new StepLimitExceededError(message, node.id, steps, graph.id);
        }
        this.logger.warn(message);
        status = RunStatus.STEP_LIMIT_REACHED;
        break;
      }

      const path = pathOf(frame);
      let ran: boolean;
      try {
        ran = await this.runNode(graph, node, path, context);
      } catch (error) {
        if (!isNodeExecutionError(error)) {
          throw error;
        }
        // The failing node's continuations are dropped, siblings already on the stack still run
        errors.push(error);
        steps++;
        visits.set(node, nodeVisits + 1);
        continue;
      }

      if (!ran) {
        continue;
      }
      steps++;
      visits.set(node, nodeVisits + 1);
      executed.push(node.id);

      const next: Frame[] = [];
      for (const pin of node.getFiredFlowOutputs()) {
        if (!pin.isFlowPin) {
          continue;
        }
        for (const connection of graph.getOutgoingConnections(pin)) {
          const target = connection.targetPin?.parentNode;
          if (target && graph.hasNode(target)) {
            next.push({ node: target, parent: frame });
          }
        }
      }
      for (let i = next.length - 1; i >= 0; i--) {
        stack.push(next[i]);
      }
    }

    if (status === RunStatus.COMPLETED && errors.length > 0) {
      status = RunStatus.FAULTED;
    }

    return this.finishRun({
      category: NodeGraphCategory.CONTROL_FLOW,
      graphId: graph.id,
      status,
      executedNodeIds: executed,
      steps,
      errors,
      durationMs: Date.now() - startedAt,
    });
  }
}
