import type { Node } from '../model/node';
import type { NodeGraph } from '../model/node-graph';
import { EngineEventType } from '../types/engine-hooks';
import { DataFlowResult, PinValues, RunStatus } from '../types/engine-result';
import { NodeGraphCategory } from '../types/graph-category';
import type { PinValue } from '../types/utils';
import { computeEvaluationOrder } from './evaluation-order';
import { GraphEngine } from './graph-engine';

/**
 * Declarative scheduler. Evaluates every node once in dependency order,
 * pulling connected inputs before a node runs and pushing its outputs after.
 *
 * The order is fixed before the first node runs, so a cycle fails the run
 * with no node evaluated. A faulting node fails the whole pass.
 */
export class DataFlowEngine extends GraphEngine<DataFlowResult> {
  readonly category = NodeGraphCategory.DATA_FLOW;

  async executeAsync(graph: NodeGraph, signal?: AbortSignal): Promise<DataFlowResult> {
    this.assertCategory(graph);
    if (graph.mainNodeId !== undefined) {
      this.resolveMainNode(graph, graph.mainNodeId);
    }

    const order = computeEvaluationOrder(graph);
    const evaluationOrder = order.map(node => node.id);

    const startedAt = Date.now();
    const context = this.createContext(graph, signal);
    const executed: Node[] = [];
    let status = RunStatus.COMPLETED;

    this.emit(EngineEventType.RUN_STARTED, graph.id, this.category);
    this.logger.logEvent('data-flow', 'run-started', { graphId: graph.id, nodes: order.length });

    for (let i = 0; i < order.length; i++) {
      if (signal?.aborted) {
        status = RunStatus.CANCELLED;
        break;
      }

      const node = order[i];
      this.pullInputs(graph, node);
      const ran = await this.runNode(graph, node, evaluationOrder.slice(0, i + 1), context);
      if (!ran) {
        continue;
      }
      this.pushOutputs(graph, node);
      executed.push(node);
    }

    return this.finishRun({
      category: NodeGraphCategory.DATA_FLOW,
      graphId: graph.id,
      status,
      executedNodeIds: executed.map(node => node.id),
      evaluationOrder,
      sinkOutputs: this.collectSinkOutputs(graph, executed),
      durationMs: Date.now() - startedAt,
    });
  }

  private pullInputs(graph: NodeGraph, node: Node): void {
    for (const pin of node.inputPins) {
      if (!pin.isFlowPin) {
        graph.getIncomingConnection(pin)?.transfer();
      }
    }
  }

  private pushOutputs(graph: NodeGraph, node: Node): void {
    for (const pin of node.outputPins) {
      if (pin.isFlowPin) {
        continue;
      }
      for (const connection of graph.getOutgoingConnections(pin)) {
        connection.transfer();
      }
    }
  }

  /**
   * A sink is an evaluated node whose data outputs feed no connection. It reports
   * its data output values, or its data input values when it has no data outputs.
   */
  private collectSinkOutputs(graph: NodeGraph, evaluated: readonly Node[]): Map<string, PinValues> {
    const sinks = new Map<string, PinValues>();
    for (const node of evaluated) {
      const dataOutputs = node.outputPins.filter(pin => !pin.isFlowPin);
      if (dataOutputs.some(pin => graph.getOutgoingConnections(pin).length > 0)) {
        continue;
      }

      const reported = dataOutputs.length > 0 ? dataOutputs : node.inputPins.filter(pin => !pin.isFlowPin);
      const values: Record<string, PinValue> = {};
      for (const pin of reported) {
        values[pin.name] = pin.value;
      }
      sinks.set(node.id, values);
    }
    return sinks;
  }
}
