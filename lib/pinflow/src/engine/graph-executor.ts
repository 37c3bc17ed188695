import type { NodeGraph } from '../model/node-graph';
import type { IEngineEvents } from '../types/engine-hooks';
import type { IEngineOptions } from '../types/engine-options';
import type { GraphRunResult } from '../types/engine-result';
import { NodeGraphCategory } from '../types/graph-category';
import { GraphPreconditionError } from '../utils/errors';
import { ControlFlowEngine } from './control-flow-engine';
import { DataFlowEngine } from './data-flow-engine';

/**
 * Selects the engine matching the graph category
 */
export class GraphExecutor {
  private readonly controlFlow: ControlFlowEngine;
  private readonly dataFlow: DataFlowEngine;

  constructor(options: IEngineOptions = {}, events?: IEngineEvents) {
    this.controlFlow = new ControlFlowEngine(options, events);
    this.dataFlow = new DataFlowEngine(options, events);
  }

  executeAsync(graph: NodeGraph, signal?: AbortSignal): Promise<GraphRunResult> {
    switch (graph.category) {
      case NodeGraphCategory.CONTROL_FLOW:
        return this.controlFlow.executeAsync(graph, signal);
      case NodeGraphCategory.DATA_FLOW:
        return this.dataFlow.executeAsync(graph, signal);
      default: {
        const category: never = graph.category;
        return Promise.reject(
          new GraphPreconditionError(`Unknown graph category: ${String(category)}`, graph.id)
        );
      }
    }
  }
}
