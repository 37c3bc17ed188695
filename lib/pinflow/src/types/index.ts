/**
 * Types - Core type definitions
 */

// Model
export { NodeGraphCategory, isNodeGraphCategory } from './graph-category';
export { PinDirection, isPinDirection } from './pin-direction';
export { NodeState } from './node-state';
export type { Point, Size, Rect } from './geometry';
export type { GraphChange, GraphChangeType } from './graph-change';
export type { PinValue, Serializable } from './utils';

// Engine
export { DEFAULT_ENGINE_OPTIONS } from './engine-options';
export type { IEngineOptions } from './engine-options';
export { EngineEventType } from './engine-hooks';
export type { EngineEventHandlers, IEngineEvents, IHookManager, UnsubscribeFn } from './engine-hooks';
export { RunStatus, isControlFlowResult, isDataFlowResult } from './engine-result';
export type { ControlFlowResult, DataFlowResult, GraphRunResult, PinValues } from './engine-result';
export type { RunnerStats } from './engine-stats';

// Logging
export { LogLevel } from './logger';
export type { ILogger, LogMetadata } from './logger';
