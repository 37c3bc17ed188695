import {
  EngineEventHandlers,
  EngineEventType,
  IHookManager,
  UnsubscribeFn,
} from '../types/engine-hooks';
import { getErrorMessage, isError } from '../utils/errors';
import { LoggerManager } from '../utils/logging';

type AnyEventHandler = EngineEventHandlers[keyof EngineEventHandlers];

/**
 * Multi-handler registry for engine events.
 * A throwing handler is logged and never interrupts the run that emitted the event.
 */
export class HookManager implements IHookManager {
  private readonly handlers = new Map<keyof EngineEventHandlers, Set<AnyEventHandler>>();

  constructor() {
    Object.values(EngineEventType).forEach(eventType => {
      this.handlers.set(eventType, new Set());
    });
  }

  public on<K extends keyof EngineEventHandlers>(
    eventType: K,
    handler: EngineEventHandlers[K]
  ): UnsubscribeFn {
    const handlers = this.handlers.get(eventType);

    if (!handlers) {
      LoggerManager.warn(`Attempt to subscribe to unknown event: ${String(eventType)}`);
      return () => {
        /* nothing registered */
      };
    }

    handlers.add(handler);
    return () => {
      handlers.delete(handler);
    };
  }

  public emit<K extends keyof EngineEventHandlers>(
    eventType: K,
    ...args: Parameters<EngineEventHandlers[K]>
  ): void {
    const handlers = this.handlers.get(eventType);
    if (!handlers || handlers.size === 0) {
      return;
    }

    handlers.forEach(handler => {
      try {
        Reflect.apply(handler, undefined, args);
      } catch (error) {
        LoggerManager.error(
          `Error in event handler ${String(eventType)}: ${getErrorMessage(error)}`,
          isError(error) ? error : undefined
        );
      }
    });
  }

  public clearEvent(eventType: keyof EngineEventHandlers): void {
    this.handlers.get(eventType)?.clear();
  }

  public clearAllEvents(): void {
    this.handlers.forEach(handlers => handlers.clear());
  }

  public hasHandlers(eventType: keyof EngineEventHandlers): boolean {
    const handlers = this.handlers.get(eventType);
    return !!handlers && handlers.size > 0;
  }
}
