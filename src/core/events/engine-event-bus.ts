import { Logger } from '@nestjs/common';
import { toError } from '../errors';
import {
  EngineEvent,
  EngineEventHandler,
  EngineEventType,
  EventSubscription,
} from './engine-events';

/**
 * In-process bus for engine notices
 *
 * Supports multiple handlers per notice type plus catch-all handlers.
 * A failing handler is logged and never affects the emitter or the other
 * handlers.
 */
export class EngineEventBus {
  private readonly logger = new Logger(EngineEventBus.name);
  private handlers: Map<EngineEventType, Set<EngineEventHandler>> = new Map();
  private globalHandlers: Set<EngineEventHandler> = new Set();
  private subscriptionIdCounter = 0;

  /**
   * Register an event handler for a specific notice type
   */
  on(eventType: EngineEventType, handler: EngineEventHandler): EventSubscription {
    const subscriptionId = `sub_${++this.subscriptionIdCounter}`;

    let handlers = this.handlers.get(eventType);
    if (!handlers) {
      handlers = new Set();
      this.handlers.set(eventType, handlers);
    }
    handlers.add(handler);

    return {
      id: subscriptionId,
      unsubscribe: () => this.off(eventType, handler),
    };
  }

  /**
   * Register a handler for all notice types
   */
  onAll(handler: EngineEventHandler): EventSubscription {
    const subscriptionId = `sub_${++this.subscriptionIdCounter}`;
    this.globalHandlers.add(handler);

    return {
      id: subscriptionId,
      unsubscribe: () => {
        this.globalHandlers.delete(handler);
      },
    };
  }

  off(eventType: EngineEventType, handler: EngineEventHandler): void {
    const handlers = this.handlers.get(eventType);
    if (handlers) {
      handlers.delete(handler);
      if (handlers.size === 0) {
        this.handlers.delete(eventType);
      }
    }
  }

  removeAllHandlers(eventType?: EngineEventType): void {
    if (eventType) {
      this.handlers.delete(eventType);
    } else {
      this.handlers.clear();
      this.globalHandlers.clear();
    }
  }

  /**
   * Deliver a notice to every matching handler and wait for them.
   * Never rejects.
   */
  async emit(event: EngineEvent): Promise<void> {
    const allHandlers = [
      ...(this.handlers.get(event.type) ?? []),
      ...this.globalHandlers,
    ];

    const results = await Promise.allSettled(
      allHandlers.map(async (handler) => handler(event)),
    );

    for (const result of results) {
      if (result.status === 'rejected') {
        this.logger.error(
          `Handler for ${event.type} failed: ${toError(result.reason).message}`,
        );
      }
    }
  }

  hasHandlers(eventType: EngineEventType): boolean {
    return (
      (this.handlers.get(eventType)?.size ?? 0) > 0 ||
      this.globalHandlers.size > 0
    );
  }

  getHandlerCount(eventType?: EngineEventType): number {
    if (eventType) {
      return (this.handlers.get(eventType)?.size ?? 0) + this.globalHandlers.size;
    }

    let total = this.globalHandlers.size;
    for (const handlers of this.handlers.values()) {
      total += handlers.size;
    }
    return total;
  }
}
