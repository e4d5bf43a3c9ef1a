import { EventEmitter } from 'events';
import { IEventBus, EventHandler } from '../../domain/events/IEventBus';
import { EventName, EventPayload } from '../../domain/events/DomainEvents';
import { ILogger } from '../../domain/common/ILogger';

/**
 * In-memory event bus implementation using Node.js EventEmitter.
 * Provides async event emission with error handling.
 */
export class InMemoryEventBus implements IEventBus {
  private emitter: EventEmitter;
  private logger: ILogger;

  constructor(logger: ILogger) {
    this.emitter = new EventEmitter();
    this.logger = logger;

    // One listener per bridged event plus test and tool subscribers
    this.emitter.setMaxListeners(100);
  }

  /**
   * Emit an event with data.
   * Handlers are awaited together; a failing handler is logged and does
   * not affect the others.
   */
  async emit<K extends EventName>(event: K, data: EventPayload<K>): Promise<void> {
    this.logger.debug(`Event emitted: ${event}`, { event });

    // rawListeners keeps once() wrappers, so calling them also unregisters
    const listeners = this.emitter.rawListeners(event);

    const promises = listeners.map(async (listener) => {
      try {
        await listener(data);
      } catch (error) {
        this.logger.error(`Error in event handler for ${event}:`, error instanceof Error ? error : new Error(String(error)));
      }
    });

    await Promise.all(promises);
  }

  on<K extends EventName>(event: K, handler: EventHandler<EventPayload<K>>): void {
    this.emitter.on(event, handler);
    this.logger.debug(`Handler registered for: ${event}`);
  }

  off<K extends EventName>(event: K, handler: EventHandler<EventPayload<K>>): void {
    this.emitter.off(event, handler);
    this.logger.debug(`Handler removed for: ${event}`);
  }

  once<K extends EventName>(event: K, handler: EventHandler<EventPayload<K>>): void {
    this.emitter.once(event, handler);
    this.logger.debug(`One-time handler registered for: ${event}`);
  }

  /**
   * Remove all listeners for an event, or all events if not specified.
   */
  removeAllListeners(event?: EventName): void {
    if (event) {
      this.emitter.removeAllListeners(event);
      this.logger.debug(`All handlers removed for: ${event}`);
    } else {
      this.emitter.removeAllListeners();
      this.logger.debug('All handlers removed');
    }
  }

  listenerCount(event: EventName): number {
    return this.emitter.listenerCount(event);
  }
}
