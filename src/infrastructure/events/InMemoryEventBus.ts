import { EventEmitter } from 'events';
import { IEventBus, EventHandler } from '../../domain/events/IEventBus';
import { EventName, EventPayload } from '../../domain/events/DomainEvents';
import { ILogger } from '../../domain/common/ILogger';
import { toError } from '../../domain/common/Errors';

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

    this.emitter.setMaxListeners(100);
  }

  /**
   * Emit an event with data.
   * Handlers are called asynchronously and errors are caught.
   */
  async emit<K extends EventName>(event: K, data: EventPayload<K>): Promise<void> {
    this.logger.debug(`Event emitted: ${event}`, { event });

    const listeners = this.emitter.listeners(event);

    const promises = listeners.map(async (listener) => {
      try {
        await listener(data);
      } catch (error) {
        this.logger.error(`Error in event handler for ${event}:`, toError(error));
      }
    });

    await Promise.all(promises);
  }

  on<K extends EventName>(event: K, handler: EventHandler<K>): void {
    this.emitter.on(event, handler);
    this.logger.debug(`Handler registered for: ${event}`);
  }

  off<K extends EventName>(event: K, handler: EventHandler<K>): void {
    this.emitter.off(event, handler);
    this.logger.debug(`Handler removed for: ${event}`);
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
