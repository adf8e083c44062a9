import { EventName, EventPayload } from './DomainEvents';

/**
 * Event handler function type.
 */
export type EventHandler<K extends EventName> = (data: EventPayload<K>) => void | Promise<void>;

/**
 * Interface for event bus implementations.
 * Provides publish-subscribe pattern for domain events.
 */
export interface IEventBus {
  /**
   * Emit an event with data.
   * Resolves once every handler has settled; handler errors are logged, not rethrown.
   */
  emit<K extends EventName>(event: K, data: EventPayload<K>): Promise<void>;

  /**
   * Subscribe to an event.
   */
  on<K extends EventName>(event: K, handler: EventHandler<K>): void;

  /**
   * Unsubscribe from an event.
   */
  off<K extends EventName>(event: K, handler: EventHandler<K>): void;

  /**
   * Remove all listeners for an event.
   * @param event - Event name (optional - if not provided, removes all)
   */
  removeAllListeners(event?: EventName): void;

  /**
   * Get count of listeners for an event.
   */
  listenerCount(event: EventName): number;
}
