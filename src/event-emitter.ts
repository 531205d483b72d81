/**
 * Simple event emitter implementation for the sync engine
 */

import type { EventEmitter, SyncEvents } from './interfaces';
import { errorFields, logger as defaultLogger, type Logger } from './logger';

type Listener<K extends keyof SyncEvents> = (data: SyncEvents[K]) => void;
type ListenerMap = { [K in keyof SyncEvents]?: Set<Listener<K>> };

export class SyncEventEmitter implements EventEmitter {
  private listeners: ListenerMap = {};

  constructor(private readonly logger: Logger = defaultLogger) {}

  on<K extends keyof SyncEvents>(event: K, listener: Listener<K>): () => void {
    const existing: Set<Listener<K>> | undefined = this.listeners[event];
    const eventListeners: Set<Listener<K>> = existing ?? new Set<Listener<K>>();
    if (!existing) {
      this.listeners[event] = eventListeners;
    }

    eventListeners.add(listener);

    // Return unsubscribe function
    return () => {
      this.off(event, listener);
    };
  }

  emit<K extends keyof SyncEvents>(event: K, data: SyncEvents[K]): void {
    const eventListeners: Set<Listener<K>> | undefined = this.listeners[event];
    if (!eventListeners) return;

    for (const listener of [...eventListeners]) {
      try {
        listener(data);
      } catch (error) {
        this.logger.error(`Error in event listener for ${event}`, { error: errorFields(error) });
      }
    }
  }

  off<K extends keyof SyncEvents>(event: K, listener: Listener<K>): void {
    const eventListeners: Set<Listener<K>> | undefined = this.listeners[event];
    if (eventListeners) {
      eventListeners.delete(listener);
      if (eventListeners.size === 0) {
        delete this.listeners[event];
      }
    }
  }

  removeAllListeners<K extends keyof SyncEvents>(event?: K): void {
    if (event) {
      delete this.listeners[event];
    } else {
      this.listeners = {};
    }
  }

  // Utility method to get listener count for testing
  listenerCount<K extends keyof SyncEvents>(event: K): number {
    const eventListeners: Set<Listener<K>> | undefined = this.listeners[event];
    return eventListeners?.size ?? 0;
  }
}
