/**
 * Minimal typed event hub
 */

import type { Logger } from './logger';

export type EventHandler<T> = (payload: T) => void;

export class EventHub<Events extends object> {
  private handlers: { [K in keyof Events]?: Set<EventHandler<Events[K]>> } = {};

  constructor(private readonly logger: Logger) {}

  on<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): void {
    let set = this.handlers[event];
    if (!set) {
      set = new Set<EventHandler<Events[K]>>();
      this.handlers[event] = set;
    }
    set.add(handler);
  }

  off<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): void {
    this.handlers[event]?.delete(handler);
  }

  /**
   * Call every handler; a throwing handler is logged and the rest still run
   */
  emit<K extends keyof Events>(event: K, payload: Events[K]): void {
    const set = this.handlers[event];
    if (!set) return;
    for (const handler of set) {
      try {
        handler(payload);
      } catch (error) {
        this.logger.error(`Error in ${String(event)} handler:`, error);
      }
    }
  }

  listenerCount<K extends keyof Events>(event: K): number {
    return this.handlers[event]?.size ?? 0;
  }
}
