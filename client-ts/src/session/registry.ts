import { randomUUID } from 'node:crypto';
import { ACK_MODE } from '../protocol/frames';
import type { AckMode, Frame } from '../protocol/frames';

export type MessageCallback = (body: string | undefined, frame: Frame) => void;

export interface Subscription {
  id: string;
  destination: string;
  ackMode: AckMode;
  callback: MessageCallback;
}

/**
 * Destination -> subscription. One subscription per destination; registering
 * again replaces the previous one.
 */
export class SubscriptionRegistry {
  private readonly entries = new Map<string, Subscription>();
  private counter = 0;

  register(destination: string, callback: MessageCallback): Subscription {
    const subscription: Subscription = {
      id: this.nextId(),
      destination,
      ackMode: ACK_MODE,
      callback,
    };
    this.entries.set(destination, subscription);
    return subscription;
  }

  resolve(destination: string): Subscription | undefined {
    return this.entries.get(destination);
  }

  /**
   * Remove the entry for `destination`. With `id`, only if it is still the
   * current subscription there.
   */
  unregister(destination: string, id?: string): boolean {
    const current = this.entries.get(destination);
    if (!current || (id !== undefined && current.id !== id)) {
      return false;
    }
    return this.entries.delete(destination);
  }

  list(): Subscription[] {
    return [...this.entries.values()];
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }

  private nextId(): string {
    return `sub-${++this.counter}-${randomUUID().slice(0, 8)}`;
  }
}
