import type { DynHandle, DynHandleMut } from '../domain/ports/Handle.js';
import { SubscriptionKind, type Subscription, type SubscriptionId } from '../domain/model/Subscription.js';
import { HandlerLock } from '../domain/services/HandlerLock.js';

/**
 * Subscriptions keyed by id.
 *
 * One counter serves both kinds, so an id identifies an entry regardless of
 * its kind. Ids are never reused, including after `remove()` and `clear()`.
 */
export class SubscriptionRegistry {
  private readonly entries = new Map<SubscriptionId, Subscription>();
  private lastId: SubscriptionId = 0;

  get size(): number {
    return this.entries.size;
  }

  addShared(handler: DynHandle): SubscriptionId {
    const id = this.nextId();
    this.entries.set(id, { id, kind: SubscriptionKind.SHARED, handler });
    return id;
  }

  addExclusive(handler: DynHandleMut): SubscriptionId {
    const id = this.nextId();
    this.entries.set(id, { id, kind: SubscriptionKind.EXCLUSIVE, handler, lock: new HandlerLock() });
    return id;
  }

  get(id: SubscriptionId): Subscription | undefined {
    return this.entries.get(id);
  }

  has(id: SubscriptionId): boolean {
    return this.entries.has(id);
  }

  /** Returns `true` when an entry was removed. Unknown ids are ignored. */
  remove(id: SubscriptionId): boolean {
    return this.entries.delete(id);
  }

  clear(): void {
    this.entries.clear();
  }

  /** Entries as of now, in registry order. Later changes do not affect the returned array. */
  snapshot(): readonly Subscription[] {
    return [...this.entries.values()];
  }

  private nextId(): SubscriptionId {
    this.lastId += 1;
    return this.lastId;
  }
}
