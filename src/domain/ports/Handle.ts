import type { Event, EventType } from '../model/Event.js';
import type { EventEnvelope } from '../model/EventEnvelope.js';

/**
 * Read-only handler bound to one event type.
 *
 * May be invoked concurrently for the same or different events, so it must
 * not depend on exclusive access to its own state.
 */
export interface Handle<T extends Event> {
  readonly eventType: EventType<T>;
  handle(event: T): void | Promise<void>;
}

/**
 * Mutating handler bound to one event type.
 *
 * The publisher holds an exclusive lock on the handler while `handleMut` runs,
 * including until a returned promise settles.
 */
export interface HandleMut<T extends Event> {
  readonly eventType: EventType<T>;
  handleMut(event: T): void | Promise<void>;
}

/** Type-erased read-only handler. Resolves `true` when the event matched and was delivered. */
export interface DynHandle {
  readonly eventType: EventType;
  dynHandle(envelope: EventEnvelope): Promise<boolean>;
}

/** Type-erased mutating handler. Resolves `true` when the event matched and was delivered. */
export interface DynHandleMut {
  readonly eventType: EventType;
  dynHandleMut(envelope: EventEnvelope): Promise<boolean>;
}
