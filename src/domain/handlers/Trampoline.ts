import type { Event, EventType } from '../model/Event.js';
import { duplicateEvent } from '../model/Event.js';
import type { EventEnvelope } from '../model/EventEnvelope.js';
import type { DynHandle, DynHandleMut, Handle, HandleMut } from '../ports/Handle.js';

/**
 * Erases the event type of a {@link Handle}.
 *
 * Events of any other runtime type are ignored. A throwing or rejecting
 * handler surfaces as a rejection of `dynHandle`.
 */
export class SharedTrampoline<T extends Event> implements DynHandle {
  readonly eventType: EventType<T>;

  constructor(private readonly inner: Handle<T>) {
    this.eventType = inner.eventType;
  }

  async dynHandle(envelope: EventEnvelope): Promise<boolean> {
    const event = envelope.downcast(this.eventType);
    if (event === undefined) return false;
    await this.inner.handle(duplicateEvent(event));
    return true;
  }
}

/**
 * Erases the event type of a {@link HandleMut}.
 *
 * Callers must not invoke the same instance concurrently; the publisher
 * guards each one with its own `HandlerLock`.
 */
export class ExclusiveTrampoline<T extends Event> implements DynHandleMut {
  readonly eventType: EventType<T>;

  constructor(private readonly inner: HandleMut<T>) {
    this.eventType = inner.eventType;
  }

  async dynHandleMut(envelope: EventEnvelope): Promise<boolean> {
    const event = envelope.downcast(this.eventType);
    if (event === undefined) return false;
    await this.inner.handleMut(duplicateEvent(event));
    return true;
  }
}
