import type { Event, EventType } from './Event.js';
import { eventTypeName, isEventOf } from './Event.js';

/** Type-erased view of a published event. */
export interface ErasedEvent {
  readonly type: EventType;
  readonly event: Event;
}

/**
 * Wraps one published event behind a uniform interface.
 *
 * Created once per `publish()` call and shared read-only by every handler
 * invocation of that call.
 */
export class EventEnvelope {
  readonly type: EventType;
  readonly typeName: string;
  private readonly event: Event;

  constructor(event: Event) {
    this.event = event;
    this.type = runtimeTypeOf(event);
    this.typeName = eventTypeName(this.type);
  }

  asAny(): ErasedEvent {
    return { type: this.type, event: this.event };
  }

  /** The event narrowed to `T`, or `undefined` when its runtime type is not exactly `type`. */
  downcast<T extends Event>(type: EventType<T>): T | undefined {
    return isEventOf(this.event, type) ? this.event : undefined;
  }
}

function runtimeTypeOf(event: Event): EventType {
  const proto: unknown = Object.getPrototypeOf(event);
  const ctor: unknown = typeof proto === 'object' && proto !== null ? proto.constructor : undefined;
  if (!isEventType(ctor) || proto !== ctor.prototype) {
    throw new TypeError('Published events must be class instances or plain objects');
  }
  return ctor;
}

function isEventType(value: unknown): value is EventType {
  return typeof value === 'function' && typeof value.prototype === 'object' && value.prototype !== null;
}
