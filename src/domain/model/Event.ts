/**
 * Marker for values that can be published.
 *
 * An event's class is its runtime type identity. Fields should be `readonly`:
 * one instance is shared by every handler that receives it unless the event
 * is {@link Cloneable}, in which case each handler gets its own copy.
 */
export type Event = object;

/** An event that produces independent copies of itself. */
export interface Cloneable {
  clone(): this;
}

/** The class of an event, used as its runtime type tag. */
export type EventType<T extends Event = Event> = abstract new (...args: never[]) => T;

/** `true` when `value` is an instance of exactly `type` (subclasses do not match). */
export function isEventOf<T extends Event>(value: Event, type: EventType<T>): value is T {
  return Object.getPrototypeOf(value) === type.prototype;
}

export function isCloneable<T extends Event>(event: T): event is T & Cloneable {
  return 'clone' in event && typeof event.clone === 'function';
}

/** Copy an event for a single handler invocation. */
export function duplicateEvent<T extends Event>(event: T): T {
  return isCloneable(event) ? event.clone() : event;
}

/** Printable name of an event type, for logs and failure records. */
export function eventTypeName(type: EventType): string {
  return type.name || 'AnonymousEvent';
}
