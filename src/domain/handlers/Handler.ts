import type { Event, EventType } from '../model/Event.js';
import type { Handle } from '../ports/Handle.js';

/** Function form of a read-only handler. */
export type HandlerFn<T extends Event> = (event: T) => void | Promise<void>;

/**
 * Adapts a plain function to {@link Handle}.
 *
 * @example
 * ```typescript
 * const onWarning = new Handler(Warning, (event) => console.warn(event.message));
 * publisher.subscribe(onWarning);
 * ```
 */
export class Handler<T extends Event> implements Handle<T> {
  constructor(
    readonly eventType: EventType<T>,
    private readonly fn: HandlerFn<T>,
  ) {}

  handle(event: T): void | Promise<void> {
    return this.fn(event);
  }
}
