import type { Logger } from 'pino';
import type {
  DispatchEvent,
  DispatchEventPayload,
  DispatchEventType,
} from '../domain/events/DispatchEvents.js';
import { isDispatchEventOf } from '../domain/events/DispatchEvents.js';

type DiagnosticListener<T extends DispatchEventType> = (event: DispatchEventPayload<T>) => void;

type WildcardListener = (event: DispatchEvent) => void;

/**
 * Typed bus for the publisher's own diagnostic events. Subscribe with `on()`,
 * publish with `emit()`. Listener errors are logged and never reach the
 * dispatch path.
 */
export class DiagnosticsBus {
  private readonly listeners = new Map<DispatchEventType, Map<unknown, WildcardListener>>();
  private readonly wildcardListeners = new Set<WildcardListener>();

  constructor(private readonly logger: Logger) {}

  on<T extends DispatchEventType>(type: T, listener: DiagnosticListener<T>): void {
    const existing = this.listeners.get(type) ?? new Map<unknown, WildcardListener>();
    existing.set(listener, (event) => {
      if (isDispatchEventOf(event, type)) listener(event);
    });
    this.listeners.set(type, existing);
  }

  onAny(listener: WildcardListener): void {
    this.wildcardListeners.add(listener);
  }

  off<T extends DispatchEventType>(type: T, listener: DiagnosticListener<T>): void {
    this.listeners.get(type)?.delete(listener);
  }

  offAny(listener: WildcardListener): void {
    this.wildcardListeners.delete(listener);
  }

  emit(event: DispatchEvent): void {
    const typed = this.listeners.get(event.type);
    if (typed) {
      for (const listener of typed.values()) {
        this.deliver(listener, event);
      }
    }

    for (const listener of this.wildcardListeners) {
      this.deliver(listener, event);
    }
  }

  private deliver(listener: WildcardListener, event: DispatchEvent): void {
    try {
      listener(event);
    } catch (err) {
      this.logger.error({ err, diagnostic: event.type }, 'Diagnostic listener threw');
    }
  }
}
