import type { LevelWithSilent, Logger } from 'pino';
import type { Event, EventType } from './domain/model/Event.js';
import { eventTypeName } from './domain/model/Event.js';
import type { PublishResult } from './domain/model/HandlerFailure.js';
import { SubscriptionKind, type SubscriptionId } from './domain/model/Subscription.js';
import type { Handle, HandleMut } from './domain/ports/Handle.js';
import type { DispatchEvent, DispatchEventPayload, DispatchEventType } from './domain/events/DispatchEvents.js';
import { Handler, type HandlerFn } from './domain/handlers/Handler.js';
import { ExclusiveTrampoline, SharedTrampoline } from './domain/handlers/Trampoline.js';
import { PublisherConfigError } from './domain/errors/DispatchErrors.js';
import { PublisherContext, type PoisonPolicy } from './application/PublisherContext.js';
import { PublishEvent } from './application/usecases/PublishEvent.js';
import { createLogger } from './infrastructure/logging/createLogger.js';
import { availableParallelism } from './infrastructure/concurrency/availableParallelism.js';

/** Configuration for a publisher. */
export interface PublisherConfig {
  /**
   * Maximum number of shared handler invocations in flight during one `publish()`.
   * Must be a positive integer. Default: the host's available parallelism.
   */
  readonly maxConcurrency?: number;
  /**
   * What to do when an exclusive handler that faulted earlier is reached again.
   * `'fatal'` rejects `publish()` with `PoisonedHandlerError`; `'recover'` clears
   * the poison and invokes the handler. Default: `'fatal'`.
   */
  readonly poisonPolicy?: PoisonPolicy;
  /** Logger to use. Default: a pino logger named `fanout`. */
  readonly logger?: Logger;
  /** Level of the default logger. Ignored when `logger` is given. Default: `'silent'`. */
  readonly logLevel?: LevelWithSilent;
}

/**
 * Publishes events to every subscribed handler whose declared event type is
 * exactly the event's runtime type.
 *
 * @example
 * ```typescript
 * class GamePaused {}
 *
 * const publisher = new Publisher();
 * const id = publisher.subscribeWith(GamePaused, () => console.log('Game paused'));
 *
 * const result = await publisher.publish(new GamePaused());
 * if (!result.success) console.error(result.failures);
 *
 * publisher.unsubscribe(id);
 * ```
 */
export class Publisher {
  private readonly ctx: PublisherContext;

  constructor(config: PublisherConfig = {}) {
    this.ctx = new PublisherContext(
      resolveConcurrency(config.maxConcurrency),
      config.poisonPolicy ?? 'fatal',
      config.logger ?? createLogger({ level: config.logLevel }),
    );
  }

  /** Subscribe a read-only handler. Returns the id needed to `unsubscribe()` it. */
  subscribe<T extends Event>(handler: Handle<T>): SubscriptionId {
    const id = this.ctx.registry.addShared(new SharedTrampoline(handler));
    this.logSubscribed(id, SubscriptionKind.SHARED, handler.eventType);
    return id;
  }

  /** Subscribe a function to events of `type`. Returns the id needed to `unsubscribe()` it. */
  subscribeWith<T extends Event>(type: EventType<T>, fn: HandlerFn<T>): SubscriptionId {
    return this.subscribe(new Handler(type, fn));
  }

  /** Subscribe a handler that mutates its own state. Returns the id needed to `unsubscribeMut()` it. */
  subscribeMut<T extends Event>(handler: HandleMut<T>): SubscriptionId {
    const id = this.ctx.registry.addExclusive(new ExclusiveTrampoline(handler));
    this.logSubscribed(id, SubscriptionKind.EXCLUSIVE, handler.eventType);
    return id;
  }

  /** Remove a handler so it stops receiving events. Unknown ids are ignored. */
  unsubscribe(id: SubscriptionId): void {
    if (this.ctx.registry.remove(id)) {
      this.ctx.logger.debug({ subscriptionId: id }, 'Unsubscribed');
    }
  }

  /** Remove a mutating handler. Equivalent to `unsubscribe()`: ids are unique across kinds. */
  unsubscribeMut(id: SubscriptionId): void {
    this.unsubscribe(id);
  }

  /**
   * Publish an event to every subscribed handler.
   *
   * Resolves once every handler registered when the call began has finished
   * or faulted. Handler faults never reject; they are collected in
   * `result.failures`.
   *
   * @throws PoisonedHandlerError when an exclusive handler's lock is poisoned and
   * `poisonPolicy` is `'fatal'`.
   */
  async publish<T extends Event>(event: T): Promise<PublishResult> {
    return new PublishEvent(this.ctx).execute(event);
  }

  /**
   * Accept the current state of an exclusive handler that faulted earlier.
   * Returns `true` when its lock was poisoned.
   */
  recover(id: SubscriptionId): boolean {
    const subscription = this.ctx.registry.get(id);
    if (subscription?.kind !== SubscriptionKind.EXCLUSIVE) return false;
    const wasPoisoned = subscription.lock.recover();
    if (wasPoisoned) {
      this.ctx.logger.info({ subscriptionId: id }, 'Recovered poisoned exclusive handler');
    }
    return wasPoisoned;
  }

  has(id: SubscriptionId): boolean {
    return this.ctx.registry.has(id);
  }

  /** Number of current subscriptions of both kinds. */
  get size(): number {
    return this.ctx.registry.size;
  }

  /** Drop every subscription. Ids issued later still continue from the last one. */
  clear(): void {
    this.ctx.registry.clear();
  }

  /** Subscribe to a diagnostic event. Returns `this` for chaining. */
  on<T extends DispatchEventType>(type: T, listener: (event: DispatchEventPayload<T>) => void): this {
    this.ctx.diagnostics.on(type, listener);
    return this;
  }

  /** Subscribe to every diagnostic event. Returns `this` for chaining. */
  onAny(listener: (event: DispatchEvent) => void): this {
    this.ctx.diagnostics.onAny(listener);
    return this;
  }

  off<T extends DispatchEventType>(type: T, listener: (event: DispatchEventPayload<T>) => void): this {
    this.ctx.diagnostics.off(type, listener);
    return this;
  }

  offAny(listener: (event: DispatchEvent) => void): this {
    this.ctx.diagnostics.offAny(listener);
    return this;
  }

  private logSubscribed(id: SubscriptionId, kind: SubscriptionKind, type: EventType): void {
    this.ctx.logger.debug({ subscriptionId: id, kind, eventType: eventTypeName(type) }, 'Subscribed');
  }
}

function resolveConcurrency(maxConcurrency: number | undefined): number {
  if (maxConcurrency === undefined) return availableParallelism();
  if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
    throw new PublisherConfigError('maxConcurrency', `expected a positive integer, got ${String(maxConcurrency)}`);
  }
  return maxConcurrency;
}
