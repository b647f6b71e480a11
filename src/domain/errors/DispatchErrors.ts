import type { SubscriptionId } from '../model/Subscription.js';

/** Base class for errors raised by the publisher itself (never by handlers). */
export class DispatchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DispatchError';
  }
}

/**
 * Raised by `publish()` when an exclusive handler's lock was poisoned by an
 * earlier fault and the publisher's `poisonPolicy` is `'fatal'`.
 *
 * `cause` holds the error that poisoned the lock.
 */
export class PoisonedHandlerError extends DispatchError {
  readonly subscriptionId: SubscriptionId;
  readonly eventType: string;

  constructor(subscriptionId: SubscriptionId, eventType: string, cause: unknown) {
    super(
      `Exclusive handler ${String(subscriptionId)} for ${eventType} is poisoned by an earlier fault. Call recover(${String(subscriptionId)}) to accept its current state.`,
      { cause },
    );
    this.name = 'PoisonedHandlerError';
    this.subscriptionId = subscriptionId;
    this.eventType = eventType;
  }
}

export class PublisherConfigError extends DispatchError {
  readonly option: string;

  constructor(option: string, message: string) {
    super(`Invalid publisher option '${option}': ${message}`);
    this.name = 'PublisherConfigError';
    this.option = option;
  }
}
