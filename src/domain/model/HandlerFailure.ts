import type { SubscriptionId, SubscriptionKind } from './Subscription.js';

/** A single handler's abnormal termination during `publish()`. */
export interface HandlerFailure {
  readonly subscriptionId: SubscriptionId;
  readonly kind: SubscriptionKind;
  /** Name of the published event's type. */
  readonly eventType: string;
  /** Whatever the handler threw or rejected with. */
  readonly error: unknown;
  readonly message: string;
}

/**
 * Outcome of `publish()`.
 *
 * `failures` lists one record per faulted handler, in completion order.
 */
export type PublishResult =
  | { readonly success: true; readonly failures: readonly [] }
  | { readonly success: false; readonly failures: readonly HandlerFailure[] };

export function succeeded(): PublishResult {
  return { success: true, failures: [] };
}

export function failed(failures: readonly HandlerFailure[]): PublishResult {
  return { success: false, failures };
}

export function toPublishResult(failures: readonly HandlerFailure[]): PublishResult {
  return failures.length === 0 ? succeeded() : failed(failures);
}

/** Build a failure record from a caught value. */
export function handlerFailure(
  subscriptionId: SubscriptionId,
  kind: SubscriptionKind,
  eventType: string,
  error: unknown,
): HandlerFailure {
  return {
    subscriptionId,
    kind,
    eventType,
    error,
    message: describeError(error),
  };
}

/**
 * Printable form of a thrown value. Never throws: values whose `message`
 * getter or string conversion throws fall back to their `[object Tag]` form.
 */
export function describeError(error: unknown): string {
  try {
    return error instanceof Error ? String(error.message) : String(error);
  } catch {
    return fallbackDescription(error);
  }
}

function fallbackDescription(error: unknown): string {
  try {
    return Object.prototype.toString.call(error);
  } catch {
    return '[unprintable error]';
  }
}
