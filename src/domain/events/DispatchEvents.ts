import type { HandlerFailure } from '../model/HandlerFailure.js';
import type { SubscriptionId } from '../model/Subscription.js';

/** Emitted when `publish()` begins, before any handler runs. */
export interface DispatchStartedEvent {
  readonly type: 'dispatch:started';
  readonly eventType: string;
  /** Subscriptions in the snapshot this publish walks. */
  readonly subscriptions: number;
  /** Maximum shared handler invocations in flight. */
  readonly concurrency: number;
  readonly timestamp: number;
}

/** Emitted when `publish()` settles with a result (not when it rejects). */
export interface DispatchCompletedEvent {
  readonly type: 'dispatch:completed';
  readonly eventType: string;
  /** Handlers whose declared type matched and that were invoked. */
  readonly delivered: number;
  readonly failed: number;
  readonly durationMs: number;
  readonly timestamp: number;
}

/** Emitted for each handler that throws or rejects. */
export interface HandlerFailedEvent {
  readonly type: 'handler:failed';
  readonly failure: HandlerFailure;
  readonly timestamp: number;
}

/** Emitted when a publish reaches an exclusive handler whose lock is poisoned. */
export interface HandlerPoisonedEvent {
  readonly type: 'handler:poisoned';
  readonly subscriptionId: SubscriptionId;
  readonly eventType: string;
  /** `true` when the publisher cleared the poison and invoked the handler anyway. */
  readonly recovered: boolean;
  readonly timestamp: number;
}

/** Discriminated union of all diagnostic events. */
export type DispatchEvent = DispatchStartedEvent | DispatchCompletedEvent | HandlerFailedEvent | HandlerPoisonedEvent;

/** Extract the `type` discriminator from the union. */
export type DispatchEventType = DispatchEvent['type'];

/** Look up the payload type for a given event type string. */
export type DispatchEventPayload<T extends DispatchEventType> = Extract<DispatchEvent, { type: T }>;

export function isDispatchEventOf<T extends DispatchEventType>(
  event: DispatchEvent,
  type: T,
): event is DispatchEventPayload<T> {
  return event.type === type;
}
