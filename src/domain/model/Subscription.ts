import type { DynHandle, DynHandleMut } from '../ports/Handle.js';
import type { HandlerLock } from '../services/HandlerLock.js';

/** Identifier returned by `subscribe()`. Strictly increasing from `1`, never reused. */
export type SubscriptionId = number;

export const SubscriptionKind = {
  SHARED: 'shared',
  EXCLUSIVE: 'exclusive',
} as const;

export type SubscriptionKind = (typeof SubscriptionKind)[keyof typeof SubscriptionKind];

/** Read-only handler entry. Invoked concurrently with other shared entries. */
export interface SharedSubscription {
  readonly id: SubscriptionId;
  readonly kind: typeof SubscriptionKind.SHARED;
  readonly handler: DynHandle;
}

/** Mutating handler entry. Invoked only while holding its own lock. */
export interface ExclusiveSubscription {
  readonly id: SubscriptionId;
  readonly kind: typeof SubscriptionKind.EXCLUSIVE;
  readonly handler: DynHandleMut;
  readonly lock: HandlerLock;
}

export type Subscription = SharedSubscription | ExclusiveSubscription;
