import type { Event } from '../../domain/model/Event.js';
import { eventTypeName } from '../../domain/model/Event.js';
import { EventEnvelope } from '../../domain/model/EventEnvelope.js';
import type { HandlerFailure, PublishResult } from '../../domain/model/HandlerFailure.js';
import { handlerFailure, toPublishResult } from '../../domain/model/HandlerFailure.js';
import {
  SubscriptionKind,
  type ExclusiveSubscription,
  type SharedSubscription,
} from '../../domain/model/Subscription.js';
import { PoisonedHandlerError } from '../../domain/errors/DispatchErrors.js';
import type { PublisherContext } from '../PublisherContext.js';

type InvocationOutcome =
  | { readonly status: 'delivered' }
  | { readonly status: 'skipped' }
  | { readonly status: 'failed'; readonly failure: HandlerFailure };

const DELIVERED: InvocationOutcome = { status: 'delivered' };
const SKIPPED: InvocationOutcome = { status: 'skipped' };

/**
 * Use case: fan one event out to every subscription registered when the call begins.
 *
 * Shared handlers run as independent units, at most `maxConcurrency` in flight;
 * when the budget is used up the oldest unit is awaited before the next one
 * starts. Exclusive handlers run in line, in registry order, each under its own
 * lock. A poisoned lock under the `'fatal'` policy stops scheduling, waits for
 * the shared units already started and rejects with `PoisonedHandlerError`.
 */
export class PublishEvent {
  constructor(private readonly ctx: PublisherContext) {}

  async execute(event: Event): Promise<PublishResult> {
    const envelope = new EventEnvelope(event);
    const subscriptions = this.ctx.registry.snapshot();
    const startedAt = Date.now();
    const failures: HandlerFailure[] = [];
    let delivered = 0;

    const record = (outcome: InvocationOutcome): void => {
      if (outcome.status === 'delivered') {
        delivered++;
      } else if (outcome.status === 'failed') {
        failures.push(outcome.failure);
        this.reportFailure(outcome.failure);
      }
    };

    this.ctx.diagnostics.emit({
      type: 'dispatch:started',
      eventType: envelope.typeName,
      subscriptions: subscriptions.length,
      concurrency: this.ctx.maxConcurrency,
      timestamp: startedAt,
    });

    const inFlight: Promise<void>[] = [];
    try {
      for (const subscription of subscriptions) {
        if (subscription.kind === SubscriptionKind.SHARED) {
          if (inFlight.length >= this.ctx.maxConcurrency) {
            await inFlight.shift();
          }
          inFlight.push(this.runShared(subscription, envelope).then(record));
        } else {
          record(await this.runExclusive(subscription, envelope));
        }
      }
    } finally {
      await Promise.all(inFlight);
    }

    this.ctx.diagnostics.emit({
      type: 'dispatch:completed',
      eventType: envelope.typeName,
      delivered,
      failed: failures.length,
      durationMs: Date.now() - startedAt,
      timestamp: Date.now(),
    });

    return toPublishResult(failures);
  }

  private async runShared(subscription: SharedSubscription, envelope: EventEnvelope): Promise<InvocationOutcome> {
    try {
      return (await subscription.handler.dynHandle(envelope)) ? DELIVERED : SKIPPED;
    } catch (error) {
      return {
        status: 'failed',
        failure: handlerFailure(subscription.id, subscription.kind, envelope.typeName, error),
      };
    }
  }

  private async runExclusive(
    subscription: ExclusiveSubscription,
    envelope: EventEnvelope,
  ): Promise<InvocationOutcome> {
    const release = await subscription.lock.acquire();
    try {
      this.checkPoison(subscription);
      try {
        return (await subscription.handler.dynHandleMut(envelope)) ? DELIVERED : SKIPPED;
      } catch (error) {
        subscription.lock.poison(error);
        return {
          status: 'failed',
          failure: handlerFailure(subscription.id, subscription.kind, envelope.typeName, error),
        };
      }
    } finally {
      release();
    }
  }

  private checkPoison(subscription: ExclusiveSubscription): void {
    const { lock } = subscription;
    if (!lock.poisoned) return;

    const eventType = eventTypeName(subscription.handler.eventType);
    const recovered = this.ctx.poisonPolicy === 'recover';
    const logFields = { subscriptionId: subscription.id, eventType, err: lock.cause };

    this.ctx.diagnostics.emit({
      type: 'handler:poisoned',
      subscriptionId: subscription.id,
      eventType,
      recovered,
      timestamp: Date.now(),
    });

    if (recovered) {
      this.ctx.logger.warn(logFields, 'Recovering poisoned exclusive handler');
      lock.recover();
      return;
    }

    this.ctx.logger.error(logFields, 'Exclusive handler is poisoned');
    throw new PoisonedHandlerError(subscription.id, eventType, lock.cause);
  }

  private reportFailure(failure: HandlerFailure): void {
    this.ctx.logger.warn(
      {
        subscriptionId: failure.subscriptionId,
        kind: failure.kind,
        eventType: failure.eventType,
        err: failure.error,
      },
      'Handler failed',
    );
    this.ctx.diagnostics.emit({ type: 'handler:failed', failure, timestamp: Date.now() });
  }
}
