import type { Logger } from 'pino';
import { DiagnosticsBus } from './DiagnosticsBus.js';
import { SubscriptionRegistry } from './SubscriptionRegistry.js';

/** What `publish()` does when it reaches an exclusive handler whose lock is poisoned. */
export type PoisonPolicy = 'fatal' | 'recover';

/**
 * State shared by the use cases of one `Publisher`.
 *
 * Internal: not exported from the public API.
 */
export class PublisherContext {
  readonly registry = new SubscriptionRegistry();
  readonly diagnostics: DiagnosticsBus;

  constructor(
    readonly maxConcurrency: number,
    readonly poisonPolicy: PoisonPolicy,
    readonly logger: Logger,
  ) {
    this.diagnostics = new DiagnosticsBus(logger);
  }
}
