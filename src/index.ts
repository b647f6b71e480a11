// Main entry point
export { Publisher } from './Publisher.js';
export type { PublisherConfig } from './Publisher.js';
export type { PoisonPolicy } from './application/PublisherContext.js';

// Events
export type { Event, EventType, Cloneable } from './domain/model/Event.js';
export { isEventOf, isCloneable, duplicateEvent, eventTypeName } from './domain/model/Event.js';
export { EventEnvelope } from './domain/model/EventEnvelope.js';
export type { ErasedEvent } from './domain/model/EventEnvelope.js';

// Handlers
export type { Handle, HandleMut, DynHandle, DynHandleMut } from './domain/ports/Handle.js';
export { Handler } from './domain/handlers/Handler.js';
export type { HandlerFn } from './domain/handlers/Handler.js';
export { SharedTrampoline, ExclusiveTrampoline } from './domain/handlers/Trampoline.js';

// Subscriptions and results
export { SubscriptionKind } from './domain/model/Subscription.js';
export type {
  SubscriptionId,
  Subscription,
  SharedSubscription,
  ExclusiveSubscription,
} from './domain/model/Subscription.js';
export type { HandlerFailure, PublishResult } from './domain/model/HandlerFailure.js';
export { succeeded, failed, toPublishResult, handlerFailure } from './domain/model/HandlerFailure.js';
export { HandlerLock } from './domain/services/HandlerLock.js';
export type { ReleaseFn } from './domain/services/HandlerLock.js';

// Errors
export { DispatchError, PoisonedHandlerError, PublisherConfigError } from './domain/errors/DispatchErrors.js';

// Diagnostic events
export type {
  DispatchEvent,
  DispatchEventType,
  DispatchEventPayload,
  DispatchStartedEvent,
  DispatchCompletedEvent,
  HandlerFailedEvent,
  HandlerPoisonedEvent,
} from './domain/events/DispatchEvents.js';

// Infrastructure
export { createLogger } from './infrastructure/logging/createLogger.js';
export type { LoggerOptions } from './infrastructure/logging/createLogger.js';
export { availableParallelism } from './infrastructure/concurrency/availableParallelism.js';
