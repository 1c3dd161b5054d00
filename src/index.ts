/**
 * tentative - optimistic state and Outcome utilities
 *
 * Apply a state change now, confirm it in the background, roll it back if
 * the confirmation fails.
 *
 * @example
 * ```typescript
 * import { OptimisticValue, success, failure } from 'tentative';
 *
 * const counter = new OptimisticValue(counterSource);
 * counter.stream.subscribe((n) => render(n));
 *
 * const outcome = await counter.update(
 *     () => api.increment().then(() => success(undefined), (e) => failure(e)),
 *     (n) => n + 1,
 * );
 * ```
 *
 * @packageDocumentation
 */

export { OptimisticValue } from './core/OptimisticValue';
export type { OptimisticTask, OptimisticUpdater } from './core/OptimisticValue';

// Outcome
export { Success, Failure, success, failure, attempt } from './outcome/Outcome';
export type { Outcome, OutcomeHandlers } from './outcome/Outcome';
export { AsyncOutcome } from './outcome/AsyncOutcome';
export type { Task } from './outcome/AsyncOutcome';
export { waitAll, waitAllOrFirstError, firstSuccess, settle, runTask } from './outcome/tasks';
export type { PendingOutcome } from './outcome/tasks';

// Optional
export { Present, Absent, present, absent, fromNullable } from './optional/Optional';
export type { Optional, OptionalHandlers } from './optional/Optional';
export { AsyncOptional } from './optional/AsyncOptional';

// Streams
export { Channel } from './stream/Channel';
export { subscribeTo, isSubscribable } from './stream/source';

// Helpers
export { ListReplacer, upsert } from './collections/ListReplacer';
export {
    CompositeSpecification,
    AndSpecification,
    OrSpecification,
    NotSpecification,
    spec,
    check,
} from './rules/Specification';
export type { Specification } from './rules/Specification';
export { Entity } from './entity/Entity';
export type { EntityInit } from './entity/Entity';
export { parallelSetup, sequentialSetup, runSetup } from './setup/setup';
export type { SetupTask } from './setup/setup';

// Types
export type {
    Observer,
    Subscribable,
    Source,
    Stream,
    Unsubscribe,
    OptimisticValueOptions,
} from './types';

// Errors
export {
    TentativeError,
    ConfigurationError,
    StateUninitializedError,
    UnwrapError,
    TimeoutError,
    EmptyInputError,
    AllTasksFailedError,
    SetupError,
    toError,
} from './errors';

// Logging
export { Logger, LogLevel, logger } from './utils/Logger';
export { parseOptions } from './validation';
