import { StateUninitializedError, toError } from '../errors';
import { absent, present, type Optional } from '../optional/Optional';
import { AsyncOutcome } from '../outcome/AsyncOutcome';
import { failure, type Outcome } from '../outcome/Outcome';
import { runTask, type PendingOutcome } from '../outcome/tasks';
import { Channel } from '../stream/Channel';
import { subscribeTo } from '../stream/source';
import { logger, type Logger } from '../utils/Logger';
import { parseOptions } from '../validation';
import type { OptimisticValueOptions, Source, Stream } from '../types';

/** Confirming operation run after the speculative snapshot is published. */
export type OptimisticTask<R, E = Error> = () => PendingOutcome<R, E>;

/** Pure, total transition from the current snapshot to the speculative one. */
export type OptimisticUpdater<T> = (current: T) => T;

/**
 * The last-known-state cell. Tagged rather than nullable so that `null` and
 * `undefined` remain legitimate snapshots.
 */
type SnapshotState<T> =
    | { status: 'uninitialized' }
    | { status: 'initialized'; value: T };

/**
 * OptimisticValue: speculate, confirm, roll back.
 *
 * Wraps a source of confirmed snapshots. `update` publishes the speculative
 * snapshot immediately, runs the confirming task, and re-publishes the previous
 * snapshot if the task fails. `stream` carries source and speculative snapshots
 * in arrival order.
 *
 * Each call to `update` goes Idle -> Speculating -> Committed | RolledBack.
 *
 * Known limitation: unless `serialize` is set, overlapping updates are not
 * ordered. A rollback restores the snapshot its own call started from, even if
 * another update or a source emission has replaced it since.
 *
 * @example
 * ```typescript
 * const todos = new OptimisticValue(api.todos$);
 *
 * const outcome = await todos.update(
 *     () => api.save(todo),
 *     upsert(todo, (t) => t.id === todo.id),
 * );
 * ```
 */
export class OptimisticValue<T> {
    /** Source and speculative snapshots, broadcast without replay. */
    readonly stream: Stream<T>;

    private state: SnapshotState<T> = { status: 'uninitialized' };
    private readonly speculative = new Channel<T>();
    private readonly merged = new Channel<T>();
    private readonly logger: Logger;
    private readonly serialize: boolean;
    private queue: Promise<unknown> = Promise.resolve();
    private sourceDone = false;

    constructor(source: Source<T>, options: OptimisticValueOptions = {}) {
        const config = parseOptions(options);
        this.logger = logger.child(config.name ?? 'OptimisticValue', config.debug ?? false);
        this.serialize = config.serialize ?? false;

        const merged = this.merged;
        this.stream = {
            subscribe: (observer) => merged.subscribe(observer),
            [Symbol.asyncIterator]: () => merged[Symbol.asyncIterator](),
        };

        this.speculative.subscribe({
            next: (value) => this.merged.push(value),
            complete: () => this.completeIfDrained(),
        });

        // Attached for the engine's whole life, so the cell tracks the source
        // even while nobody listens to `stream`.
        subscribeTo(source, {
            next: (value) => {
                this.state = { status: 'initialized', value };
                this.merged.push(value);
            },
            error: (error) => {
                this.logger.debug('Source reported an error', error);
                this.merged.fail(error);
            },
            complete: () => {
                this.sourceDone = true;
                this.completeIfDrained();
            },
        });
    }

    /** Whether a snapshot has been observed yet. */
    get initialized(): boolean {
        return this.state.status === 'initialized';
    }

    /** The last-known snapshot, Absent before the first one. */
    get current(): Optional<T> {
        return this.state.status === 'initialized' ? present(this.state.value) : absent<T>();
    }

    get disposed(): boolean {
        return this.speculative.closed;
    }

    /**
     * Applies `updater` speculatively, then confirms with `task`.
     *
     * The speculative snapshot is on `stream` before `task` is invoked. A Failure
     * from `task` (or a rejection, or a throw) restores and re-publishes the
     * previous snapshot. The task's own Outcome is returned unchanged.
     *
     * Before any snapshot has been observed, resolves to
     * Failure(StateUninitializedError) without invoking `task`.
     */
    update<R, E = Error>(
        task: OptimisticTask<R, E>,
        updater: OptimisticUpdater<T>
    ): AsyncOutcome<R, E | Error> {
        if (!this.serialize) {
            return AsyncOutcome.of(this.apply(task, updater));
        }
        const turn = this.queue.then(() => this.apply(task, updater));
        this.queue = turn;
        return AsyncOutcome.of(turn);
    }

    /**
     * Closes the speculative channel. In-flight updates still settle and still
     * move the state cell, but publish nothing. The source keeps flowing.
     */
    dispose(): void {
        if (this.speculative.closed) return;
        this.logger.debug('Disposed');
        this.speculative.close();
    }

    private async apply<R, E>(
        task: OptimisticTask<R, E>,
        updater: OptimisticUpdater<T>
    ): Promise<Outcome<R, E | Error>> {
        if (this.state.status === 'uninitialized') {
            this.logger.debug('update() before the first snapshot; task not run');
            return failure<Error, R>(new StateUninitializedError());
        }

        const previous = this.state.value;
        let candidate: T;
        try {
            candidate = updater(previous);
        } catch (thrown) {
            const error = toError(thrown);
            this.logger.debug('Updater threw; state left untouched', error);
            return failure<Error, R>(error, error.stack);
        }

        this.state = { status: 'initialized', value: candidate };
        this.publish(candidate);
        this.logger.debug('Speculating');

        const outcome = await runTask(task);

        if (outcome.isFailure()) {
            this.state = { status: 'initialized', value: previous };
            this.publish(previous);
            this.logger.debug('Task failed; rolled back', outcome.error);
        } else {
            this.logger.debug('Task succeeded; committed');
        }
        return outcome;
    }

    private publish(value: T): void {
        if (!this.speculative.push(value)) {
            this.logger.debug('Speculative channel closed; snapshot not published');
        }
    }

    private completeIfDrained(): void {
        if (this.sourceDone && this.speculative.closed) {
            this.merged.close();
        }
    }
}
