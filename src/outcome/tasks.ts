import { AllTasksFailedError, EmptyInputError, toError } from '../errors';
import { AsyncOutcome } from './AsyncOutcome';
import { failure, success, type Outcome } from './Outcome';

/** Anything that settles to an Outcome: a Task, an AsyncOutcome... */
export type PendingOutcome<T, E = Error> = PromiseLike<Outcome<T, E>>;

/**
 * Settles `pending`, turning a rejection into a Failure so that aggregates
 * always observe an Outcome.
 */
export function settle<T, E>(pending: PendingOutcome<T, E>): Promise<Outcome<T, E | Error>> {
    return Promise.resolve(pending).then(
        (outcome): Outcome<T, E | Error> => outcome,
        (thrown: unknown) => {
            const error = toError(thrown);
            return failure<Error, T>(error, error.stack);
        }
    );
}

/**
 * Invokes a task factory, capturing a synchronous throw as well as a rejection.
 */
export function runTask<T, E>(task: () => PendingOutcome<T, E>): Promise<Outcome<T, E | Error>> {
    try {
        return settle(task());
    } catch (thrown) {
        const error = toError(thrown);
        return Promise.resolve(failure<Error, T>(error, error.stack));
    }
}

/**
 * Waits for every member and returns their Outcomes in input order,
 * successes and failures alike.
 */
export function waitAll<T, E>(tasks: Iterable<PendingOutcome<T, E>>): Promise<Outcome<T, E | Error>[]> {
    return Promise.all(Array.from(tasks, (task) => settle(task)));
}

/**
 * Success with every value (in input order) when all members succeed.
 * Otherwise the first Failure to complete, without waiting for the rest.
 */
export function waitAllOrFirstError<T, E>(
    tasks: Iterable<PendingOutcome<T, E>>
): AsyncOutcome<T[], E | Error> {
    const members = Array.from(tasks);
    if (members.length === 0) return AsyncOutcome.success<T[], E | Error>([]);

    return AsyncOutcome.of(
        new Promise<Outcome<T[], E | Error>>((resolve) => {
            const values = new Array<T>(members.length);
            let remaining = members.length;
            let done = false;

            members.forEach((task, index) => {
                void settle(task).then((outcome) => {
                    if (done) return;
                    if (outcome.isFailure()) {
                        done = true;
                        resolve(failure<E | Error, T[]>(outcome.error, outcome.trace));
                        return;
                    }
                    values[index] = outcome.value;
                    remaining -= 1;
                    if (remaining === 0) {
                        done = true;
                        resolve(success<T[], E | Error>(values));
                    }
                });
            });
        })
    );
}

/**
 * The first Success to complete. When every member fails, a Failure whose
 * AllTasksFailedError lists the errors in input order.
 */
export function firstSuccess<T, E>(tasks: Iterable<PendingOutcome<T, E>>): AsyncOutcome<T, E | Error> {
    const members = Array.from(tasks);
    if (members.length === 0) {
        return AsyncOutcome.failure<E | Error, T>(new EmptyInputError('No tasks provided'));
    }

    return AsyncOutcome.of(
        new Promise<Outcome<T, E | Error>>((resolve) => {
            const errors = new Array<unknown>(members.length);
            let remaining = members.length;
            let done = false;

            members.forEach((task, index) => {
                void settle(task).then((outcome) => {
                    if (done) return;
                    if (outcome.isSuccess()) {
                        done = true;
                        resolve(outcome);
                        return;
                    }
                    errors[index] = outcome.error;
                    remaining -= 1;
                    if (remaining === 0) {
                        done = true;
                        resolve(failure<E | Error, T>(new AllTasksFailedError(errors)));
                    }
                });
            });
        })
    );
}
