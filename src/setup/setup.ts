import { SetupError } from '../errors';
import { failure, success, type Outcome } from '../outcome/Outcome';
import { runTask, waitAll, type PendingOutcome } from '../outcome/tasks';
import { logger } from '../utils/Logger';

/** One bootstrap step. It reports failure through its Outcome. */
export type SetupTask<E = Error> = () => PendingOutcome<void, E>;

const setupLogger = logger.child('setup');

/**
 * Starts every task at once and waits for all of them. Settles to the first
 * Failure in input order, or Success when all succeeded.
 */
export function parallelSetup<E>(tasks: Iterable<SetupTask<E>>): SetupTask<E | Error> {
    const members = Array.from(tasks);
    return async (): Promise<Outcome<void, E | Error>> => {
        const results = await waitAll(members.map((task) => runTask(task)));
        for (const result of results) {
            if (result.isFailure()) return failure<E | Error, void>(result.error, result.trace);
        }
        return success<void, E | Error>(undefined);
    };
}

/** Runs tasks one after another, stopping at the first Failure. */
export function sequentialSetup<E>(tasks: Iterable<SetupTask<E>>): SetupTask<E | Error> {
    const members = Array.from(tasks);
    return async (): Promise<Outcome<void, E | Error>> => {
        for (const task of members) {
            const result = await runTask(task);
            if (result.isFailure()) return result;
        }
        return success<void, E | Error>(undefined);
    };
}

/**
 * Runs bootstrap tasks in order.
 * @throws {SetupError} on the first failing task, with its error as `cause`
 */
export async function runSetup<E>(tasks: readonly SetupTask<E>[]): Promise<void> {
    for (const [index, task] of tasks.entries()) {
        setupLogger.debug(`Running step ${index + 1}/${tasks.length}`);
        const result = await runTask(task);
        if (result.isFailure()) {
            setupLogger.error(`Step ${index + 1}/${tasks.length} failed`, result.error);
            throw new SetupError('Setup failed', result.error);
        }
    }
    setupLogger.debug('Setup complete');
}
