import { describe, it, expect, vi } from 'vitest';
import { Failure, Success, attempt, failure, success, type Outcome } from './Outcome';
import { UnwrapError } from '../errors';

const boom = new Error('boom');

describe('Outcome', () => {
    describe('construction', () => {
        it('exactly one variant is active', () => {
            const ok = success(1);
            const bad = failure(boom);

            expect(ok.isSuccess()).toBe(true);
            expect(ok.isFailure()).toBe(false);
            expect(bad.isSuccess()).toBe(false);
            expect(bad.isFailure()).toBe(true);
            expect(ok).toBeInstanceOf(Success);
            expect(bad).toBeInstanceOf(Failure);
        });

        it('is frozen once constructed', () => {
            expect(Object.isFrozen(success(1))).toBe(true);
            expect(Object.isFrozen(failure(boom))).toBe(true);
        });

        it('keeps the optional trace on Failure', () => {
            expect(failure(boom, 'at line 1').trace).toBe('at line 1');
            expect(failure(boom).trace).toBeUndefined();
        });

        it('narrows on isSuccess / isFailure', () => {
            const outcome: Outcome<number> = success(5);
            if (outcome.isSuccess()) {
                expect(outcome.value).toBe(5);
            } else {
                expect.unreachable();
            }
        });
    });

    describe('map / mapError', () => {
        it('map transforms only a Success', () => {
            expect(success(2).map((n) => n * 10).unwrap()).toBe(20);

            const mapped = failure<Error, number>(boom).map((n) => n * 10);
            expect(mapped.isFailure() && mapped.error).toBe(boom);
        });

        it('map does not call the transform on a Failure', () => {
            const transform = vi.fn((n: number) => n);
            failure<Error, number>(boom).map(transform);
            expect(transform).not.toHaveBeenCalled();
        });

        it('mapError transforms only a Failure', () => {
            const mapped = failure(boom).mapError((e) => e.message.toUpperCase());
            expect(mapped.isFailure() && mapped.error).toBe('BOOM');

            const transform = vi.fn((e: Error) => e.message);
            expect(success<number>(3).mapError(transform).unwrap()).toBe(3);
            expect(transform).not.toHaveBeenCalled();
        });

        it('mapError keeps the trace', () => {
            const mapped = failure(boom, 'trace').mapError(() => 'other');
            expect(mapped.isFailure() && mapped.trace).toBe('trace');
        });
    });

    describe('laws', () => {
        const double = (n: number): Outcome<number> => success(n * 2);
        const positive = (n: number): Outcome<number> =>
            n > 0 ? success(n) : failure(new Error('not positive'));

        it('identity map is a no-op', () => {
            expect(success(7).map((n) => n).unwrap()).toBe(7);
            const failed = failure<Error, number>(boom).map((n) => n);
            expect(failed.isFailure() && failed.error).toBe(boom);
        });

        it('flatMap is associative', () => {
            for (const start of [-3, 0, 4]) {
                const left = success(start).flatMap(double).flatMap(positive);
                const right = success(start).flatMap((n) => double(n).flatMap(positive));
                expect(left.toString()).toBe(right.toString());
            }
        });

        it('flatMap short-circuits on Failure', () => {
            const next = vi.fn(double);
            const result = failure<Error, number>(boom).flatMap(next);
            expect(next).not.toHaveBeenCalled();
            expect(result.isFailure() && result.error).toBe(boom);
        });

        it('left identity: success(a).flatMap(f) equals f(a)', () => {
            expect(success(3).flatMap(double).unwrap()).toBe(double(3).unwrap());
        });
    });

    describe('recover / recoverWith', () => {
        it('recover turns a Failure into a Success', () => {
            expect(failure<Error, string>(boom).recover((e) => `recovered ${e.message}`).unwrap())
                .toBe('recovered boom');
        });

        it('recover returns a Success unchanged', () => {
            const ok = success<string>('fine');
            expect(ok.recover(() => 'other')).toBe(ok);
        });

        it('recoverWith may fail again', () => {
            const second = new Error('second');
            const result = failure<Error, number>(boom).recoverWith(() => failure(second));
            expect(result.isFailure() && result.error).toBe(second);

            expect(failure<Error, number>(boom).recoverWith(() => success(1)).unwrap()).toBe(1);
        });
    });

    describe('extraction', () => {
        it('unwrap throws UnwrapError carrying the error', () => {
            const bad = failure(boom);
            expect(() => bad.unwrap()).toThrow(UnwrapError);
            expect(() => bad.unwrap()).toThrow('Called unwrap on Failure: boom');
            try {
                bad.unwrap();
            } catch (error) {
                expect(error instanceof UnwrapError && error.cause).toBe(boom);
            }
        });

        it('unwrapOr and unwrapOrElse are total', () => {
            expect(failure<Error, number>(boom).unwrapOr(0)).toBe(0);
            expect(success(5).unwrapOr(0)).toBe(5);
            expect(failure<Error, number>(boom).unwrapOrElse((e) => e.message.length)).toBe(4);
            expect(success(5).unwrapOrElse(() => 0)).toBe(5);
        });

        it('match dispatches to the active variant', () => {
            const handlers = {
                success: (n: number) => `ok:${n}`,
                failure: (e: Error, trace?: string) => `err:${e.message}:${trace ?? '-'}`,
            };
            expect(success(1).match(handlers)).toBe('ok:1');
            expect(failure<Error, number>(boom, 't').match(handlers)).toBe('err:boom:t');
        });
    });

    describe('inspection and conversion', () => {
        it('inspect and inspectError observe without changing', () => {
            const seen: unknown[] = [];
            const ok = success(1);
            const bad = failure(boom);

            expect(ok.inspect((v) => seen.push(v)).inspectError((e) => seen.push(e))).toBe(ok);
            expect(bad.inspect((v) => seen.push(v)).inspectError((e) => seen.push(e))).toBe(bad);
            expect(seen).toEqual([1, boom]);
        });

        it('toOptional maps Success to Present and Failure to Absent', () => {
            expect(success(1).toOptional().unwrapOr(0)).toBe(1);
            expect(failure(boom).toOptional().isAbsent()).toBe(true);
        });

        it('async lifts a settled outcome', async () => {
            expect(await success(4).async().unwrap()).toBe(4);
        });

        it('toString names the variant', () => {
            expect(success(1).toString()).toBe('Success(1)');
            expect(failure(boom).toString()).toBe('Failure(boom)');
        });
    });

    describe('attempt', () => {
        it('captures a throw as Failure with its stack', () => {
            const result = attempt(() => {
                throw boom;
            });
            expect(result.isFailure() && result.error).toBe(boom);
            expect(result.isFailure() && result.trace).toBe(boom.stack);
        });

        it('wraps a returned value in Success', () => {
            expect(attempt(() => JSON.parse('{"a":1}')).map((json) => json.a).unwrap()).toBe(1);
        });
    });
});
