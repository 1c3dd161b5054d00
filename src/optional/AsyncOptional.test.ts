import { describe, it, expect, vi, afterEach } from 'vitest';
import { AsyncOptional } from './AsyncOptional';
import { absent, present } from './Optional';

const later = <T>(value: T, ms = 0) => new Promise<T>((resolve) => setTimeout(() => resolve(value), ms));

describe('AsyncOptional', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('is awaitable and yields the Optional', async () => {
        const optional = await AsyncOptional.present(2);
        expect(optional.isPresent() && optional.value).toBe(2);
        expect(await AsyncOptional.absent().isAbsent()).toBe(true);
    });

    it('of accepts a settled or pending Optional', async () => {
        expect(await AsyncOptional.of(present(1)).unwrap()).toBe(1);
        expect(await AsyncOptional.of(later(absent<number>())).isAbsent()).toBe(true);
    });

    it('fromNullable maps a pending null to Absent', async () => {
        expect(await AsyncOptional.fromNullable(later<string | null>(null)).isAbsent()).toBe(true);
        expect(await AsyncOptional.fromNullable(later<string | null>('x')).unwrap()).toBe('x');
    });

    it('chains sync and async transforms', async () => {
        const result = AsyncOptional.present(3)
            .map((n) => n + 1)
            .mapAsync((n) => later(n * 2))
            .flatMap((n) => present(n - 1))
            .flatMapAsync((n) => later(present(`${n}`)));
        expect(await result.unwrap()).toBe('7');
    });

    it('skips async transforms on Absent', async () => {
        const transform = vi.fn((n: number) => later(n));
        expect(await AsyncOptional.absent<number>().mapAsync(transform).isAbsent()).toBe(true);
        expect(transform).not.toHaveBeenCalled();
    });

    it('filter and filterAsync drop failing values', async () => {
        expect(await AsyncOptional.present(2).filter((n) => n > 1).unwrap()).toBe(2);
        expect(await AsyncOptional.present(2).filterAsync((n) => later(n > 5)).isAbsent()).toBe(true);
    });

    it('inspect observes the value', async () => {
        const seen: number[] = [];
        await AsyncOptional.present(5).inspect((n) => seen.push(n));
        expect(seen).toEqual([5]);
    });

    it('extracts with fallbacks', async () => {
        expect(await AsyncOptional.absent<number>().unwrapOr(1)).toBe(1);
        expect(await AsyncOptional.absent<number>().unwrapOrElseAsync(() => later(2))).toBe(2);
        expect(await AsyncOptional.present(3).unwrapOrElseAsync(() => later(2))).toBe(3);
        expect(await AsyncOptional.absent<number>().toNullable()).toBeNull();
        await expect(AsyncOptional.absent<number>().unwrap()).rejects.toThrow('Called unwrap on Absent');
    });

    it('converts to AsyncOutcome', async () => {
        const missing = new Error('missing');
        expect(await AsyncOptional.present(1).toOutcome(missing).unwrap()).toBe(1);
        const failed = await AsyncOptional.absent<number>().toOutcome(missing);
        expect(failed.isFailure() && failed.error).toBe(missing);
        const lazy = await AsyncOptional.absent<number>().toOutcomeElse(() => 'lazy');
        expect(lazy.isFailure() && lazy.error).toBe('lazy');
    });

    it('withTimeout settles to Absent when late', async () => {
        vi.useFakeTimers();
        const pending = AsyncOptional.of(later(present(1), 1000)).withTimeout(100);
        await vi.advanceTimersByTimeAsync(100);
        expect(await pending.isAbsent()).toBe(true);
    });

    it('withTimeout uses onTimeout and passes timely values', async () => {
        vi.useFakeTimers();
        const fallback = AsyncOptional.of(later(present(1), 1000)).withTimeout(10, () => present(-1));
        const timely = AsyncOptional.of(later(present(2), 5)).withTimeout(10);
        await vi.advanceTimersByTimeAsync(10);
        expect(await fallback.unwrap()).toBe(-1);
        expect(await timely.unwrap()).toBe(2);
    });
});
