/**
 * Replace-or-append by predicate.
 *
 * NOTE the asymmetry callers must account for: on a hit the wrapped array is
 * mutated in place and the same reference is returned; on a miss the wrapped
 * array is left alone and a new, longer array is returned.
 */
export class ListReplacer<T> {
    constructor(private readonly items: T[]) {}

    replace(item: T, predicate: (candidate: T) => boolean): T[] {
        const index = this.items.findIndex((candidate) => predicate(candidate));
        if (index >= 0) {
            this.items[index] = item;
            return this.items;
        }
        return [...this.items, item];
    }
}

/**
 * An `OptimisticValue` updater that upserts `item`. It works on a copy, so the
 * previous snapshot survives intact for a rollback.
 */
export function upsert<T>(item: T, predicate: (candidate: T) => boolean): (items: readonly T[]) => T[] {
    return (items) => new ListReplacer([...items]).replace(item, predicate);
}
