import { describe, it, expect } from 'vitest';
import { ListReplacer, upsert } from './ListReplacer';

interface Todo {
    id: number;
    title: string;
}

const todos = (): Todo[] => [
    { id: 1, title: 'one' },
    { id: 2, title: 'two' },
    { id: 3, title: 'three' },
];

describe('ListReplacer', () => {
    it('replaces the matching item in place and returns the same array', () => {
        const items = todos();
        const result = new ListReplacer(items).replace({ id: 2, title: 'TWO' }, (t) => t.id === 2);

        expect(result).toBe(items);
        expect(items.map((t) => t.title)).toEqual(['one', 'TWO', 'three']);
    });

    it('replaces only the first match', () => {
        const items = [1, 2, 2];
        new ListReplacer(items).replace(9, (n) => n === 2);
        expect(items).toEqual([1, 9, 2]);
    });

    it('appends to a new array when nothing matches', () => {
        const items = todos();
        const result = new ListReplacer(items).replace({ id: 4, title: 'four' }, (t) => t.id === 4);

        expect(result).not.toBe(items);
        expect(result).toHaveLength(4);
        expect(result[3]).toEqual({ id: 4, title: 'four' });
        expect(items).toHaveLength(3);
    });

    it('appends to an empty list', () => {
        expect(new ListReplacer<number>([]).replace(1, () => true)).toEqual([1]);
    });
});

describe('upsert', () => {
    it('never mutates the input list', () => {
        const items = todos();
        const updated = upsert<Todo>({ id: 1, title: 'ONE' }, (t) => t.id === 1)(items);

        expect(updated).not.toBe(items);
        expect(updated[0].title).toBe('ONE');
        expect(items[0].title).toBe('one');
    });

    it('appends a new item', () => {
        const updated = upsert<Todo>({ id: 5, title: 'five' }, (t) => t.id === 5)(todos());
        expect(updated.map((t) => t.id)).toEqual([1, 2, 3, 5]);
    });
});
