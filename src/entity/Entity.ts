import { isEqual } from 'lodash-es';

export interface EntityInit {
    id?: string;
    createdAt?: Date;
    updatedAt?: Date;
}

/**
 * Base class for domain entities: an identity, lifecycle timestamps and a
 * change flag.
 *
 * Two entities are equal when they share a concrete class, `id`, timestamps
 * and `uniqueProps()`. Collections are compared deeply.
 *
 * @example
 * ```typescript
 * class User extends Entity {
 *     constructor(readonly email: string, init?: EntityInit) {
 *         super(init);
 *     }
 *
 *     protected uniqueProps(): readonly unknown[] {
 *         return [this.email];
 *     }
 * }
 *
 * const alice = new User('alice@example.com');
 * alice.equals(new User('alice@example.com', alice)); // true
 * ```
 */
export abstract class Entity {
    readonly id: string;
    readonly createdAt: Date;
    readonly updatedAt: Date;
    private changed = false;

    protected constructor(init: EntityInit = {}) {
        const now = new Date();
        this.id = init.id ?? crypto.randomUUID();
        this.createdAt = init.createdAt ?? now;
        this.updatedAt = init.updatedAt ?? now;
    }

    get hasChanged(): boolean {
        return this.changed;
    }

    markAsChanged(): void {
        this.changed = true;
    }

    /** Properties that take part in equality besides the identity. */
    protected uniqueProps(): readonly unknown[] {
        return [];
    }

    equals(other: unknown): boolean {
        if (this === other) return true;
        if (!(other instanceof Entity) || other.constructor !== this.constructor) return false;
        return isEqual(
            [this.id, this.createdAt, this.updatedAt, ...this.uniqueProps()],
            [other.id, other.createdAt, other.updatedAt, ...other.uniqueProps()]
        );
    }

    toString(): string {
        const props = [this.id, ...this.uniqueProps()].map((prop) => String(prop));
        return `${this.constructor.name}(${props.join(', ')})`;
    }
}
