import { z } from 'zod';
import { ConfigurationError } from './errors';
import type { OptimisticValueOptions } from './types';

/**
 * Zod schemas for option validation.
 * Options are checked once, at construction, so a typo fails loudly there.
 */

export const OptimisticValueOptionsSchema = z.object({
    name: z.string().min(1).optional(),
    debug: z.boolean().optional(),
    serialize: z.boolean().optional(),
}).strict();

/**
 * Parses and validates engine options.
 *
 * @param options - Raw options object (may come from untyped callers)
 * @returns Validated options
 * @throws {ConfigurationError} If any option is invalid or unknown
 */
export function parseOptions(options: unknown): OptimisticValueOptions {
    const result = OptimisticValueOptionsSchema.safeParse(options ?? {});

    if (!result.success) {
        const errorMessages = result.error.issues
            .map(e => `${e.path.length > 0 ? e.path.join('.') : '(root)'}: ${e.message}`)
            .join(', ');

        throw new ConfigurationError(`Invalid options: ${errorMessages}`);
    }

    return result.data;
}
