import { z } from 'zod';

/**
 * A finite number, or a non-blank string holding one.
 * `null`, `""` and booleans are rejected rather than read as 0.
 */
export const numericValue = z
    .union([z.number(), z.string().trim().min(1)])
    .pipe(z.coerce.number().finite());
