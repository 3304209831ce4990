/**
 * Table configuration
 */

import { z } from 'zod';

/**
 * What a table does when a key structurally equal to an existing one is set.
 * - `overwrite`: replace the stored value, keep the original key and position
 * - `reject`: throw `MapKeyCollisionError`
 */
export const duplicateKeyPolicySchema = z.enum(['overwrite', 'reject']);

export type DuplicateKeyPolicy = z.infer<typeof duplicateKeyPolicySchema>;

export const tableOptionsSchema = z.object({
  /** Expected number of entries; the slot array is sized to fit it. */
  initialCapacity: z.number().int().min(1).max(2 ** 24).default(8),
  duplicateKeys: duplicateKeyPolicySchema.default('overwrite'),
});

/** Options as written by callers (every field optional). */
export type TableOptionsInput = z.input<typeof tableOptionsSchema>;

/** Options after defaults are applied. */
export type TableOptions = z.output<typeof tableOptionsSchema>;

/**
 * Validate table options and fill in defaults.
 *
 * @throws {z.ZodError} If an option is out of range or of the wrong type
 */
export function resolveTableOptions(input: TableOptionsInput = {}): TableOptions {
  return tableOptionsSchema.parse(input);
}
