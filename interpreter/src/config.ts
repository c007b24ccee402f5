/**
 * Engine configuration, validated with zod.
 */

import { z } from 'zod';

export const EngineConfigSchema = z.object({
  /** Reject bindings of a variable to a term containing it (Prolog). */
  occursCheck: z.boolean().default(false),
  /** Statements, instructions or resolution steps allowed per run. */
  maxSteps: z.number().int().positive().default(10_000_000),
  /** Nested Pascal calls allowed before a stack-overflow error. */
  maxCallDepth: z.number().int().positive().default(1000),
  /** Seed of the deterministic generator behind RND and random. */
  randomSeed: z.number().int().default(1),
  /** Column width of a BASIC print zone (`PRINT A, B`). */
  printZoneWidth: z.number().int().positive().default(14),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

export const DEFAULT_CONFIG: EngineConfig = EngineConfigSchema.parse({});

/**
 * Validate partial configuration and fill in defaults. Throws a `ZodError`
 * describing every invalid field.
 */
export function resolveConfig(input: unknown = {}): EngineConfig {
  return EngineConfigSchema.parse(input);
}
