import { z } from 'zod';
import { loadConfig } from 'zod-config';
import { envAdapter } from 'zod-config/env-adapter';

/**
 * Environment flags arrive as strings: "true"/"1" switch them on, "false"/"0" off.
 * Any other value fails validation.
 */
const envFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

/**
 * Centralised configuration schema for Treeline.
 *
 * All hard-coded defaults belong here, so the schema doubles as live documentation.
 */
export const configSchema = z.object({
  // Runtime environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Log verbosity
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

  // Check every tree for cycles and shared nodes before traversing it
  TREE_VALIDATE_STRUCTURE: envFlag.default('false'),

  // Depth past which validation reports a deep_nesting warning
  TREE_MAX_DEPTH: z.coerce.number().int().min(1).default(1000),
});

export type AppConfig = z.infer<typeof configSchema>;

// The resolved configuration object, fully validated & typed.
// Top-level await makes sure that every importer sees a ready-to-use value.
export const cfg: AppConfig = await loadConfig({
  schema: configSchema,
  adapters: [envAdapter()],
});
