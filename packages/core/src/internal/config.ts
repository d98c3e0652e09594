/**
 * Environment configuration, read once at load
 */

import { z } from 'zod';
import { DEFAULT_MIN_DEPTH } from './constants';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;
export const ENGINE_MODES = ['naive', 'incremental'] as const;

export type EngineMode = (typeof ENGINE_MODES)[number];

const EnvSchema = z.object({
  ARTRIE_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
  ARTRIE_ENGINE_MODE: z.enum(ENGINE_MODES).default('incremental'),
  ARTRIE_MIN_DEPTH: z.coerce.number().int().nonnegative().default(DEFAULT_MIN_DEPTH),
});

export type Env = z.infer<typeof EnvSchema>;

export interface Config {
  logLevel: Env['ARTRIE_LOG_LEVEL'];
  engineMode: EngineMode;
  minDepth: number;
}

export function loadConfig(source: Record<string, string | undefined>): Config {
  const env = EnvSchema.parse(source);
  return {
    logLevel: env.ARTRIE_LOG_LEVEL,
    engineMode: env.ARTRIE_ENGINE_MODE,
    minDepth: env.ARTRIE_MIN_DEPTH,
  };
}

export const config: Config = loadConfig(process.env);

// Meta as accepted from callers; range clamping and the integer check happen in `makeMeta`
export const MetaInputSchema = z.object({
  minDepth: z.number(),
});

export type MetaInput = z.infer<typeof MetaInputSchema>;
