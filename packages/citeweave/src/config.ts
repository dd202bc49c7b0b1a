import { z } from 'zod';

export type CollationSensitivity = 'base' | 'accent' | 'case' | 'variant';

const numberFromEnv = (defaultValue: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(defaultValue);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  CITEWEAVE_NEAR_NOTE_DISTANCE: numberFromEnv(5, 0, 1000),
  CITEWEAVE_COLLATION_SENSITIVITY: z.enum(['base', 'accent', 'case', 'variant']).default('accent'),
  CITEWEAVE_MAX_DISAMBIGUATION_PASSES: numberFromEnv(8, 1, 100)
});

type ParsedEnv = z.infer<typeof envSchema>;

export interface EngineConfig {
  nodeEnv: ParsedEnv['NODE_ENV'];
  logLevel: ParsedEnv['LOG_LEVEL'];
  /** Used when the style's citation options do not set a near-note distance. */
  nearNoteDistance: number;
  collationSensitivity: CollationSensitivity;
  maxDisambiguationPasses: number;
}

export type ConfigOverrides = Partial<Record<keyof ParsedEnv, string | number>>;

export const parseConfig = (overrides?: ConfigOverrides): EngineConfig => {
  const mergedEnv: Record<string, string | number | undefined> = {
    ...process.env,
    ...(overrides ?? {})
  };

  const env = envSchema.parse(mergedEnv);

  return {
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    nearNoteDistance: env.CITEWEAVE_NEAR_NOTE_DISTANCE,
    collationSensitivity: env.CITEWEAVE_COLLATION_SENSITIVITY,
    maxDisambiguationPasses: env.CITEWEAVE_MAX_DISAMBIGUATION_PASSES
  };
};
