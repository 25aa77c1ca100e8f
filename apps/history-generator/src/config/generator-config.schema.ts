import { z } from 'zod';
import { CRASH_DISTRIBUTIONS } from '@shared/kernel/GeneratorConfig';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export const generatorConfigSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),

  NODE_ENV: z.string().default('development'),

  GAME_ID_BASE: z.coerce
    .number()
    .int()
    .nonnegative('GAME_ID_BASE must be >= 0')
    .default(7_900_000),

  GAME_ID_SPAN: z.coerce
    .number()
    .int()
    .nonnegative('GAME_ID_SPAN must be >= 0')
    .default(100_000),

  TIMESTAMP_WINDOW_DAYS: z.coerce
    .number()
    .positive('TIMESTAMP_WINDOW_DAYS must be > 0')
    .default(7),

  CRASH_DISTRIBUTION: z.enum(CRASH_DISTRIBUTIONS).default('legacy'),
});

export type RawGeneratorConfig = z.infer<typeof generatorConfigSchema>;
