import { Provider } from '@nestjs/common';
import { GeneratorConfig } from '@shared/kernel/GeneratorConfig';
import { DAY_MS } from '@history/domain/TimestampSampler';
import { generatorConfigSchema, RawGeneratorConfig } from './generator-config.schema';

export const VALIDATED_ENV = 'VALIDATED_ENV';
export const GENERATOR_CONFIG = 'GENERATOR_CONFIG';

export function parseGeneratorEnv(env: NodeJS.ProcessEnv): RawGeneratorConfig {
  const result = generatorConfigSchema.safeParse({
    LOG_LEVEL: env.LOG_LEVEL,
    NODE_ENV: env.NODE_ENV,
    GAME_ID_BASE: env.GAME_ID_BASE,
    GAME_ID_SPAN: env.GAME_ID_SPAN,
    TIMESTAMP_WINDOW_DAYS: env.TIMESTAMP_WINDOW_DAYS,
    CRASH_DISTRIBUTION: env.CRASH_DISTRIBUTION,
  });

  if (!result.success) {
    const messages = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`[GeneratorConfig] Invalid environment variables:\n${messages}`);
  }

  return result.data;
}

export function toGeneratorConfig(env: RawGeneratorConfig): GeneratorConfig {
  return {
    gameIdBase: env.GAME_ID_BASE,
    gameIdSpan: env.GAME_ID_SPAN,
    timestampWindowMs: Math.round(env.TIMESTAMP_WINDOW_DAYS * DAY_MS),
    distribution: env.CRASH_DISTRIBUTION,
  };
}

/**
 * Runs Zod validation once at boot. All other providers
 * derive their values from this single source of truth.
 */
export const validatedEnvProvider: Provider<RawGeneratorConfig> = {
  provide: VALIDATED_ENV,
  useFactory: (): RawGeneratorConfig => parseGeneratorEnv(process.env),
};

export const generatorConfigProvider: Provider<GeneratorConfig> = {
  provide: GENERATOR_CONFIG,
  useFactory: toGeneratorConfig,
  inject: [VALIDATED_ENV],
};
