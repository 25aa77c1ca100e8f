import { INestApplicationContext } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../../src/app.module';
import { RunOptions } from '@config/run-options.module';
import {
  CRASH_POINT_SAMPLER,
  GENERATE_MOCK_DATA_USE_CASE,
  GENERATE_RECENT_HISTORY_USE_CASE,
} from '@history/infrastructure/history.module';
import { GenerateMockDataUseCase } from '@history/application/GenerateMockDataUseCase';
import { GenerateRecentHistoryUseCase } from '@history/application/GenerateRecentHistoryUseCase';
import { CrashPointSampler } from '@history/domain/CrashPointSampler';
import { RANDOM_SOURCE } from '@shared/tokens';
import { SeededRandomSource } from '@rng/domain/SeededRandomSource';
import { MathRandomSource } from '@rng/infrastructure/MathRandomSource';

describe('AppModule', () => {
  const savedEnv = { ...process.env };
  const contexts: INestApplicationContext[] = [];

  const boot = async (options: RunOptions): Promise<INestApplicationContext> => {
    const app = await NestFactory.createApplicationContext(AppModule.forRun(options), {
      logger: false,
    });
    contexts.push(app);
    return app;
  };

  beforeAll(() => {
    process.env.NODE_ENV = 'production';
    process.env.LOG_LEVEL = 'silent';
    delete process.env.CRASH_DISTRIBUTION;
  });

  afterEach(async () => {
    await Promise.all(contexts.splice(0).map((app) => app.close()));
  });

  afterAll(() => {
    process.env = savedEnv;
  });

  it('resolves the orchestration use case', async () => {
    const app = await boot({});
    expect(app.get(GENERATE_MOCK_DATA_USE_CASE)).toBeInstanceOf(GenerateMockDataUseCase);
  });

  it('uses the process-wide source when unseeded', async () => {
    const app = await boot({});
    expect(app.get(RANDOM_SOURCE)).toBeInstanceOf(MathRandomSource);
  });

  it('replays identical records for identical seeds', async () => {
    const first = await boot({ seed: 1234 });
    const second = await boot({ seed: 1234 });
    expect(first.get(RANDOM_SOURCE)).toBeInstanceOf(SeededRandomSource);

    const a = first.get<GenerateRecentHistoryUseCase>(GENERATE_RECENT_HISTORY_USE_CASE).execute({ count: 5 });
    const b = second.get<GenerateRecentHistoryUseCase>(GENERATE_RECENT_HISTORY_USE_CASE).execute({ count: 5 });
    expect(a.data).toEqual(b.data);
  });

  it('defaults to the legacy distribution', async () => {
    const app = await boot({});
    expect(app.get<CrashPointSampler>(CRASH_POINT_SAMPLER).distribution).toBe('legacy');
  });

  it('lets the run override the distribution', async () => {
    const app = await boot({ distribution: 'cumulative' });
    expect(app.get<CrashPointSampler>(CRASH_POINT_SAMPLER).distribution).toBe('cumulative');
  });
});
