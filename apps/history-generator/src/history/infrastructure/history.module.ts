import { Module } from '@nestjs/common';
import { GeneratorConfigModule } from '@config/config.module';
import { GENERATOR_CONFIG } from '@config/env-config.provider';
import { RUN_OPTIONS, RunOptions } from '@config/run-options.module';
import { GeneratorConfig } from '@shared/kernel/GeneratorConfig';
import { Clock } from '@shared/ports/Clock';
import { Logger } from '@shared/ports/Logger';
import { CLOCK, LOGGER, RANDOM_SOURCE } from '@shared/tokens';
import { LoggingModule } from '@shared/infrastructure/logging.module';
import { RngModule } from '@rng/infrastructure/rng.module';
import { RandomSource } from '@rng/domain/RandomSource';
import { CrashPointSampler } from '@history/domain/CrashPointSampler';
import { GameIdSampler } from '@history/domain/GameIdSampler';
import { HashSampler } from '@history/domain/HashSampler';
import { TimestampSampler } from '@history/domain/TimestampSampler';
import { GameRecordFactory } from '@history/domain/GameRecordFactory';
import { HistoryPaginator } from '@history/domain/HistoryPaginator';
import { ResponseEnvelopeBuilder } from '@history/domain/ResponseEnvelope';
import { EnvelopeWriter } from '@history/application/ports/EnvelopeWriter';
import { GenerateCrashHistoryUseCase } from '@history/application/GenerateCrashHistoryUseCase';
import { GenerateRecentHistoryUseCase } from '@history/application/GenerateRecentHistoryUseCase';
import { GenerateMockDataUseCase } from '@history/application/GenerateMockDataUseCase';
import { JsonFileEnvelopeWriter } from './JsonFileEnvelopeWriter';

export const GAME_ID_SAMPLER = 'GameIdSampler';
export const CRASH_POINT_SAMPLER = 'CrashPointSampler';
export const HASH_SAMPLER = 'HashSampler';
export const TIMESTAMP_SAMPLER = 'TimestampSampler';
export const GAME_RECORD_FACTORY = 'GameRecordFactory';
export const HISTORY_PAGINATOR = 'HistoryPaginator';
export const RESPONSE_ENVELOPE_BUILDER = 'ResponseEnvelopeBuilder';
export const ENVELOPE_WRITER = 'EnvelopeWriter';
export const GENERATE_CRASH_HISTORY_USE_CASE = 'GenerateCrashHistoryUseCase';
export const GENERATE_RECENT_HISTORY_USE_CASE = 'GenerateRecentHistoryUseCase';
export const GENERATE_MOCK_DATA_USE_CASE = 'GenerateMockDataUseCase';

@Module({
  imports: [GeneratorConfigModule, LoggingModule, RngModule],
  providers: [
    // ── Samplers ────────────────────────────────────────
    {
      provide: GAME_ID_SAMPLER,
      useFactory: (random: RandomSource, config: GeneratorConfig): GameIdSampler =>
        new GameIdSampler(random, config.gameIdBase, config.gameIdSpan),
      inject: [RANDOM_SOURCE, GENERATOR_CONFIG],
    },
    {
      provide: CRASH_POINT_SAMPLER,
      useFactory: (
        random: RandomSource,
        config: GeneratorConfig,
        run: RunOptions,
        logger: Logger,
      ): CrashPointSampler => {
        const distribution = run.distribution ?? config.distribution;
        if (distribution === 'cumulative') {
          logger.warn('Cumulative tier selection active; crash points will not match the historical 80/19/1 split', {
            distribution,
          });
        }
        return new CrashPointSampler(random, distribution);
      },
      inject: [RANDOM_SOURCE, GENERATOR_CONFIG, RUN_OPTIONS, LOGGER],
    },
    {
      provide: HASH_SAMPLER,
      useFactory: (random: RandomSource): HashSampler => new HashSampler(random),
      inject: [RANDOM_SOURCE],
    },
    {
      provide: TIMESTAMP_SAMPLER,
      useFactory: (random: RandomSource, clock: Clock, config: GeneratorConfig): TimestampSampler =>
        new TimestampSampler(random, clock, config.timestampWindowMs),
      inject: [RANDOM_SOURCE, CLOCK, GENERATOR_CONFIG],
    },

    // ── Domain services ─────────────────────────────────
    {
      provide: GAME_RECORD_FACTORY,
      useFactory: (
        gameIds: GameIdSampler,
        crashPoints: CrashPointSampler,
        hashes: HashSampler,
        timestamps: TimestampSampler,
      ): GameRecordFactory => new GameRecordFactory(gameIds, crashPoints, hashes, timestamps),
      inject: [GAME_ID_SAMPLER, CRASH_POINT_SAMPLER, HASH_SAMPLER, TIMESTAMP_SAMPLER],
    },
    {
      provide: HISTORY_PAGINATOR,
      useFactory: (records: GameRecordFactory, random: RandomSource): HistoryPaginator =>
        new HistoryPaginator(records, random),
      inject: [GAME_RECORD_FACTORY, RANDOM_SOURCE],
    },
    {
      provide: RESPONSE_ENVELOPE_BUILDER,
      useFactory: (clock: Clock): ResponseEnvelopeBuilder => new ResponseEnvelopeBuilder(clock),
      inject: [CLOCK],
    },
    {
      provide: ENVELOPE_WRITER,
      useFactory: (logger: Logger): EnvelopeWriter => new JsonFileEnvelopeWriter(logger),
      inject: [LOGGER],
    },

    // ── Use cases ───────────────────────────────────────
    {
      provide: GENERATE_CRASH_HISTORY_USE_CASE,
      useFactory: (
        paginator: HistoryPaginator,
        envelopes: ResponseEnvelopeBuilder,
      ): GenerateCrashHistoryUseCase => new GenerateCrashHistoryUseCase(paginator, envelopes),
      inject: [HISTORY_PAGINATOR, RESPONSE_ENVELOPE_BUILDER],
    },
    {
      provide: GENERATE_RECENT_HISTORY_USE_CASE,
      useFactory: (
        records: GameRecordFactory,
        envelopes: ResponseEnvelopeBuilder,
      ): GenerateRecentHistoryUseCase => new GenerateRecentHistoryUseCase(records, envelopes),
      inject: [GAME_RECORD_FACTORY, RESPONSE_ENVELOPE_BUILDER],
    },
    {
      provide: GENERATE_MOCK_DATA_USE_CASE,
      useFactory: (
        crashHistory: GenerateCrashHistoryUseCase,
        recentHistory: GenerateRecentHistoryUseCase,
        writer: EnvelopeWriter,
        logger: Logger,
      ): GenerateMockDataUseCase =>
        new GenerateMockDataUseCase(crashHistory, recentHistory, writer, logger),
      inject: [
        GENERATE_CRASH_HISTORY_USE_CASE,
        GENERATE_RECENT_HISTORY_USE_CASE,
        ENVELOPE_WRITER,
        LOGGER,
      ],
    },
  ],
  exports: [
    GENERATE_CRASH_HISTORY_USE_CASE,
    GENERATE_RECENT_HISTORY_USE_CASE,
    GENERATE_MOCK_DATA_USE_CASE,
  ],
})
export class HistoryModule {}
