import { Module } from '@nestjs/common';
import { LoggerModule, PinoLogger } from 'nestjs-pino';
import { GeneratorConfigModule } from '@config/config.module';
import { VALIDATED_ENV } from '@config/env-config.provider';
import { RawGeneratorConfig } from '@config/generator-config.schema';
import { Logger } from '@shared/ports/Logger';
import { LOGGER } from '@shared/tokens';
import { PinoLoggerAdapter } from './PinoLoggerAdapter';

@Module({
  imports: [
    LoggerModule.forRootAsync({
      imports: [GeneratorConfigModule],
      inject: [VALIDATED_ENV],
      useFactory: (env: RawGeneratorConfig) => ({
        pinoHttp: {
          level: env.LOG_LEVEL,
          autoLogging: false,
          transport:
            env.NODE_ENV !== 'production'
              ? { target: 'pino-pretty', options: { colorize: true } }
              : undefined,
        },
      }),
    }),
  ],
  providers: [
    {
      provide: LOGGER,
      useFactory: (pino: PinoLogger): Logger => {
        pino.setContext('HistoryGenerator');
        return new PinoLoggerAdapter(pino);
      },
      inject: [PinoLogger],
    },
  ],
  exports: [LOGGER],
})
export class LoggingModule {}
