import { DynamicModule, Module } from '@nestjs/common';
import { GeneratorConfigModule } from '@config/config.module';
import { RunOptions, RunOptionsModule } from '@config/run-options.module';
import { LoggingModule } from '@shared/infrastructure/logging.module';
import { RngModule } from '@rng/infrastructure/rng.module';
import { HistoryModule } from '@history/infrastructure/history.module';

@Module({})
export class AppModule {
  static forRun(options: RunOptions = {}): DynamicModule {
    return {
      module: AppModule,
      imports: [
        RunOptionsModule.register(options),
        GeneratorConfigModule,
        LoggingModule,
        RngModule,
        HistoryModule,
      ],
    };
  }
}
