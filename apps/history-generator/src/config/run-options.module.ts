import { DynamicModule, Module } from '@nestjs/common';
import { CrashDistribution } from '@shared/kernel/GeneratorConfig';

export const RUN_OPTIONS = 'RUN_OPTIONS';

/** Per-invocation overrides taken from the command line. */
export interface RunOptions {
  seed?: number;
  distribution?: CrashDistribution;
}

@Module({})
export class RunOptionsModule {
  static register(options: RunOptions): DynamicModule {
    return {
      module: RunOptionsModule,
      global: true,
      providers: [{ provide: RUN_OPTIONS, useValue: options }],
      exports: [RUN_OPTIONS],
    };
  }
}
