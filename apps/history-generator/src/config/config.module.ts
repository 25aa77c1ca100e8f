import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import {
  validatedEnvProvider,
  generatorConfigProvider,
  VALIDATED_ENV,
  GENERATOR_CONFIG,
} from './env-config.provider';

@Module({
  imports: [
    ConfigModule.forRoot({
      envFilePath: ['.env.local', '.env'],
    }),
  ],
  providers: [validatedEnvProvider, generatorConfigProvider],
  exports: [VALIDATED_ENV, GENERATOR_CONFIG],
})
export class GeneratorConfigModule {}
