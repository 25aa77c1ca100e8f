import { NestFactory } from '@nestjs/core';
import { Logger as NestLogger } from 'nestjs-pino';
import { AppModule } from '../app.module';
import { parseCliArgs, USAGE } from './parseCliArgs';
import { GENERATE_MOCK_DATA_USE_CASE } from '@history/infrastructure/history.module';
import { GenerateMockDataUseCase } from '@history/application/GenerateMockDataUseCase';
import { Logger } from '@shared/ports/Logger';
import { LOGGER } from '@shared/tokens';

export const EXIT_OK = 0;
export const EXIT_INVALID_ARGUMENTS = 2;

export interface CliOutput {
  write(chunk: string): unknown;
}

export interface CliStreams {
  stdout: CliOutput;
  stderr: CliOutput;
}

/**
 * Resolves with the exit code for help and argument errors and for a
 * completed run. Generation failures are logged and rethrown.
 */
export async function runCli(argv: string[], streams: CliStreams = process): Promise<number> {
  const parsed = parseCliArgs(argv);

  if (parsed.kind === 'help') {
    streams.stdout.write(USAGE);
    return EXIT_OK;
  }

  if (parsed.kind === 'invalid') {
    streams.stderr.write(`${parsed.issues.map((issue) => `error: ${issue}`).join('\n')}\n\n${USAGE}`);
    return EXIT_INVALID_ARGUMENTS;
  }

  const app = await NestFactory.createApplicationContext(AppModule.forRun(parsed.runOptions), {
    bufferLogs: true,
  });
  app.useLogger(app.get(NestLogger));

  try {
    const generate = app.get<GenerateMockDataUseCase>(GENERATE_MOCK_DATA_USE_CASE);
    await generate.execute(parsed.command);
  } catch (err) {
    app.get<Logger>(LOGGER).error('Mock data generation failed', { err });
    throw err;
  } finally {
    await app.close();
  }

  return EXIT_OK;
}
