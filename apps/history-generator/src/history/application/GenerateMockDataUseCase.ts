import { Logger } from '@shared/ports/Logger';
import { EnvelopeWriter } from './ports/EnvelopeWriter';
import { GenerateCrashHistoryUseCase } from './GenerateCrashHistoryUseCase';
import { GenerateRecentHistoryUseCase } from './GenerateRecentHistoryUseCase';
import { GenerateMockDataCommand } from './commands/GenerateMockDataCommand';
import { GeneratedFile, GenerateMockDataResult } from './commands/GenerateMockDataResult';

export const DEFAULT_HISTORY_OUTPUT = 'crash_history.json';
export const DEFAULT_RECENT_OUTPUT = 'recent_history.json';

export class GenerateMockDataUseCase {
  constructor(
    private readonly crashHistory: GenerateCrashHistoryUseCase,
    private readonly recentHistory: GenerateRecentHistoryUseCase,
    private readonly writer: EnvelopeWriter,
    private readonly logger: Logger,
  ) {}

  async execute(command: GenerateMockDataCommand): Promise<GenerateMockDataResult> {
    const both = !command.history && !command.recent;
    const files: GeneratedFile[] = [];

    if (command.history || both) {
      const envelope = this.crashHistory.execute({
        count: command.count,
        page: command.page,
        pageSize: command.pageSize,
        total: command.total,
      });
      const destination = command.output ?? DEFAULT_HISTORY_OUTPUT;
      await this.writer.write(envelope, destination, { pretty: command.pretty });
      files.push({ kind: 'history', destination, itemCount: envelope.data.items.length });
    }

    if (command.recent || both) {
      const envelope = this.recentHistory.execute({ count: command.count });
      // --output names the recent file only when recent history is the sole target
      const destination =
        command.recent && !command.history && command.output ? command.output : DEFAULT_RECENT_OUTPUT;
      await this.writer.write(envelope, destination, { pretty: command.pretty });
      files.push({ kind: 'recent', destination, itemCount: envelope.data.length });
    }

    this.logger.info('Mock data generation complete', {
      files: files.map((f) => f.destination),
    });

    return { files };
  }
}
