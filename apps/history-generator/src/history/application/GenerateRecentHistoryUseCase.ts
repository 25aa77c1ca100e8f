import { GameRecordFactory } from '@history/domain/GameRecordFactory';
import { RecentRecord } from '@history/domain/GameRecord';
import { RecentHistoryEnvelope, ResponseEnvelopeBuilder } from '@history/domain/ResponseEnvelope';
import { GenerateRecentHistoryCommand } from './commands/GenerateRecentHistoryCommand';

export class GenerateRecentHistoryUseCase {
  constructor(
    private readonly records: GameRecordFactory,
    private readonly envelopes: ResponseEnvelopeBuilder,
  ) {}

  execute(command: GenerateRecentHistoryCommand): RecentHistoryEnvelope {
    const items: RecentRecord[] = [];
    for (let i = 0; i < command.count; i++) {
      items.push(this.records.createRecent());
    }
    return this.envelopes.recent(items);
  }
}
