import { HistoryPaginator } from '@history/domain/HistoryPaginator';
import { PagedHistoryEnvelope, ResponseEnvelopeBuilder } from '@history/domain/ResponseEnvelope';
import { GenerateCrashHistoryCommand } from './commands/GenerateCrashHistoryCommand';

export class GenerateCrashHistoryUseCase {
  constructor(
    private readonly paginator: HistoryPaginator,
    private readonly envelopes: ResponseEnvelopeBuilder,
  ) {}

  execute(command: GenerateCrashHistoryCommand): PagedHistoryEnvelope {
    const page =
      command.total === undefined
        ? this.paginator.paginate(command.count, command.page, command.pageSize)
        : this.paginator.paginateWithin(command.total, command.page, command.pageSize);

    return this.envelopes.paged(page);
  }
}
