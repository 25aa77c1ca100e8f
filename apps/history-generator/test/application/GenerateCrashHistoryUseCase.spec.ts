import { GenerateCrashHistoryUseCase } from '@history/application/GenerateCrashHistoryUseCase';
import { HistoryPaginator } from '@history/domain/HistoryPaginator';
import { ResponseEnvelopeBuilder } from '@history/domain/ResponseEnvelope';
import { SeededRandomSource } from '@rng/domain/SeededRandomSource';
import { FixedClock, TEST_NOW } from '../helpers/fakes';
import { createRecordFactory } from '../helpers/factories';

describe('GenerateCrashHistoryUseCase', () => {
  let paginator: HistoryPaginator;
  let useCase: GenerateCrashHistoryUseCase;

  beforeEach(() => {
    const clock = new FixedClock(TEST_NOW);
    const random = new SeededRandomSource(17);
    paginator = new HistoryPaginator(createRecordFactory(random, clock), random);
    useCase = new GenerateCrashHistoryUseCase(paginator, new ResponseEnvelopeBuilder(clock));
  });

  it('builds a paged envelope', () => {
    const envelope = useCase.execute({ count: 200, page: 3, pageSize: 50 });

    expect(envelope.msg).toBe('');
    expect(envelope.code).toBe(200);
    expect(envelope.success).toBe(true);
    expect(envelope.generated).toBe(true);
    expect(envelope.timestamp).toBe(TEST_NOW);
    expect(envelope.data.total).toBe(200);
    expect(envelope.data.page).toBe(3);
    expect(envelope.data.pageSize).toBe(50);
    expect(envelope.data.items).toHaveLength(50);
  });

  it('resolves a fresh total when none is given', () => {
    const paginate = jest.spyOn(paginator, 'paginate');
    const paginateWithin = jest.spyOn(paginator, 'paginateWithin');

    useCase.execute({ count: 10, page: 1, pageSize: 20 });

    expect(paginate).toHaveBeenCalledWith(10, 1, 20);
    expect(paginateWithin).toHaveBeenCalledTimes(1);
  });

  it('uses the authoritative total when given', () => {
    const resolveTotal = jest.spyOn(paginator, 'resolveTotal');

    const envelope = useCase.execute({ count: 10, page: 2, pageSize: 20, total: 30 });

    expect(resolveTotal).not.toHaveBeenCalled();
    expect(envelope.data.total).toBe(30);
    expect(envelope.data.items).toHaveLength(10);
  });

  it('keeps total stable across pages of a fixed dataset', () => {
    const totals = [1, 2, 3].map(
      (page) => useCase.execute({ count: 50, page, pageSize: 25, total: 60 }).data.total,
    );
    expect(totals).toEqual([60, 60, 60]);
  });
});
