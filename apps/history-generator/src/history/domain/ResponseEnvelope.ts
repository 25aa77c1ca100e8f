import { Clock } from '@shared/ports/Clock';
import { PageResult } from './HistoryPaginator';
import { PagedRecord, RecentRecord } from './GameRecord';

export const SUCCESS_CODE = 200;

export interface ResponseEnvelope<T> {
  data: T;
  msg: string;
  code: number;
  success: boolean;
  timestamp: number;
  /** Always true: marks the payload as synthetic. */
  generated: true;
}

export interface PagedHistoryData {
  items: PagedRecord[];
  total: number;
  page: number;
  pageSize: number;
}

export type PagedHistoryEnvelope = ResponseEnvelope<PagedHistoryData>;
export type RecentHistoryEnvelope = ResponseEnvelope<RecentRecord[]>;

export class ResponseEnvelopeBuilder {
  constructor(private readonly clock: Clock) {}

  paged(result: PageResult): PagedHistoryEnvelope {
    return this.wrap({
      items: [...result.items],
      total: result.total,
      page: result.page,
      pageSize: result.pageSize,
    });
  }

  recent(records: readonly RecentRecord[]): RecentHistoryEnvelope {
    // Rebuild each record so nothing beyond the recent shape leaks into data
    return this.wrap(
      records.map(({ gameId, crashPoint, hash }) => ({ gameId, crashPoint, hash })),
    );
  }

  private wrap<T>(data: T): ResponseEnvelope<T> {
    return {
      data,
      msg: '',
      code: SUCCESS_CODE,
      success: true,
      timestamp: this.clock.now(),
      generated: true,
    };
  }
}
