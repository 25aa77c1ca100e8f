import { RandomSource, integerInSpan } from '@rng/domain/RandomSource';
import { GameRecordFactory } from './GameRecordFactory';
import { PagedRecord } from './GameRecord';

export interface PageResult {
  readonly items: readonly PagedRecord[];
  readonly total: number;
  readonly page: number;
  readonly pageSize: number;
}

export interface PageBounds {
  readonly startIndex: number;
  readonly endIndex: number;
}

/**
 * Inputs are not validated here: zero or negative page/pageSize produce
 * whatever bounds the arithmetic gives, clamped to an empty page.
 */
export class HistoryPaginator {
  constructor(
    private readonly records: GameRecordFactory,
    private readonly random: RandomSource,
  ) {}

  static bounds(total: number, page: number, pageSize: number): PageBounds {
    const startIndex = (page - 1) * pageSize;
    const endIndex = Math.min(startIndex + pageSize, total);
    return { startIndex, endIndex };
  }

  /**
   * `count` wins when it already covers the requested page; otherwise the
   * total is padded past the page end by a jitter in [0, pageSize).
   */
  resolveTotal(count: number, page: number, pageSize: number): number {
    const pageEnd = page * pageSize;
    if (count > pageEnd) return count;
    return pageEnd + integerInSpan(this.random, 0, pageSize);
  }

  /** Fresh total per call: two calls with the same arguments may disagree. */
  paginate(count: number, page: number, pageSize: number): PageResult {
    return this.paginateWithin(this.resolveTotal(count, page, pageSize), page, pageSize);
  }

  /** Slices a page out of a dataset whose total has already been fixed. */
  paginateWithin(total: number, page: number, pageSize: number): PageResult {
    const { startIndex, endIndex } = HistoryPaginator.bounds(total, page, pageSize);
    const size = Math.max(0, endIndex - startIndex);

    const items: PagedRecord[] = [];
    for (let i = 0; i < size; i++) {
      items.push(this.records.createPaged());
    }

    return { items, total, page, pageSize };
  }
}
