export interface RecentRecord {
  readonly gameId: number;
  readonly crashPoint: number;
  readonly hash: string;
}

export interface PagedRecord extends RecentRecord {
  readonly timestamp: number;
}

export type GameRecord = RecentRecord | PagedRecord;

export function isPagedRecord(record: GameRecord): record is PagedRecord {
  return 'timestamp' in record;
}
