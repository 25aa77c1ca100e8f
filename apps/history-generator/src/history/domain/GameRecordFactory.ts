import { CrashPointSampler } from './CrashPointSampler';
import { GameIdSampler } from './GameIdSampler';
import { HashSampler } from './HashSampler';
import { TimestampSampler } from './TimestampSampler';
import { GameRecord, PagedRecord, RecentRecord } from './GameRecord';

export class GameRecordFactory {
  constructor(
    private readonly gameIds: GameIdSampler,
    private readonly crashPoints: CrashPointSampler,
    private readonly hashes: HashSampler,
    private readonly timestamps: TimestampSampler,
  ) {}

  create(includeTimestamp: true): PagedRecord;
  create(includeTimestamp: false): RecentRecord;
  create(includeTimestamp: boolean): GameRecord;
  create(includeTimestamp: boolean): GameRecord {
    return includeTimestamp ? this.createPaged() : this.createRecent();
  }

  createRecent(): RecentRecord {
    return Object.freeze({
      gameId: this.gameIds.sample(),
      crashPoint: this.crashPoints.sample().value,
      hash: this.hashes.sample(),
    });
  }

  createPaged(): PagedRecord {
    // Timestamp is drawn first so seeded runs line up with the legacy draw order
    const timestamp = this.timestamps.sample();
    return Object.freeze({
      gameId: this.gameIds.sample(),
      crashPoint: this.crashPoints.sample().value,
      hash: this.hashes.sample(),
      timestamp,
    });
  }
}
