export interface GenerateCrashHistoryCommand {
  count: number;
  page: number;
  pageSize: number;
  /** Authoritative dataset total; when set, no jitter is drawn. */
  total?: number;
}
