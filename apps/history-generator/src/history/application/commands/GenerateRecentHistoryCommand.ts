export interface GenerateRecentHistoryCommand {
  count: number;
}
