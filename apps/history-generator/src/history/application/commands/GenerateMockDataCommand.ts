export interface GenerateMockDataCommand {
  history: boolean;
  recent: boolean;
  count: number;
  page: number;
  pageSize: number;
  total?: number;
  output?: string;
  pretty: boolean;
}
