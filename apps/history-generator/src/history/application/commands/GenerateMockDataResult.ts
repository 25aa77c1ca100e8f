export type GeneratedKind = 'history' | 'recent';

export interface GeneratedFile {
  kind: GeneratedKind;
  destination: string;
  itemCount: number;
}

export interface GenerateMockDataResult {
  files: GeneratedFile[];
}
