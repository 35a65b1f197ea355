export type ExportKind = 'json' | 'csv' | 'xml' | 'reports';

export interface ExportStore {
  /** Writes `contents` and returns the absolute path of the written file. */
  write: (kind: ExportKind, filename: string, extension: string, contents: string) => Promise<string>;
}
