export interface RawRecord {
  source: string;
  title: string;
  company: string;
  description: string;
  url: string;
  type?: string;
  score?: number;
  extras?: Record<string, unknown>;
}

export interface SourceManifest {
  id: string;
  name: string;
  version: string;
}

export interface CollectOptions {
  limit?: number;
}

export interface CollectResult {
  records: RawRecord[];
  /** Sub-requests that failed while the source still returned what it gathered. */
  warnings: string[];
}

export interface Source {
  manifest: SourceManifest;
  collect(options?: CollectOptions): Promise<CollectResult>;
}
