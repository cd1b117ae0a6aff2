/**
 * A product as returned by an archive search. Only `supplierId` and
 * `downloadUrl` matter to the downloader; every other field is carried along
 * untouched so completion records hand back the full search result.
 */
export interface ArchiveProduct {
  supplierId: string;
  downloadUrl?: string;
  [field: string]: unknown;
}

/**
 * Operations the bulk downloader needs from the remote archive.
 */
export interface ArchiveClient {
  /** Submit a long-term archive request, resolving to its request id. */
  request(product: ArchiveProduct): Promise<string>;
  /** Resolve to the download url once the request is complete, otherwise null. */
  isRequestReady(requestId: string): Promise<string | null>;
  /** Transfer the product's bytes to `outputPath`. */
  download(product: ArchiveProduct, outputPath: string): Promise<void>;
}

export interface CompletionRecord {
  product: ArchiveProduct;
  path: string;
}

export interface CompletionSink {
  put(record: CompletionRecord): void;
}

export interface ProgressSnapshot {
  downloadsPending: number;
  downloadsInProgress: number;
  requestsPending: number;
}

export interface FailedDownload {
  product: ArchiveProduct;
  path: string;
  error: string;
}

export interface BulkDownloaderStats extends ProgressSnapshot {
  outstanding: number;
  completed: number;
  failed: number;
  failedItems: FailedDownload[];
}

export type SessionState = 'unstarted' | 'running' | 'shutting-down';

export interface BulkDownloaderOptions {
  /** Number of download workers. */
  parallel?: number;
  /** Receives a record for every finished download. */
  completionSink?: CompletionSink;
  /** ms between sweeps over the outstanding archive requests. */
  pollInterval?: number;
  /** ms an idle worker waits before checking the ready queue again. */
  idleDelay?: number;
  maxConcurrentPolls?: number;
  monitor?: boolean;
  monitorInterval?: number;
  /** Start the background loops from the constructor. Defaults to true. */
  autoStart?: boolean;
}

export interface BulkDownloaderEvents {
  requested: (product: ArchiveProduct, requestId: string) => void;
  ready: (product: ArchiveProduct, requestId: string) => void;
  completed: (record: CompletionRecord) => void;
  failed: (product: ArchiveProduct, error: unknown) => void;
  progress: (snapshot: ProgressSnapshot) => void;
}

export type SensorType = 'All' | 'SAR' | 'Optical';

export interface SearchQuery {
  /** Area of interest as WKT. */
  wkt: string;
  /** ISO 8601 start of the acquisition window. */
  startDate: string;
  endDate: string;
  sensor?: SensorType;
  satelliteName?: string;
  sourceGroup?: string;
  filters?: Record<string, unknown>;
}

export interface SearchResult {
  products: ArchiveProduct[];
  [field: string]: unknown;
}

export interface ArchiveCredentials {
  username: string;
  password: string;
}

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export interface DownloaderConfig {
  outputDir: string;
  logLevel: LogLevelName;
  download: {
    parallel: number;
    pollInterval: number;
    idleDelay: number;
    maxConcurrentPolls: number;
    monitor: boolean;
    monitorInterval: number;
  };
  api: {
    baseUrl: string;
    retryAttempts: number;
    downloadTimeout: number;
  };
}
