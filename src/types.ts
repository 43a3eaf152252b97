// Type definitions for the application

export interface RemoteEntry {
  name: string;
  isDirectory: boolean;
}

export interface TransferTarget {
  sourceUrl: string;
  destinationPath: string;
}

export interface Credentials {
  username?: string;
  password?: string;
}

export interface SessionState {
  isPaused: boolean;
  isCanceled: boolean;
  totalFiles: number;
  downloadedFiles: number;
  skippedFiles: number;
  failedFiles: number;
  totalBytes: number;
}

export type TransferOutcome =
  | 'completed'
  | 'skipped'
  | 'failed-permanent'
  | 'canceled';

export type SessionOutcome = 'completed' | 'canceled' | 'failed';

/**
 * Events pushed from a running session to whoever drives it (HTTP layer, tests).
 * Exactly one of `completed`, `canceled` or `failed` ends a run.
 */
export type SessionEvent =
  | { type: 'file-progress'; percent: number }
  | { type: 'overall-progress'; percent: number }
  | { type: 'log'; message: string }
  | { type: 'file-count'; total: number }
  | { type: 'time-remaining'; text: string }
  | { type: 'completed' }
  | { type: 'canceled' }
  | { type: 'failed'; message: string };

export interface DownloadRequest {
  url: string;
  outputDir?: string;
  username?: string;
  password?: string;
  singleFile?: boolean;
}

export interface LocalFile {
  name: string;
  size: number;
  path: string;
}
