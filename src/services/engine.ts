import type { AppConfig } from './configManager.js';
import type { CompletionLedger } from './completionLedger.js';
import type { ControlState } from './controlState.js';
import type { Transport } from './transport.js';
import type { Credentials, SessionEvent, TransferTarget } from '../types.js';

export interface EngineSettings {
  retryDelayMs: number;
  maxRetries: number | null;
  maxRedirects: number;
  maxDepth: number;
}

/**
 * Callbacks the session hands to the crawl so counters and events stay in one place
 */
export interface TransferObserver {
  emit(event: SessionEvent): void;
  fileSkipped(target: TransferTarget): void;
  fileCompleted(target: TransferTarget, bytes: number, elapsedMs: number): void;
  fileFailed(url: string): void;
}

export interface EngineContext {
  transport: Transport;
  ledger: CompletionLedger;
  control: ControlState;
  observer: TransferObserver;
  settings: EngineSettings;
  credentials?: Credentials;
  now: () => number;
}

export function settingsFromConfig(config: AppConfig): EngineSettings {
  return {
    retryDelayMs: config.retryDelaySeconds * 1000,
    maxRetries: config.maxRetries,
    maxRedirects: config.maxRedirects,
    maxDepth: config.maxDepth
  };
}

export function hasRetriesLeft(settings: EngineSettings, attempts: number): boolean {
  return settings.maxRetries === null || attempts <= settings.maxRetries;
}
