import { EventEmitter } from 'events';
import path from 'path';
import fs from 'fs';
import { CompletionLedger } from './completionLedger.js';
import { ControlState } from './controlState.js';
import { DirectoryCrawler } from './directoryCrawler.js';
import type { EngineContext, EngineSettings, TransferObserver } from './engine.js';
import { FileTransfer } from './fileTransfer.js';
import type { Transport } from './transport.js';
import { formatDuration, formatMegabytes, toPercent } from '../utils/formatters.js';
import type {
  Credentials,
  SessionEvent,
  SessionOutcome,
  SessionState,
  TransferTarget
} from '../types.js';

export interface StartOptions {
  url: string;
  destDir: string;
  credentials?: Credentials;
  /** Defaults to true when the URL does not end in "/" */
  singleFileMode?: boolean;
}

export interface DownloadSessionOptions {
  transport: Transport;
  settings: EngineSettings;
  now?: () => number;
}

/**
 * One mirror run: count, then walk, then a single terminal event.
 * Events are emitted on 'event' in the order the work completes.
 */
export class DownloadSession extends EventEmitter {
  private readonly control = new ControlState();
  private readonly now: () => number;
  private running = false;
  private finished = false;

  private totalFiles = 0;
  private downloadedFiles = 0;
  private skippedFiles = 0;
  private failedFiles = 0;
  private totalBytes = 0;
  private readonly pendingFailures: string[] = [];

  constructor(private readonly options: DownloadSessionOptions) {
    super();
    this.now = options.now ?? (() => Date.now());
  }

  /**
   * Run the whole pipeline. Errors inside the pipeline do not reject;
   * they end the run with a 'failed' event.
   */
  async start(options: StartOptions): Promise<SessionOutcome> {
    if (this.running || this.finished) {
      throw new Error('A download session can only be started once');
    }
    this.running = true;

    let outcome: SessionOutcome;
    try {
      await this.execute(options);
      outcome = this.control.isCanceled ? 'canceled' : 'completed';
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error('[DownloadSession] Run failed:', error);
      this.push({ type: 'log', message: `An error occurred: ${message}` });
      this.push({ type: 'failed', message });
      outcome = 'failed';
    } finally {
      this.running = false;
      this.finished = true;
    }

    if (outcome === 'canceled') {
      this.push({ type: 'log', message: 'Download canceled.' });
      this.push({ type: 'canceled' });
    } else if (outcome === 'completed') {
      if (this.pendingFailures.length > 0) {
        this.push({ type: 'log', message: `Files that could not be downloaded: ${this.pendingFailures.join(', ')}` });
      }
      this.push({ type: 'log', message: 'Download complete.' });
      this.push({ type: 'completed' });
    }
    return outcome;
  }

  pause(): void {
    this.control.pause();
  }

  resume(): void {
    this.control.resume();
  }

  cancel(): void {
    this.control.cancel();
  }

  get isRunning(): boolean {
    return this.running;
  }

  getState(): SessionState {
    return {
      isPaused: this.control.isPaused,
      isCanceled: this.control.isCanceled,
      totalFiles: this.totalFiles,
      downloadedFiles: this.downloadedFiles,
      skippedFiles: this.skippedFiles,
      failedFiles: this.failedFiles,
      totalBytes: this.totalBytes
    };
  }

  getPendingFailures(): string[] {
    return [...this.pendingFailures];
  }

  private async execute(options: StartOptions): Promise<void> {
    const destRoot = path.resolve(options.destDir);
    await fs.promises.mkdir(destRoot, { recursive: true });

    const context: EngineContext = {
      transport: this.options.transport,
      ledger: CompletionLedger.load(destRoot),
      control: this.control,
      observer: this.createObserver(),
      settings: this.options.settings,
      credentials: options.credentials,
      now: this.now
    };

    const singleFileMode = options.singleFileMode ?? !options.url.endsWith('/');
    if (singleFileMode) {
      this.totalFiles = 1;
      this.push({ type: 'file-count', total: 1 });
      await new FileTransfer(context).run(options.url, destRoot);
      return;
    }

    const crawler = new DirectoryCrawler(context);
    this.totalFiles = await crawler.count(options.url);
    if (this.control.isCanceled) {
      return;
    }
    this.push({ type: 'file-count', total: this.totalFiles });
    this.push({ type: 'log', message: `Total files to download: ${this.totalFiles}` });

    await crawler.walk(options.url, destRoot);
  }

  private createObserver(): TransferObserver {
    return {
      emit: event => this.push(event),
      fileSkipped: () => {
        this.skippedFiles++;
        this.pushOverallProgress();
      },
      fileCompleted: (target: TransferTarget, bytes: number, elapsedMs: number) => {
        this.downloadedFiles++;
        this.totalBytes += bytes;
        this.pushOverallProgress();

        this.push({
          type: 'log',
          message: `Downloaded: ${target.destinationPath} (${this.downloadedFiles}/${this.totalFiles}) - ${formatMegabytes(bytes)}`
        });

        const remainingFiles = this.totalFiles - this.finishedFiles();
        this.push({
          type: 'time-remaining',
          text: `Overall time remaining: ${formatDuration((elapsedMs / 1000) * remainingFiles)}`
        });
      },
      fileFailed: (url: string) => {
        this.failedFiles++;
        this.pendingFailures.push(url);
        this.pushOverallProgress();
      }
    };
  }

  /**
   * Files that reached a final state this run: downloaded, skipped or failed
   */
  private finishedFiles(): number {
    return this.downloadedFiles + this.skippedFiles + this.failedFiles;
  }

  private pushOverallProgress(): void {
    const finished = this.finishedFiles();
    // a listing can grow between the count and the walk
    if (finished > this.totalFiles) {
      this.totalFiles = finished;
      this.push({ type: 'file-count', total: this.totalFiles });
    }
    this.push({
      type: 'overall-progress',
      percent: toPercent(finished, this.totalFiles)
    });
  }

  private push(event: SessionEvent): void {
    this.emit('event', event);
  }
}
