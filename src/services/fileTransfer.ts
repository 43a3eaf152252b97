import fs from 'fs';
import path from 'path';
import { hasRetriesLeft, type EngineContext } from './engine.js';
import { NetworkError, type StreamResponse } from './transport.js';
import { formatDuration, toPercent } from '../utils/formatters.js';
import { joinInside, toLocalSegment } from '../utils/paths.js';
import type { TransferOutcome, TransferTarget } from '../types.js';

type OkStream = Extract<StreamResponse, { kind: 'ok' }>;

/**
 * Destination is `<destDir>/<last path segment of the source URL>`.
 * Null when that name cannot be placed inside `destDir`.
 */
export function resolveTarget(sourceUrl: string, destDir: string): TransferTarget | null {
  const segments = new URL(sourceUrl).pathname.split('/');
  const lastSegment = segments[segments.length - 1] ?? '';
  const filename = lastSegment === '' ? 'index.html' : toLocalSegment(lastSegment);
  const destinationPath = filename === null ? null : joinInside(destDir, filename);
  if (destinationPath === null) {
    return null;
  }
  return { sourceUrl, destinationPath };
}

/**
 * Downloads one file:
 * Pending -> Streaming -> Completed | Skipped | FailedPermanent | Canceled,
 * with FailedRetrying looping back into Streaming after a delay.
 */
export class FileTransfer {
  constructor(private readonly context: EngineContext) {}

  async run(sourceUrl: string, destDir: string): Promise<TransferOutcome> {
    const { transport, ledger, control, observer, settings, credentials } = this.context;

    await control.waitWhilePaused();
    if (control.isCanceled) {
      return 'canceled';
    }

    const target = resolveTarget(sourceUrl, destDir);
    if (target === null) {
      observer.emit({ type: 'log', message: `Skipping ${sourceUrl}: file name leaves ${destDir}` });
      observer.fileFailed(sourceUrl);
      return 'failed-permanent';
    }
    if (ledger.contains(target.destinationPath)) {
      observer.emit({ type: 'log', message: `Skipping already downloaded file: ${target.destinationPath}` });
      observer.fileSkipped(target);
      return 'skipped';
    }

    const startedAt = this.context.now();
    let url = sourceUrl;
    let hops = 0;
    let failures = 0;

    while (true) {
      await control.waitWhilePaused();
      if (control.isCanceled) {
        return 'canceled';
      }

      try {
        const response = await transport.openStream(url, credentials);

        if (response.kind === 'redirect') {
          hops++;
          if (hops > settings.maxRedirects) {
            observer.emit({ type: 'log', message: `Too many redirects for ${sourceUrl} (limit ${settings.maxRedirects})` });
            observer.fileFailed(url);
            return 'failed-permanent';
          }
          observer.emit({ type: 'log', message: `Redirected to: ${response.location}` });
          url = response.location;
          continue;
        }

        if (response.kind === 'status') {
          if (response.statusCode === 401) {
            observer.emit({ type: 'log', message: `Authentication required for ${url}. Please enter username and password.` });
          }
          observer.emit({ type: 'log', message: `Failed to download ${url}: ${response.statusCode}` });
          observer.fileFailed(url);
          return 'failed-permanent';
        }

        const written = await this.stream(response, target);
        if (written === null) {
          return 'canceled';
        }

        ledger.record(target.destinationPath);
        observer.fileCompleted(target, written, this.context.now() - startedAt);
        return 'completed';
      } catch (error) {
        if (!(error instanceof NetworkError)) {
          throw error;
        }

        failures++;
        if (!hasRetriesLeft(settings, failures)) {
          observer.emit({ type: 'log', message: `Giving up on ${url} after ${failures} failed attempts: ${error.message}` });
          observer.fileFailed(url);
          return 'failed-permanent';
        }

        const delaySeconds = settings.retryDelayMs / 1000;
        observer.emit({
          type: 'log',
          message: `Network issue encountered for ${url}: ${error.message}. Retrying in ${delaySeconds} seconds...`
        });
        await control.sleep(settings.retryDelayMs);
      }
    }
  }

  /**
   * Write chunks to disk, checking pause/cancel before each one.
   * Returns bytes written, or null when canceled mid-stream (partial file is kept).
   */
  private async stream(response: OkStream, target: TransferTarget): Promise<number | null> {
    const { control, observer } = this.context;
    const { totalBytes } = response;

    await fs.promises.mkdir(path.dirname(target.destinationPath), { recursive: true });
    const file = await fs.promises.open(target.destinationPath, 'w');

    const streamStart = this.context.now();
    let written = 0;
    let lastPercent = -1;

    try {
      for await (const chunk of response.chunks) {
        await control.waitWhilePaused();
        if (control.isCanceled) {
          response.discard();
          return null;
        }

        await file.write(chunk);
        written += chunk.length;

        if (totalBytes > 0) {
          const percent = toPercent(written, totalBytes);
          if (percent !== lastPercent) {
            lastPercent = percent;
            observer.emit({ type: 'file-progress', percent });

            const elapsedSeconds = (this.context.now() - streamStart) / 1000;
            const remaining = elapsedSeconds * Math.max(0, totalBytes - written) / written;
            observer.emit({
              type: 'time-remaining',
              text: `Time remaining for current file: ${formatDuration(remaining)}`
            });
          }
        }
      }
    } finally {
      await file.close();
    }

    return written;
  }
}
