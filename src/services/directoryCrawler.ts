import fs from 'fs';
import { hasRetriesLeft, type EngineContext } from './engine.js';
import { FileTransfer } from './fileTransfer.js';
import { parseListing } from './listingParser.js';
import { NetworkError, TooManyRedirectsError, type ListingResponse } from './transport.js';
import { isBelow, joinInside, toLocalSegment } from '../utils/paths.js';
import type { RemoteEntry } from '../types.js';

/**
 * Depth-first, pre-order walk of a remote directory index.
 * Child URLs resolve against the listing URL; local directories mirror the hrefs.
 */
export class DirectoryCrawler {
  private readonly transfer: FileTransfer;

  constructor(private readonly context: EngineContext) {
    this.transfer = new FileTransfer(context);
  }

  /**
   * Count files below `url`. Advisory only: unreachable or failing
   * subtrees count as zero and never reach the session log.
   */
  async count(url: string, depth: number = 0): Promise<number> {
    const { transport, control, settings } = this.context;
    if (control.isCanceled || depth > settings.maxDepth) {
      return 0;
    }

    let entries: RemoteEntry[];
    try {
      const response = await transport.fetchListing(url);
      if (response.statusCode !== 200) {
        return 0;
      }
      entries = parseListing(response.body);
    } catch (error) {
      console.error(`[DirectoryCrawler] Count skipped ${url}:`, error instanceof Error ? error.message : String(error));
      return 0;
    }

    let total = 0;
    for (const entry of entries) {
      if (entry.isDirectory) {
        const child = childUrl(url, entry);
        total += child === null ? 0 : await this.count(child, depth + 1);
      } else {
        total += 1;
      }
    }
    return total;
  }

  /**
   * Mirror `url` into `destDir`, delegating each file to FileTransfer
   * and recursing into subdirectories before moving to the next sibling.
   */
  async walk(url: string, destDir: string, depth: number = 0): Promise<void> {
    const { control, observer, settings } = this.context;
    await control.waitWhilePaused();
    if (control.isCanceled) {
      return;
    }
    if (depth > settings.maxDepth) {
      observer.emit({ type: 'log', message: `Skipping ${url}: deeper than ${settings.maxDepth} levels` });
      return;
    }

    const response = await this.fetchListingWithRetry(url);
    if (response === null) {
      return;
    }
    if (response.statusCode !== 200) {
      if (response.statusCode === 401) {
        observer.emit({ type: 'log', message: `Authentication required for ${url}. Please enter username and password.` });
      }
      observer.emit({ type: 'log', message: `Failed to access ${url}: ${response.statusCode}` });
      return;
    }

    await fs.promises.mkdir(destDir, { recursive: true });

    for (const entry of parseListing(response.body)) {
      await control.waitWhilePaused();
      if (control.isCanceled) {
        return;
      }

      const fullUrl = childUrl(url, entry);
      if (fullUrl === null) {
        observer.emit({ type: 'log', message: `Skipping link outside ${url}: ${entry.name}` });
        continue;
      }

      if (entry.isDirectory) {
        const name = toLocalSegment(localName(entry));
        const localPath = name === null ? null : joinInside(destDir, name);
        if (localPath === null) {
          observer.emit({ type: 'log', message: `Skipping directory with unusable name: ${entry.name}` });
          continue;
        }
        observer.emit({ type: 'log', message: `Entering directory: ${localPath}` });
        await this.walk(fullUrl, localPath, depth + 1);
      } else {
        observer.emit({ type: 'log', message: `Downloading file: ${entry.name} from ${fullUrl}` });
        await this.transfer.run(fullUrl, destDir);
      }
    }
  }

  /**
   * Fetch a listing, retrying network failures after the configured delay.
   * Null means canceled or out of retries.
   */
  private async fetchListingWithRetry(url: string): Promise<ListingResponse | null> {
    const { transport, control, observer, settings } = this.context;
    let failures = 0;

    while (!control.isCanceled) {
      try {
        return await transport.fetchListing(url);
      } catch (error) {
        if (error instanceof TooManyRedirectsError) {
          observer.emit({ type: 'log', message: error.message });
          return null;
        }
        if (!(error instanceof NetworkError)) {
          throw error;
        }

        failures++;
        if (!hasRetriesLeft(settings, failures)) {
          observer.emit({ type: 'log', message: `Giving up on directory ${url} after ${failures} failed attempts: ${error.message}` });
          return null;
        }

        observer.emit({
          type: 'log',
          message: `Network issue encountered for directory ${url}: ${error.message}. Retrying in ${settings.retryDelayMs / 1000} seconds...`
        });
        await control.sleep(settings.retryDelayMs);
      }
    }
    return null;
  }
}

/**
 * Resolve an href against its listing. Null for links that do not
 * resolve or that point outside the listing's directory.
 */
function childUrl(parentUrl: string, entry: RemoteEntry): string | null {
  let resolved: string;
  try {
    resolved = new URL(entry.name, parentUrl).toString();
  } catch {
    return null;
  }
  return isBelow(parentUrl, resolved) ? resolved : null;
}

/**
 * Last segment of an entry's href with any query, fragment
 * or trailing slash removed, still percent-encoded.
 */
function localName(entry: RemoteEntry): string {
  const bare = entry.name.replace(/[?#].*$/, '').replace(/\/+$/, '');
  const segments = bare.split('/');
  return segments[segments.length - 1] ?? bare;
}
