import fs from 'fs';
import path from 'path';

export const LEDGER_FILENAME = 'download_progress.txt';

/**
 * Append-only record of destination paths that finished downloading.
 * Lives at `<destination root>/download_progress.txt`, one path per line.
 */
export class CompletionLedger {
  private completed: Set<string>;

  private constructor(readonly filePath: string, entries: Iterable<string>) {
    this.completed = new Set(entries);
  }

  /**
   * Load the ledger for a destination root.
   * A missing file is an empty ledger.
   */
  static load(destinationRoot: string): CompletionLedger {
    const filePath = path.join(destinationRoot, LEDGER_FILENAME);
    if (!fs.existsSync(filePath)) {
      return new CompletionLedger(filePath, []);
    }

    const data = fs.readFileSync(filePath, 'utf-8');
    const lines = data
      .split(/\r?\n/)
      .map(line => line.trim())
      .filter(line => line.length > 0);

    console.log(`[CompletionLedger] Loaded ${lines.length} completed entries from ${filePath}`);
    return new CompletionLedger(filePath, lines);
  }

  contains(id: string): boolean {
    return this.completed.has(id);
  }

  /**
   * Record a finished file. The line is fsync'd before this returns.
   */
  record(id: string): void {
    if (this.completed.has(id)) {
      return;
    }

    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const fd = fs.openSync(this.filePath, 'a');
    try {
      fs.writeSync(fd, `${id}\n`);
      fs.fsyncSync(fd);
    } finally {
      fs.closeSync(fd);
    }
    this.completed.add(id);
  }

  get size(): number {
    return this.completed.size;
  }

  entries(): string[] {
    return Array.from(this.completed);
  }
}
