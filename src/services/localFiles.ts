import fs from 'fs';
import path from 'path';
import { LEDGER_FILENAME } from './completionLedger.js';
import type { LocalFile } from '../types.js';

/**
 * Scan a mirrored directory and list every file with its size (recursively).
 * The completion ledger itself is left out.
 * @returns Empty when the directory does not exist
 */
export async function scanDirectory(dirPath: string): Promise<LocalFile[]> {
  if (!fs.existsSync(dirPath)) {
    return [];
  }

  const files: LocalFile[] = [];
  const entries = await fs.promises.readdir(dirPath, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = path.join(dirPath, entry.name);

    if (entry.isFile()) {
      if (entry.name === LEDGER_FILENAME) continue;
      const stats = await fs.promises.stat(fullPath);
      files.push({
        name: entry.name,
        size: stats.size,
        path: fullPath
      });
    } else if (entry.isDirectory()) {
      files.push(...await scanDirectory(fullPath));
    }
  }

  return files;
}
