import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import { DirectoryCrawler } from '../services/directoryCrawler.js';
import { TooManyRedirectsError } from '../services/transport.js';
import { createEngineHarness, type EngineHarness } from './helpers/engineHarness.js';

const ROOT = 'http://mirror.test/pub/';

describe('DirectoryCrawler', () => {
  let harness: EngineHarness;

  beforeEach(async () => {
    harness = await createEngineHarness();
  });

  afterEach(async () => {
    await harness.cleanup();
  });

  describe('count', () => {
    it('counts files across nested listings', async () => {
      harness.remote
        .listing(ROOT, ['a.txt', 'sub/', 'c.txt'])
        .listing(`${ROOT}sub/`, ['b.txt', 'deeper/'])
        .listing(`${ROOT}sub/deeper/`, ['d.txt', 'e.txt']);

      expect(await new DirectoryCrawler(harness.context).count(ROOT)).toBe(5);
    });

    it('counts failing subtrees as zero without logging', async () => {
      harness.remote
        .listing(ROOT, ['a.txt', 'broken/', 'flaky/'])
        .status(`${ROOT}broken/`, 500)
        .listing(`${ROOT}flaky/`, ['x.txt'])
        .failNetwork(`${ROOT}flaky/`, 1);

      expect(await new DirectoryCrawler(harness.context).count(ROOT)).toBe(1);
      expect(harness.events).toEqual([]);
    });

    it('ignores links to the parent directory', async () => {
      harness.remote
        .listing(ROOT, ['/', 'a.txt'])
        .listing('http://mirror.test/', ['pub/', 'secret.txt']);

      expect(await new DirectoryCrawler(harness.context).count(ROOT)).toBe(1);
      expect(harness.remote.requests).toEqual([{ method: 'LISTING', url: ROOT }]);
    });

    it('stops descending past the depth limit', async () => {
      await harness.cleanup();
      harness = await createEngineHarness({ maxDepth: 1 });
      harness.remote
        .listing(ROOT, ['a.txt', 'sub/'])
        .listing(`${ROOT}sub/`, ['b.txt', 'deeper/'])
        .listing(`${ROOT}sub/deeper/`, ['c.txt']);

      expect(await new DirectoryCrawler(harness.context).count(ROOT)).toBe(2);
      expect(harness.remote.requestsFor('LISTING', `${ROOT}sub/deeper/`)).toEqual([]);
    });

    it('returns zero once canceled', async () => {
      harness.remote.listing(ROOT, ['a.txt']);
      harness.control.cancel();

      expect(await new DirectoryCrawler(harness.context).count(ROOT)).toBe(0);
      expect(harness.remote.requests).toEqual([]);
    });
  });

  describe('walk', () => {
    it('mirrors the tree depth-first in listing order', async () => {
      harness.remote
        .listing(ROOT, ['a.txt', 'sub/', 'c.txt'])
        .listing(`${ROOT}sub/`, ['b.txt'])
        .file(`${ROOT}a.txt`, 'alpha')
        .file(`${ROOT}sub/b.txt`, 'bravo')
        .file(`${ROOT}c.txt`, 'charlie');

      await new DirectoryCrawler(harness.context).walk(ROOT, harness.root);

      expect(harness.remote.requests.map(request => `${request.method} ${request.url}`)).toEqual([
        `LISTING ${ROOT}`,
        `STREAM ${ROOT}a.txt`,
        `LISTING ${ROOT}sub/`,
        `STREAM ${ROOT}sub/b.txt`,
        `STREAM ${ROOT}c.txt`
      ]);
      expect(harness.logs()).toEqual([
        `Downloading file: a.txt from ${ROOT}a.txt`,
        `Entering directory: ${path.join(harness.root, 'sub')}`,
        `Downloading file: b.txt from ${ROOT}sub/b.txt`,
        `Downloading file: c.txt from ${ROOT}c.txt`
      ]);
      expect(fs.readFileSync(path.join(harness.root, 'sub', 'b.txt'), 'utf-8')).toBe('bravo');
      expect(harness.ledger.entries()).toEqual([
        path.join(harness.root, 'a.txt'),
        path.join(harness.root, 'sub', 'b.txt'),
        path.join(harness.root, 'c.txt')
      ]);
    });

    it('decodes percent-encoded directory names for the local path', async () => {
      harness.remote
        .listing(ROOT, ['My%20Docs/'])
        .listing(`${ROOT}My%20Docs/`, ['notes.txt'])
        .file(`${ROOT}My%20Docs/notes.txt`, 'hello');

      await new DirectoryCrawler(harness.context).walk(ROOT, harness.root);

      expect(fs.readFileSync(path.join(harness.root, 'My Docs', 'notes.txt'), 'utf-8')).toBe('hello');
    });

    it('follows absolute hrefs only while they stay below the listing', async () => {
      harness.remote
        .listing(ROOT, ['/pub/a.txt', 'http://mirror.test/other/b.txt'])
        .file(`${ROOT}a.txt`, 'a')
        .file('http://mirror.test/other/b.txt', 'b');

      await new DirectoryCrawler(harness.context).walk(ROOT, harness.root);

      expect(fs.readFileSync(path.join(harness.root, 'a.txt'), 'utf-8')).toBe('a');
      expect(fs.existsSync(path.join(harness.root, 'b.txt'))).toBe(false);
      expect(harness.logs()).toContain(`Skipping link outside ${ROOT}: http://mirror.test/other/b.txt`);
    });

    it('never climbs to a parent directory or another host', async () => {
      harness.remote
        .listing(ROOT, ['/', '/pub/', 'http://elsewhere.test/pub/x.txt', 'a.txt'])
        .listing('http://mirror.test/', ['pub/', 'secret.txt'])
        .file('http://mirror.test/secret.txt', 'secret')
        .file('http://elsewhere.test/pub/x.txt', 'x')
        .file(`${ROOT}a.txt`, 'a');

      await new DirectoryCrawler(harness.context).walk(ROOT, harness.root);

      expect(harness.remote.requests.map(request => `${request.method} ${request.url}`)).toEqual([
        `LISTING ${ROOT}`,
        `STREAM ${ROOT}a.txt`
      ]);
      expect(harness.logs()).toEqual([
        `Skipping link outside ${ROOT}: /`,
        `Skipping link outside ${ROOT}: /pub/`,
        `Skipping link outside ${ROOT}: http://elsewhere.test/pub/x.txt`,
        `Downloading file: a.txt from ${ROOT}a.txt`
      ]);
    });

    it('keeps files whose decoded name would escape the destination inside it', async () => {
      harness.remote.listing(ROOT, ['..%2Fescaped.txt']).file(`${ROOT}..%2Fescaped.txt`, 'hello');
      const dest = path.join(harness.root, 'dest');

      await new DirectoryCrawler(harness.context).walk(ROOT, dest);

      expect(fs.existsSync(path.join(harness.root, 'escaped.txt'))).toBe(false);
      expect(fs.readFileSync(path.join(dest, '..%2Fescaped.txt'), 'utf-8')).toBe('hello');
      expect(harness.completed).toEqual([{ path: path.join(dest, '..%2Fescaped.txt'), bytes: 5 }]);
    });

    it('skips encoded dot-dot directories', async () => {
      harness.remote
        .listing(ROOT, ['%2E%2E/'])
        .listing('http://mirror.test/', ['secret.txt'])
        .file('http://mirror.test/secret.txt', 'secret');
      const dest = path.join(harness.root, 'dest');

      await new DirectoryCrawler(harness.context).walk(ROOT, dest);

      expect(harness.logs()).toEqual([`Skipping link outside ${ROOT}: %2E%2E/`]);
      expect(harness.remote.requests).toHaveLength(1);
      expect(fs.existsSync(path.join(harness.root, 'secret.txt'))).toBe(false);
    });

    it('logs a failing subdirectory and carries on with its siblings', async () => {
      harness.remote
        .listing(ROOT, ['bad/', 'c.txt'])
        .status(`${ROOT}bad/`, 500)
        .file(`${ROOT}c.txt`, 'charlie');

      await new DirectoryCrawler(harness.context).walk(ROOT, harness.root);

      expect(harness.logs()).toEqual([
        `Entering directory: ${path.join(harness.root, 'bad')}`,
        `Failed to access ${ROOT}bad/: 500`,
        `Downloading file: c.txt from ${ROOT}c.txt`
      ]);
      expect(fs.existsSync(path.join(harness.root, 'bad'))).toBe(false);
      expect(harness.ledger.contains(path.join(harness.root, 'c.txt'))).toBe(true);
    });

    it('logs authentication failures on listings', async () => {
      harness.remote.status(ROOT, 401);

      await new DirectoryCrawler(harness.context).walk(ROOT, harness.root);

      expect(harness.logs()).toEqual([
        `Authentication required for ${ROOT}. Please enter username and password.`,
        `Failed to access ${ROOT}: 401`
      ]);
    });

    it('retries a listing after a network failure', async () => {
      harness.remote
        .listing(ROOT, ['a.txt'])
        .file(`${ROOT}a.txt`, 'a')
        .failNetwork(ROOT, 1);

      await new DirectoryCrawler(harness.context).walk(ROOT, harness.root);

      expect(harness.remote.requestsFor('LISTING', ROOT)).toHaveLength(2);
      expect(harness.logs()[0]).toBe(
        `Network issue encountered for directory ${ROOT}: connection reset. Retrying in 0 seconds...`
      );
      expect(harness.ledger.size).toBe(1);
    });

    it('gives up on a listing once retries are exhausted', async () => {
      await harness.cleanup();
      harness = await createEngineHarness({ maxRetries: 0 });
      harness.remote.listing(ROOT, ['a.txt']).failNetwork(ROOT, 1);

      await new DirectoryCrawler(harness.context).walk(ROOT, harness.root);

      expect(harness.logs()).toEqual([
        `Giving up on directory ${ROOT} after 1 failed attempts: connection reset`
      ]);
    });

    it('skips a listing stuck in a redirect loop', async () => {
      harness.remote.listing(ROOT, ['loop/', 'a.txt']).file(`${ROOT}a.txt`, 'a');
      harness.remote.crash(`${ROOT}loop/`, new TooManyRedirectsError(`${ROOT}loop/`, 11));

      await new DirectoryCrawler(harness.context).walk(ROOT, harness.root);

      expect(harness.logs()).toContain(`Too many redirects (11) while fetching ${ROOT}loop/`);
      expect(harness.ledger.contains(path.join(harness.root, 'a.txt'))).toBe(true);
    });

    it('does not descend past the depth limit', async () => {
      await harness.cleanup();
      harness = await createEngineHarness({ maxDepth: 1 });
      harness.remote
        .listing(ROOT, ['sub/'])
        .listing(`${ROOT}sub/`, ['deeper/'])
        .listing(`${ROOT}sub/deeper/`, ['c.txt']);

      await new DirectoryCrawler(harness.context).walk(ROOT, harness.root);

      expect(harness.logs()).toContain(`Skipping ${ROOT}sub/deeper/: deeper than 1 levels`);
      expect(harness.remote.requestsFor('LISTING', `${ROOT}sub/deeper/`)).toEqual([]);
    });

    it('stops between entries once canceled', async () => {
      harness.remote
        .listing(ROOT, ['a.txt', 'b.txt'])
        .file(`${ROOT}a.txt`, 'a')
        .file(`${ROOT}b.txt`, 'b');
      const observer = harness.context.observer;
      harness.context.observer = {
        ...observer,
        fileCompleted: (target, bytes, elapsedMs) => {
          observer.fileCompleted(target, bytes, elapsedMs);
          harness.control.cancel();
        }
      };

      await new DirectoryCrawler(harness.context).walk(ROOT, harness.root);

      expect(harness.remote.requestsFor('STREAM', `${ROOT}b.txt`)).toEqual([]);
      expect(harness.ledger.size).toBe(1);
    });
  });
});
