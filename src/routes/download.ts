import { Router, type Request, type Response } from 'express';
import { ConfigManager, type AppConfig } from '../services/configManager.js';
import { DownloadSession } from '../services/downloadSession.js';
import { settingsFromConfig } from '../services/engine.js';
import { scanDirectory } from '../services/localFiles.js';
import { HttpTransport, type Transport } from '../services/transport.js';
import { checkUrl } from '../services/urlCheck.js';
import type { DownloadRequest, SessionEvent } from '../types.js';

export interface DownloadRouterOptions {
  configManager?: ConfigManager;
  createTransport?: (config: AppConfig) => Transport;
}

const DEFAULT_OUTPUT_DIR = './downloads';

function defaultTransport(config: AppConfig): Transport {
  return new HttpTransport({
    userAgent: config.userAgent,
    chunkSize: config.chunkSize,
    maxRedirects: config.maxRedirects,
    timeoutMs: config.requestTimeoutSeconds * 1000
  });
}

export function createDownloadRouter(options: DownloadRouterOptions = {}): Router {
  const router = Router();
  const configManager = options.configManager ?? new ConfigManager();
  const createTransport = options.createTransport ?? defaultTransport;

  // Store SSE clients for progress broadcast
  const progressClients: Response[] = [];

  // One run at a time; the last one stays around for /status
  let session: DownloadSession | null = null;
  let sessionInfo: { url: string; outputDir: string; startedAt: number } | null = null;

  function broadcast(payload: object): void {
    const data = `data: ${JSON.stringify(payload)}\n\n`;
    progressClients.forEach(client => {
      client.write(data);
    });
  }

  function handleSessionEvent(event: SessionEvent): void {
    if (event.type === 'log') {
      console.log('[DownloadSession]', event.message);
    }
    broadcast(event);
  }

  /**
   * POST /api/download/check
   * HEAD the URL (with optional credentials) before starting
   */
  router.post('/check', async (req: Request, res: Response) => {
    try {
      const { url, username, password }: DownloadRequest = req.body;

      if (!isHttpUrl(url)) {
        res.status(400).json({ error: 'A valid http(s) URL is required' });
        return;
      }

      const result = await checkUrl(createTransport(configManager.getConfig()), url, username, password);
      res.json(result);
    } catch (error) {
      console.error('Error checking URL:', error);
      res.status(500).json({
        error: 'Failed to check URL',
        details: error instanceof Error ? error.message : String(error)
      });
    }
  });

  /**
   * POST /api/download/start
   * Start mirroring a directory listing (or a single file)
   */
  router.post('/start', (req: Request, res: Response) => {
    try {
      const { url, outputDir = DEFAULT_OUTPUT_DIR, username, password, singleFile }: DownloadRequest = req.body;

      if (!isHttpUrl(url)) {
        res.status(400).json({ error: 'A valid http(s) URL is required' });
        return;
      }
      if (typeof outputDir !== 'string' || outputDir.trim() === '') {
        res.status(400).json({ error: 'outputDir must be a non-empty string' });
        return;
      }
      if (session?.isRunning) {
        res.status(409).json({ error: 'A download is already running' });
        return;
      }

      const config = configManager.getConfig();
      const current = new DownloadSession({
        transport: createTransport(config),
        settings: settingsFromConfig(config)
      });
      current.on('event', handleSessionEvent);
      session = current;
      sessionInfo = { url, outputDir, startedAt: Date.now() };

      const singleFileMode = typeof singleFile === 'boolean' ? singleFile : !url.endsWith('/');
      broadcast({ type: 'session-start', url, outputDir, singleFileMode });

      current
        .start({
          url,
          destDir: outputDir,
          credentials: { username, password },
          singleFileMode
        })
        .then(outcome => {
          console.log(`[DownloadSession] Run finished: ${outcome}`);
        })
        .catch((error: unknown) => {
          console.error('[DownloadSession] Could not start run:', error);
        });

      res.json({ status: 'started', url, outputDir, singleFileMode });
    } catch (error) {
      console.error('Error starting download:', error);
      res.status(500).json({
        error: 'Failed to start download',
        details: error instanceof Error ? error.message : String(error)
      });
    }
  });

  /**
   * POST /api/download/pause
   */
  router.post('/pause', (_req: Request, res: Response) => {
    if (!session?.isRunning) {
      res.status(400).json({ error: 'No active download to pause' });
      return;
    }
    session.pause();
    broadcast({ type: 'paused' });
    res.json({ status: 'paused' });
  });

  /**
   * POST /api/download/resume
   */
  router.post('/resume', (_req: Request, res: Response) => {
    if (!session?.isRunning) {
      res.status(400).json({ error: 'No active download to resume' });
      return;
    }
    session.resume();
    broadcast({ type: 'resumed' });
    res.json({ status: 'resumed' });
  });

  /**
   * POST /api/download/cancel
   * Cancel is cooperative: the run stops at its next chunk or listing boundary
   */
  router.post('/cancel', (_req: Request, res: Response) => {
    if (!session?.isRunning) {
      res.status(400).json({ error: 'No active download to cancel' });
      return;
    }
    session.cancel();
    res.json({ status: 'cancelling', message: 'Cancel requested' });
  });

  /**
   * GET /api/download/status
   * Get current download status
   */
  router.get('/status', (_req: Request, res: Response) => {
    if (!session || !sessionInfo) {
      res.json({ isDownloading: false });
      return;
    }

    res.json({
      isDownloading: session.isRunning,
      ...sessionInfo,
      state: session.getState(),
      pendingFailures: session.getPendingFailures()
    });
  });

  /**
   * GET /api/download/progress
   * Server-Sent Events endpoint for real-time progress
   */
  router.get('/progress', (req: Request, res: Response) => {
    // Set SSE headers
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');

    progressClients.push(res);

    res.write(`data: ${JSON.stringify({ status: 'connected' })}\n\n`);

    // Late joiners get the current counters
    if (session?.isRunning) {
      res.write(`data: ${JSON.stringify({ type: 'state', state: session.getState() })}\n\n`);
    }

    // Remove client on disconnect
    req.on('close', () => {
      const index = progressClients.indexOf(res);
      if (index !== -1) {
        progressClients.splice(index, 1);
      }
    });
  });

  /**
   * GET /api/download/files
   * Get list of mirrored files
   */
  router.get('/files', async (req: Request, res: Response) => {
    try {
      const outputDir = typeof req.query.dir === 'string' && req.query.dir !== '' ? req.query.dir : DEFAULT_OUTPUT_DIR;
      const files = await scanDirectory(outputDir);
      res.json({ files });
    } catch (error) {
      console.error('Error getting files:', error);
      res.status(500).json({
        error: 'Failed to get files',
        details: error instanceof Error ? error.message : String(error)
      });
    }
  });

  /**
   * GET /api/download/config
   * Get current download configuration
   */
  router.get('/config', (_req: Request, res: Response) => {
    res.json(configManager.getConfig());
  });

  /**
   * POST /api/download/config
   * Update retry, redirect and transfer settings (applies to the next run)
   */
  router.post('/config', (req: Request, res: Response) => {
    try {
      const result = validateConfigUpdate(req.body);
      if (typeof result === 'string') {
        res.status(400).json({ error: result });
        return;
      }

      res.json({
        status: 'success',
        config: configManager.update(result)
      });
    } catch (error) {
      console.error('Error setting config:', error);
      res.status(500).json({ error: 'Failed to set config' });
    }
  });

  return router;
}

function isHttpUrl(value: unknown): value is string {
  if (typeof value !== 'string') {
    return false;
  }
  try {
    const parsed = new URL(value);
    return parsed.protocol === 'http:' || parsed.protocol === 'https:';
  } catch {
    return false;
  }
}

type NumericKey = 'retryDelaySeconds' | 'maxRedirects' | 'chunkSize' | 'requestTimeoutSeconds' | 'maxDepth';

const NUMERIC_LIMITS: Array<[NumericKey, number, number]> = [
  ['retryDelaySeconds', 0, 3600],
  ['maxRedirects', 0, 50],
  ['chunkSize', 1, 1024 * 1024],
  ['requestTimeoutSeconds', 1, 3600],
  ['maxDepth', 1, 1000]
];

/**
 * Validate a config update body. Returns the accepted fields, or an error message.
 */
export function validateConfigUpdate(body: unknown): Partial<AppConfig> | string {
  if (typeof body !== 'object' || body === null) {
    return 'Config body must be an object';
  }
  const fields = new Map(Object.entries(body));
  const updates: Partial<AppConfig> = {};

  for (const [key, min, max] of NUMERIC_LIMITS) {
    const value = fields.get(key);
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isInteger(value) || value < min || value > max) {
      return `${key} must be an integer between ${min} and ${max}`;
    }
    updates[key] = value;
  }

  if (fields.has('maxRetries')) {
    const value = fields.get('maxRetries');
    if (value === null) {
      updates.maxRetries = null;
    } else if (typeof value === 'number' && Number.isInteger(value) && value >= 0) {
      updates.maxRetries = value;
    } else {
      return 'maxRetries must be null or a non-negative integer';
    }
  }

  const userAgent = fields.get('userAgent');
  if (userAgent !== undefined) {
    if (typeof userAgent !== 'string' || userAgent.trim() === '') {
      return 'userAgent must be a non-empty string';
    }
    updates.userAgent = userAgent;
  }

  return updates;
}
