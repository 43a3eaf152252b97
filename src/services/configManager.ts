import fs from 'fs';

export interface AppConfig {
  retryDelaySeconds: number;
  maxRetries: number | null;  // null retries forever
  maxRedirects: number;
  chunkSize: number;
  requestTimeoutSeconds: number;
  maxDepth: number;
  userAgent: string;
}

export const DEFAULT_CONFIG_FILE = process.env.DOWNLOADER_CONFIG ?? './config.json';

export const DEFAULT_CONFIG: AppConfig = {
  retryDelaySeconds: 60,
  maxRetries: null,
  maxRedirects: 10,
  chunkSize: 1024,
  requestTimeoutSeconds: 300,
  maxDepth: 64,
  userAgent: 'listing-mirror/1.0 (recursive directory downloader)'
};

export class ConfigManager {
  private config: AppConfig;

  constructor(private readonly configFile: string = DEFAULT_CONFIG_FILE) {
    this.config = this.loadConfig();
  }

  /**
   * Load config from file, keeping defaults for missing or mistyped keys
   */
  private loadConfig(): AppConfig {
    try {
      if (fs.existsSync(this.configFile)) {
        const data = fs.readFileSync(this.configFile, 'utf-8');
        const loadedConfig: unknown = JSON.parse(data);
        const merged = mergeConfig(DEFAULT_CONFIG, loadedConfig);
        console.log('[ConfigManager] Loaded config from file:', merged);
        return merged;
      }
    } catch (error) {
      console.error('[ConfigManager] Error loading config:', error);
    }
    console.log('[ConfigManager] Using default config:', DEFAULT_CONFIG);
    return { ...DEFAULT_CONFIG };
  }

  /**
   * Save config to file
   */
  private saveConfig(): void {
    try {
      fs.writeFileSync(this.configFile, JSON.stringify(this.config, null, 2));
      console.log('[ConfigManager] Config saved successfully to', this.configFile);
    } catch (error) {
      console.error('[ConfigManager] Error saving config:', error);
    }
  }

  /**
   * Apply a partial update and persist it
   */
  update(updates: Partial<AppConfig>): AppConfig {
    this.config = { ...this.config, ...updates };
    this.saveConfig();
    return this.getConfig();
  }

  /**
   * Get all config
   */
  getConfig(): AppConfig {
    return { ...this.config };
  }
}

function mergeConfig(base: AppConfig, loaded: unknown): AppConfig {
  const result: AppConfig = { ...base };
  if (typeof loaded !== 'object' || loaded === null) {
    return result;
  }
  const source = new Map(Object.entries(loaded));

  const numberKeys = [
    'retryDelaySeconds',
    'maxRedirects',
    'chunkSize',
    'requestTimeoutSeconds',
    'maxDepth'
  ] as const;
  for (const key of numberKeys) {
    const value = source.get(key);
    if (typeof value === 'number' && Number.isFinite(value)) {
      result[key] = value;
    }
  }

  const maxRetries = source.get('maxRetries');
  if (maxRetries === null || (typeof maxRetries === 'number' && Number.isFinite(maxRetries))) {
    result.maxRetries = maxRetries;
  }

  const userAgent = source.get('userAgent');
  if (typeof userAgent === 'string' && userAgent.trim() !== '') {
    result.userAgent = userAgent;
  }

  return result;
}
