import path from 'path';
import { BulkDownloaderOptions, DownloaderConfig } from '../types';
import { defaultConfig } from './default';
import { FileUtils } from '../utils/fileUtils';
import { isLogLevelName, logger, parseLogLevel } from '../utils/logger';

export interface ConfigUpdate {
  outputDir?: string;
  logLevel?: DownloaderConfig['logLevel'];
  download?: Partial<DownloaderConfig['download']>;
  api?: Partial<DownloaderConfig['api']>;
}

function cloneConfig(config: DownloaderConfig): DownloaderConfig {
  return {
    ...config,
    download: { ...config.download },
    api: { ...config.api },
  };
}

function isValidUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

export class ConfigManager {
  private config: DownloaderConfig;
  private configPath: string;

  constructor(configPath?: string) {
    this.config = cloneConfig(defaultConfig);
    this.configPath = configPath || path.join(process.cwd(), 'config.json');
  }

  async loadConfig(): Promise<DownloaderConfig> {
    const existingConfig = await FileUtils.readJSON<ConfigUpdate>(this.configPath);

    if (existingConfig) {
      this.config = this.mergeConfigs(defaultConfig, existingConfig);
      logger.info(`Loaded configuration from ${this.configPath}`);
    } else {
      this.config = cloneConfig(defaultConfig);
      logger.info('No configuration file found, using default config');
    }

    return this.config;
  }

  async saveConfig(): Promise<void> {
    try {
      await FileUtils.writeJSON(this.configPath, this.config);
      logger.info(`Configuration saved to ${this.configPath}`);
    } catch (error) {
      logger.error('Failed to save configuration:', error);
      throw error;
    }
  }

  getConfig(): DownloaderConfig {
    return this.config;
  }

  updateConfig(updates: ConfigUpdate): void {
    this.config = this.mergeConfigs(this.config, updates);
  }

  setOutputDir(dir: string): void {
    this.config.outputDir = dir;
  }

  setParallel(parallel: number): void {
    this.config.download.parallel = parallel;
  }

  /** Applies the configured log level to the shared logger. */
  applyLogLevel(): void {
    logger.setLogLevel(parseLogLevel(this.config.logLevel));
  }

  toDownloaderOptions(): BulkDownloaderOptions {
    return { ...this.config.download };
  }

  validateConfig(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const { download, api } = this.config;

    if (!this.config.outputDir || this.config.outputDir.trim() === '') {
      errors.push('Output directory is required');
    }

    if (!isLogLevelName(this.config.logLevel)) {
      errors.push(`Log level must be one of debug, info, warn, error (got ${this.config.logLevel})`);
    }

    if (!Number.isInteger(download.parallel) || download.parallel < 1) {
      errors.push('Parallel downloads must be a positive integer');
    }
    if (!Number.isInteger(download.maxConcurrentPolls) || download.maxConcurrentPolls < 1) {
      errors.push('Max concurrent polls must be a positive integer');
    }
    if (!Number.isFinite(download.pollInterval) || download.pollInterval < 0) {
      errors.push('Poll interval must be a non-negative number');
    }
    if (!Number.isFinite(download.idleDelay) || download.idleDelay < 0) {
      errors.push('Idle delay must be a non-negative number');
    }
    if (download.monitor && !(Number.isFinite(download.monitorInterval) && download.monitorInterval > 0)) {
      errors.push('Monitor interval must be greater than 0 when the monitor is enabled');
    }

    if (!api.baseUrl) {
      errors.push('API base URL is required');
    } else if (!isValidUrl(api.baseUrl)) {
      errors.push(`API base URL is not a valid URL: ${api.baseUrl}`);
    }
    if (!Number.isInteger(api.retryAttempts) || api.retryAttempts < 1) {
      errors.push('Retry attempts must be at least 1');
    }
    if (!Number.isFinite(api.downloadTimeout) || api.downloadTimeout < 1000) {
      errors.push('Download timeout must be at least 1000ms');
    }

    return {
      valid: errors.length === 0,
      errors,
    };
  }

  private mergeConfigs(base: DownloaderConfig, updates: ConfigUpdate): DownloaderConfig {
    return {
      outputDir: updates.outputDir ?? base.outputDir,
      logLevel: updates.logLevel ?? base.logLevel,
      download: { ...base.download, ...updates.download },
      api: { ...base.api, ...updates.api },
    };
  }
}
