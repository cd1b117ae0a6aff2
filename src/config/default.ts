import { DownloaderConfig } from '../types';

export const defaultConfig: DownloaderConfig = {
  outputDir: './downloads',
  logLevel: 'info',
  download: {
    parallel: 2,
    pollInterval: 5000,
    idleDelay: 1000,
    maxConcurrentPolls: 1,
    monitor: true,
    monitorInterval: 5000,
  },
  api: {
    baseUrl: 'https://geobrowser.satapps.org/api/',
    retryAttempts: 3,
    downloadTimeout: 60000, // per attempt
  },
};

export const PRODUCT_FILE_EXTENSION = '.zip';
