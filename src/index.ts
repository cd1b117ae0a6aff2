import { BulkDownloader } from './bulk/BulkDownloader';
import { CompletionQueue } from './bulk/CompletionQueue';
import { ArchiveApiClient } from './client/ArchiveApiClient';
import { CredentialsProvider } from './client/CredentialsProvider';
import { ConfigManager } from './config/configManager';
import { defaultConfig } from './config/default';
import { AlreadyStartedError, ArchiveHttpError } from './errors';
import { logger, LogLevel } from './utils/logger';

// Export all the main classes for programmatic usage
export {
  BulkDownloader,
  CompletionQueue,
  ArchiveApiClient,
  CredentialsProvider,
  ConfigManager,
  defaultConfig,
  AlreadyStartedError,
  ArchiveHttpError,
  logger,
  LogLevel,
};

export type { ArchiveApiClientOptions, FetchFunction } from './client/ArchiveApiClient';
export type { CredentialsOptions } from './client/CredentialsProvider';

// Export types
export * from './types';
