import fs from 'fs-extra';
import path from 'path';
import { ArchiveCredentials } from '../types';
import { logger } from '../utils/logger';
import { isRecord } from '../utils/guards';

export interface CredentialsOptions {
  username?: string;
  password?: string;
  /** JSON file holding `{ "username": "...", "password": "..." }` */
  credentialsFile?: string;
}

export const CREDENTIALS_FILENAME = '.archive-credentials.json';

function isCredentials(value: unknown): value is ArchiveCredentials {
  if (!isRecord(value)) {
    return false;
  }
  const { username, password } = value;
  return typeof username === 'string' && typeof password === 'string' && !!username && !!password;
}

/**
 * Provides archive credentials from various sources in priority order:
 * 1. Direct username/password options
 * 2. Credentials file path
 * 3. Environment variables ARCHIVE_USERNAME and ARCHIVE_PASSWORD
 * 4. Credentials file in home directory (~/.archive-credentials.json)
 */
export class CredentialsProvider {
  static async getCredentials(options?: CredentialsOptions): Promise<ArchiveCredentials | null> {
    // 1. Direct options
    if (options?.username && options?.password) {
      logger.debug('Using archive credentials from direct parameters');
      return { username: options.username, password: options.password };
    }

    // 2. Credentials file path
    if (options?.credentialsFile) {
      const credentials = await this.readCredentialsFile(path.resolve(options.credentialsFile));
      if (credentials) {
        logger.debug(`Using archive credentials from file: ${options.credentialsFile}`);
        return credentials;
      }
    }

    // 3. Environment
    const { ARCHIVE_USERNAME, ARCHIVE_PASSWORD } = process.env;
    if (ARCHIVE_USERNAME && ARCHIVE_PASSWORD) {
      logger.debug('Using archive credentials from ARCHIVE_USERNAME/ARCHIVE_PASSWORD');
      return { username: ARCHIVE_USERNAME, password: ARCHIVE_PASSWORD };
    }

    // 4. Home directory
    const home = process.env.HOME || process.env.USERPROFILE;
    if (home) {
      const credentials = await this.readCredentialsFile(path.join(home, CREDENTIALS_FILENAME));
      if (credentials) {
        logger.debug('Using archive credentials from home directory file');
        return credentials;
      }
    }

    return null;
  }

  private static async readCredentialsFile(filePath: string): Promise<ArchiveCredentials | null> {
    try {
      if (!(await fs.pathExists(filePath))) {
        return null;
      }
      const contents: unknown = await fs.readJson(filePath);
      if (isCredentials(contents)) {
        return { username: contents.username, password: contents.password };
      }
      logger.warn(`Credentials file has no username/password: ${filePath}`);
    } catch (error) {
      logger.warn(`Failed to read credentials file: ${filePath}`, error);
    }
    return null;
  }
}
