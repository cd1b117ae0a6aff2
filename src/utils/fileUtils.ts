import fs from 'fs-extra';
import path from 'path';
import { PRODUCT_FILE_EXTENSION } from '../config/default';
import { logger } from './logger';

export class FileUtils {
  static async ensureDir(dirPath: string): Promise<void> {
    try {
      await fs.ensureDir(dirPath);
    } catch (error) {
      logger.error(`Failed to create directory: ${dirPath}`, error);
      throw error;
    }
  }

  static async writeJSON(filePath: string, data: unknown): Promise<void> {
    try {
      await fs.ensureDir(path.dirname(filePath));
      await fs.writeJson(filePath, data, { spaces: 2 });
    } catch (error) {
      logger.error(`Failed to write JSON file: ${filePath}`, error);
      throw error;
    }
  }

  static async readJSON<T>(filePath: string): Promise<T | null> {
    try {
      if (await fs.pathExists(filePath)) {
        return await fs.readJson(filePath);
      }
      return null;
    } catch (error) {
      logger.error(`Failed to read JSON file: ${filePath}`, error);
      return null;
    }
  }

  static async deleteFile(filePath: string): Promise<void> {
    try {
      if (await fs.pathExists(filePath)) {
        await fs.remove(filePath);
      }
    } catch (error) {
      logger.error(`Failed to delete file: ${filePath}`, error);
      throw error;
    }
  }

  /** Where a product is written: `{outputDir}/{supplierId}.zip`. */
  static productPath(outputDir: string, supplierId: string): string {
    return path.join(outputDir, `${supplierId}${PRODUCT_FILE_EXTENSION}`);
  }
}
