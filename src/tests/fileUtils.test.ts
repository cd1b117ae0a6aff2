import { FileUtils } from '../utils/fileUtils';
import fs from 'fs-extra';
import path from 'path';
import { TestPaths } from './test-config';

describe('FileUtils', () => {
  const testDir = TestPaths.unit.fileUtils;

  beforeEach(async () => {
    await fs.ensureDir(testDir);
  });

  afterEach(async () => {
    await fs.remove(testDir);
  });

  describe('ensureDir', () => {
    it('should create directory if it does not exist', async () => {
      const dirPath = path.join(testDir, 'new-dir');
      await FileUtils.ensureDir(dirPath);

      expect(await fs.pathExists(dirPath)).toBe(true);
    });

    it('should not throw error if directory already exists', async () => {
      const dirPath = path.join(testDir, 'existing-dir');
      await fs.ensureDir(dirPath);

      await expect(FileUtils.ensureDir(dirPath)).resolves.toBeUndefined();
    });
  });

  describe('writeJSON and readJSON', () => {
    it('should write and read JSON data correctly', async () => {
      const filePath = path.join(testDir, 'nested', 'test.json');
      const testData = { supplierId: 'S1B_0001', downloads: 2 };

      await FileUtils.writeJSON(filePath, testData);

      expect(await FileUtils.readJSON(filePath)).toEqual(testData);
    });

    it('should return null for non-existent file', async () => {
      const result = await FileUtils.readJSON(path.join(testDir, 'nonexistent.json'));

      expect(result).toBeNull();
    });
  });

  describe('deleteFile', () => {
    it('should remove an existing file and ignore a missing one', async () => {
      const filePath = path.join(testDir, 'partial.zip');
      await fs.writeFile(filePath, 'partial');

      await FileUtils.deleteFile(filePath);
      expect(await fs.pathExists(filePath)).toBe(false);

      await expect(FileUtils.deleteFile(filePath)).resolves.toBeUndefined();
    });
  });

  describe('productPath', () => {
    it('should name the file after the supplier id', () => {
      expect(FileUtils.productPath('/data/out', 'S2A_MSIL1C_20240101')).toBe(
        path.join('/data/out', 'S2A_MSIL1C_20240101.zip')
      );
    });
  });
});
