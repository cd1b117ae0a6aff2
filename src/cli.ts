#!/usr/bin/env node
import dotenv from 'dotenv';
import path from 'path';
import ProgressBar from 'progress';
import { ArchiveApiClient } from './client/ArchiveApiClient';
import { BulkDownloader } from './bulk/BulkDownloader';
import { ConfigManager } from './config/configManager';
import { FileUtils } from './utils/fileUtils';
import { delay } from './utils/delay';
import { isArchiveProduct } from './utils/guards';
import { logger } from './utils/logger';
import { ArchiveClient, ArchiveProduct, CompletionRecord, SearchQuery, SensorType } from './types';

export interface CliOptions {
  configPath?: string;
  outputDir?: string;
  parallel?: number;
  credentialsFile?: string;
  /** JSON file with an array of products or supplier ids. */
  productsFile?: string;
  search?: SearchQuery;
}

const SENSORS: SensorType[] = ['All', 'SAR', 'Optical'];

function isSensorType(value: string): value is SensorType {
  return SENSORS.some(sensor => sensor === value);
}

// Accepts both --flag=value and --flag value.
function readFlag(args: string[], name: string): string | undefined {
  const flag = `--${name}`;
  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith(`${flag}=`)) {
      return args[i].slice(flag.length + 1);
    }
    if (args[i] === flag) {
      if (i + 1 >= args.length || args[i + 1].startsWith('--')) {
        throw new Error(`Missing value for ${flag}`);
      }
      return args[i + 1];
    }
  }
  return undefined;
}

export function parseCliArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    configPath: readFlag(args, 'config'),
    outputDir: readFlag(args, 'output'),
    credentialsFile: readFlag(args, 'credentials'),
    productsFile: readFlag(args, 'products'),
  };

  const parallel = readFlag(args, 'parallel');
  if (parallel !== undefined) {
    options.parallel = Number(parallel);
    if (!Number.isInteger(options.parallel) || options.parallel < 1) {
      throw new Error(`--parallel must be a positive integer (got ${parallel})`);
    }
  }

  const wkt = readFlag(args, 'wkt');
  if (wkt !== undefined) {
    const startDate = readFlag(args, 'start');
    const endDate = readFlag(args, 'end');
    if (!startDate || !endDate) {
      throw new Error('--wkt needs both --start and --end');
    }
    const sensor = readFlag(args, 'sensor') ?? 'All';
    if (!isSensorType(sensor)) {
      throw new Error(`Invalid sensor: ${sensor}. Valid sensors: ${SENSORS.join(', ')}`);
    }
    options.search = { wkt, startDate, endDate, sensor };
    const satelliteName = readFlag(args, 'satellite');
    if (satelliteName) {
      options.search.satelliteName = satelliteName;
    }
  }

  if (!options.productsFile && !options.search) {
    throw new Error('Nothing to download: pass --products <file> or --wkt with --start and --end');
  }

  return options;
}

/**
 * Reads products from a JSON array. Plain strings are supplier ids without a
 * download url, so they go through an archive request first.
 */
export async function readProductsFile(filePath: string): Promise<ArchiveProduct[]> {
  const contents = await FileUtils.readJSON<unknown>(filePath);
  if (!Array.isArray(contents)) {
    throw new Error(`Products file must contain a JSON array: ${filePath}`);
  }

  const products: ArchiveProduct[] = [];
  for (const entry of contents) {
    if (typeof entry === 'string' && entry) {
      products.push({ supplierId: entry });
    } else if (isArchiveProduct(entry)) {
      products.push(entry);
    } else {
      logger.warn(`Skipping products file entry without a supplierId: ${JSON.stringify(entry)}`);
    }
  }
  return products;
}

/** Products the downloader will actually fetch; repeated supplier ids are skipped. */
export function countUniqueProducts(products: ArchiveProduct[]): number {
  return new Set(products.map(product => product.supplierId)).size;
}

/** Resolves once the downloader has nothing outstanding. */
export async function waitUntilDone(downloader: BulkDownloader, interval = 1000): Promise<void> {
  while (!downloader.isDone()) {
    await delay(interval);
  }
}

/**
 * Downloads every product and returns the number of failures.
 */
export async function runDownloads(
  client: ArchiveClient,
  products: ArchiveProduct[],
  options: {
    outputDir: string;
    config: ConfigManager;
    waitInterval?: number;
    /** Called once per product when its download completes or fails. */
    onSettled?: (product: ArchiveProduct) => void;
  }
): Promise<number> {
  const downloader = new BulkDownloader(client, options.outputDir, options.config.toDownloaderOptions());
  const { onSettled } = options;
  if (onSettled) {
    downloader.on('completed', (record: CompletionRecord) => onSettled(record.product));
    downloader.on('failed', (product: ArchiveProduct) => onSettled(product));
  }

  try {
    await downloader.add(products);
    await waitUntilDone(downloader, options.waitInterval);
  } finally {
    downloader.shutdown();
    await downloader.whenStopped();
  }

  const stats = downloader.getStats();
  for (const failure of stats.failedItems) {
    logger.item(`${failure.product.supplierId}: ${failure.error}`, '✖');
  }
  return stats.failed;
}

async function main(): Promise<void> {
  dotenv.config();
  const options = parseCliArgs(process.argv.slice(2));

  const configManager = new ConfigManager(options.configPath);
  await configManager.loadConfig();
  if (options.outputDir) {
    configManager.setOutputDir(options.outputDir);
  }
  if (options.parallel) {
    configManager.setParallel(options.parallel);
  }
  configManager.applyLogLevel();

  const validation = configManager.validateConfig();
  if (!validation.valid) {
    validation.errors.forEach(error => logger.error(error));
    process.exit(1);
  }
  const config = configManager.getConfig();

  const client = await ArchiveApiClient.fromCredentials(
    { credentialsFile: options.credentialsFile },
    config.api
  );

  const products: ArchiveProduct[] = [];
  if (options.productsFile) {
    products.push(...(await readProductsFile(options.productsFile)));
  }
  if (options.search) {
    logger.section('Searching the archive');
    const result = await client.search(options.search);
    logger.info(`Search found ${result.products.length} products`);
    products.push(...result.products);
  }

  const outputDir = path.resolve(config.outputDir);
  const total = countUniqueProducts(products);
  logger.section(`Downloading ${total} products to ${outputDir}`);
  const progressBar = new ProgressBar('  downloading [:bar] :percent :current/:total :etas', {
    total: Math.max(total, 1),
    width: 40,
    complete: '█',
    incomplete: '░',
  });
  const failed = await runDownloads(client, products, {
    outputDir,
    config: configManager,
    onSettled: () => progressBar.tick(),
  });

  if (failed > 0) {
    logger.error(`${failed} downloads failed`);
    process.exit(1);
  }
  logger.success('All downloads completed');
}

if (require.main === module) {
  process.on('unhandledRejection', error => {
    logger.error('Unhandled rejection:', error);
    process.exit(1);
  });

  main().catch(error => {
    logger.error('Bulk download failed:', error);
    process.exit(1);
  });
}
