import fetch, { RequestInit, Response } from 'node-fetch';
import fs from 'fs-extra';
import path from 'path';
import { pipeline } from 'stream/promises';
import {
  ArchiveClient,
  ArchiveCredentials,
  ArchiveProduct,
  SearchQuery,
  SearchResult,
} from '../types';
import { defaultConfig } from '../config/default';
import { ArchiveHttpError } from '../errors';
import { logger } from '../utils/logger';
import { FileUtils } from '../utils/fileUtils';
import { delay, errorMessage } from '../utils/delay';
import { isArchiveProduct, isRecord } from '../utils/guards';
import { CredentialsOptions, CredentialsProvider } from './CredentialsProvider';

export type FetchFunction = (url: string, init?: RequestInit) => Promise<Response>;

export interface ArchiveApiClientOptions {
  baseUrl?: string;
  /** Attempts per download before giving up. */
  retryAttempts?: number;
  /** Base back-off between download attempts, multiplied by the attempt number. */
  retryDelay?: number;
  /** ms allowed for one download attempt */
  downloadTimeout?: number;
  userAgent?: string;
  fetch?: FetchFunction;
}

interface SendOptions {
  method: 'GET' | 'POST';
  body?: unknown;
  signal?: AbortSignal;
}

// Log in again this long before the archive says the token expires.
const TOKEN_EXPIRY_MARGIN_MS = 5 * 60 * 1000;

/**
 * Client for the archive's JSON API: search, long-term archive requests and
 * product downloads. Authentication is handled here; callers never see the
 * token. A rejected token triggers one fresh login and one retry.
 */
export class ArchiveApiClient implements ArchiveClient {
  private baseUrl: string;
  private retryAttempts: number;
  private retryDelay: number;
  private downloadTimeout: number;
  private userAgent: string;
  private fetchImpl: FetchFunction;
  private token: string | null = null;
  private tokenExpiry: number | null = null;

  static async fromCredentials(
    credentialOptions?: CredentialsOptions,
    options?: ArchiveApiClientOptions
  ): Promise<ArchiveApiClient> {
    const credentials = await CredentialsProvider.getCredentials(credentialOptions);
    if (!credentials) {
      throw new Error(
        'No archive credentials found. Set ARCHIVE_USERNAME and ARCHIVE_PASSWORD or provide a credentials file'
      );
    }
    return new ArchiveApiClient(credentials, options);
  }

  constructor(
    private credentials: ArchiveCredentials,
    options: ArchiveApiClientOptions = {}
  ) {
    const baseUrl = options.baseUrl ?? defaultConfig.api.baseUrl;
    this.baseUrl = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
    this.retryAttempts = Math.max(1, options.retryAttempts ?? defaultConfig.api.retryAttempts);
    this.retryDelay = options.retryDelay ?? 1000;
    this.downloadTimeout = options.downloadTimeout ?? defaultConfig.api.downloadTimeout;
    this.userAgent = options.userAgent ?? 'ArchiveBulkDownloader/1.0';
    this.fetchImpl = options.fetch ?? fetch;
  }

  /**
   * Logs in unless the current token is still good.
   */
  async login(): Promise<void> {
    if (this.token && this.tokenExpiry !== null && Date.now() < this.tokenExpiry) {
      return;
    }

    const { username, password } = this.credentials;
    if (!username || !password) {
      throw new Error('username and password must not be blank');
    }

    const url = this.endpoint('authentication');
    const response = await this.fetchImpl(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'User-Agent': this.userAgent },
      body: JSON.stringify({ username, password }),
    });

    // No token-error handling here: bad credentials would just log in forever.
    if (!response.ok) {
      const error = new ArchiveHttpError(
        response.status,
        response.statusText,
        await response.text(),
        url
      );
      logger.error(`Login failed: ${error.message}`, error.body);
      throw error;
    }

    const data: unknown = await response.json();
    if (!isRecord(data) || typeof data.token !== 'string' || typeof data.validUntil !== 'string') {
      throw new Error('Login response did not contain a token');
    }

    const validUntil = Date.parse(data.validUntil);
    if (Number.isNaN(validUntil)) {
      throw new Error(`Login response has an invalid validUntil: ${data.validUntil}`);
    }

    this.token = data.token;
    this.tokenExpiry = validUntil - TOKEN_EXPIRY_MARGIN_MS;
    logger.debug('Successful login');
  }

  async search(query: SearchQuery): Promise<SearchResult> {
    const body: Record<string, unknown> = {
      sensorFilters: { type: query.sensor ?? 'All' },
      filters: query.filters ?? {},
      aoiWKT: query.wkt,
      start: query.startDate,
      stop: query.endDate,
    };
    if (query.satelliteName) {
      body.satelliteName = query.satelliteName;
    }
    if (query.sourceGroup) {
      body.sourceGroup = query.sourceGroup;
    }

    const response = await this.send(this.endpoint('search'), { method: 'POST', body });
    return this.parseSearchResult(await response.json());
  }

  async searchSar(query: Omit<SearchQuery, 'sensor'>): Promise<SearchResult> {
    return this.search({ ...query, sensor: 'SAR' });
  }

  async searchOptical(query: Omit<SearchQuery, 'sensor'>): Promise<SearchResult> {
    return this.search({ ...query, sensor: 'Optical' });
  }

  /**
   * Looks up known products by id.
   */
  async searchProduct(productIds: string | string[]): Promise<SearchResult> {
    const ids = Array.isArray(productIds) ? productIds.join(',') : productIds;
    const url = `${this.endpoint('search/products')}?${new URLSearchParams({ ids })}`;
    const response = await this.send(url, { method: 'GET' });
    return this.parseSearchResult(await response.json());
  }

  async request(product: ArchiveProduct): Promise<string> {
    const url = this.endpoint(`request/${encodeURIComponent(product.supplierId)}`);
    const response = await this.send(url, { method: 'POST' });
    const data: unknown = await response.json();
    if (!isRecord(data) || typeof data.requestId !== 'string') {
      throw new Error(`Archive request for ${product.supplierId} returned no requestId`);
    }
    return data.requestId;
  }

  async isRequestReady(requestId: string): Promise<string | null> {
    const url = `${this.endpoint('request')}?${new URLSearchParams({ ids: requestId })}`;
    const response = await this.send(url, { method: 'GET' });
    const data: unknown = await response.json();
    if (!Array.isArray(data) || data.length === 0) {
      return null;
    }
    const [status] = data;
    if (isRecord(status) && typeof status.downloadUrl === 'string' && status.downloadUrl) {
      return status.downloadUrl;
    }
    return null;
  }

  /**
   * Opens the product's download url. Use this instead of `download` when the
   * bytes should not touch disk.
   */
  async downloadRequest(product: ArchiveProduct, signal?: AbortSignal): Promise<Response> {
    if (!product.downloadUrl) {
      throw new Error(`No download url defined for product ${product.supplierId}`);
    }
    return this.send(product.downloadUrl, { method: 'GET', signal });
  }

  async download(product: ArchiveProduct, outputPath: string): Promise<void> {
    if (!product.downloadUrl) {
      throw new Error(`No download url defined for product ${product.supplierId}`);
    }

    await FileUtils.ensureDir(path.dirname(outputPath));

    let lastError: unknown = null;
    for (let attempt = 1; attempt <= this.retryAttempts; attempt++) {
      try {
        await this.transfer(product, outputPath);
        return;
      } catch (error) {
        lastError = error;
        await this.cleanupPartialDownload(outputPath);
        if (attempt < this.retryAttempts) {
          logger.warn(
            `Download attempt ${attempt} failed for ${product.supplierId}, retrying: ${errorMessage(error)}`
          );
          await delay(this.retryDelay * attempt);
        }
      }
    }

    throw lastError ?? new Error(`Download of ${product.supplierId} failed after all retries`);
  }

  private async transfer(product: ArchiveProduct, outputPath: string): Promise<void> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.downloadTimeout);

    try {
      const response = await this.downloadRequest(product, controller.signal);
      await pipeline(response.body, fs.createWriteStream(outputPath));
    } finally {
      clearTimeout(timeout);
    }
  }

  private async cleanupPartialDownload(filePath: string): Promise<void> {
    try {
      await FileUtils.deleteFile(filePath);
    } catch (error) {
      logger.warn(`Could not remove partial download ${filePath}: ${errorMessage(error)}`);
    }
  }

  private async send(url: string, options: SendOptions, retry = true): Promise<Response> {
    await this.login();

    const headers: Record<string, string> = {
      'User-Agent': this.userAgent,
      Authorization: `Token ${this.token}`,
    };
    const init: RequestInit = { method: options.method, headers, signal: options.signal };
    if (options.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(options.body);
    }

    const response = await this.fetchImpl(url, init);
    if (response.ok) {
      return response;
    }

    const error = new ArchiveHttpError(
      response.status,
      response.statusText,
      await response.text(),
      url
    );

    if (retry && error.isTokenError()) {
      logger.debug(`Token rejected by ${url}, logging in again`);
      this.token = null;
      this.tokenExpiry = null;
      return this.send(url, options, false);
    }

    logger.error(`Archive API call failed: ${error.message}`, error.body);
    throw error;
  }

  private parseSearchResult(data: unknown): SearchResult {
    if (!isRecord(data) || !Array.isArray(data.products)) {
      throw new Error('Search response did not contain a products list');
    }
    const products = data.products.filter(isArchiveProduct);
    if (products.length !== data.products.length) {
      logger.warn(
        `Ignored ${data.products.length - products.length} search results without a supplierId`
      );
    }
    return { ...data, products };
  }

  private endpoint(relative: string): string {
    return new URL(relative, this.baseUrl).toString();
  }
}
