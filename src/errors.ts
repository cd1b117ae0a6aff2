export class ArchiveHttpError extends Error {
  constructor(
    readonly status: number,
    readonly statusText: string,
    readonly body: string,
    readonly url: string
  ) {
    super(`HTTP ${status}: ${statusText} (${url})`);
    this.name = 'ArchiveHttpError';
  }

  /** The archive reports expired or missing sessions through these responses. */
  isTokenError(): boolean {
    if (this.status === 401 || this.status === 403) {
      return true;
    }
    return this.status === 400 && this.body.includes('User token does not exist');
  }
}

export class AlreadyStartedError extends Error {
  constructor(message = 'The bulk downloader has already been started') {
    super(message);
    this.name = 'AlreadyStartedError';
  }
}
