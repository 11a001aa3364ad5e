export class SermonkeeperError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'SermonkeeperError';
  }
}

export class ConfigError extends SermonkeeperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

export class DbError extends SermonkeeperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DB_ERROR', details);
    this.name = 'DbError';
  }
}

/**
 * The metadata store cannot be opened or queried. Fatal to an ingest pass.
 */
export class StoreUnavailableError extends SermonkeeperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'STORE_UNAVAILABLE', details);
    this.name = 'StoreUnavailableError';
  }
}

export class SourceUnavailableError extends SermonkeeperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'SOURCE_UNAVAILABLE', details);
    this.name = 'SourceUnavailableError';
  }
}

export class DownloadFailedError extends SermonkeeperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'DOWNLOAD_FAILED', details);
    this.name = 'DownloadFailedError';
  }
}

export class IngestBusyError extends SermonkeeperError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INGEST_BUSY', details);
    this.name = 'IngestBusyError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
