/**
 * Error taxonomy for transfer operations.
 *
 * - RepositoryError: search/listing failed; fatal for the listing.
 * - TransferError: one asset failed to download; recorded, batch continues.
 * - UploadError: the single component upload failed; fatal for the upload.
 * - ConfigError / UsageError: rejected before any request is made.
 */

export class TransferBaseError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TransferBaseError';
  }
}

export class RepositoryError extends TransferBaseError {
  public readonly statusCode?: number;
  public readonly responseBody?: string;

  constructor(
    message: string,
    details: { statusCode?: number; responseBody?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: details.cause });
    this.name = 'RepositoryError';
    this.statusCode = details.statusCode;
    this.responseBody = details.responseBody;
  }
}

export class TransferError extends TransferBaseError {
  public readonly assetPath: string;
  public readonly statusCode?: number;

  constructor(
    assetPath: string,
    message: string,
    details: { statusCode?: number; cause?: unknown } = {}
  ) {
    super(message, { cause: details.cause });
    this.name = 'TransferError';
    this.assetPath = assetPath;
    this.statusCode = details.statusCode;
  }
}

export class UploadError extends TransferBaseError {
  public readonly statusCode?: number;
  public readonly responseBody?: string;

  constructor(
    message: string,
    details: { statusCode?: number; responseBody?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: details.cause });
    this.name = 'UploadError';
    this.statusCode = details.statusCode;
    this.responseBody = details.responseBody;
  }
}

export class ConfigError extends TransferBaseError {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
    this.problems = problems;
  }
}

export class UsageError extends TransferBaseError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Render an unknown thrown value as a message string.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
