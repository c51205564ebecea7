// Rectangle bounds that break right >= left / bottom >= top, or a negative size.
export class InvalidGeometryError extends Error {
  override readonly name = 'InvalidGeometryError';
}

// A JSON or CSV record with a missing or uncoercible field.
export class MalformedRecordError extends Error {
  override readonly name = 'MalformedRecordError';

  constructor(message: string, readonly field?: string) {
    super(message);
  }
}

export class FileNotFoundError extends Error {
  override readonly name = 'FileNotFoundError';

  constructor(readonly path: string, hint?: string) {
    super(hint ? `File ${path} doesn't exist. ${hint}` : `File ${path} doesn't exist.`);
  }
}

// Logged by the image store, never thrown past it.
export class FetchFailureError extends Error {
  override readonly name = 'FetchFailureError';

  constructor(readonly url: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to fetch ${url}: ${message}`, options);
  }
}

export class ConfigError extends Error {
  override readonly name = 'ConfigError';

  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
