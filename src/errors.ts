/**
 * Expected element or attribute missing from a scraped page.
 * Fatal on the roster page; a per-item failure on a biography page.
 */
export class StructuralParseError extends Error {
  readonly url: string | undefined;

  constructor(message: string, options: { url?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'StructuralParseError';
    this.url = options.url;
  }
}

export class FetchError extends Error {
  readonly url: string;
  readonly status: number | undefined;

  constructor(message: string, options: { url: string; status?: number; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = 'FetchError';
    this.url = options.url;
    this.status = options.status;
  }
}

export class OracleError extends Error {
  constructor(message: string, options: { cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'OracleError';
  }
}

export class CheckpointError extends Error {
  readonly filePath: string;

  constructor(message: string, options: { filePath: string; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = 'CheckpointError';
    this.filePath = options.filePath;
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
