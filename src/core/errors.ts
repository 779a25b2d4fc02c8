export interface TransportErrorDetails {
  url: string;
  status?: number;
  retriable: boolean;
  attempts: number;
  cause?: unknown;
}

/** Network or HTTP failure after the fetcher has given up on a URL. */
export class TransportError extends Error {
  readonly url: string;
  readonly status?: number;
  readonly retriable: boolean;
  readonly attempts: number;

  constructor(message: string, details: TransportErrorDetails) {
    super(message, { cause: details.cause });
    this.name = "TransportError";
    this.url = details.url;
    this.status = details.status;
    this.retriable = details.retriable;
    this.attempts = details.attempts;
  }
}

export class SourceFetchError extends Error {
  readonly sourceId: string;

  constructor(sourceId: string, cause: unknown) {
    super(`Failed to fetch index for source ${sourceId}: ${errorMessage(cause)}`, { cause });
    this.name = "SourceFetchError";
    this.sourceId = sourceId;
  }
}

export class SourceConfigError extends Error {
  readonly sourceId: string;

  constructor(sourceId: string, message: string) {
    super(`Invalid source ${sourceId}: ${message}`);
    this.name = "SourceConfigError";
    this.sourceId = sourceId;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
