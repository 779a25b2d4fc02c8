import { Agent, fetch as undiciFetch } from "undici";
import { Logger } from "../observability";
import { errorMessage, TransportError } from "./errors";

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

export function getFetchDispatcher(ignoreHttpsErrors: boolean): Agent | undefined {
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

export interface HttpResponseLike {
  ok: boolean;
  status: number;
  body?: { cancel(): Promise<void> } | null;
  text(): Promise<string>;
}

export interface FetchInit {
  method: "GET";
  headers: Record<string, string>;
  signal: AbortSignal;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<HttpResponseLike>;

/** The capability the crawler depends on: a URL in, an HTML body out, or a thrown TransportError. */
export interface PageSource {
  fetchHtml(url: string): Promise<string>;
}

export interface HtmlFetcherOptions {
  userAgent: string;
  timeoutMs: number;
  maxAttempts: number;
  baseDelayMs: number;
  ignoreHttpsErrors?: boolean;
  fetchFn?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

const RETRIABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

export function isRetriableStatus(status: number): boolean {
  return RETRIABLE_STATUSES.has(status);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffDelay(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * 2 ** (attempt - 1);
}

export function createUndiciFetch(ignoreHttpsErrors: boolean): FetchLike {
  const dispatcher = getFetchDispatcher(ignoreHttpsErrors);
  return (url, init) => undiciFetch(url, { ...init, dispatcher });
}

class RetriableStatusError extends Error {
  readonly status: number;

  constructor(url: string, status: number) {
    super(`HTTP ${status} while fetching ${url}`);
    this.status = status;
  }
}

export class HtmlFetcher implements PageSource {
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly fetchFn: FetchLike;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger?: Logger;

  constructor(options: HtmlFetcherOptions) {
    this.userAgent = options.userAgent;
    this.timeoutMs = options.timeoutMs;
    this.maxAttempts = Math.max(1, options.maxAttempts);
    this.baseDelayMs = options.baseDelayMs;
    this.fetchFn = options.fetchFn ?? createUndiciFetch(options.ignoreHttpsErrors ?? false);
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger;
  }

  async fetchHtml(url: string): Promise<string> {
    let lastError: unknown;
    let lastStatus: number | undefined;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      try {
        return await this.attempt(url, attempt);
      } catch (error) {
        if (error instanceof TransportError) {
          throw error;
        }

        lastError = error;
        lastStatus = error instanceof RetriableStatusError ? error.status : undefined;
        if (attempt >= this.maxAttempts) {
          break;
        }

        const delayMs = backoffDelay(this.baseDelayMs, attempt);
        this.logger?.warn("fetch_retry", { url, attempt, delayMs, status: lastStatus, error: errorMessage(error) });
        await this.sleep(delayMs);
      }
    }

    throw new TransportError(`Giving up on ${url} after ${this.maxAttempts} attempts: ${errorMessage(lastError)}`, {
      url,
      status: lastStatus,
      retriable: true,
      attempts: this.maxAttempts,
      cause: lastError,
    });
  }

  private async attempt(url: string, attempt: number): Promise<string> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchFn(url, {
        method: "GET",
        headers: {
          "user-agent": this.userAgent,
          accept: "text/html,application/xhtml+xml",
        },
        signal: controller.signal,
      });

      if (response.ok) {
        return await response.text();
      }
      // Release the connection; the error body is not used.
      await response.body?.cancel();
      if (isRetriableStatus(response.status)) {
        throw new RetriableStatusError(url, response.status);
      }
      throw new TransportError(`HTTP ${response.status} while fetching ${url}`, {
        url,
        status: response.status,
        retriable: false,
        attempts: attempt,
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}
