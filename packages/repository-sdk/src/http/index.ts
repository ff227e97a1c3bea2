/**
 * HTTP client with retry, timeout, and error handling
 */

import { Readable } from "node:stream";
import { getErrorMessage, isTransientError } from "@archivum/errors";
import { RepositoryAPIError, RepositoryNetworkError, RepositoryTimeoutError } from "../errors.js";
import { createConsoleLogger, type Logger } from "../logger.js";
import type {
  ClientConfig,
  ErrorResponse,
  QueryParams,
  RequestOptions,
  RetryOptions,
  SendOptions,
  TransportResponse,
} from "../types/index.js";

/**
 * Default configuration values
 */
export const DEFAULT_BASE_URL = "https://repository.example.org/api";
export const DEFAULT_TIMEOUT = 30000;
export const DEFAULT_RETRY_OPTIONS: Required<RetryOptions> = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 10000,
  backoffMultiplier: 2,
  retryableStatusCodes: [408, 429, 500, 502, 503, 504],
};

const ABSOLUTE_URL = /^https?:\/\//i;

/**
 * Authorization header for the configured credentials. Basic auth wins
 * over a token.
 */
function authorization(config: ClientConfig): string | undefined {
  if (config.username !== undefined) {
    const credentials = Buffer.from(`${config.username}:${config.password ?? ""}`).toString("base64");
    return `Basic ${credentials}`;
  }
  if (config.token) {
    return `Token ${config.token}`;
  }
  return undefined;
}

/**
 * HTTP client for the repository API
 */
export class HttpClient {
  readonly baseUrl: string;
  private readonly timeout: number;
  private readonly retryOptions: Required<RetryOptions>;
  private readonly defaultHeaders: Record<string, string>;
  private readonly logger: Logger;

  constructor(config: ClientConfig) {
    this.baseUrl = (config.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT;
    this.retryOptions = {
      ...DEFAULT_RETRY_OPTIONS,
      ...config.retry,
    };
    this.logger = config.logger ?? createConsoleLogger("repository-sdk");

    const auth = authorization(config);
    this.defaultHeaders = {
      Accept: "application/json",
      "User-Agent": "@archivum/repository-sdk",
      ...(auth !== undefined ? { Authorization: auth } : {}),
      ...config.headers,
    };
  }

  /**
   * Create a new HttpClient with updated retry options
   */
  withRetry(options: RetryOptions): HttpClient {
    return new HttpClient({
      baseUrl: this.baseUrl,
      timeout: this.timeout,
      retry: { ...this.retryOptions, ...options },
      headers: this.defaultHeaders,
      logger: this.logger,
    });
  }

  /**
   * Create a new HttpClient with updated timeout
   */
  withTimeout(timeout: number): HttpClient {
    return new HttpClient({
      baseUrl: this.baseUrl,
      timeout,
      retry: this.retryOptions,
      headers: this.defaultHeaders,
      logger: this.logger,
    });
  }

  /**
   * Resolve a path against the base URL. Absolute URLs pass through.
   */
  resolve(path: string): string {
    if (ABSOLUTE_URL.test(path)) {
      return path;
    }
    return `${this.baseUrl}/${path.replace(/^\/+/, "")}`;
  }

  /**
   * Make a JSON request with retry and timeout.
   *
   * Resolves with the parsed body, or `undefined` for 204 No Content.
   */
  async request(path: string, options: RequestOptions): Promise<unknown> {
    const url = this.buildUrl(path, options.query);
    const headers: Record<string, string> = { ...this.defaultHeaders, ...options.headers };

    const init: RequestInit = { method: options.method, headers };
    if (options.body !== undefined) {
      headers["Content-Type"] = "application/json";
      init.body = JSON.stringify(options.body);
    }

    let lastError: Error | undefined;

    for (let attempt = 1; attempt <= this.retryOptions.maxAttempts; attempt++) {
      try {
        const response = await this.fetchWithTimeout(url, init);

        return await this.handleResponse(response);
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error));

        if (!this.isRetryable(error)) {
          throw error;
        }

        // If this was the last attempt, throw
        if (attempt === this.retryOptions.maxAttempts) {
          throw lastError;
        }

        // Calculate delay with exponential backoff
        const delay = Math.min(
          this.retryOptions.initialDelay * this.retryOptions.backoffMultiplier ** (attempt - 1),
          this.retryOptions.maxDelay,
        );

        this.logger.warn(
          `${options.method} ${url} failed (${lastError.message}), retrying in ${delay}ms`,
        );
        await this.sleep(delay);
      }
    }

    throw lastError ?? new RepositoryNetworkError("Request failed after all retries");
  }

  /**
   * Send a raw request once.
   *
   * Never throws on an HTTP status; the caller inspects `statusCode`.
   * Timeouts and connection failures still throw.
   */
  async send(path: string, options: SendOptions): Promise<TransportResponse> {
    const url = this.buildUrl(path, options.query);
    const init: RequestInit = {
      method: options.method,
      headers: { ...this.defaultHeaders, ...options.headers },
    };

    if (options.body !== undefined) {
      init.body = options.body;
      if (options.body instanceof Readable) {
        // Streamed uploads must be declared half-duplex
        init.duplex = "half";
      }
    }

    const response = await this.fetchWithTimeout(url, init);
    return {
      statusCode: response.status,
      headers: response.headers,
      body: new Uint8Array(await response.arrayBuffer()),
    };
  }

  /**
   * Throw a RepositoryAPIError unless the raw response has a 2xx status
   */
  assertOk(response: TransportResponse): void {
    if (response.statusCode >= 200 && response.statusCode < 300) {
      return;
    }
    const errorResponse = parseErrorBody(new TextDecoder().decode(response.body));
    throw new RepositoryAPIError(
      errorMessage(errorResponse, response.statusCode, ""),
      response.statusCode,
      errorResponse,
    );
  }

  async get(path: string, query?: QueryParams): Promise<unknown> {
    return this.request(path, query ? { method: "GET", query } : { method: "GET" });
  }

  async post(path: string, body?: unknown): Promise<unknown> {
    return this.request(path, { method: "POST", body });
  }

  async put(path: string, body?: unknown): Promise<unknown> {
    return this.request(path, { method: "PUT", body });
  }

  async patch(path: string, body?: unknown): Promise<unknown> {
    return this.request(path, { method: "PATCH", body });
  }

  async delete(path: string): Promise<unknown> {
    return this.request(path, { method: "DELETE" });
  }

  async options(path: string): Promise<unknown> {
    return this.request(path, { method: "OPTIONS" });
  }

  private isRetryable(error: unknown): boolean {
    if (error instanceof RepositoryAPIError) {
      return this.retryOptions.retryableStatusCodes.includes(error.statusCode);
    }
    // Timeouts and network errors are retried, anything else is a bug
    return isTransientError(error);
  }

  /**
   * Build full URL with query parameters
   */
  private buildUrl(path: string, query?: QueryParams): string {
    const url = new URL(this.resolve(path));

    if (query) {
      for (const [key, value] of Object.entries(query)) {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      }
    }

    return url.toString();
  }

  /**
   * Fetch with timeout
   */
  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(url, {
        ...init,
        signal: controller.signal,
      });

      clearTimeout(timeoutId);
      return response;
    } catch (error) {
      clearTimeout(timeoutId);

      if (error instanceof Error && error.name === "AbortError") {
        throw new RepositoryTimeoutError(`Request timeout after ${this.timeout}ms`, this.timeout);
      }

      throw new RepositoryNetworkError(`Network error: ${getErrorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Handle HTTP response
   */
  private async handleResponse(response: Response): Promise<unknown> {
    const text = await response.text();

    if (response.ok) {
      if (response.status === 204 || text.length === 0) {
        return undefined;
      }

      try {
        return JSON.parse(text);
      } catch (error) {
        throw new RepositoryAPIError("Failed to parse response JSON", response.status, undefined, {
          cause: error,
        });
      }
    }

    const errorResponse = parseErrorBody(text);
    throw new RepositoryAPIError(
      errorMessage(errorResponse, response.status, response.statusText),
      response.status,
      errorResponse,
    );
  }

  /**
   * Sleep for a given duration
   */
  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

function parseErrorBody(text: string): ErrorResponse | undefined {
  if (text.length === 0) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      return undefined;
    }
    const body: ErrorResponse = {};
    if ("detail" in parsed && typeof parsed.detail === "string") body.detail = parsed.detail;
    if ("message" in parsed && typeof parsed.message === "string") body.message = parsed.message;
    if ("errors" in parsed && typeof parsed.errors === "object" && parsed.errors !== null) {
      body.errors = { ...parsed.errors };
    }
    return body;
  } catch {
    // Not JSON; the status line is all we have
    return undefined;
  }
}

function errorMessage(
  errorResponse: ErrorResponse | undefined,
  status: number,
  statusText: string,
): string {
  return (
    errorResponse?.detail ??
    errorResponse?.message ??
    `HTTP ${status}${statusText ? `: ${statusText}` : ""}`
  );
}
