/**
 * Common types and interfaces for @archivum/repository-sdk
 */

import type { Readable } from "node:stream";
import type { Logger } from "../logger.js";

/**
 * Configuration options for RepositoryClient
 */
export interface ClientConfig {
  /**
   * API token, sent as `Authorization: Token <token>`
   */
  token?: string;

  /**
   * Basic auth credentials, sent as `Authorization: Basic ...`.
   * Used instead of `token` when both are given.
   */
  username?: string;
  password?: string;

  /**
   * Base URL for the repository API
   * @default "https://repository.example.org/api"
   */
  baseUrl?: string;

  /**
   * Request timeout in milliseconds
   * @default 30000
   */
  timeout?: number;

  /**
   * Retry configuration
   */
  retry?: RetryOptions;

  /**
   * Custom headers to include with every request
   */
  headers?: Record<string, string>;

  /**
   * Receives retry warnings from the transport
   */
  logger?: Logger;
}

/**
 * Retry options for failed requests
 */
export interface RetryOptions {
  /**
   * Maximum number of attempts, the first one included
   * @default 3
   */
  maxAttempts?: number;

  /**
   * Initial delay in milliseconds before first retry
   * @default 1000
   */
  initialDelay?: number;

  /**
   * Maximum delay in milliseconds between retries
   * @default 10000
   */
  maxDelay?: number;

  /**
   * Backoff multiplier for exponential backoff
   * @default 2
   */
  backoffMultiplier?: number;

  /**
   * HTTP status codes that should trigger a retry
   * @default [408, 429, 500, 502, 503, 504]
   */
  retryableStatusCodes?: number[];
}

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "OPTIONS";

export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * Options for JSON requests
 */
export interface RequestOptions {
  method: HttpMethod;

  /**
   * Request body (will be JSON serialized)
   */
  body?: unknown;

  /**
   * Additional headers for this request
   */
  headers?: Record<string, string>;

  query?: QueryParams;
}

/**
 * Raw request body accepted by `HttpClient.send`
 */
export type RawBody = string | Uint8Array | Readable | FormData;

/**
 * Options for raw single-attempt requests
 */
export interface SendOptions {
  method: HttpMethod;
  body?: RawBody;
  headers?: Record<string, string>;
  query?: QueryParams;
}

/**
 * A response as seen by callers that inspect the status themselves
 */
export interface TransportResponse {
  statusCode: number;
  headers: Headers;
  body: Uint8Array;
}

/**
 * API error response
 */
export interface ErrorResponse {
  /**
   * Human-readable error message
   */
  detail?: string;

  message?: string;

  /**
   * Per-field validation messages
   */
  errors?: Record<string, unknown>;
}

/**
 * A zip archive to submit: a file path, a byte stream or the bytes themselves
 */
export type PackageSource = string | Readable | Uint8Array;

/**
 * Anything that accepts package archives, usually a collection.
 */
export interface PackageSubmitter {
  submitPackage(source: PackageSource): Promise<TransportResponse>;
}
