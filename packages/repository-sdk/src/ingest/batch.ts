/**
 * Batch ingest: submit prebuilt package archives to a collection one at a
 * time, record where each one ended up, and retry the failures selectively.
 *
 * A failed submission never stops the batch. Every failure is recorded as a
 * SubmissionError whose `cause` is whatever the transport threw.
 */

import { open } from "node:fs/promises";
import {
  getErrorMessage,
  hasCode,
  isExternalError,
  isSubmissionError,
  isTimeoutError,
  type SubmissionCode,
  SubmissionError,
} from "@archivum/errors";
import { RepositoryAPIError } from "../errors.js";
import { createConsoleLogger, type Logger } from "../logger.js";
import { withSpan } from "../tracing.js";
import type { PackageSubmitter, TransportResponse } from "../types/index.js";

export interface IngestSuccess {
  readonly path: string;
  /** URL of the item the repository created */
  readonly location: string;
}

export interface IngestFailure {
  readonly path: string;
  readonly error: SubmissionError;
}

export interface BatchIngestSummary {
  attempted: number;
  succeeded: number;
  failed: number;
}

export interface BatchIngestOptions {
  logger?: Logger;
}

export type ErrorClass = abstract new (...args: never[]) => Error;

export type FailurePredicate = (error: SubmissionError) => boolean;

/**
 * Which failures `retryFailed` picks up:
 * - an error class, matched against the recorded error and its cause
 * - a submission code
 * - a predicate over the recorded error
 */
export type ErrorKind = ErrorClass | SubmissionCode | FailurePredicate;

function isErrorClass(kind: ErrorClass | FailurePredicate): kind is ErrorClass {
  return kind === Error || kind.prototype instanceof Error;
}

/**
 * Whether a recorded failure matches a retry filter
 */
export function matchesErrorKind(error: SubmissionError, kind: ErrorKind): boolean {
  if (typeof kind === "string") {
    return hasCode(error, kind);
  }
  if (isErrorClass(kind)) {
    const cause = error.cause;
    return error instanceof kind || cause instanceof kind;
  }
  return kind(error);
}

function failureFromException(path: string, error: unknown): SubmissionError {
  if (isSubmissionError(error)) {
    return error;
  }

  const detail = getErrorMessage(error);
  let code: SubmissionCode = "SUBMISSION_FAILED";
  let statusCode: number | undefined;
  if (isTimeoutError(error)) {
    code = "SUBMISSION_TIMEOUT";
  } else if (isExternalError(error)) {
    code = "SUBMISSION_CONNECTION_FAILED";
  } else if (error instanceof RepositoryAPIError) {
    code = "SUBMISSION_REJECTED";
    statusCode = error.statusCode;
  }

  return new SubmissionError({
    code,
    message: `Submitting ${path} failed: ${detail}`,
    path,
    statusCode,
    cause: error,
  });
}

/**
 * Location of the created item, or the failure the response represents
 */
function interpretResponse(path: string, response: TransportResponse): string | SubmissionError {
  if (response.statusCode !== 201) {
    return new SubmissionError({
      code: "SUBMISSION_REJECTED",
      message: `Submitting ${path} returned status ${response.statusCode}`,
      path,
      statusCode: response.statusCode,
    });
  }

  const location = response.headers.get("Location");
  if (!location) {
    return new SubmissionError({
      code: "SUBMISSION_INVALID_RESPONSE",
      message: `Submitting ${path} returned 201 without a Location header`,
      path,
      statusCode: response.statusCode,
    });
  }
  return location;
}

export class BatchIngest {
  readonly paths: readonly string[];
  private readonly collection: PackageSubmitter;
  private readonly logger: Logger;
  private readonly _successes: IngestSuccess[] = [];
  private readonly _errors: IngestFailure[] = [];

  constructor(collection: PackageSubmitter, paths: Iterable<string>, options: BatchIngestOptions = {}) {
    this.collection = collection;
    this.paths = [...paths];
    this.logger = options.logger ?? createConsoleLogger("batch-ingest");
  }

  get successes(): readonly IngestSuccess[] {
    return this._successes;
  }

  get errors(): readonly IngestFailure[] {
    return this._errors;
  }

  /**
   * Submit every configured path, in order
   */
  async run(): Promise<BatchIngestSummary> {
    return this.submitAll(this.paths);
  }

  /**
   * Re-submit the failed paths that match `kind` (all of them by default).
   * Failures that do not match stay where they are.
   */
  async retryFailed(kind?: ErrorKind): Promise<BatchIngestSummary> {
    const selected = this._errors.filter(
      (failure) => kind === undefined || matchesErrorKind(failure.error, kind),
    );
    for (const failure of selected) {
      this.forget(failure.path);
    }
    return this.submitAll(selected.map((failure) => failure.path));
  }

  private async submitAll(paths: readonly string[]): Promise<BatchIngestSummary> {
    const summary: BatchIngestSummary = { attempted: 0, succeeded: 0, failed: 0 };

    for (const path of paths) {
      summary.attempted++;
      if (await this.submit(path)) {
        summary.succeeded++;
      } else {
        summary.failed++;
      }
    }

    this.logger.info(
      `Submitted ${summary.attempted} package(s): ${summary.succeeded} succeeded, ${summary.failed} failed`,
    );
    return summary;
  }

  /**
   * One attempt for one path. Records the outcome and reports success.
   */
  private async submit(path: string): Promise<boolean> {
    let outcome: string | SubmissionError;
    try {
      const response = await this.send(path);
      outcome = interpretResponse(path, response);
    } catch (error) {
      outcome = failureFromException(path, error);
    }

    this.forget(path);
    if (typeof outcome === "string") {
      this._successes.push({ path, location: outcome });
      this.logger.info(`${path} -> ${outcome}`);
      return true;
    }

    this._errors.push({ path, error: outcome });
    this.logger.warn(`${path} failed: ${outcome.message}`);
    return false;
  }

  private async send(path: string): Promise<TransportResponse> {
    return withSpan("repository.ingest.submit", { "ingest.path": path }, async () => {
      const handle = await open(path, "r");
      const stream = handle.createReadStream({ autoClose: false });
      try {
        return await this.collection.submitPackage(stream);
      } finally {
        stream.destroy();
        await handle.close();
      }
    });
  }

  /**
   * Drop every recorded outcome for a path
   */
  private forget(path: string): void {
    removeWhere(this._successes, (entry) => entry.path === path);
    removeWhere(this._errors, (entry) => entry.path === path);
  }
}

function removeWhere<T>(entries: T[], predicate: (entry: T) => boolean): void {
  for (let i = entries.length - 1; i >= 0; i--) {
    const entry = entries[i];
    if (entry !== undefined && predicate(entry)) {
      entries.splice(i, 1);
    }
  }
}
