/**
 * Main repository client
 */

import { HttpClient } from "./http/index.js";
import type { Attachment } from "./resources/attachments.js";
import type { ResourceList } from "./resources/base.js";
import type { Collection } from "./resources/collections.js";
import type { Item } from "./resources/items.js";
import { ApiRoot } from "./resources/root.js";
import type { ClientConfig, RetryOptions } from "./types/index.js";

export interface CommitOptions {
  /** Commit even when the server reports pending problems */
  force?: boolean;
}

/**
 * Repository API client
 *
 * Discovers the collections, items and attachments lists through the API
 * root document, with built-in retry, timeout, and error handling.
 *
 * @example
 * ```typescript
 * const client = new RepositoryClient(loadClientConfig());
 *
 * const collection = (await client.collections()).item(155);
 * const response = await collection.submitPackage("/tmp/packages/package1.zip");
 * console.log(response.headers.get("Location"));
 * ```
 */
export class RepositoryClient {
  /**
   * Original config for creating new instances
   */
  private readonly _config: ClientConfig;

  /**
   * HTTP client instance
   */
  private readonly _http: HttpClient;

  /**
   * The API root at the base URL, fetched once on first use
   */
  public readonly root: ApiRoot;

  constructor(config: ClientConfig = {}) {
    this._config = config;
    this._http = new HttpClient(config);
    this.root = new ApiRoot(this._http, this._http.baseUrl);
  }

  get baseUrl(): string {
    return this._http.baseUrl;
  }

  async collections(): Promise<ResourceList<Collection>> {
    return this.root.collections();
  }

  /**
   * Items across all collections
   */
  async items(): Promise<ResourceList<Item>> {
    return this.root.items();
  }

  async attachments(): Promise<ResourceList<Attachment>> {
    return this.root.attachments();
  }

  /**
   * Commit pending changes on the server
   */
  async commit(options: CommitOptions = {}): Promise<void> {
    await this._http.post(await this.root.link("commit"), { force: options.force ?? false });
  }

  /**
   * Discard pending changes on the server
   */
  async rollback(): Promise<void> {
    await this._http.post(await this.root.link("rollback"));
  }

  /**
   * Create a new client with updated retry options
   *
   * Returns a new instance; the original client is not modified.
   *
   * @example
   * ```typescript
   * const resilientClient = client.withRetry({ maxAttempts: 5, initialDelay: 2000 });
   * ```
   */
  withRetry(options: RetryOptions): RepositoryClient {
    return new RepositoryClient({
      ...this._config,
      retry: { ...this._config.retry, ...options },
    });
  }

  /**
   * Create a new client with updated timeout
   *
   * Returns a new instance; the original client is not modified.
   */
  withTimeout(ms: number): RepositoryClient {
    return new RepositoryClient({
      ...this._config,
      timeout: ms,
    });
  }
}
