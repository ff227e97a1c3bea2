/**
 * Resource handles for the repository API
 */

import { ValidationError } from "@archivum/errors";
import type { z } from "zod";
import { RepositoryAPIError, RepositoryValidationError } from "../errors.js";
import type { HttpClient } from "../http/index.js";

/**
 * Builds a handle of one resource kind for a URL
 */
export type ResourceFactory<T> = (http: HttpClient, url: string) => T;

export type RepresentationSchema<R> = z.ZodType<R, z.ZodTypeDef, unknown>;

/**
 * Parse a payload against a schema, turning the first issue into a
 * RepositoryValidationError.
 */
export function parseRepresentation<R>(schema: RepresentationSchema<R>, payload: unknown, url: string): R {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join(".") || undefined;
    throw new RepositoryValidationError(
      `Unexpected representation from ${url}: ${issue?.message ?? "invalid payload"}${field ? ` at ${field}` : ""}`,
      field,
      { cause: result.error },
    );
  }
  return result.data;
}

/**
 * A remote resource addressed by URL.
 *
 * The JSON representation is fetched on first access and cached. Every
 * network round-trip is an explicit method call: `get` may fetch, `set`
 * always writes and drops the cache so the next `get` sees the server's
 * view.
 */
export abstract class Resource<R extends object> {
  /**
   * HTTP client for making API requests
   */
  protected readonly http: HttpClient;

  readonly url: string;

  private readonly schema: RepresentationSchema<R>;
  private readonly readOnly: ReadonlySet<string>;
  private cached: R | undefined;

  constructor(
    http: HttpClient,
    url: string,
    schema: RepresentationSchema<R>,
    readOnly: readonly (keyof R & string)[] = [],
  ) {
    this.http = http;
    this.url = url;
    this.schema = schema;
    this.readOnly = new Set(readOnly);
  }

  /**
   * The cached representation, fetched on first call
   */
  async representation(): Promise<R> {
    if (this.cached === undefined) {
      this.cached = parseRepresentation(this.schema, await this.http.get(this.url), this.url);
    }
    return this.cached;
  }

  /**
   * Read one field of the representation
   */
  async get<K extends keyof R & string>(name: K): Promise<R[K]> {
    const representation = await this.representation();
    return representation[name];
  }

  /**
   * Write one field. The cache is invalidated after the write.
   */
  async set<K extends keyof R & string>(name: K, value: R[K]): Promise<void> {
    await this.write({ [name]: value });
  }

  /**
   * Write several fields in one PATCH request
   */
  async setProperties(values: Partial<R>): Promise<void> {
    await this.write(values);
  }

  private async write(values: object): Promise<void> {
    for (const name of Object.keys(values)) {
      if (this.readOnly.has(name)) {
        throw new ValidationError({
          code: "RESOURCE_READ_ONLY",
          message: `Attempting to write read-only property: ${name}`,
          metadata: { field: name, url: this.url },
        });
      }
    }

    await this.http.patch(this.url, values);
    this.cached = undefined;
  }

  /**
   * Drop the cached representation so the next read re-fetches it
   */
  refresh(): void {
    this.cached = undefined;
  }

  /**
   * Prime the cache with a representation the server already returned
   */
  prime(payload: unknown): void {
    this.cached = parseRepresentation(this.schema, payload, this.url);
  }

  async delete(): Promise<void> {
    await this.http.delete(this.url);
    this.cached = undefined;
  }

  /**
   * Follow a link field of the representation to another resource
   */
  async related<T>(name: keyof R & string, factory: ResourceFactory<T>): Promise<T> {
    const link = await this.get(name);
    if (typeof link !== "string" || link.length === 0) {
      throw new RepositoryValidationError(`${name} is not a resource link on ${this.url}`, name);
    }
    return factory(this.http, link);
  }

  toString(): string {
    return `<${this.constructor.name} (${this.url})>`;
  }
}

/**
 * What a list needs from its entries
 */
export interface ListEntry {
  readonly url: string;
  prime(payload: unknown): void;
}

/**
 * A list endpoint whose entries are resources of one kind
 */
export class ResourceList<T extends ListEntry> {
  protected readonly http: HttpClient;
  readonly url: string;
  private readonly factory: ResourceFactory<T>;

  constructor(http: HttpClient, url: string, factory: ResourceFactory<T>) {
    this.http = http;
    this.url = url.replace(/\/+$/, "");
    this.factory = factory;
  }

  /**
   * Handle for the entry at `<url>/<id>`. No request is made.
   */
  item(id: string | number): T {
    return this.factory(this.http, `${this.url}/${id}`);
  }

  /**
   * Fetch the list. Entries may be URLs or objects carrying a `url`.
   */
  async list(): Promise<T[]> {
    const payload = await this.http.get(this.url);
    if (!Array.isArray(payload)) {
      throw new RepositoryValidationError(`Expected a list from ${this.url}`, undefined);
    }

    return payload.map((entry: unknown) => {
      if (typeof entry === "string") {
        return this.factory(this.http, entry);
      }
      if (typeof entry === "object" && entry !== null && "url" in entry && typeof entry.url === "string") {
        const resource = this.factory(this.http, entry.url);
        resource.prime(entry);
        return resource;
      }
      throw new RepositoryValidationError(`Unrecognized list entry from ${this.url}`, undefined);
    });
  }

  /**
   * Create a new resource. The handle points at the `Location` header and
   * its cache holds the representation returned with the 201.
   */
  async create(params: Record<string, unknown> = {}): Promise<T> {
    const response = await this.http.send(this.url, {
      method: "POST",
      body: JSON.stringify(params),
      headers: { "Content-Type": "application/json" },
    });
    this.http.assertOk(response);

    const location = response.headers.get("Location");
    if (!location) {
      throw new RepositoryAPIError(
        `Created resource at ${this.url} has no Location header`,
        response.statusCode,
        undefined,
      );
    }

    const resource = this.factory(this.http, this.http.resolve(location));
    const text = new TextDecoder().decode(response.body);
    if (text.length > 0) {
      const payload: unknown = JSON.parse(text);
      resource.prime(payload);
    }
    return resource;
  }

  toString(): string {
    return `<ResourceList (${this.url})>`;
  }
}
