import { z } from "zod";
import { RepositoryValidationError } from "../errors.js";
import type { HttpClient } from "../http/index.js";
import type { Attachment } from "./attachments.js";
import { Resource, type ResourceList } from "./base.js";
import type { Collection } from "./collections.js";
import type { Item } from "./items.js";
import { createResourceList } from "./registry.js";

export const ApiRootSchema = z.object({
  url: z.string().optional(),
  resources: z
    .object({
      collections: z.string().nullish(),
      objects: z.string().nullish(),
      attachments: z.string().nullish(),
      commit: z.string().nullish(),
      rollback: z.string().nullish(),
    })
    .default({}),
});

export type ApiRootRepresentation = z.infer<typeof ApiRootSchema>;

export type RootLink = keyof ApiRootRepresentation["resources"];

/**
 * The API root document. Every top-level endpoint is discovered through
 * its `resources` links rather than assumed.
 */
export class ApiRoot extends Resource<ApiRootRepresentation> {
  constructor(http: HttpClient, url: string) {
    super(http, url, ApiRootSchema);
  }

  /**
   * Absolute URL of a top-level endpoint. Relative links resolve against
   * the root URL.
   *
   * @throws RepositoryValidationError when the root does not advertise it
   */
  async link(name: RootLink): Promise<string> {
    const resources = await this.get("resources");
    const link = resources[name];
    if (!link) {
      throw new RepositoryValidationError(
        `API root at ${this.url} does not link ${name}`,
        `resources.${name}`,
      );
    }
    return new URL(link, `${this.url}/`).toString();
  }

  async collections(): Promise<ResourceList<Collection>> {
    return createResourceList("collection", this.http, await this.link("collections"));
  }

  /**
   * Items across all collections. The root calls them `objects`.
   */
  async items(): Promise<ResourceList<Item>> {
    return createResourceList("item", this.http, await this.link("objects"));
  }

  async attachments(): Promise<ResourceList<Attachment>> {
    return createResourceList("attachment", this.http, await this.link("attachments"));
  }
}
