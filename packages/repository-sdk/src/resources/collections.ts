import { open } from "node:fs/promises";
import { z } from "zod";
import type { PackageSource, PackageSubmitter, TransportResponse } from "../types/index.js";
import { Resource, type ResourceList } from "./base.js";
import type { Item } from "./items.js";
import { createResourceList } from "./registry.js";
import type { HttpClient } from "../http/index.js";

export const CollectionSchema = z.object({
  url: z.string().optional(),
  name: z.string().nullish(),
  description: z.string().nullish(),
  persistent_url: z.string().nullish(),
  items: z.string().nullish(),
});

export type CollectionRepresentation = z.infer<typeof CollectionSchema>;

/**
 * A collection: groups items and accepts package submissions
 */
export class Collection extends Resource<CollectionRepresentation> implements PackageSubmitter {
  constructor(http: HttpClient, url: string) {
    super(http, url, CollectionSchema, ["persistent_url"]);
  }

  get packageUrl(): string {
    return `${this.url}/package`;
  }

  /**
   * Items of this collection
   */
  async items(): Promise<ResourceList<Item>> {
    const link = await this.get("items");
    return createResourceList("item", this.http, link ?? `${this.url}/items`);
  }

  /**
   * POST a package archive to `<url>/package`.
   *
   * A path is opened here and closed once the request completes; streams
   * and byte arrays are sent as given. The response is returned whatever
   * its status.
   */
  async submitPackage(source: PackageSource): Promise<TransportResponse> {
    const headers = { "Content-Type": "application/zip" };

    if (typeof source !== "string") {
      return this.http.send(this.packageUrl, { method: "POST", body: source, headers });
    }

    const handle = await open(source, "r");
    const stream = handle.createReadStream({ autoClose: false });
    try {
      return await this.http.send(this.packageUrl, { method: "POST", body: stream, headers });
    } finally {
      stream.destroy();
      await handle.close();
    }
  }
}
