import { z } from "zod";
import type { HttpClient } from "../http/index.js";
import { MetadataDocumentSchema, MetadataRecord } from "../packaging/metadata.js";
import type { Attachment } from "./attachments.js";
import { parseRepresentation, Resource, type ResourceList } from "./base.js";
import type { Collection } from "./collections.js";
import { createResourceList, RESOURCE_REGISTRY } from "./registry.js";

export const ItemSchema = z.object({
  url: z.string().optional(),
  label: z.string().nullish(),
  status: z.string().nullish(),
  item_status: z.string().nullish(),
  embargo_date: z.string().nullish(),
  enabled: z.boolean().nullish(),
  item_enabled: z.boolean().nullish(),
  persistent_url: z.string().nullish(),
  collection: z.string().nullish(),
  attachments: z.string().nullish(),
  metadata: z.string().nullish(),
});

export type ItemRepresentation = z.infer<typeof ItemSchema>;

export class Item extends Resource<ItemRepresentation> {
  constructor(http: HttpClient, url: string) {
    super(http, url, ItemSchema, ["status", "enabled", "persistent_url"]);
  }

  async collection(): Promise<Collection> {
    return this.related("collection", RESOURCE_REGISTRY.collection);
  }

  async attachments(): Promise<ResourceList<Attachment>> {
    const link = await this.get("attachments");
    return createResourceList("attachment", this.http, link ?? `${this.url}/attachments`);
  }

  /**
   * Fetch the descriptive metadata document
   */
  async metadata(): Promise<MetadataRecord> {
    const url = await this.metadataUrl();
    const document = parseRepresentation(MetadataDocumentSchema, await this.http.get(url), url);
    return new MetadataRecord(document);
  }

  /**
   * Replace the descriptive metadata document
   */
  async setMetadata(record: MetadataRecord): Promise<void> {
    await this.http.put(await this.metadataUrl(), record.toJSON());
  }

  private async metadataUrl(): Promise<string> {
    return (await this.get("metadata")) ?? `${this.url}/metadata`;
  }
}
