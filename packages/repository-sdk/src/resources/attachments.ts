import { z } from "zod";
import type { HttpClient } from "../http/index.js";
import { MetadataDocumentSchema, MetadataRecord } from "../packaging/metadata.js";
import { parseRepresentation, Resource } from "./base.js";
import type { ContentUpload } from "./content.js";
import type { Item } from "./items.js";
import { RESOURCE_REGISTRY } from "./registry.js";

export const AttachmentSchema = z.object({
  url: z.string().optional(),
  label: z.string().nullish(),
  status: z.string().nullish(),
  item: z.string().nullish(),
  metadata: z.string().nullish(),
  content: z.string().nullish(),
  persistent_url: z.string().nullish(),
});

export type AttachmentRepresentation = z.infer<typeof AttachmentSchema>;

export class Attachment extends Resource<AttachmentRepresentation> {
  constructor(http: HttpClient, url: string) {
    super(http, url, AttachmentSchema, ["persistent_url"]);
  }

  async item(): Promise<Item> {
    return this.related("item", RESOURCE_REGISTRY.item);
  }

  async metadata(): Promise<MetadataRecord> {
    const url = await this.link("metadata");
    const document = parseRepresentation(MetadataDocumentSchema, await this.http.get(url), url);
    return new MetadataRecord(document);
  }

  async setMetadata(record: MetadataRecord): Promise<void> {
    await this.http.put(await this.link("metadata"), record.toJSON());
  }

  /**
   * Download the attached file. Resolves with `null` when the attachment
   * has no content yet.
   */
  async content(): Promise<Uint8Array | null> {
    const response = await this.http.send(await this.link("content"), { method: "GET" });
    if (response.statusCode === 404) {
      return null;
    }
    this.http.assertOk(response);
    return response.body;
  }

  /**
   * Upload a file as the attachment's content (multipart `content` part)
   */
  async setContent(upload: ContentUpload): Promise<void> {
    const blob =
      upload.data instanceof Blob ? upload.data : new Blob([upload.data], { type: upload.filetype });
    const form = new FormData();
    form.append("content", blob, upload.filename);

    const response = await this.http.send(await this.link("content"), { method: "PUT", body: form });
    this.http.assertOk(response);
    this.refresh();
  }

  private async link(name: "metadata" | "content"): Promise<string> {
    return (await this.get(name)) ?? `${this.url}/${name}`;
  }
}
