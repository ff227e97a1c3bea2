/**
 * Item packaging: one item's metadata and attachments, materialized into a
 * working directory and then into a zip archive ready for submission.
 *
 * @example
 * ```typescript
 * const archive = await ItemPackager.session({ metadata: { title: "Survey data" } }, async (pack) => {
 *   const attachment = pack.addAttachment(createReadStream("./source/table.csv"), "table.csv", {
 *     label: "Data",
 *   });
 *   attachment.metadata.addDescription("Tabular data from the 2019 survey");
 *   return pack.write("/tmp/packages/package1");
 * });
 * // archive === "/tmp/packages/package1.zip"
 * ```
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Readable } from "node:stream";
import { PackageConflictError, PackageStateError, ReservedMetadataFieldError } from "@archivum/errors";
import { createConsoleLogger, type Logger } from "../logger.js";
import { withSpan } from "../tracing.js";
import { zipDirectory } from "./archive.js";
import { AttachmentDescriptor, type AttachmentSeed } from "./attachment.js";
import {
  type AttachmentFragment,
  codePointLength,
  formatEmbargoDate,
  MANIFEST_FILE,
  type Manifest,
  MAX_LABEL_LENGTH,
  parseManifest,
  RESERVED_MANIFEST_KEYS,
} from "./manifest.js";
import { MetadataRecord, type MetadataSeed } from "./metadata.js";

const TRUNCATION_SUFFIX = "...";

export const ITEM_STATUSES = ["Public", "Private"] as const;
export type ItemStatus = (typeof ITEM_STATUSES)[number];

export interface ItemSeed {
  label?: string;
  status?: ItemStatus;
  embargoDate?: Date;
  enabled?: boolean;
  metadata?: MetadataSeed;
}

export interface ItemPackagerOptions {
  /**
   * Parent of the working directory
   * @default os.tmpdir()
   */
  tempRoot?: string;

  logger?: Logger;
}

/**
 * An item under construction
 */
export class ItemDescriptor {
  label: string | null;
  readonly metadata: MetadataRecord;
  status: ItemStatus | null;
  embargoDate: Date | null;
  enabled: boolean | null;
  readonly attachments: AttachmentDescriptor[] = [];

  constructor(seed: ItemSeed = {}) {
    this.label = seed.label ?? null;
    this.metadata = new MetadataRecord(seed.metadata);
    this.assertNoReservedFields();
    this.status = seed.status ?? null;
    this.embargoDate = seed.embargoDate ?? null;
    this.enabled = seed.enabled ?? null;
  }

  setPublic(): void {
    this.status = "Public";
  }

  setPrivate(): void {
    this.status = "Private";
  }

  enable(): void {
    this.enabled = true;
  }

  disable(): void {
    this.enabled = false;
  }

  setEmbargoDate(date: Date): void {
    this.embargoDate = date;
  }

  removeEmbargo(): void {
    this.embargoDate = null;
  }

  /**
   * Shorten an over-long label to 255 code points ending in `...` and
   * note the original in `metadata.notes`. Labels within the limit are
   * left alone, so calling this again is a no-op.
   */
  validateAndTransform(): void {
    if (this.label === null || codePointLength(this.label) <= MAX_LABEL_LENGTH) {
      return;
    }
    const original = this.label;
    const kept = Array.from(original).slice(0, MAX_LABEL_LENGTH - TRUNCATION_SUFFIX.length);
    this.label = kept.join("") + TRUNCATION_SUFFIX;
    this.metadata.addNote(`Label truncated from original: ${original}`);
  }

  /**
   * The manifest document for this item, given its materialized attachments
   *
   * @throws ReservedMetadataFieldError when a metadata field would shadow an
   *   item property
   */
  toManifest(fragments: readonly AttachmentFragment[]): Manifest {
    this.assertNoReservedFields();
    return parseManifest({
      ...this.metadata.toJSON(),
      label: this.label,
      status: this.status,
      embargo_date: this.embargoDate === null ? null : formatEmbargoDate(this.embargoDate),
      enabled: this.enabled,
      attachments: fragments,
    });
  }

  private assertNoReservedFields(): void {
    const reserved = this.metadata.fields().find((field) => RESERVED_MANIFEST_KEYS.has(field));
    if (reserved !== undefined) {
      throw new ReservedMetadataFieldError(reserved);
    }
  }
}

/**
 * Builds one package. Attachments can only be added while the packager is
 * open, that is while it owns a private working directory.
 */
export class ItemPackager {
  readonly item: ItemDescriptor;
  private readonly tempRoot: string;
  private readonly logger: Logger;
  private workingDir: string | null = null;
  private written = false;

  constructor(seed: ItemSeed = {}, options: ItemPackagerOptions = {}) {
    this.item = new ItemDescriptor(seed);
    this.tempRoot = options.tempRoot ?? tmpdir();
    this.logger = options.logger ?? createConsoleLogger("item-packager");
  }

  /**
   * Open a packager, run `fn`, and remove the working directory whatever
   * the outcome.
   */
  static async session<T>(
    seed: ItemSeed,
    fn: (packager: ItemPackager) => Promise<T>,
    options: ItemPackagerOptions = {},
  ): Promise<T> {
    const packager = new ItemPackager(seed, options);
    await packager.open();
    try {
      return await fn(packager);
    } finally {
      await packager.close();
    }
  }

  get isOpen(): boolean {
    return this.workingDir !== null;
  }

  /**
   * The working directory of the open packager
   */
  get directory(): string {
    if (this.workingDir === null) {
      throw new PackageStateError("Packager is not open");
    }
    return this.workingDir;
  }

  async open(): Promise<this> {
    if (this.workingDir !== null) {
      throw new PackageStateError("Packager is already open");
    }
    this.workingDir = await mkdtemp(join(this.tempRoot, "package-"));
    this.logger.debug(`Opened working directory ${this.workingDir}`);
    return this;
  }

  /**
   * Release every source not yet copied and remove the working directory.
   * Safe to call more than once.
   */
  async close(): Promise<void> {
    const dir = this.workingDir;
    if (dir === null) {
      return;
    }
    this.workingDir = null;
    this.discardSources();
    await rm(dir, { recursive: true, force: true });
    this.logger.debug(`Removed working directory ${dir}`);
  }

  /**
   * Add a file to the item. The content is copied when the package is
   * written; the returned descriptor can still be annotated until then.
   *
   * The packager owns `source` from here on: it is destroyed when this
   * call fails, and when the packager closes without having copied it.
   *
   * @throws PackageStateError when the packager is not open or already written
   * @throws PackageConflictError when another attachment uses the same name
   */
  addAttachment(
    source: Readable | null,
    destinationName?: string,
    seed?: AttachmentSeed,
  ): AttachmentDescriptor {
    if (this.workingDir === null) {
      source?.destroy();
      throw new PackageStateError("Attachments can only be added while the packager is open");
    }

    const attachment = new AttachmentDescriptor(source, destinationName, seed);
    const taken =
      attachment.destinationName === MANIFEST_FILE ||
      this.item.attachments.some((a) => a.destinationName === attachment.destinationName);
    if (taken) {
      attachment.discard();
      throw new PackageConflictError(attachment.destinationName);
    }
    if (this.written) {
      attachment.discard();
      throw new PackageStateError("Package was already written");
    }
    this.item.attachments.push(attachment);
    return attachment;
  }

  validateAndTransform(): void {
    this.item.validateAndTransform();
  }

  /**
   * Copy every attachment into the working directory, in insertion order,
   * and write `manifest.json` beside them.
   */
  async writeDirectory(): Promise<Manifest> {
    const dir = this.directory;
    if (this.written) {
      throw new PackageStateError("Package was already written");
    }
    this.written = true;

    this.validateAndTransform();
    const fragments: AttachmentFragment[] = [];
    try {
      for (const attachment of this.item.attachments) {
        fragments.push(await attachment.writeDirectory(dir));
        this.logger.debug(`Materialized ${attachment.destinationName}`);
      }
    } catch (error) {
      this.discardSources();
      throw error;
    }

    const manifest = this.item.toManifest(fragments);
    await writeFile(join(dir, MANIFEST_FILE), JSON.stringify(manifest), { flag: "wx" });
    return manifest;
  }

  private discardSources(): void {
    for (const attachment of this.item.attachments) {
      attachment.discard();
    }
  }

  /**
   * Write the package to `<targetBaseName>.zip`
   *
   * @returns Path of the archive
   */
  async write(targetBaseName: string): Promise<string> {
    return withSpan(
      "repository.package.write",
      { "package.target": targetBaseName, "package.attachments": this.item.attachments.length },
      async () => {
        await this.writeDirectory();
        return zipDirectory(this.directory, `${targetBaseName}.zip`);
      },
    );
  }
}
