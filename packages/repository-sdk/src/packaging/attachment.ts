/**
 * One file of a package and its metadata
 */

import { randomUUID } from "node:crypto";
import { ReadStream } from "node:fs";
import { access, type FileHandle, mkdir, open, rm } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { PackageConflictError, PackageStateError } from "@archivum/errors";
import type { AttachmentFragment } from "./manifest.js";
import { MetadataRecord, type MetadataSeed } from "./metadata.js";

/** Bytes copied per write while materializing */
export const COPY_CHUNK_SIZE = 64 * 1024;

export const ACCESS_LEVELS = ["OpenAccess", "ASU", "Closed"] as const;
export type AccessLevel = (typeof ACCESS_LEVELS)[number];

export interface AttachmentSeed {
  label?: string;
  metadata?: MetadataSeed;
}

/**
 * Strip leading separators and dots, and drop `.`, `..` and empty
 * segments, so the name stays inside the working directory.
 */
export function normalizeDestinationName(name: string): string {
  return name
    .replace(/^[\\/.]+/, "")
    .split(/[\\/]+/)
    .filter((segment) => segment !== "" && segment !== "." && segment !== "..")
    .join("/");
}

function sourceFileName(source: Readable | null): string {
  if (source instanceof ReadStream) {
    return basename(typeof source.path === "string" ? source.path : source.path.toString());
  }
  return "";
}

function isAlreadyExists(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EEXIST";
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export class AttachmentDescriptor {
  label: string;
  readonly metadata: MetadataRecord;
  readonly destinationName: string;
  private source: Readable | null;
  private consumed = false;

  /**
   * @param source - Content to copy into the package, or `null` for a
   *   metadata-only attachment
   * @param destinationName - Path inside the package. Defaults to the
   *   source file's name, then to a generated token.
   */
  constructor(source: Readable | null, destinationName?: string, seed: AttachmentSeed = {}) {
    this.source = source;
    this.destinationName =
      normalizeDestinationName(destinationName ?? "") ||
      normalizeDestinationName(sourceFileName(source)) ||
      randomUUID();
    this.label = seed.label || basename(this.destinationName);
    this.metadata = new MetadataRecord(seed.metadata);
  }

  setFileAccess(level: AccessLevel): void {
    this.metadata.setValue("file_access", level);
  }

  setDerivativeAccess(level: AccessLevel): void {
    this.metadata.setValue("derivative_access", level);
  }

  setFileOpen(): void {
    this.setFileAccess("OpenAccess");
  }

  setFileAsuOnly(): void {
    this.setFileAccess("ASU");
  }

  setFileClosed(): void {
    this.setFileAccess("Closed");
  }

  setDerivativesOpen(): void {
    this.setDerivativeAccess("OpenAccess");
  }

  setDerivativesAsuOnly(): void {
    this.setDerivativeAccess("ASU");
  }

  setDerivativesClosed(): void {
    this.setDerivativeAccess("Closed");
  }

  /**
   * Release the source without copying it. No-op once the source was
   * consumed.
   */
  discard(): void {
    if (this.source !== null) {
      this.source.destroy();
      this.source = null;
      this.consumed = true;
    }
  }

  /**
   * Copy the source into `<workingDir>/<destinationName>` and close it.
   *
   * The output is created exclusively: an existing file is never
   * overwritten. The source can be consumed once, successfully or not; a
   * failed copy removes its partial output.
   *
   * @throws PackageConflictError when the output file already exists
   * @throws PackageStateError when the source was already consumed
   */
  async writeDirectory(workingDir: string): Promise<AttachmentFragment> {
    const outputPath = join(workingDir, this.destinationName);

    if (this.consumed) {
      if (await pathExists(outputPath)) {
        throw new PackageConflictError(this.destinationName);
      }
      throw new PackageStateError(`Attachment ${this.destinationName} source was already consumed`);
    }

    const source = this.source;
    if (source === null) {
      return this.toFragment(null);
    }

    await mkdir(dirname(outputPath), { recursive: true });

    let output: FileHandle;
    try {
      output = await open(outputPath, "wx");
    } catch (error) {
      if (isAlreadyExists(error)) {
        throw new PackageConflictError(this.destinationName);
      }
      throw error;
    }

    try {
      await pipeline(source, output.createWriteStream({ highWaterMark: COPY_CHUNK_SIZE }));
    } catch (error) {
      await rm(outputPath, { force: true });
      throw error;
    } finally {
      source.destroy();
      this.source = null;
      this.consumed = true;
    }

    return this.toFragment(this.destinationName);
  }

  /**
   * The manifest entry for this attachment
   */
  toFragment(content: string | null): AttachmentFragment {
    return {
      label: this.label,
      metadata: this.metadata.toJSON(),
      content,
    };
  }
}
