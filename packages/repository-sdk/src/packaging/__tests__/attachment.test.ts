import { createReadStream } from "node:fs";
import { access, mkdtemp, readdir, readFile, rm, unlink, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Readable } from "node:stream";
import { PackageConflictError, PackageStateError } from "@archivum/errors";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { AttachmentDescriptor, normalizeDestinationName } from "../attachment.js";

/**
 * Emits one chunk, then fails
 */
function failingSource(): Readable {
  let sent = false;
  return new Readable({
    read() {
      if (!sent) {
        sent = true;
        this.push(Buffer.from("partial"));
        return;
      }
      this.destroy(new Error("source device lost"));
    },
  });
}

describe("normalizeDestinationName", () => {
  it("should keep names inside the working directory", () => {
    expect(normalizeDestinationName("../../etc/passwd")).toBe("etc/passwd");
    expect(normalizeDestinationName("/data/./tables//2019.csv")).toBe("data/tables/2019.csv");
    expect(normalizeDestinationName("sub\\b.txt")).toBe("sub/b.txt");
    expect(normalizeDestinationName("a/../b.txt")).toBe("a/b.txt");
    expect(normalizeDestinationName("...")).toBe("");
  });
});

describe("AttachmentDescriptor", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "attachment-test-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("should take its name and label from the destination", () => {
    const attachment = new AttachmentDescriptor(Readable.from(["x"]), "scans/page-1.tif");

    expect(attachment.destinationName).toBe("scans/page-1.tif");
    expect(attachment.label).toBe("page-1.tif");
  });

  it("should fall back to the source file name", async () => {
    const source = join(dir, "table.csv");
    await writeFile(source, "a,b\n");
    const stream = createReadStream(source);

    const attachment = new AttachmentDescriptor(stream, undefined, { label: "Data" });
    stream.destroy();

    expect(attachment.destinationName).toBe("table.csv");
    expect(attachment.label).toBe("Data");
  });

  it("should generate a name when nothing else is known", () => {
    const attachment = new AttachmentDescriptor(Readable.from(["x"]));

    expect(attachment.destinationName).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/);
  });

  it("should set access levels in its metadata", () => {
    const attachment = new AttachmentDescriptor(null, "a.txt");

    attachment.setFileClosed();
    attachment.setDerivativesAsuOnly();
    expect(attachment.metadata.value("file_access")).toBe("Closed");
    expect(attachment.metadata.value("derivative_access")).toBe("ASU");

    attachment.setFileOpen();
    attachment.setDerivativesOpen();
    expect(attachment.metadata.value("file_access")).toBe("OpenAccess");
    expect(attachment.metadata.value("derivative_access")).toBe("OpenAccess");
  });

  it("should copy the content into the working directory", async () => {
    const attachment = new AttachmentDescriptor(Readable.from([Buffer.from("hello "), Buffer.from("world")]), "sub/b.txt", {
      metadata: { title: "Greeting" },
    });

    const fragment = await attachment.writeDirectory(dir);

    expect(await readFile(join(dir, "sub", "b.txt"), "utf8")).toBe("hello world");
    expect(fragment).toEqual({ label: "b.txt", metadata: { title: ["Greeting"] }, content: "sub/b.txt" });
  });

  it("should write nothing for a metadata-only attachment", async () => {
    const attachment = new AttachmentDescriptor(null, "placeholder.pdf");

    const fragment = await attachment.writeDirectory(dir);

    expect(fragment).toEqual({ label: "placeholder.pdf", metadata: {}, content: null });
    expect(await readdir(dir)).toEqual([]);
  });

  it("should leave an existing file untouched", async () => {
    await writeFile(join(dir, "a.txt"), "original");
    const attachment = new AttachmentDescriptor(Readable.from([Buffer.from("replacement")]), "a.txt");

    await expect(attachment.writeDirectory(dir)).rejects.toThrow(PackageConflictError);
    expect(await readFile(join(dir, "a.txt"), "utf8")).toBe("original");
  });

  it("should refuse to materialize twice", async () => {
    const attachment = new AttachmentDescriptor(Readable.from([Buffer.from("once")]), "a.txt");
    await attachment.writeDirectory(dir);

    await expect(attachment.writeDirectory(dir)).rejects.toThrow(PackageConflictError);

    await unlink(join(dir, "a.txt"));
    await expect(attachment.writeDirectory(dir)).rejects.toThrow(PackageStateError);
  });

  it("should remove the partial output when the copy fails", async () => {
    const attachment = new AttachmentDescriptor(failingSource(), "broken.bin");

    await expect(attachment.writeDirectory(dir)).rejects.toThrow("source device lost");

    await expect(access(join(dir, "broken.bin"))).rejects.toThrow();
    await expect(attachment.writeDirectory(dir)).rejects.toThrow(
      "Attachment broken.bin source was already consumed",
    );
  });

  it("should destroy a discarded source", async () => {
    const source = Readable.from([Buffer.from("unused")]);
    const attachment = new AttachmentDescriptor(source, "unused.txt");

    attachment.discard();

    expect(source.destroyed).toBe(true);
    await expect(attachment.writeDirectory(dir)).rejects.toThrow(PackageStateError);
    expect(await readdir(dir)).toEqual([]);
  });
});
