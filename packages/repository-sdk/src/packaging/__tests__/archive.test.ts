import { mkdir, mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { NotFoundError } from "@archivum/errors";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { entryName, readArchive, readPackageManifest, zipDirectory } from "../archive.js";

describe("archive", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "archive-test-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("should name entries relative to the root with forward slashes", () => {
    expect(entryName(join(root, "src"), join(root, "src", "sub", "b.txt"))).toBe("sub/b.txt");
  });

  it("should zip nested files with relative entry names", async () => {
    const source = join(root, "src");
    await mkdir(join(source, "sub"), { recursive: true });
    await writeFile(join(source, "a.txt"), "alpha");
    await writeFile(join(source, "sub", "b.txt"), "beta");

    const target = await zipDirectory(source, join(root, "out.zip"));

    expect(target).toBe(join(root, "out.zip"));
    const entries = await readArchive(target);
    expect([...entries.keys()].sort()).toEqual(["a.txt", "sub/b.txt"]);
    expect(Buffer.from(entries.get("sub/b.txt") ?? []).toString()).toBe("beta");
  });

  it("should default to a fresh archive in the temp directory", async () => {
    const source = join(root, "src");
    await mkdir(source);
    await writeFile(join(source, "a.txt"), "alpha");

    const target = await zipDirectory(source);

    try {
      expect(target.startsWith(join(tmpdir(), "archive-"))).toBe(true);
      expect(target.endsWith(".zip")).toBe(true);
      expect((await readArchive(target)).size).toBe(1);
    } finally {
      await rm(target, { force: true });
    }
  });

  it("should raise NotFoundError for an archive without a manifest", async () => {
    const source = join(root, "src");
    await mkdir(source);
    await writeFile(join(source, "a.txt"), "alpha");
    const target = await zipDirectory(source, join(root, "bare.zip"));

    await expect(readPackageManifest(target)).rejects.toThrow(NotFoundError);
  });

  it("should fail when the target cannot be written", async () => {
    const source = join(root, "src");
    await mkdir(source);
    await writeFile(join(source, "a.txt"), "alpha");

    await expect(zipDirectory(source, join(root, "missing", "out.zip"))).rejects.toThrow("ENOENT");
    expect(await readdir(root)).toEqual(["src"]);
  });
});
