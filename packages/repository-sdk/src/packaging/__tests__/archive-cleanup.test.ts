import { mkdir, mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { zipDirectory } from "../archive.js";

// Reading any file named `unreadable.bin` fails after the first chunk
vi.mock("node:fs", async (importOriginal) => {
  const actual = await importOriginal<typeof import("node:fs")>();
  const { Readable } = await import("node:stream");
  return {
    ...actual,
    createReadStream: (...args: Parameters<typeof actual.createReadStream>) => {
      const [path] = args;
      if (String(path).endsWith("unreadable.bin")) {
        let sent = false;
        return new Readable({
          read() {
            if (!sent) {
              sent = true;
              this.push(Buffer.from("first chunk"));
              return;
            }
            this.destroy(new Error("EIO: i/o error, read"));
          },
        });
      }
      return actual.createReadStream(...args);
    },
  };
});

describe("zipDirectory cleanup", () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), "archive-cleanup-test-"));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("should remove the partial archive when a file cannot be read", async () => {
    const source = join(root, "src");
    await mkdir(source);
    await writeFile(join(source, "a.txt"), "alpha");
    await writeFile(join(source, "unreadable.bin"), "beta");

    await expect(zipDirectory(source, join(root, "out.zip"))).rejects.toThrow("EIO: i/o error, read");

    expect(await readdir(root)).toEqual(["src"]);
  });
});
