/**
 * Directory to zip archive, and back
 */

import { randomUUID } from "node:crypto";
import { createReadStream, createWriteStream } from "node:fs";
import { readdir, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join, relative, sep } from "node:path";
import { NotFoundError } from "@archivum/errors";
import { strFromU8, unzipSync, Zip, ZipDeflate } from "fflate";
import { withSpan } from "../tracing.js";
import { MANIFEST_FILE, type Manifest, parseManifest } from "./manifest.js";

const DEFLATE_LEVEL = 6;

/**
 * Every regular file under `dir`, depth first
 */
async function listFiles(dir: string): Promise<string[]> {
  const files: string[] = [];
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listFiles(path)));
    } else if (entry.isFile()) {
      files.push(path);
    }
  }
  return files;
}

/**
 * Archive entry name: the path relative to the root, always with `/`
 */
export function entryName(root: string, file: string): string {
  return relative(root, file).split(sep).join("/");
}

/**
 * Write every regular file under `sourceDir` into a deflated zip. On
 * failure the partial archive is removed.
 *
 * @param targetPath - Defaults to a fresh `.zip` file in the OS temp dir
 * @returns Path of the archive
 */
export async function zipDirectory(sourceDir: string, targetPath?: string): Promise<string> {
  const target = targetPath ?? join(tmpdir(), `archive-${randomUUID()}.zip`);

  return withSpan("repository.archive.zip", { "archive.source": sourceDir, "archive.target": target }, async () => {
    const files = await listFiles(sourceDir);
    const output = createWriteStream(target);
    const written = new Promise<void>((resolve, reject) => {
      output.once("finish", resolve);
      output.once("error", reject);
    });
    const closed = new Promise<void>((resolve) => {
      output.once("close", () => resolve());
    });

    const zip = new Zip((error, chunk, final) => {
      if (error) {
        output.destroy(error);
        return;
      }
      output.write(chunk);
      if (final) {
        output.end();
      }
    });

    const produce = async (): Promise<void> => {
      try {
        for (const file of files) {
          const entry = new ZipDeflate(entryName(sourceDir, file), { level: DEFLATE_LEVEL });
          zip.add(entry);
          for await (const chunk of createReadStream(file)) {
            entry.push(chunk, false);
          }
          entry.push(new Uint8Array(0), true);
        }
        zip.end();
      } catch (error) {
        zip.terminate();
        output.destroy();
        throw error;
      }
    };

    try {
      // A write error can arrive while entries are still being read
      await Promise.all([written, produce()]);
    } catch (error) {
      zip.terminate();
      output.destroy();
      await closed;
      await rm(target, { force: true });
      throw error;
    }
    return target;
  });
}

/**
 * All entries of an archive, keyed by entry name
 */
export async function readArchive(path: string): Promise<Map<string, Uint8Array>> {
  const entries = unzipSync(await readFile(path));
  return new Map(Object.entries(entries));
}

/**
 * Read and validate the manifest of a package archive
 */
export async function readPackageManifest(path: string): Promise<Manifest> {
  const entries = await readArchive(path);
  const bytes = entries.get(MANIFEST_FILE);
  if (bytes === undefined) {
    throw new NotFoundError(`${path} has no ${MANIFEST_FILE}`, { path });
  }
  const document: unknown = JSON.parse(strFromU8(bytes));
  return parseManifest(document);
}
