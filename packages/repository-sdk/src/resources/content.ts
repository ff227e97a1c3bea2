/**
 * Uploads for an attachment's content
 */

import { posix } from "node:path";
import { HttpClient } from "../http/index.js";

/**
 * A file upload for an attachment's content
 */
export interface ContentUpload {
  data: Uint8Array | Blob;
  filename: string;
  filetype: string;
}

export interface CreateContentOptions {
  /** @default "content" */
  filename?: string;
  /** Guessed from the filename when absent */
  filetype?: string;
}

export interface UrlContentOptions {
  /** Defaults to the last segment of the URL path */
  filename?: string;
  /** Client used for the download; a bare client without credentials by default */
  http?: HttpClient;
}

const MIME_TYPES: Record<string, string> = {
  ".txt": "text/plain",
  ".csv": "text/csv",
  ".tsv": "text/tab-separated-values",
  ".html": "text/html",
  ".htm": "text/html",
  ".css": "text/css",
  ".md": "text/markdown",
  ".xml": "application/xml",
  ".json": "application/json",
  ".yaml": "application/x-yaml",
  ".yml": "application/x-yaml",
  ".pdf": "application/pdf",
  ".zip": "application/zip",
  ".gz": "application/gzip",
  ".doc": "application/msword",
  ".docx": "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  ".xls": "application/vnd.ms-excel",
  ".xlsx": "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  ".ppt": "application/vnd.ms-powerpoint",
  ".pptx": "application/vnd.openxmlformats-officedocument.presentationml.presentation",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".gif": "image/gif",
  ".tif": "image/tiff",
  ".tiff": "image/tiff",
  ".svg": "image/svg+xml",
  ".mp3": "audio/mpeg",
  ".wav": "audio/x-wav",
  ".mp4": "video/mp4",
  ".mov": "video/quicktime",
};

/**
 * MIME type for a filename, from its extension
 */
export function guessContentType(filename: string): string {
  const ext = posix.extname(filename).toLowerCase();
  return MIME_TYPES[ext] ?? "application/octet-stream";
}

/**
 * Wrap bytes as an upload. The server only treats a multipart part as a
 * file when it has a filename, so one is always set.
 */
export function createContent(data: Uint8Array | Blob, options: CreateContentOptions = {}): ContentUpload {
  const filename = options.filename || "content";
  return {
    data,
    filename,
    filetype: options.filetype || guessContentType(filename),
  };
}

/**
 * Last segment of a URL's path, or `undefined` when the path ends in `/`
 */
export function filenameFromUrl(url: string): string | undefined {
  return posix.basename(new URL(url).pathname) || undefined;
}

/**
 * Download `url` and wrap the body as an upload. The type comes from the
 * response's `Content-Type`, falling back to the filename.
 *
 * @throws RepositoryAPIError for a non-2xx response
 */
export async function createUrlContent(url: string, options: UrlContentOptions = {}): Promise<ContentUpload> {
  const http = options.http ?? new HttpClient({});
  const response = await http.send(url, { method: "GET", headers: { Accept: "*/*" } });
  http.assertOk(response);

  return createContent(response.body, {
    filename: options.filename || filenameFromUrl(url),
    filetype: response.headers.get("Content-Type") ?? undefined,
  });
}
