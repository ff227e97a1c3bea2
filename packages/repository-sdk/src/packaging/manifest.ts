/**
 * manifest.json: the item's fields and metadata at the top level, plus one
 * fragment per attachment.
 */

import { ValidationError, type ValidationIssue } from "@archivum/errors";
import { z } from "zod";
import { MetadataDocumentSchema } from "./metadata.js";

export const MANIFEST_FILE = "manifest.json";

/** In code points, not UTF-16 units */
export const MAX_LABEL_LENGTH = 255;

/**
 * Length of a string in code points
 */
export function codePointLength(text: string): number {
  return Array.from(text).length;
}

export const AttachmentFragmentSchema = z.object({
  label: z.string(),
  metadata: MetadataDocumentSchema,
  content: z.string().nullable(),
});

export type AttachmentFragment = z.infer<typeof AttachmentFragmentSchema>;

/**
 * Top-level manifest keys that belong to the item, not its metadata
 */
export const RESERVED_MANIFEST_KEYS: ReadonlySet<string> = new Set([
  "label",
  "status",
  "embargo_date",
  "enabled",
  "attachments",
]);

const MetadataValueSchema = MetadataDocumentSchema.valueSchema;

export const ManifestSchema = z
  .object({
    label: z
      .string()
      .refine((label) => codePointLength(label) <= MAX_LABEL_LENGTH, {
        message: `must be at most ${MAX_LABEL_LENGTH} characters`,
      })
      .nullable(),
    status: z.string().nullable(),
    embargo_date: z
      .string()
      .regex(/^\d{4}-\d{2}-\d{2}$/, { message: "must be a YYYY-MM-DD date" })
      .nullable(),
    enabled: z.boolean().nullable(),
    attachments: z.array(AttachmentFragmentSchema),
  })
  .passthrough()
  .superRefine((manifest, ctx) => {
    for (const [key, value] of Object.entries(manifest)) {
      if (!RESERVED_MANIFEST_KEYS.has(key) && !MetadataValueSchema.safeParse(value).success) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: "must be a string or a list of metadata entries",
        });
      }
    }
  });

export type Manifest = z.infer<typeof ManifestSchema>;

/**
 * Validate a manifest document
 *
 * @throws ValidationError listing every issue found
 */
export function parseManifest(document: unknown): Manifest {
  const result = ManifestSchema.safeParse(document);
  if (result.success) {
    return result.data;
  }

  const issues: ValidationIssue[] = result.error.issues.map((issue) => ({
    field: issue.path.join("."),
    message: issue.message,
    code: issue.code,
  }));
  throw new ValidationError({
    code: "VALIDATION_FAILED",
    message: `Invalid manifest: ${issues.map((i) => `${i.field || "<root>"} ${i.message}`).join("; ")}`,
    issues,
  });
}

/**
 * `YYYY-MM-DD` from the UTC calendar fields of a date
 */
export function formatEmbargoDate(date: Date): string {
  const year = String(date.getUTCFullYear()).padStart(4, "0");
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  const day = String(date.getUTCDate()).padStart(2, "0");
  return `${year}-${month}-${day}`;
}
