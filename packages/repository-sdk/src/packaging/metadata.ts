/**
 * Descriptive and access-control metadata for items and attachments
 */

import { InvalidArgumentError, MetadataFieldMissingError, ValidationError } from "@archivum/errors";
import { z } from "zod";

/**
 * Fields that always hold a list, even with zero or one entries
 */
export const LIST_FIELDS = [
  "title",
  "subject",
  "description",
  "extent",
  "type",
  "contributor",
  "language",
  "notes",
  "series",
  "identifier",
  "citation",
] as const;

/**
 * Declared single-valued fields. Any field not in LIST_FIELDS is
 * single-valued; these are the ones the repository knows about.
 */
export const STRING_FIELDS = ["created", "rights", "file_access", "derivative_access"] as const;

export type ListField = (typeof LIST_FIELDS)[number];
export type StringField = (typeof STRING_FIELDS)[number];

export const DESCRIPTION_KINDS = ["abstract", "tableOfContents"] as const;
export type DescriptionKind = (typeof DESCRIPTION_KINDS)[number];

/**
 * One entry of a multi-valued field: plain text or a structured object
 */
export type MetadataEntry = string | Readonly<Record<string, unknown>>;

export type DescriptionEntry = { value: string; type?: DescriptionKind };

export type ContributorEntry = {
  last: string;
  rest?: string;
  roles?: string[];
  is_institution: boolean;
};

export type IdentifierEntry = { value: string; type?: string };

export type MetadataSeedValue = string | MetadataEntry | readonly MetadataEntry[];

export type MetadataSeed = Readonly<Record<string, MetadataSeedValue | undefined>>;

/**
 * Serialized form: scalars for single-valued fields, arrays for the rest
 */
export type MetadataDocument = Record<string, string | MetadataEntry[]>;

export const MetadataEntrySchema = z.union([z.string(), z.record(z.unknown())]);

export const MetadataDocumentSchema = z.record(
  z.union([z.string(), z.array(MetadataEntrySchema)]),
);

const LIST_FIELD_SET: ReadonlySet<string> = new Set(LIST_FIELDS);

export function isListField(field: string): field is ListField {
  return LIST_FIELD_SET.has(field);
}

function isEntryList(value: MetadataSeedValue): value is readonly MetadataEntry[] {
  return Array.isArray(value);
}

/**
 * A metadata record. Multi-valued fields are created empty on first
 * access, and the same array is handed out on every access so callers
 * can push to it directly.
 */
export class MetadataRecord {
  private readonly store = new Map<string, string | MetadataEntry[]>();

  constructor(seed: MetadataSeed = {}) {
    for (const [field, value] of Object.entries(seed)) {
      if (value === undefined) {
        continue;
      }
      if (isEntryList(value)) {
        // Fields the repository reports as lists stay lists, declared or not
        this.store.set(field, [...value]);
      } else if (isListField(field)) {
        this.store.set(field, [value]);
      } else if (typeof value === "string") {
        this.store.set(field, value);
      } else {
        throw new ValidationError({
          code: "VALIDATION_FAILED",
          message: `Metadata field ${field} takes a string or a list of entries`,
          issues: [{ field, message: "Expected string or array", code: "invalid_type", value }],
        });
      }
    }
  }

  /**
   * The live list of a multi-valued field. Any field not yet set can be
   * started as a list.
   *
   * @throws ValidationError when the field holds a single value
   */
  list(field: string): MetadataEntry[] {
    const current = this.store.get(field);
    if (Array.isArray(current)) {
      return current;
    }
    if (current !== undefined) {
      throw new ValidationError({
        code: "VALIDATION_FAILED",
        message: `Metadata field ${field} is single-valued; read it with value()`,
      });
    }
    const created: MetadataEntry[] = [];
    this.store.set(field, created);
    return created;
  }

  /**
   * The value of a single-valued field
   *
   * @throws MetadataFieldMissingError when the field was never set
   */
  value(field: string): string {
    const current = this.store.get(field);
    if (typeof current === "string") {
      return current;
    }
    if (current === undefined) {
      throw new MetadataFieldMissingError(field);
    }
    throw new ValidationError({
      code: "VALIDATION_FAILED",
      message: `Metadata field ${field} is multi-valued; read it with list()`,
    });
  }

  /**
   * Set a field. A value for a multi-valued field becomes its only entry.
   */
  setValue(field: string, value: string): void {
    this.store.set(field, isListField(field) ? [value] : value);
  }

  /**
   * Replace the entries of a field, making it multi-valued
   */
  setList(field: string, entries: readonly MetadataEntry[]): void {
    this.store.set(field, [...entries]);
  }

  has(field: string): boolean {
    return this.store.has(field);
  }

  delete(field: string): boolean {
    return this.store.delete(field);
  }

  fields(): string[] {
    return [...this.store.keys()];
  }

  addDescription(text: string, kind?: string): void {
    const entry: DescriptionEntry = { value: text };
    if (kind !== undefined) {
      if (!isDescriptionKind(kind)) {
        throw new InvalidArgumentError("kind", kind, DESCRIPTION_KINDS);
      }
      entry.type = kind;
    }
    this.list("description").push(entry);
  }

  addPersonalContributor(last: string, rest: string, roles?: string | readonly string[]): void {
    this.addContributor(last, rest, roles, false);
  }

  addInstitutionalContributor(name: string, roles?: string | readonly string[]): void {
    this.addContributor(name, undefined, roles, true);
  }

  addIdentifier(value: string, type?: string): void {
    const entry: IdentifierEntry = { value };
    if (type) {
      entry.type = type;
    }
    this.list("identifier").push(entry);
  }

  addNote(text: string): void {
    this.list("notes").push(text);
  }

  /**
   * A fresh plain copy. The record itself is left as it is.
   */
  toJSON(): MetadataDocument {
    const document: MetadataDocument = {};
    for (const [field, value] of this.store) {
      document[field] = typeof value === "string" ? value : [...value];
    }
    return document;
  }

  private addContributor(
    last: string,
    rest: string | undefined,
    roles: string | readonly string[] | undefined,
    institution: boolean,
  ): void {
    const entry: ContributorEntry = { last, is_institution: institution };
    if (rest) {
      entry.rest = rest;
    }
    if (roles !== undefined && roles.length > 0) {
      entry.roles = typeof roles === "string" ? [roles] : [...roles];
    }
    this.list("contributor").push(entry);
  }
}

function isDescriptionKind(kind: string): kind is DescriptionKind {
  return DESCRIPTION_KINDS.some((candidate) => candidate === kind);
}
