import { ConflictError } from "./bases/conflict-error.js";
import { NotFoundError } from "./bases/not-found-error.js";
import { ValidationError } from "./bases/validation-error.js";

// ---------------------------------------------------------------------------
// Packaging scope
// ---------------------------------------------------------------------------

/**
 * Thrown when a packaging operation runs outside an open packaging session,
 * or repeats a one-shot step (writing the same package twice).
 */
export class PackageStateError extends ConflictError<"PACKAGE_INVALID_STATE"> {
  constructor(message: string) {
    super({ code: "PACKAGE_INVALID_STATE", message });
  }
}

// ---------------------------------------------------------------------------
// Destination name collision
// ---------------------------------------------------------------------------

/**
 * Thrown when two attachments of one item claim the same destination name.
 * The file already in the working directory is left untouched.
 */
export class PackageConflictError extends ConflictError<"PACKAGE_ENTRY_CONFLICT"> {
  readonly destinationName: string;

  constructor(destinationName: string) {
    super({
      code: "PACKAGE_ENTRY_CONFLICT",
      message: `${destinationName} already exists in the package directory`,
      metadata: { destinationName },
    });
    this.destinationName = destinationName;
  }
}

// ---------------------------------------------------------------------------
// Disallowed enum value
// ---------------------------------------------------------------------------

/**
 * Thrown when an argument is outside its allowed set of values.
 */
export class InvalidArgumentError extends ValidationError<"VALIDATION_INVALID_ARGUMENT"> {
  readonly argument: string;
  readonly allowed: readonly string[];

  constructor(argument: string, value: unknown, allowed: readonly string[]) {
    super({
      code: "VALIDATION_INVALID_ARGUMENT",
      message: `${argument} must be one of ${allowed.map((a) => `"${a}"`).join(", ")}; got ${JSON.stringify(value)}`,
      metadata: { argument },
      issues: [
        {
          field: argument,
          message: `Expected one of: ${allowed.join(", ")}`,
          code: "invalid_enum_value",
          value,
        },
      ],
    });
    this.argument = argument;
    this.allowed = allowed;
  }
}

// ---------------------------------------------------------------------------
// Missing single-valued metadata field
// ---------------------------------------------------------------------------

/**
 * Thrown when a single-valued metadata field is read before it was set.
 */
export class MetadataFieldMissingError extends NotFoundError<"METADATA_FIELD_MISSING"> {
  readonly field: string;

  constructor(field: string) {
    super({
      code: "METADATA_FIELD_MISSING",
      message: `Metadata field not set: ${field}`,
      metadata: { field },
    });
    this.field = field;
  }
}

// ---------------------------------------------------------------------------
// Metadata field shadowing an item property
// ---------------------------------------------------------------------------

/**
 * Thrown when item metadata uses a name the manifest reserves for the
 * item's own properties (`label`, `status` and so on).
 */
export class ReservedMetadataFieldError extends ValidationError<"METADATA_FIELD_RESERVED"> {
  readonly field: string;

  constructor(field: string) {
    super({
      code: "METADATA_FIELD_RESERVED",
      message: `Metadata field ${field} is reserved for the item itself`,
      metadata: { field },
      issues: [{ field, message: "is reserved for the item itself", code: "reserved" }],
    });
    this.field = field;
  }
}
