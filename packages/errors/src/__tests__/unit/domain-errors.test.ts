import { describe, expect, it } from "vitest";
import {
  ConflictError,
  ExternalError,
  InvalidArgumentError,
  isSubmissionError,
  MetadataFieldMissingError,
  NotFoundError,
  PackageConflictError,
  PackageStateError,
  ReservedMetadataFieldError,
  SubmissionError,
  ValidationError,
} from "../../index.js";

describe("PackageStateError", () => {
  it("should be a ConflictError with the packaging state code", () => {
    const error = new PackageStateError("Packager is not open");

    expect(error).toBeInstanceOf(ConflictError);
    expect(error.name).toBe("PackageStateError");
    expect(error.code).toBe("PACKAGE_INVALID_STATE");
    expect(error.grpcCode).toBe("FAILED_PRECONDITION");
    expect(error.message).toBe("Packager is not open");
  });
});

describe("PackageConflictError", () => {
  it("should name the destination", () => {
    const error = new PackageConflictError("data/table.csv");

    expect(error).toBeInstanceOf(ConflictError);
    expect(error.code).toBe("PACKAGE_ENTRY_CONFLICT");
    expect(error.destinationName).toBe("data/table.csv");
    expect(error.message).toBe("data/table.csv already exists in the package directory");
    expect(error.metadata).toEqual({ destinationName: "data/table.csv" });
  });
});

describe("InvalidArgumentError", () => {
  it("should list the allowed values", () => {
    const error = new InvalidArgumentError("kind", "summary", ["abstract", "tableOfContents"]);

    expect(error).toBeInstanceOf(ValidationError);
    expect(error.code).toBe("VALIDATION_INVALID_ARGUMENT");
    expect(error.message).toBe(
      'kind must be one of "abstract", "tableOfContents"; got "summary"',
    );
    expect(error.issues).toHaveLength(1);
    expect(error.issues[0]?.field).toBe("kind");
    expect(error.allowed).toEqual(["abstract", "tableOfContents"]);
  });
});

describe("MetadataFieldMissingError", () => {
  it("should be a NotFoundError naming the field", () => {
    const error = new MetadataFieldMissingError("rights");

    expect(error).toBeInstanceOf(NotFoundError);
    expect(error.code).toBe("METADATA_FIELD_MISSING");
    expect(error.field).toBe("rights");
    expect(error.message).toBe("Metadata field not set: rights");
  });
});

describe("ReservedMetadataFieldError", () => {
  it("should be a ValidationError naming the field", () => {
    const error = new ReservedMetadataFieldError("status");

    expect(error).toBeInstanceOf(ValidationError);
    expect(error.code).toBe("METADATA_FIELD_RESERVED");
    expect(error.httpStatus).toBe(400);
    expect(error.field).toBe("status");
    expect(error.message).toBe("Metadata field status is reserved for the item itself");
    expect(error.issues).toEqual([{ field: "status", message: "is reserved for the item itself", code: "reserved" }]);
  });
});

describe("SubmissionError", () => {
  it("should carry path, status and cause", () => {
    const cause = new Error("ECONNREFUSED");
    const error = new SubmissionError({
      code: "SUBMISSION_CONNECTION_FAILED",
      message: "Connection refused",
      path: "/tmp/p1.zip",
      cause,
    });

    expect(error).toBeInstanceOf(ExternalError);
    expect(isSubmissionError(error)).toBe(true);
    expect(error.path).toBe("/tmp/p1.zip");
    expect(error.statusCode).toBeUndefined();
    expect(error.cause).toBe(cause);
    expect(error.metadata).toEqual({ path: "/tmp/p1.zip" });
  });

  it("should record the HTTP status of a rejection", () => {
    const error = new SubmissionError({
      code: "SUBMISSION_REJECTED",
      message: "Unexpected status 500",
      statusCode: 500,
    });

    expect(error.statusCode).toBe(500);
    expect(error.metadata).toEqual({ statusCode: "500" });
    expect(error.httpStatus).toBe(502);
  });

  it("should not match unrelated errors", () => {
    expect(isSubmissionError(new Error("x"))).toBe(false);
  });
});
