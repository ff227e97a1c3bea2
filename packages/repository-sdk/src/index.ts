/**
 * @archivum/repository-sdk
 *
 * Client for a digital-repository REST service: resource handles for
 * collections, items and attachments, item packaging into zip archives,
 * and batch ingest of prebuilt packages.
 */

// Main client
export { type CommitOptions, RepositoryClient } from "./client.js";

// Configuration
export { EnvConfigSchema, type EnvConfig, loadClientConfig } from "./config.js";

// Errors
export {
  codeForStatus,
  RepositoryAPIError,
  RepositoryNetworkError,
  RepositoryTimeoutError,
  RepositoryValidationError,
} from "./errors.js";

// HTTP client (for advanced usage)
export { DEFAULT_BASE_URL, DEFAULT_RETRY_OPTIONS, DEFAULT_TIMEOUT, HttpClient } from "./http/index.js";

// Logging and tracing
export { createConsoleLogger, LOG_LEVELS, type Logger, type LogLevel, noopLogger } from "./logger.js";
export { type SpanAttributes, withSpan } from "./tracing.js";

// Resources
export {
  type ListEntry,
  parseRepresentation,
  Resource,
  type ResourceFactory,
  ResourceList,
  type RepresentationSchema,
} from "./resources/base.js";
export { Attachment, type AttachmentRepresentation, AttachmentSchema } from "./resources/attachments.js";
export {
  type ContentUpload,
  createContent,
  type CreateContentOptions,
  createUrlContent,
  filenameFromUrl,
  guessContentType,
  type UrlContentOptions,
} from "./resources/content.js";
export { Collection, type CollectionRepresentation, CollectionSchema } from "./resources/collections.js";
export { Item, type ItemRepresentation, ItemSchema } from "./resources/items.js";
export { ApiRoot, type ApiRootRepresentation, ApiRootSchema, type RootLink } from "./resources/root.js";
export {
  createResource,
  createResourceList,
  isResourceKind,
  RESOURCE_REGISTRY,
  type ResourceKind,
  type ResourceKindMap,
} from "./resources/registry.js";

// Packaging
export {
  type ContributorEntry,
  DESCRIPTION_KINDS,
  type DescriptionEntry,
  type DescriptionKind,
  type IdentifierEntry,
  isListField,
  LIST_FIELDS,
  type ListField,
  type MetadataDocument,
  MetadataDocumentSchema,
  type MetadataEntry,
  MetadataRecord,
  type MetadataSeed,
  type MetadataSeedValue,
  STRING_FIELDS,
  type StringField,
} from "./packaging/metadata.js";
export {
  ACCESS_LEVELS,
  type AccessLevel,
  AttachmentDescriptor,
  type AttachmentSeed,
  COPY_CHUNK_SIZE,
  normalizeDestinationName,
} from "./packaging/attachment.js";
export {
  ITEM_STATUSES,
  ItemDescriptor,
  ItemPackager,
  type ItemPackagerOptions,
  type ItemSeed,
  type ItemStatus,
} from "./packaging/item.js";
export {
  type AttachmentFragment,
  AttachmentFragmentSchema,
  codePointLength,
  formatEmbargoDate,
  MANIFEST_FILE,
  type Manifest,
  ManifestSchema,
  MAX_LABEL_LENGTH,
  parseManifest,
  RESERVED_MANIFEST_KEYS,
} from "./packaging/manifest.js";
export { entryName, readArchive, readPackageManifest, zipDirectory } from "./packaging/archive.js";

// Batch ingest
export {
  BatchIngest,
  type BatchIngestOptions,
  type BatchIngestSummary,
  type ErrorClass,
  type ErrorKind,
  type FailurePredicate,
  type IngestFailure,
  type IngestSuccess,
  matchesErrorKind,
} from "./ingest/batch.js";

// Types
export type {
  ClientConfig,
  ErrorResponse,
  HttpMethod,
  PackageSource,
  PackageSubmitter,
  QueryParams,
  RawBody,
  RequestOptions,
  RetryOptions,
  SendOptions,
  TransportResponse,
} from "./types/index.js";
