/**
 * Static registry of resource kinds.
 *
 * Link fields in a representation only carry URLs; the kind of the target
 * is known statically and resolved here instead of by name at run time.
 */

import type { HttpClient } from "../http/index.js";
import { Attachment } from "./attachments.js";
import { ResourceList, type ResourceFactory } from "./base.js";
import { Collection } from "./collections.js";
import { Item } from "./items.js";

export interface ResourceKindMap {
  collection: Collection;
  item: Item;
  attachment: Attachment;
}

export type ResourceKind = keyof ResourceKindMap;

export const RESOURCE_REGISTRY: { readonly [K in ResourceKind]: ResourceFactory<ResourceKindMap[K]> } = {
  collection: (http, url) => new Collection(http, url),
  item: (http, url) => new Item(http, url),
  attachment: (http, url) => new Attachment(http, url),
};

export function isResourceKind(value: string): value is ResourceKind {
  return Object.hasOwn(RESOURCE_REGISTRY, value);
}

/**
 * Build a handle of the given kind
 */
export function createResource<K extends ResourceKind>(
  kind: K,
  http: HttpClient,
  url: string,
): ResourceKindMap[K] {
  const factory: ResourceFactory<ResourceKindMap[K]> = RESOURCE_REGISTRY[kind];
  return factory(http, url);
}

/**
 * Build a list handle whose entries are of the given kind
 */
export function createResourceList<K extends ResourceKind>(
  kind: K,
  http: HttpClient,
  url: string,
): ResourceList<ResourceKindMap[K]> {
  return new ResourceList(http, url, RESOURCE_REGISTRY[kind]);
}
