// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Collection topics: `collection:<slug>` for one collection,
 * `collection:*` for every collection.
 */

export type Collection =
  | { kind: "collection"; slug: string }
  | { kind: "all" };

const TOPIC_PREFIX = "collection:";

export const ALL_COLLECTIONS: Collection = { kind: "all" };

/**
 * Collection by slug; `*` means every collection. The slug is sent as is.
 */
export function collection(slug: string): Collection {
  return slug === "*" ? ALL_COLLECTIONS : { kind: "collection", slug };
}

export function collectionTopic(target: Collection): string {
  return TOPIC_PREFIX + (target.kind === "all" ? "*" : target.slug);
}

/**
 * Inverse of {@link collectionTopic}; undefined for any other topic.
 */
export function parseCollectionTopic(topic: string): Collection | undefined {
  if (!topic.startsWith(TOPIC_PREFIX)) return undefined;
  const slug = topic.slice(TOPIC_PREFIX.length);
  return collection(slug);
}
