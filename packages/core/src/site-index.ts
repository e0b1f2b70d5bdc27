/**
 * Cross-document indices
 *
 * Built once per build, after every document has finished, from the closed
 * set of published documents. The result is frozen and passed explicitly to
 * whatever needs navigation; there is no global registry.
 *
 * Invariants:
 * - Every published document appears exactly once in `chronological`
 * - Order: date descending, ties by slug ascending
 * - A term maps only to documents that declare it, in chronological order
 */

import { basename } from "node:path";
import { DuplicatePermalinkError } from "./errors.js";
import type { BuildFailure, Document, Neighbors, SiteIndex } from "./types.js";

/**
 * Chronological comparator: newer first, then slug ascending
 */
export function compareChronological(a: Document, b: Document): number {
  if (a.date.iso !== b.date.iso) {
    return a.date.iso < b.date.iso ? 1 : -1;
  }
  if (a.slug === b.slug) {
    return 0;
  }
  return a.slug < b.slug ? -1 : 1;
}

/**
 * Group documents by a term list, keeping the given order within each group
 */
function buildTermIndex(
  ordered: readonly Document[],
  termsOf: (doc: Document) => readonly string[]
): ReadonlyMap<string, readonly Document[]> {
  const groups = new Map<string, Document[]>();
  for (const doc of ordered) {
    for (const term of termsOf(doc)) {
      const bucket = groups.get(term);
      if (bucket) {
        bucket.push(doc);
      } else {
        groups.set(term, [doc]);
      }
    }
  }

  const sorted = new Map<string, readonly Document[]>();
  for (const term of [...groups.keys()].sort()) {
    const bucket = groups.get(term);
    if (bucket) {
      sorted.set(term, Object.freeze(bucket));
    }
  }
  return sorted;
}

/**
 * Build the chronological, tag and category indices
 *
 * Unpublished documents are left out.
 */
export function buildSiteIndex(documents: readonly Document[]): SiteIndex {
  const chronological = Object.freeze(
    documents.filter((doc) => doc.published).sort(compareChronological)
  );

  const positions = new Map<string, number>();
  chronological.forEach((doc, i) => positions.set(doc.id, i));

  const tags = buildTermIndex(chronological, (doc) => doc.tags);
  const categories = buildTermIndex(chronological, (doc) => doc.categories);

  return Object.freeze({
    chronological,
    tags,
    categories,
    get(id: string): Document | undefined {
      const position = positions.get(id);
      return position === undefined ? undefined : chronological[position];
    },
    neighbors(id: string): Neighbors {
      const position = positions.get(id);
      if (position === undefined) {
        return { previous: null, next: null };
      }
      return {
        previous: chronological[position - 1] ?? null,
        next: chronological[position + 1] ?? null,
      };
    },
  });
}

/**
 * Find documents whose permalink is already taken by an earlier entry
 */
export function detectPermalinkCollisions(index: SiteIndex): BuildFailure[] {
  const owners = new Map<string, Document>();
  const failures: BuildFailure[] = [];

  for (const doc of index.chronological) {
    const owner = owners.get(doc.permalink);
    if (owner) {
      failures.push({
        file: basename(doc.sourcePath),
        documentId: doc.id,
        error: new DuplicatePermalinkError(doc.permalink, doc.id, owner.id),
      });
    } else {
      owners.set(doc.permalink, doc);
    }
  }

  return failures;
}
