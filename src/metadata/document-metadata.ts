import { randomUUID } from 'crypto';
import { MAX_DOCUMENT_ID_LENGTH } from '../config/constants';
import type { Frontmatter } from '../schemas/frontmatter-schemas';
import type { DocumentMetadata, MetadataSeed } from './types';

const DEFAULT_SOURCE_URL = 'manual';
const DEFAULT_SOURCE_TYPE = 'manual';

/**
 * Derives a document id from its title: lowercase, runs of anything but
 * letters and digits collapsed to `-`, at most 64 characters. Without a usable
 * title a random `doc-<hex>` id is generated.
 */
export function generateDocumentId(title?: string): string {
  const slug = (title ?? '')
    .trim()
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, '-')
    .replace(/^-+|-+$/g, '');

  if (slug) {
    return slug.slice(0, MAX_DOCUMENT_ID_LENGTH);
  }
  return `doc-${randomUUID().replace(/-/g, '')}`;
}

export function buildMetadata(documentId: string, seed: MetadataSeed = {}, now: Date = new Date()): DocumentMetadata {
  const title = seed.title?.trim();
  const sourceType = seed.sourceType?.trim();
  return {
    id: documentId,
    title: title ? title : documentId,
    sourceUrl: seed.sourceUrl ?? DEFAULT_SOURCE_URL,
    sourceType: sourceType ? sourceType : DEFAULT_SOURCE_TYPE,
    tags: [...(seed.tags ?? [])],
    ingestedAt: now,
    custom: { ...(seed.custom ?? {}) },
  };
}

/**
 * Reads a YAML list of scalars or a single string; any other shape yields [].
 */
export function extractStringList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value
      .filter((item): item is string | number | boolean =>
        ['string', 'number', 'boolean'].includes(typeof item)
      )
      .map((item) => String(item).trim())
      .filter((item) => item.length > 0);
  }
  if (typeof value === 'string' && value.trim()) {
    return [value.trim()];
  }
  return [];
}

function stringField(frontmatter: Frontmatter, key: string): string | undefined {
  const value = frontmatter[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Overlays frontmatter on metadata. Known keys update the typed fields (a blank
 * title is ignored); every key is also copied into `custom`.
 */
export function mergeFrontmatter(metadata: DocumentMetadata, frontmatter: Frontmatter): DocumentMetadata {
  const merged: DocumentMetadata = {
    ...metadata,
    tags: [...metadata.tags],
    custom: { ...metadata.custom, ...frontmatter },
  };

  const title = stringField(frontmatter, 'title');
  if (title !== undefined && title.trim()) {
    merged.title = title;
  }

  const description = stringField(frontmatter, 'description');
  if (description !== undefined) {
    merged.description = description;
  }

  const author = stringField(frontmatter, 'author');
  if (author !== undefined) {
    merged.author = author;
  }

  const url = stringField(frontmatter, 'url');
  if (url !== undefined) {
    merged.sourceUrl = url;
  }

  const sourceType = stringField(frontmatter, 'sourceType');
  if (sourceType !== undefined) {
    merged.sourceType = sourceType;
  }

  const tags = extractStringList(frontmatter['tags']);
  if (tags.length > 0) {
    merged.tags = tags;
  }

  return merged;
}
