/**
 * Metadata describing one ingested document. Known fields are typed; anything
 * else (frontmatter keys, caller extras) lives in `custom`.
 */
export interface DocumentMetadata {
  id: string;
  title: string;
  sourceUrl: string;
  sourceType: string;
  description?: string;
  author?: string;
  tags: string[];
  ingestedAt: Date;
  custom: Record<string, unknown>;
}

export interface MetadataSeed {
  title?: string | undefined;
  sourceUrl?: string | undefined;
  sourceType?: string | undefined;
  tags?: string[] | undefined;
  custom?: Record<string, unknown> | undefined;
}
