import type { DocumentMetadata } from '../metadata/types';

/**
 * Estimates how many tokens a piece of text costs. Must be monotonic in the
 * text length for the size bounds to hold.
 */
export type TokenEstimator = (text: string) => number;

export interface ChunkingOptions {
  minChunkSize?: number; // Floor below which a chunk is not worth emitting
  targetChunkSize?: number; // Sections at or under this size are never split
  maxChunkSize?: number; // Hard ceiling, exceeded only by forceAdd
  overlapPercentage?: number; // Fraction of a finished chunk carried into the next (0-1)
}

export type ChunkBounds = Required<ChunkingOptions>;

export interface DocumentChunk<TMetadata = DocumentMetadata> {
  readonly id: string;
  readonly parentDocumentId: string;
  readonly chunkIndex: number;
  readonly title: string | null;
  readonly content: string;
  readonly tokenCount: number;
  readonly startPosition: number;
  readonly endPosition: number;
  readonly metadata: TMetadata;
}

export interface Section {
  readonly title: string;
  readonly content: string; // Trimmed, including the heading line
  readonly level: number; // 0 for prose before the first heading
  readonly start: number; // Offset of content in the LF-normalized source
}

export interface TextSpan {
  text: string;
  offset: number;
}

export type AccumulatorState = 'empty' | 'accumulating' | 'finalized';

export interface ChunkingStrategy {
  readonly name: string;
  chunkMarkdown<TMetadata>(
    markdown: string,
    documentId: string,
    metadata: TMetadata
  ): DocumentChunk<TMetadata>[];
}
