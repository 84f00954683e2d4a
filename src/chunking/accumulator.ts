import { ConfigError, ProcessingError } from '../errors/index';
import type { AccumulatorState, ChunkBounds, DocumentChunk, TokenEstimator } from './types';
import { SEGMENT_SEPARATOR, estimateTokens, isBlank } from './utils';

interface Segment {
  text: string;
  offset: number | undefined;
}

/**
 * Rejects token bounds that cannot produce valid chunks. Values are never
 * clamped into range.
 */
export function validateChunkBounds(bounds: ChunkBounds): void {
  const { minChunkSize, targetChunkSize, maxChunkSize, overlapPercentage } = bounds;

  if (!Number.isFinite(minChunkSize) || minChunkSize <= 0) {
    throw new ConfigError(`minChunkSize must be positive (got ${minChunkSize})`);
  }
  if (!Number.isFinite(targetChunkSize) || targetChunkSize <= minChunkSize) {
    throw new ConfigError(
      `targetChunkSize must be greater than minChunkSize (got target=${targetChunkSize}, min=${minChunkSize})`
    );
  }
  if (!Number.isFinite(maxChunkSize) || maxChunkSize <= targetChunkSize) {
    throw new ConfigError(
      `maxChunkSize must be greater than targetChunkSize (got max=${maxChunkSize}, target=${targetChunkSize})`
    );
  }
  if (!Number.isFinite(overlapPercentage) || overlapPercentage < 0 || overlapPercentage > 1) {
    throw new ConfigError(`overlapPercentage must be between 0 and 1 (got ${overlapPercentage})`);
  }
}

/**
 * Buffers the segments of one chunk at a time and refuses additions that would
 * push it past `maxChunkSize`. After a chunk is finalized, the trailing whole
 * segments worth `overlapPercentage` of it are kept so the next chunk can start
 * with them.
 */
export class ChunkAccumulator {
  private readonly bounds: ChunkBounds;
  private segments: Segment[] = [];
  private content = '';
  private tokens = 0;
  private seededWithOverlap = false;
  private overlap: Segment | null = null;
  private currentState: AccumulatorState = 'empty';

  constructor(bounds: ChunkBounds, private readonly tokenEstimator: TokenEstimator = estimateTokens) {
    validateChunkBounds(bounds);
    this.bounds = { ...bounds };
  }

  get state(): AccumulatorState {
    return this.currentState;
  }

  get currentTokenCount(): number {
    return this.tokens;
  }

  get hasContent(): boolean {
    return this.content.length > 0;
  }

  /**
   * True once something beyond the carried-over overlap has been added.
   */
  get hasNewContent(): boolean {
    return this.segments.length > (this.seededWithOverlap ? 1 : 0);
  }

  get hasReachedTarget(): boolean {
    return this.tokens >= this.bounds.targetChunkSize;
  }

  // Source offset of the first buffered segment, when the caller supplied one
  get startOffset(): number | undefined {
    return this.segments[0]?.offset;
  }

  get overlapBuffer(): string {
    return this.overlap?.text ?? '';
  }

  canFit(segment: string): boolean {
    if (isBlank(segment)) {
      return true;
    }
    const max = this.bounds.maxChunkSize;
    // An empty buffer holds zero tokens, so this also refuses a lone oversized segment
    if (this.tokens + this.tokenEstimator(segment) > max) {
      return false;
    }
    // The stored count comes from the joined text, separator included
    return this.tokenEstimator(this.join(segment)) <= max;
  }

  tryAdd(segment: string, offset?: number): boolean {
    if (isBlank(segment)) {
      return true;
    }
    this.assertWritable();

    if (!this.canFit(segment)) {
      return false;
    }

    this.append(segment, offset);
    return true;
  }

  /**
   * Appends without a size check. Reserved for a single atomic unit (a
   * sentence) that exceeds `maxChunkSize` on its own.
   */
  forceAdd(segment: string, offset?: number): void {
    if (isBlank(segment)) {
      return;
    }
    this.assertWritable();
    this.append(segment, offset);
  }

  finalize<TMetadata>(
    documentId: string,
    chunkIndex: number,
    title: string | null,
    startPosition: number,
    metadata: TMetadata
  ): DocumentChunk<TMetadata> | null {
    if (this.currentState === 'finalized') {
      throw new ProcessingError('Chunk already finalized; call reset() before finalizing again');
    }

    const content = this.content.trim();
    if (!content) {
      return null;
    }

    const chunk: DocumentChunk<TMetadata> = Object.freeze({
      id: `${documentId}_chunk_${chunkIndex}`,
      parentDocumentId: documentId,
      chunkIndex,
      title,
      content,
      tokenCount: this.tokenEstimator(content),
      startPosition,
      endPosition: startPosition + content.length,
      metadata,
    });

    this.overlap = this.buildOverlap();
    this.currentState = 'finalized';
    return chunk;
  }

  /**
   * Clears the buffer. With `includeOverlap`, the overlap kept from the last
   * finalized chunk becomes the first segment of the new one.
   */
  reset(includeOverlap = true): void {
    this.segments = [];
    this.content = '';
    this.tokens = 0;
    this.seededWithOverlap = false;
    this.currentState = 'empty';

    if (includeOverlap && this.overlap && this.overlap.text) {
      this.append(this.overlap.text, this.overlap.offset);
      this.seededWithOverlap = true;
    }
  }

  private append(segment: string, offset: number | undefined): void {
    this.content = this.join(segment);
    this.segments.push({ text: segment, offset });
    this.tokens = this.tokenEstimator(this.content);
    this.currentState = 'accumulating';
  }

  private join(segment: string): string {
    return this.content ? `${this.content}${SEGMENT_SEPARATOR}${segment}` : segment;
  }

  private assertWritable(): void {
    if (this.currentState === 'finalized') {
      throw new ProcessingError('Cannot add to a finalized chunk; call reset() first');
    }
  }

  private buildOverlap(): Segment | null {
    const target = Math.floor(this.tokens * this.bounds.overlapPercentage);
    if (target <= 0) {
      return null;
    }

    if (this.tokens <= target) {
      return { text: this.content.trim(), offset: this.segments[0]?.offset };
    }

    // Whole segments only, walking back from the end; the last one is always taken
    const picked: Segment[] = [];
    let accumulated = 0;
    for (let i = this.segments.length - 1; i >= 0; i--) {
      const segment = this.segments[i];
      if (!segment) continue;

      const segmentTokens = this.tokenEstimator(segment.text);
      if (accumulated + segmentTokens > target && picked.length > 0) {
        break;
      }

      picked.unshift(segment);
      accumulated += segmentTokens;
      if (accumulated >= target) {
        break;
      }
    }

    const first = picked[0];
    if (!first) {
      return null;
    }
    return {
      text: picked.map((s) => s.text).join(SEGMENT_SEPARATOR).trim(),
      offset: first.offset,
    };
  }
}
