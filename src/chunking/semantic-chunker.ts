import { ChunkAccumulator, validateChunkBounds } from './accumulator';
import { parseMarkdownSections } from './markdown-sections';
import type {
  ChunkBounds,
  ChunkingOptions,
  ChunkingStrategy,
  DocumentChunk,
  Section,
  TextSpan,
  TokenEstimator,
} from './types';
import { estimateTokens, splitIntoParagraphs, splitIntoSentences } from './utils';
import {
  DEFAULT_MAX_CHUNK_SIZE,
  DEFAULT_MIN_CHUNK_SIZE,
  DEFAULT_OVERLAP_PERCENTAGE,
  DEFAULT_TARGET_CHUNK_SIZE,
} from '../config/constants';
import { ValidationError, handleUnknownError } from '../errors/index';
import { debug, warn } from '../output/logger';

const DEFAULT_OPTIONS: ChunkBounds = {
  minChunkSize: DEFAULT_MIN_CHUNK_SIZE,
  targetChunkSize: DEFAULT_TARGET_CHUNK_SIZE,
  maxChunkSize: DEFAULT_MAX_CHUNK_SIZE,
  overlapPercentage: DEFAULT_OVERLAP_PERCENTAGE,
};

export interface ChunkableDocument<TMetadata> {
  content: string;
  documentId: string;
  metadata: TMetadata;
}

function isValidChunk<TMetadata>(chunk: DocumentChunk<TMetadata>): boolean {
  return chunk.content.trim().length > 0;
}

/**
 * Chunks Markdown along its own structure. Sections that fit the target size
 * become one chunk each; larger sections are rebuilt from paragraphs (and, for
 * oversized paragraphs, sentences) with overlap between the resulting chunks.
 * Chunk indices run across the whole document.
 */
export class SemanticChunker implements ChunkingStrategy {
  readonly name = 'semantic';
  private readonly bounds: ChunkBounds;

  constructor(options: ChunkingOptions = {}, private readonly tokenEstimator: TokenEstimator = estimateTokens) {
    this.bounds = { ...DEFAULT_OPTIONS, ...options };
    validateChunkBounds(this.bounds);
  }

  get options(): Readonly<ChunkBounds> {
    return this.bounds;
  }

  chunkMarkdown<TMetadata>(
    markdown: string,
    documentId: string,
    metadata: TMetadata
  ): DocumentChunk<TMetadata>[] {
    if (!documentId.trim()) {
      throw new ValidationError('documentId must not be empty');
    }

    debug(`Chunking document: ${documentId}`);

    const chunks: DocumentChunk<TMetadata>[] = [];
    // Positions run over the concatenated section contents
    let position = 0;
    for (const section of parseMarkdownSections(markdown)) {
      const emitted =
        this.tokenEstimator(section.content) <= this.bounds.targetChunkSize
          ? this.chunkSection(section, documentId, chunks.length, position, metadata)
          : this.splitLargeSection(section, documentId, chunks.length, position, metadata);
      chunks.push(...emitted);
      position += section.content.length;
    }

    const validChunks = chunks.filter(isValidChunk);
    if (validChunks.length < chunks.length) {
      warn(
        `Filtered ${chunks.length - validChunks.length} empty chunks from document ${documentId}. Valid chunks: ${validChunks.length}`
      );
    }

    debug(`Created ${validChunks.length} chunks for document: ${documentId}`);
    return validChunks;
  }

  /**
   * Chunks several documents; a document that fails is logged and skipped.
   */
  chunkDocuments<TMetadata>(documents: readonly ChunkableDocument<TMetadata>[]): DocumentChunk<TMetadata>[] {
    debug(`Chunking ${documents.length} documents`);

    const allChunks: DocumentChunk<TMetadata>[] = [];
    for (const { content, documentId, metadata } of documents) {
      try {
        allChunks.push(...this.chunkMarkdown(content, documentId, metadata));
      } catch (e: unknown) {
        const err = handleUnknownError(e, `Chunking document ${documentId}`);
        warn(`Failed to chunk document ${documentId}: ${err.message}`);
      }
    }

    debug(`Created total of ${allChunks.length} chunks from ${documents.length} documents`);
    return allChunks;
  }

  private createAccumulator(): ChunkAccumulator {
    return new ChunkAccumulator(this.bounds, this.tokenEstimator);
  }

  private chunkSection<TMetadata>(
    section: Section,
    documentId: string,
    chunkIndex: number,
    position: number,
    metadata: TMetadata
  ): DocumentChunk<TMetadata>[] {
    const accumulator = this.createAccumulator();
    accumulator.tryAdd(section.content, 0);
    const chunk = accumulator.finalize(documentId, chunkIndex, section.title, position, metadata);
    return chunk ? [chunk] : [];
  }

  // Every section starts cold: overlap only flows between chunks of the same section
  private splitLargeSection<TMetadata>(
    section: Section,
    documentId: string,
    firstIndex: number,
    position: number,
    metadata: TMetadata
  ): DocumentChunk<TMetadata>[] {
    const chunks: DocumentChunk<TMetadata>[] = [];
    const accumulator = this.createAccumulator();

    const flush = (): void => {
      const chunk = accumulator.finalize(
        documentId,
        firstIndex + chunks.length,
        section.title,
        position + (accumulator.startOffset ?? 0),
        metadata
      );
      if (chunk) {
        chunks.push(chunk);
      }
    };

    const feed = (unit: TextSpan): void => {
      if (accumulator.tryAdd(unit.text, unit.offset)) return;

      if (accumulator.hasNewContent) {
        flush();
        accumulator.reset(true);
        if (accumulator.tryAdd(unit.text, unit.offset)) return;
      }

      // The carried overlap leaves no room; start clean before forcing
      accumulator.reset(false);
      if (accumulator.tryAdd(unit.text, unit.offset)) return;
      accumulator.forceAdd(unit.text, unit.offset);
    };

    for (const paragraph of splitIntoParagraphs(section.content)) {
      if (this.tokenEstimator(paragraph.text) > this.bounds.maxChunkSize) {
        if (accumulator.hasNewContent) {
          flush();
          accumulator.reset(true);
        }
        for (const sentence of splitIntoSentences(paragraph.text, paragraph.offset)) {
          feed(sentence);
        }
      } else {
        feed(paragraph);
      }
    }

    if (accumulator.hasNewContent) {
      flush();
    }

    return chunks;
  }
}
