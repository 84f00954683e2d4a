export { ContentScorer } from './extraction/content-scorer';
export { ContentExtractor, parseExtractionOptions } from './extraction/content-extractor';
export { DEFAULT_SCORING_PATTERNS, buildVocabularyPattern, createScoringPatterns } from './extraction/scoring-patterns';
export type { ContentNode, ContentSelection, ScoredCandidate, ScoringPatterns, SelectionStrategy } from './extraction/types';

export { ChunkAccumulator, validateChunkBounds } from './chunking/accumulator';
export { SemanticChunker, type ChunkableDocument } from './chunking/semantic-chunker';
export { parseMarkdownSections } from './chunking/markdown-sections';
export { estimateTokens } from './chunking/utils';
export type {
  AccumulatorState,
  ChunkBounds,
  ChunkingOptions,
  ChunkingStrategy,
  DocumentChunk,
  Section,
  TokenEstimator,
} from './chunking/types';

export { parseFrontmatter, splitFrontmatter, stripFrontmatter } from './markdown/frontmatter';
export { buildMetadata, generateDocumentId, mergeFrontmatter } from './metadata/document-metadata';
export type { DocumentMetadata, MetadataSeed } from './metadata/types';

export {
  DocumentPreparer,
  type DocumentPreparerOptions,
  type HtmlDocumentRequest,
  type MarkdownDocumentRequest,
  type PreparedDocument,
} from './pipeline/document-preparer';
export type { ConvertiblePage, MarkdownConverter } from './pipeline/ports';

export { loadConfig } from './boundaries/config-loader';
export type { Config } from './schemas/config-schemas';
export type { ExtractionOptions, ExtractionOptionsInput } from './schemas/extraction-schemas';

export { ConfigError, ProcessingError, RagprepError, ValidationError, isRagprepError } from './errors/index';
export { setSilentMode, setVerboseMode } from './output/logger';
