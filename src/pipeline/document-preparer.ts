import { SemanticChunker } from '../chunking/semantic-chunker';
import type { DocumentChunk } from '../chunking/types';
import { UNTITLED_HTML_DOCUMENT } from '../config/constants';
import { ProcessingError, ValidationError } from '../errors/index';
import { ContentExtractor } from '../extraction/content-extractor';
import { parseFrontmatter, stripFrontmatter } from '../markdown/frontmatter';
import { buildMetadata, generateDocumentId, mergeFrontmatter } from '../metadata/document-metadata';
import type { DocumentMetadata } from '../metadata/types';
import { debug, warn } from '../output/logger';
import type { ExtractionOptionsInput } from '../schemas/extraction-schemas';
import type { MarkdownConverter } from './ports';

export interface MarkdownDocumentRequest {
  content: string;
  documentId?: string | undefined;
  title?: string | undefined;
  sourceUrl?: string | undefined;
  sourceType?: string | undefined;
  tags?: string[] | undefined;
  metadata?: Record<string, unknown> | undefined;
}

export type HtmlDocumentRequest = Omit<MarkdownDocumentRequest, 'sourceType'>;

export interface PreparedDocument {
  documentId: string;
  metadata: DocumentMetadata;
  chunks: DocumentChunk[];
}

export interface DocumentPreparerOptions {
  chunker?: SemanticChunker;
  extractor?: ContentExtractor;
  converter?: MarkdownConverter;
  extractionOptions?: ExtractionOptionsInput;
}

type MetadataEnricher = (metadata: DocumentMetadata) => DocumentMetadata;

function isHttpUrl(value: string | undefined): value is string {
  return value !== undefined && /^https?:\/\//i.test(value) && URL.canParse(value);
}

function pageMetadataEnricher(page: Readonly<Record<string, string>>): MetadataEnricher {
  return (metadata) => {
    const enriched: DocumentMetadata = { ...metadata };
    const description = page['description'];
    if (enriched.description === undefined && description) {
      enriched.description = description;
    }
    const author = page['author'];
    if (enriched.author === undefined && author) {
      enriched.author = author;
    }
    return enriched;
  };
}

/**
 * Turns a raw document into metadata plus ordered chunks. Markdown goes
 * straight to the chunker after its frontmatter is merged and stripped; HTML is
 * first reduced to its main content and converted through the configured
 * MarkdownConverter. Embedding and indexing stay with the caller.
 */
export class DocumentPreparer {
  private readonly chunker: SemanticChunker;
  private readonly extractor: ContentExtractor;
  private readonly converter: MarkdownConverter | undefined;
  private readonly extractionOptions: ExtractionOptionsInput;

  constructor(options: DocumentPreparerOptions = {}) {
    this.chunker = options.chunker ?? new SemanticChunker();
    this.extractor = options.extractor ?? new ContentExtractor();
    this.converter = options.converter;
    this.extractionOptions = options.extractionOptions ?? {};
  }

  prepareMarkdown(request: MarkdownDocumentRequest): PreparedDocument {
    return this.prepare(request, (metadata) => metadata);
  }

  prepareHtml(request: HtmlDocumentRequest): PreparedDocument {
    if (!request.content.trim()) {
      throw new ValidationError('HTML content must not be empty');
    }
    if (!this.converter) {
      throw new ProcessingError('HTML documents need a MarkdownConverter');
    }

    const pageMetadata: Record<string, string> = {};
    const baseUrl = this.extractionOptions.baseUrl ?? (isHttpUrl(request.sourceUrl) ? request.sourceUrl : undefined);
    const extractionOptions: ExtractionOptionsInput =
      baseUrl === undefined ? this.extractionOptions : { ...this.extractionOptions, baseUrl };

    const html = this.extractor.extract(request.content, pageMetadata, extractionOptions);
    const title =
      request.title?.trim() || pageMetadata['og:title'] || pageMetadata['title'] || UNTITLED_HTML_DOCUMENT;

    const markdown = this.converter.convert({
      url: request.sourceUrl ?? 'manual',
      title,
      html,
      metadata: pageMetadata,
    });
    debug(`Converted HTML to markdown (${markdown.length} chars)`);

    return this.prepare(
      { ...request, title, content: markdown, sourceType: 'html' },
      pageMetadataEnricher(pageMetadata)
    );
  }

  private prepare(request: MarkdownDocumentRequest, enrich: MetadataEnricher): PreparedDocument {
    const explicitId = request.documentId?.trim();
    const documentId = explicitId ? explicitId : generateDocumentId(request.title);

    let metadata = buildMetadata(documentId, {
      title: request.title,
      sourceUrl: request.sourceUrl,
      sourceType: request.sourceType,
      tags: request.tags,
      custom: request.metadata,
    });

    const frontmatter = parseFrontmatter(request.content);
    if (frontmatter) {
      metadata = mergeFrontmatter(metadata, frontmatter);
    }
    metadata = enrich(metadata);

    const content = stripFrontmatter(request.content);
    debug(`Chunking document ${documentId}. Length: ${content.length} characters`);

    const chunks = this.chunker.chunkMarkdown(content, documentId, metadata);
    if (chunks.length === 0) {
      warn(`No chunks produced for document ${documentId}`);
    }

    return { documentId, metadata, chunks };
  }
}
