import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import { hasChildren, isComment, type AnyNode } from 'domhandler';
import { getElementsByTagName, textContent } from 'domutils';
import { z } from 'zod';
import { ContentScorer } from './content-scorer';
import type { ContentNode, ContentSelection, ScoredCandidate } from './types';
import {
  EXTRACTION_OPTIONS_SCHEMA,
  type ExtractionOptions,
  type ExtractionOptionsInput,
} from '../schemas/extraction-schemas';
import { MIN_ASIDE_TEXT_LENGTH } from '../config/constants';
import { ValidationError, handleUnknownError } from '../errors/index';
import { debug, warn } from '../output/logger';

const ALWAYS_STRIPPED = 'script, style, noscript';
const SEMANTIC_CONTAINERS = 'article, main, [role=main]';
const HEADINGS = 'h1, h2, h3, h4, h5, h6';
const BLOCK_CONTAINERS = 'div, section';
const CLEANABLE_CONTAINERS = 'div, section, table, ul, ol';
// A list-heavy block with fewer paragraphs than this many items reads as navigation
const MAX_LIST_ITEMS_WITHOUT_PROSE = 3;
// Blocks scoring this high survive the link-density rule
const LINK_DENSITY_EXEMPT_SCORE = 25;

export function parseExtractionOptions(raw: unknown): ExtractionOptions {
  try {
    return EXTRACTION_OPTIONS_SCHEMA.parse(raw ?? {});
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid extraction options: ${e.message}`);
    }
    const err = handleUnknownError(e, 'Extraction option parsing');
    throw new ValidationError(`Extraction option parsing failed: ${err.message}`);
  }
}

function collectComments(nodes: readonly AnyNode[], into: AnyNode[]): AnyNode[] {
  for (const node of nodes) {
    if (isComment(node)) {
      into.push(node);
    } else if (hasChildren(node)) {
      collectComments(node.children, into);
    }
  }
  return into;
}

function isUnresolvableHref(value: string): boolean {
  const trimmed = value.trim();
  return trimmed.startsWith('#') || /^javascript:/i.test(trimmed);
}

function resolveUrl(value: string, baseUrl: string): string {
  if (!value.trim() || !URL.canParse(value, baseUrl)) {
    return value;
  }
  return new URL(value, baseUrl).href;
}

/**
 * Isolates the main content of an HTML page.
 *
 * The pipeline runs in a fixed order: metadata is read first, then scripts,
 * comments and deny-listed elements are removed, the best content candidate is
 * selected, optionally cleaned of low-quality blocks, and finally its URLs are
 * made absolute. Malformed markup never throws; when nothing scores well enough
 * the body (or the whole document) is returned.
 */
export class ContentExtractor {
  constructor(private readonly scorer: ContentScorer = new ContentScorer()) {}

  extract(html: string, metadataSink: Record<string, string>, options?: ExtractionOptionsInput): string {
    const opts = parseExtractionOptions(options);
    const $ = cheerio.load(html);
    const originalLength = html.length;

    this.extractMetadata($, metadataSink);
    $(ALWAYS_STRIPPED).remove();
    this.removeComments($);
    this.removeDenied($, opts);
    if (opts.removePageChrome) {
      this.removePageChrome($);
    }

    const selection = this.selectMainContent($, opts);
    debug(`Selected main content via ${selection.strategy}`);

    if (opts.aggressiveCleaning && selection.node) {
      this.cleanConditionally($, selection.node, opts);
    }

    if (opts.resolveRelativeUrls && opts.baseUrl) {
      this.resolveRelativeUrls($, selection.node, opts.baseUrl);
    }

    const cleaned = selection.node ? $.html(selection.node) : $.html();
    debug(`HTML extraction: ${originalLength} -> ${cleaned.length} chars`);
    return cleaned;
  }

  /**
   * Picks the element most likely to be the main content. Exposed for callers
   * that want the node rather than its markup; the tree must come from the same
   * CheerioAPI instance.
   */
  selectMainContent($: CheerioAPI, opts: ExtractionOptions): ContentSelection {
    for (const selector of opts.contentSelectors) {
      const best = this.bestCandidate(this.safeSelect($, selector));
      if (best && best.confidence >= opts.minConfidenceThreshold) {
        return { node: best.node, strategy: 'selector-hint' };
      }
    }

    const semantic = this.bestCandidate($(SEMANTIC_CONTAINERS).get());
    if (semantic) {
      return { node: semantic.node, strategy: 'semantic' };
    }

    const block = this.bestCandidate(
      $(BLOCK_CONTAINERS).get(),
      (candidate) => candidate.confidence >= opts.minConfidenceThreshold
    );
    if (block) {
      return { node: block.node, strategy: 'scored-block' };
    }

    const body = $('body').get(0);
    if (body) {
      warn('No content region met the confidence threshold; falling back to <body>');
      return { node: body, strategy: 'body' };
    }

    warn('No content region or <body> found; returning the whole document');
    return { node: null, strategy: 'document' };
  }

  private extractMetadata($: CheerioAPI, sink: Record<string, string>): void {
    $('meta[name]').each((_, el) => {
      const name = (el.attribs['name'] ?? '').trim();
      const content = (el.attribs['content'] ?? '').trim();
      if (name && content) {
        sink[name] = content;
      }
    });

    const ogTitle = ($('meta[property="og:title"]').first().attr('content') ?? '').trim();
    if (ogTitle) {
      sink['og:title'] = ogTitle;
    }

    const title = $('title').first().text().trim();
    if (title && sink['title'] === undefined) {
      sink['title'] = title;
    }
  }

  private removeComments($: CheerioAPI): void {
    const root = $.root().get(0);
    if (!root) return;
    $(collectComments(root.children, [])).remove();
  }

  private removeDenied($: CheerioAPI, opts: ExtractionOptions): void {
    const deniedClasses = new Set(opts.removeClassNames.map((c) => c.toLowerCase()));
    const deniedIds = new Set(opts.removeIds);

    if (deniedClasses.size > 0) {
      $('[class]')
        .filter((_, el) =>
          (el.attribs['class'] ?? '')
            .split(/\s+/)
            .some((token) => token.length > 0 && deniedClasses.has(token.toLowerCase()))
        )
        .remove();
    }

    if (deniedIds.size > 0) {
      $('[id]')
        .filter((_, el) => deniedIds.has((el.attribs['id'] ?? '').trim()))
        .remove();
    }

    for (const selector of opts.removeSelectors) {
      $(this.safeSelect($, selector)).remove();
    }
  }

  /**
   * Drops page-level headers and footers, meaning those outside any semantic
   * container. A header that holds a heading may carry the page title and is
   * kept. Short asides go as well.
   */
  private removePageChrome($: CheerioAPI): void {
    const outsideContent = (el: ContentNode): boolean => $(el).closest(SEMANTIC_CONTAINERS).length === 0;

    $('header')
      .filter((_, el) => outsideContent(el) && $(el).find(HEADINGS).length === 0)
      .remove();
    $('footer')
      .filter((_, el) => outsideContent(el))
      .remove();
    $('aside')
      .filter((_, el) => textContent(el).trim().length < MIN_ASIDE_TEXT_LENGTH)
      .remove();
  }

  private safeSelect($: CheerioAPI, selector: string): ContentNode[] {
    try {
      return $<ContentNode, string>(selector).get();
    } catch (e: unknown) {
      const err = handleUnknownError(e, `Selecting ${selector}`);
      warn(`Ignoring invalid selector "${selector}": ${err.message}`);
      return [];
    }
  }

  // Highest raw score wins; the strict comparison keeps the earliest on ties
  private bestCandidate(
    nodes: readonly ContentNode[],
    accept: (candidate: ScoredCandidate) => boolean = () => true
  ): ScoredCandidate | null {
    let best: ScoredCandidate | null = null;
    for (const node of nodes) {
      const candidate = this.scorer.evaluate(node);
      if (!accept(candidate)) continue;
      if (!best || candidate.score > best.score) {
        best = candidate;
      }
    }
    return best;
  }

  /**
   * Removes low-quality blocks inside the selected region. Blocks are visited
   * in reverse document order, so every block is judged after its own
   * descendants have been cleaned.
   */
  private cleanConditionally($: CheerioAPI, root: ContentNode, opts: ExtractionOptions): void {
    const blocks = $(root).find(CLEANABLE_CONTAINERS).get();
    let removed = 0;

    for (const block of blocks.reverse()) {
      if (this.shouldRemove(block, opts)) {
        $(block).remove();
        removed += 1;
      }
    }

    if (removed > 0) {
      debug(`Conditional cleaning removed ${removed} block(s)`);
    }
  }

  private shouldRemove(block: ContentNode, opts: ExtractionOptions): boolean {
    const { score } = this.scorer.evaluate(block);
    if (score < 0) {
      return true;
    }

    const textLength = textContent(block).trim().length;
    const imageCount = getElementsByTagName('img', block.children, true).length;
    if (textLength < opts.minTextLength && imageCount === 0) {
      return true;
    }

    if (this.scorer.linkDensity(block) > opts.maxLinkDensity && score < LINK_DENSITY_EXEMPT_SCORE) {
      return true;
    }

    const listItemCount = getElementsByTagName('li', block.children, true).length;
    const paragraphCount = getElementsByTagName('p', block.children, true).length;
    return listItemCount > paragraphCount && listItemCount > MAX_LIST_ITEMS_WITHOUT_PROSE;
  }

  private resolveRelativeUrls($: CheerioAPI, scope: ContentNode | null, baseUrl: string): void {
    const targets = scope ? $(scope).find('[href], [src]').addBack('[href], [src]') : $('[href], [src]');

    targets.each((_, el) => {
      const href = el.attribs['href'];
      if (href !== undefined) {
        el.attribs['href'] = isUnresolvableHref(href) ? '' : resolveUrl(href, baseUrl);
      }

      const src = el.attribs['src'];
      if (src !== undefined) {
        el.attribs['src'] = resolveUrl(src, baseUrl);
      }
    });
  }
}
