import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import * as cheerio from 'cheerio';
import { ContentExtractor, parseExtractionOptions } from '../src/extraction/content-extractor';
import { ValidationError } from '../src/errors/index';

const PROSE = 'Readable prose, with commas, and enough words to count as content. '.repeat(3).trim();

describe('ContentExtractor', () => {
    let extractor: ContentExtractor;
    let warnSpy: MockInstance<typeof console.warn>;

    beforeEach(() => {
        extractor = new ContentExtractor();
        warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    describe('main content selection', () => {
        it('selects the article between navigation and footer', () => {
            const html =
                '<html><body><nav><a href="/">Home</a> <a href="/about">About</a></nav>' +
                '<article><h1>T</h1><p>Body text.</p></article>' +
                '<footer>Copyright notice</footer></body></html>';

            const result = extractor.extract(html, {});

            expect(result).toBe('<article><h1>T</h1><p>Body text.</p></article>');
        });

        it('reports the selector hint strategy for a confident match', () => {
            const $ = cheerio.load('<body><article><h1>T</h1><p>Body text.</p></article></body>');
            const selection = extractor.selectMainContent($, parseExtractionOptions({}));

            expect(selection.strategy).toBe('selector-hint');
            expect(selection.node?.name).toBe('article');
        });

        it('falls back to the best confident block', () => {
            const $ = cheerio.load(
                `<body><div id="a"><p>x</p></div><div class="story"><p>${PROSE}</p></div></body>`
            );
            const selection = extractor.selectMainContent($, parseExtractionOptions({}));

            expect(selection.strategy).toBe('scored-block');
            expect(selection.node?.attribs['class']).toBe('story');
        });

        it('returns the body when nothing is confident enough', () => {
            const result = extractor.extract('<body><div><p>Hi</p></div></body>', {});

            expect(result).toBe('<body><div><p>Hi</p></div></body>');
            expect(warnSpy).toHaveBeenCalledTimes(1);
        });

        it('skips invalid selector hints', () => {
            const result = extractor.extract('<body><article><p>Body text.</p></article></body>', {}, {
                contentSelectors: ['div[', 'article'],
            });

            expect(result).toBe('<article><p>Body text.</p></article>');
        });
    });

    describe('cleanup', () => {
        it('drops scripts, styles and comments', () => {
            const html =
                '<body><article><!-- note --><script>var x = 1;</script><style>p{}</style>' +
                '<p>Body text.</p></article></body>';

            expect(extractor.extract(html, {})).toBe('<article><p>Body text.</p></article>');
        });

        it('removes deny-listed classes regardless of case', () => {
            const html = '<body><article><div class="Share">Share this</div><p>Body text.</p></article></body>';

            expect(extractor.extract(html, {})).toBe('<article><p>Body text.</p></article>');
        });

        it('removes deny-listed ids', () => {
            const html = '<body><article><p>Body text.</p><section id="comments">Nice post</section></article></body>';

            expect(extractor.extract(html, {})).toBe('<article><p>Body text.</p></article>');
        });

        it('removes ad blocks through the bundled selectors', () => {
            const html = '<body><article><div class="ad">Buy now</div><p>Body text.</p></article></body>';

            expect(extractor.extract(html, {})).toBe('<article><p>Body text.</p></article>');
        });

        describe('page chrome', () => {
            const CHROME_PAGE =
                '<body><header><a href="/">Logo</a></header><div><p>Hi</p></div>' +
                '<footer>Copyright 2024 Footer text</footer><aside>ad</aside></body>';

            it('strips page headers, footers and short asides before falling back to the body', () => {
                expect(extractor.extract(CHROME_PAGE, {})).toBe('<body><div><p>Hi</p></div></body>');
            });

            it('keeps a header with a heading and a long aside', () => {
                const related = 'Related reading on the same topic. '.repeat(3).trim();
                const html =
                    `<body><header><h1>Guide</h1></header><div><p>Hi</p></div><aside>${related}</aside></body>`;

                expect(extractor.extract(html, {})).toBe(html);
            });

            it('keeps footers inside the content', () => {
                const html = '<body><article><p>Body text.</p><footer>Posted in notes</footer></article></body>';

                expect(extractor.extract(html, {})).toBe(
                    '<article><p>Body text.</p><footer>Posted in notes</footer></article>'
                );
            });

            it('can be turned off', () => {
                expect(extractor.extract(CHROME_PAGE, {}, { removePageChrome: false })).toBe(CHROME_PAGE);
            });
        });

        it('removes a link-heavy widget under aggressive cleaning', () => {
            const widget =
                '<div class="sidebar-widget"><a href="/1">Link one</a> <a href="/2">Link two</a></div>';
            const html = `<body><article><p>${PROSE}</p>${widget}</article></body>`;

            expect(extractor.extract(html, {}, { aggressiveCleaning: true })).toBe(
                `<article><p>${PROSE}</p></article>`
            );
            expect(extractor.extract(html, {})).toContain('sidebar-widget');
        });

        it('keeps short blocks that carry an image', () => {
            const figure = '<div><img src="chart.png">Sales chart</div>';
            const html = `<body><article><p>${PROSE}</p>${figure}</article></body>`;

            expect(extractor.extract(html, {}, { aggressiveCleaning: true })).toBe(
                `<article><p>${PROSE}</p>${figure}</article>`
            );
        });

        it('is idempotent', () => {
            const html =
                `<body><nav><a href="/">Home</a></nav><article><p>${PROSE}</p>` +
                '<div class="sidebar-widget"><a href="/1">Link one</a></div></article></body>';
            const options = { aggressiveCleaning: true, baseUrl: 'https://example.com/blog/' };

            const once = extractor.extract(html, {}, options);
            const twice = extractor.extract(once, {}, options);

            expect(twice).toBe(once);
        });
    });

    describe('metadata', () => {
        it('collects meta tags, og:title and the document title', () => {
            const html =
                '<html><head><title> Page Title </title>' +
                '<meta name="description" content=" A summary ">' +
                '<meta name="author" content="Test Author">' +
                '<meta property="og:title" content="OG Title">' +
                '<meta name="empty" content="">' +
                '</head><body><article><p>Body text.</p></article></body></html>';
            const sink: Record<string, string> = {};

            extractor.extract(html, sink);

            expect(sink).toEqual({
                description: 'A summary',
                author: 'Test Author',
                'og:title': 'OG Title',
                title: 'Page Title',
            });
        });

        it('prefers a title meta tag over the title element', () => {
            const html =
                '<html><head><title>Element</title><meta name="title" content="Meta"></head>' +
                '<body><article><p>Body text.</p></article></body></html>';
            const sink: Record<string, string> = {};

            extractor.extract(html, sink);

            expect(sink['title']).toBe('Meta');
        });
    });

    describe('relative URLs', () => {
        const html =
            '<body><article><p>Body text.</p>' +
            '<a href="/docs/a">A</a><img src="img/b.png">' +
            '<a href="#top">Top</a><a href="javascript:void(0)">J</a>' +
            '<a href="https://other.example/x">X</a></article></body>';

        it('resolves against the base URL', () => {
            const result = extractor.extract(html, {}, { baseUrl: 'https://example.com/blog/post' });
            const $ = cheerio.load(result);

            expect($('a').map((_, el) => $(el).attr('href')).get()).toEqual([
                'https://example.com/docs/a',
                '',
                '',
                'https://other.example/x',
            ]);
            expect($('img').attr('src')).toBe('https://example.com/blog/img/b.png');
        });

        it('leaves URLs alone when resolution is disabled', () => {
            const result = extractor.extract(html, {}, {
                baseUrl: 'https://example.com/blog/post',
                resolveRelativeUrls: false,
            });
            const $ = cheerio.load(result);

            expect($('a').first().attr('href')).toBe('/docs/a');
            expect($('img').attr('src')).toBe('img/b.png');
        });
    });

    describe('parseExtractionOptions', () => {
        it('fills defaults', () => {
            const options = parseExtractionOptions({});

            expect(options.minConfidenceThreshold).toBe(0.6);
            expect(options.maxLinkDensity).toBe(0.3);
            expect(options.minTextLength).toBe(25);
            expect(options.aggressiveCleaning).toBe(false);
            expect(options.resolveRelativeUrls).toBe(true);
            expect(options.contentSelectors[0]).toBe('article');
        });

        it('rejects out-of-range thresholds', () => {
            expect(() => parseExtractionOptions({ minConfidenceThreshold: 2 })).toThrow(ValidationError);
        });
    });
});
