/**
 * The page handed to an HTML-to-Markdown converter.
 */
export interface ConvertiblePage {
  url: string;
  title: string;
  html: string;
  metadata: Readonly<Record<string, string>>;
}

/**
 * Converts cleaned HTML into Markdown. Implemented outside this package.
 */
export interface MarkdownConverter {
  convert(page: ConvertiblePage): string;
}
