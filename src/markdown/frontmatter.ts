import * as YAML from 'yaml';
import { FRONTMATTER_SCHEMA, type Frontmatter } from '../schemas/frontmatter-schemas';
import { handleUnknownError } from '../errors/index';
import { warn } from '../output/logger';

const FRONTMATTER_BLOCK = /^---[ \t]*\r?\n(?:([\s\S]*?)\r?\n)?---[ \t]*(?:\r?\n|$)/;

export interface SplitFrontmatter {
  yaml: string | null;
  body: string;
}

/**
 * Separates a leading `---` fenced block from the Markdown body.
 */
export function splitFrontmatter(markdown: string): SplitFrontmatter {
  const match = FRONTMATTER_BLOCK.exec(markdown);
  if (!match) {
    return { yaml: null, body: markdown };
  }
  return {
    yaml: (match[1] ?? '').trim(),
    body: markdown.slice(match[0].length).trimStart(),
  };
}

/**
 * Parses the frontmatter mapping. Invalid YAML is reported and treated as
 * absent rather than failing the document.
 */
export function parseFrontmatter(markdown: string): Frontmatter | null {
  const { yaml } = splitFrontmatter(markdown);
  if (yaml === null) {
    return null;
  }

  let raw: unknown;
  try {
    raw = YAML.parse(yaml) ?? {};
  } catch (e: unknown) {
    const err = handleUnknownError(e, 'YAML parsing');
    warn(`Failed to parse YAML frontmatter: ${err.message}`);
    return null;
  }

  const result = FRONTMATTER_SCHEMA.safeParse(raw);
  if (!result.success) {
    warn('Frontmatter is not a YAML mapping; ignoring it');
    return null;
  }
  return result.data;
}

export function stripFrontmatter(markdown: string): string {
  return splitFrontmatter(markdown).body;
}
