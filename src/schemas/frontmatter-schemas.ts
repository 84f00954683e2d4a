import { z } from 'zod';

// A frontmatter block must be a YAML mapping; scalars and sequences are rejected
export const FRONTMATTER_SCHEMA = z.record(z.string(), z.unknown());

export type Frontmatter = z.infer<typeof FRONTMATTER_SCHEMA>;
