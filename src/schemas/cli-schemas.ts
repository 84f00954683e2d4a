import { z } from 'zod';

// Options for `ragprep extract <file>`
export const EXTRACT_OPTIONS_SCHEMA = z.object({
  baseUrl: z.string().url().optional(),
  aggressive: z.boolean().default(false),
  metadata: z.boolean().default(false),
  config: z.string().optional(),
  verbose: z.boolean().default(false),
});

// Options for `ragprep chunk <file>`
export const CHUNK_OPTIONS_SCHEMA = z.object({
  id: z.string().trim().min(1).optional(),
  title: z.string().optional(),
  output: z.enum(['line', 'json']).default('line'),
  config: z.string().optional(),
  verbose: z.boolean().default(false),
});

// Inferred types
export type ExtractOptions = z.infer<typeof EXTRACT_OPTIONS_SCHEMA>;
export type ChunkOptions = z.infer<typeof CHUNK_OPTIONS_SCHEMA>;
