import { z } from 'zod';
import { EXTRACTION_OPTIONS_SCHEMA, SCORING_PATTERNS_SCHEMA } from './extraction-schemas';
import {
  DEFAULT_MAX_CHUNK_SIZE,
  DEFAULT_MIN_CHUNK_SIZE,
  DEFAULT_OVERLAP_PERCENTAGE,
  DEFAULT_TARGET_CHUNK_SIZE,
} from '../config/constants';

// Token bounds; their relative ordering is checked by validateChunkBounds()
export const CHUNKING_OPTIONS_SCHEMA = z.object({
  minChunkSize: z.number().int().default(DEFAULT_MIN_CHUNK_SIZE),
  targetChunkSize: z.number().int().default(DEFAULT_TARGET_CHUNK_SIZE),
  maxChunkSize: z.number().int().default(DEFAULT_MAX_CHUNK_SIZE),
  overlapPercentage: z.number().default(DEFAULT_OVERLAP_PERCENTAGE),
});

// Configuration file schema for .ragprep.ini validation
export const CONFIG_SCHEMA = z.object({
  chunking: CHUNKING_OPTIONS_SCHEMA.default({}),
  extraction: EXTRACTION_OPTIONS_SCHEMA.default({}),
  scoring: SCORING_PATTERNS_SCHEMA.default({}),
  configPath: z.string().min(1).optional(),
});

// Inferred types
export type ChunkingConfig = z.infer<typeof CHUNKING_OPTIONS_SCHEMA>;
export type Config = z.infer<typeof CONFIG_SCHEMA>;
