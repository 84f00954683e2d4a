import { z } from 'zod';
import {
  CHUNK_OPTIONS_SCHEMA,
  EXTRACT_OPTIONS_SCHEMA,
  type ChunkOptions,
  type ExtractOptions,
} from '../schemas/cli-schemas';
import { ValidationError, handleUnknownError } from '../errors/index';

export function parseExtractOptions(raw: unknown): ExtractOptions {
  try {
    return EXTRACT_OPTIONS_SCHEMA.parse(raw);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid extract options: ${e.message}`);
    }
    const err = handleUnknownError(e, 'Extract option parsing');
    throw new ValidationError(`Extract option parsing failed: ${err.message}`);
  }
}

export function parseChunkOptions(raw: unknown): ChunkOptions {
  try {
    return CHUNK_OPTIONS_SCHEMA.parse(raw);
  } catch (e: unknown) {
    if (e instanceof z.ZodError) {
      throw new ValidationError(`Invalid chunk options: ${e.message}`);
    }
    const err = handleUnknownError(e, 'Chunk option parsing');
    throw new ValidationError(`Chunk option parsing failed: ${err.message}`);
  }
}
