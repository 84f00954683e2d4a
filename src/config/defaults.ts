import rawDefaults from './extraction-defaults.json';
import { EXTRACTION_DEFAULTS_SCHEMA, type ExtractionDefaults } from '../schemas/defaults-schemas';
import { ConfigError } from '../errors/index';

function loadExtractionDefaults(): ExtractionDefaults {
  const result = EXTRACTION_DEFAULTS_SCHEMA.safeParse(rawDefaults);
  if (!result.success) {
    throw new ConfigError(`Invalid bundled extraction defaults: ${result.error.message}`);
  }
  return result.data;
}

// Bundled vocabularies and deny-lists
export const EXTRACTION_DEFAULTS: ExtractionDefaults = loadExtractionDefaults();
