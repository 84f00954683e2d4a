import { z } from 'zod';

const TERM_LIST = z.array(z.string().min(1));

// Shape of src/config/extraction-defaults.json
export const EXTRACTION_DEFAULTS_SCHEMA = z.object({
  scoring: z.object({
    negativeTerms: TERM_LIST.min(1),
    positiveTerms: TERM_LIST.min(1),
  }),
  contentSelectors: TERM_LIST,
  removeClassNames: TERM_LIST,
  removeIds: TERM_LIST,
  removeSelectors: TERM_LIST,
});

export type ExtractionDefaults = z.infer<typeof EXTRACTION_DEFAULTS_SCHEMA>;
