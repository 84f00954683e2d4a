import { z } from 'zod';
import { EXTRACTION_DEFAULTS } from '../config/defaults';
import {
  DEFAULT_MAX_LINK_DENSITY,
  DEFAULT_MIN_CONFIDENCE_THRESHOLD,
  DEFAULT_MIN_TEXT_LENGTH,
} from '../config/constants';

const SELECTOR_LIST = z.array(z.string().min(1));

// Options accepted by ContentExtractor.extract()
export const EXTRACTION_OPTIONS_SCHEMA = z.object({
  contentSelectors: SELECTOR_LIST.default(() => [...EXTRACTION_DEFAULTS.contentSelectors]),
  removeClassNames: SELECTOR_LIST.default(() => [...EXTRACTION_DEFAULTS.removeClassNames]),
  removeIds: SELECTOR_LIST.default(() => [...EXTRACTION_DEFAULTS.removeIds]),
  removeSelectors: SELECTOR_LIST.default(() => [...EXTRACTION_DEFAULTS.removeSelectors]),
  minConfidenceThreshold: z.number().min(0).max(1).default(DEFAULT_MIN_CONFIDENCE_THRESHOLD),
  maxLinkDensity: z.number().min(0).max(1).default(DEFAULT_MAX_LINK_DENSITY),
  minTextLength: z.number().int().nonnegative().default(DEFAULT_MIN_TEXT_LENGTH),
  removePageChrome: z.boolean().default(true),
  aggressiveCleaning: z.boolean().default(false),
  resolveRelativeUrls: z.boolean().default(true),
  baseUrl: z.string().url().optional(),
});

// Regex sources that replace the bundled vocabularies when set
export const SCORING_PATTERNS_SCHEMA = z.object({
  negativePattern: z.string().min(1).optional(),
  positivePattern: z.string().min(1).optional(),
});

export type ExtractionOptions = z.infer<typeof EXTRACTION_OPTIONS_SCHEMA>;
export type ExtractionOptionsInput = z.input<typeof EXTRACTION_OPTIONS_SCHEMA>;
export type ScoringPatternsConfig = z.infer<typeof SCORING_PATTERNS_SCHEMA>;
