import { EXTRACTION_DEFAULTS } from '../config/defaults';
import { ConfigError, handleUnknownError } from '../errors/index';
import type { ScoringPatternsConfig } from '../schemas/extraction-schemas';
import type { ScoringPatterns } from './types';

function escapeRegExp(term: string): string {
  return term.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Builds a case-insensitive substring matcher from a word list.
 */
export function buildVocabularyPattern(terms: readonly string[]): RegExp {
  if (terms.length === 0) {
    throw new ConfigError('Scoring vocabulary must contain at least one term');
  }
  return new RegExp(terms.map(escapeRegExp).join('|'), 'i');
}

function compilePattern(source: string, label: string): RegExp {
  try {
    return new RegExp(source, 'i');
  } catch (e: unknown) {
    const err = handleUnknownError(e, `Compiling ${label} pattern`);
    throw new ConfigError(`Invalid ${label} scoring pattern: ${err.message}`);
  }
}

export const DEFAULT_SCORING_PATTERNS: ScoringPatterns = {
  negative: buildVocabularyPattern(EXTRACTION_DEFAULTS.scoring.negativeTerms),
  positive: buildVocabularyPattern(EXTRACTION_DEFAULTS.scoring.positiveTerms),
};

/**
 * Resolves configured regex sources, falling back to the bundled vocabularies.
 */
export function createScoringPatterns(config: ScoringPatternsConfig = {}): ScoringPatterns {
  return {
    negative: config.negativePattern
      ? compilePattern(config.negativePattern, 'negative')
      : DEFAULT_SCORING_PATTERNS.negative,
    positive: config.positivePattern
      ? compilePattern(config.positivePattern, 'positive')
      : DEFAULT_SCORING_PATTERNS.positive,
  };
}
