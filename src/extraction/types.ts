import type { Element } from 'domhandler';

/**
 * A DOM element from the parsed page. Extraction removes nodes from the tree
 * in place, so a node is only valid for the extraction call that produced it.
 */
export type ContentNode = Element;

export interface ScoredCandidate {
  node: ContentNode;
  score: number;
  // score + 50 clamped to [0, 100], divided by 100
  confidence: number;
}

/**
 * Class/id vocabularies consulted by the scorer's lexical heuristic.
 */
export interface ScoringPatterns {
  readonly negative: RegExp;
  readonly positive: RegExp;
}

export type SelectionStrategy = 'selector-hint' | 'semantic' | 'scored-block' | 'body' | 'document';

export interface ContentSelection {
  node: ContentNode | null;
  strategy: SelectionStrategy;
}
