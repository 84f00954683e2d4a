import type { AnyNode } from 'domhandler';
import { getElementsByTagName, getOuterHTML, textContent } from 'domutils';
import { DEFAULT_SCORING_PATTERNS } from './scoring-patterns';
import type { ContentNode, ScoredCandidate, ScoringPatterns } from './types';

const ELEMENT_TYPE_PRIORS: Readonly<Record<string, number>> = {
  article: 25,
  main: 20,
  section: 15,
  div: 5,
  p: 3,
  td: 3,
  pre: 3,
};

const CLASS_ID_WEIGHT = 25;
const ROLE_MAIN_WEIGHT = 25;
const MAX_COMMA_POINTS = 10;
const MAX_LENGTH_POINTS = 30;
const POINTS_PER_PARAGRAPH = 3;
const HIGH_LINK_DENSITY = 0.5;
const MODERATE_LINK_DENSITY = 0.3;
const GALLERY_PENALTY = -10;

function textOf(node: AnyNode): string {
  return textContent(node).trim();
}

// Descendants only; the node itself never counts toward its own totals
function countDescendants(node: ContentNode, tagName: string): number {
  return getElementsByTagName(tagName, node.children, true).length;
}

/**
 * Scores elements for how likely they are to hold the page's main readable
 * content. The score is a sum of independent heuristics: element type,
 * class/id vocabulary, prose characteristics, link density and the
 * image-to-paragraph ratio. Scoring never mutates the node.
 */
export class ContentScorer {
  constructor(private readonly patterns: ScoringPatterns = DEFAULT_SCORING_PATTERNS) {}

  score(node: ContentNode): number {
    return (
      this.elementTypeScore(node) +
      this.classIdWeight(node) +
      this.contentCharacteristicsScore(node) +
      this.linkDensityPenalty(node) +
      this.imageParagraphPenalty(node)
    );
  }

  /**
   * Maps a raw score onto [0, 1]. Scores at or below -50 give 0, scores at or
   * above 50 give 1.
   */
  confidence(node: ContentNode): number {
    return ContentScorer.toConfidence(this.score(node));
  }

  evaluate(node: ContentNode): ScoredCandidate {
    const score = this.score(node);
    return { node, score, confidence: ContentScorer.toConfidence(score) };
  }

  /**
   * Ratio of anchor text to all text. A node without text counts as all links.
   */
  linkDensity(node: ContentNode): number {
    const textLength = textOf(node).length;
    if (textLength === 0) {
      return 1;
    }

    const anchors = getElementsByTagName('a', node.children, true);
    if (anchors.length === 0) {
      return 0;
    }

    const linkTextLength = anchors.reduce((sum, anchor) => sum + textOf(anchor).length, 0);
    return linkTextLength / textLength;
  }

  /**
   * Ratio of text length to serialized markup length.
   */
  textDensity(node: ContentNode): number {
    const htmlLength = getOuterHTML(node).length;
    if (htmlLength === 0) {
      return 0;
    }
    return textOf(node).length / htmlLength;
  }

  static toConfidence(score: number): number {
    return Math.max(0, Math.min(100, score + 50)) / 100;
  }

  private elementTypeScore(node: ContentNode): number {
    return ELEMENT_TYPE_PRIORS[node.name.toLowerCase()] ?? 0;
  }

  private classIdWeight(node: ContentNode): number {
    let weight = 0;
    const classId = `${node.attribs['class'] ?? ''} ${node.attribs['id'] ?? ''}`;

    if (classId.trim()) {
      // Both vocabularies may match the same string
      if (this.patterns.negative.test(classId)) {
        weight -= CLASS_ID_WEIGHT;
      }
      if (this.patterns.positive.test(classId)) {
        weight += CLASS_ID_WEIGHT;
      }
    }

    if ((node.attribs['role'] ?? '').trim().toLowerCase() === 'main') {
      weight += ROLE_MAIN_WEIGHT;
    }

    return weight;
  }

  private contentCharacteristicsScore(node: ContentNode): number {
    const text = textOf(node);
    const commaCount = text.split(',').length - 1;
    const paragraphCount = countDescendants(node, 'p');

    return (
      Math.min(commaCount, MAX_COMMA_POINTS) +
      Math.min(Math.floor(text.length / 100), MAX_LENGTH_POINTS) +
      paragraphCount * POINTS_PER_PARAGRAPH
    );
  }

  private linkDensityPenalty(node: ContentNode): number {
    const density = this.linkDensity(node);
    if (density > HIGH_LINK_DENSITY) {
      return -25;
    }
    if (density > MODERATE_LINK_DENSITY) {
      return -10;
    }
    return 0;
  }

  private imageParagraphPenalty(node: ContentNode): number {
    const imageCount = countDescendants(node, 'img');
    const paragraphCount = countDescendants(node, 'p');

    // More images than paragraphs reads as a gallery
    if (imageCount > paragraphCount && imageCount > 1) {
      return GALLERY_PENALTY;
    }
    return 0;
  }
}
