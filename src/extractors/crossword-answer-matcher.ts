/**
 * Inline crossword answer matching
 *
 * Orientation paragraphs sometimes carry their clues inline ("Across 1. ...")
 * with the answers set in bold somewhere in the same paragraph. Which bold
 * text counts as an answer is a heuristic, kept behind this interface.
 */

import { DocumentParagraph } from '../models/document.model';
import { collapseWhitespace } from '../parsers/base-parser';

export interface InlineAnswerMatcher {
  /** Candidate answers found in an orientation paragraph */
  matchAnswers(paragraph: DocumentParagraph): string[];
}

/**
 * Crossword answer form: uppercase, whitespace collapsed
 */
export function normalizeAnswer(text: string): string {
  return collapseWhitespace(text.toUpperCase());
}

/**
 * Every bold run of at least `minLength` visible characters is an answer.
 * Incidental bold text in the same paragraph (an emphasised "Across",
 * for instance) is matched too.
 */
export class BoldRunAnswerMatcher implements InlineAnswerMatcher {
  constructor(private readonly minLength = 3) {}

  matchAnswers(paragraph: DocumentParagraph): string[] {
    return paragraph.runs
      .filter(run => run.bold)
      .map(run => run.text.trim())
      .filter(text => text.length >= this.minLength)
      .map(normalizeAnswer);
  }
}
