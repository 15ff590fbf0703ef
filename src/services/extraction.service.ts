/**
 * Extraction Service
 *
 * Runs the three extraction passes over one document:
 * 1. Multiple choice
 * 2. True/False
 * 3. Crosswords
 *
 * Every call starts from fresh state; output depends only on the document.
 */

import { extractCrosswords } from '../extractors/crossword-extractor';
import { InlineAnswerMatcher } from '../extractors/crossword-answer-matcher';
import { extractMultipleChoiceQuestions } from '../extractors/multiple-choice-extractor';
import { extractTrueFalseQuestions } from '../extractors/true-false-extractor';
import { Logger, silentLogger } from '../logging/logger';
import { QuizDocument } from '../models/document.model';
import { ImageSearchWindow } from '../models/extractor-config.model';
import { Crossword, ExtractionResult } from '../models/question.model';

export interface ExtractionOptions {
  /** Paragraph window searched for question images */
  imageSearch?: ImageSearchWindow;

  /** Inline crossword answer strategy */
  answerMatcher?: InlineAnswerMatcher;

  logger?: Logger;
}

export type ExtractableDocument = Pick<QuizDocument, 'paragraphs' | 'images'>;

/**
 * Extract every question record from a document
 */
export function extractQuizContent(
  document: ExtractableDocument,
  options: ExtractionOptions = {}
): ExtractionResult {
  const logger = options.logger ?? silentLogger;
  const { paragraphs, images } = document;

  logger.info('Extracting multiple choice questions...');
  const multipleChoice = extractMultipleChoiceQuestions(paragraphs, images, {
    imageSearch: options.imageSearch,
    logger,
  });
  logger.info(`Found ${multipleChoice.questions.length} multiple choice questions`);

  logger.info('Extracting True/False questions...');
  const trueFalse = extractTrueFalseQuestions(paragraphs, { logger });
  logger.info(`Found ${trueFalse.length} True/False questions`);

  logger.info('Extracting crossword puzzles...');
  const crosswords = extractCrosswords(paragraphs, {
    answerMatcher: options.answerMatcher,
    logger,
  });
  logger.info(`Found ${crosswords.length} crosswords`);
  for (const crossword of crosswords) {
    const counts = countClues(crossword);
    logger.info(`  ${crossword.title}: ${crossword.clues.length} clues`, { ...counts });
  }

  const result: ExtractionResult = {
    multipleChoice: multipleChoice.questions,
    trueFalse,
    crosswords,
    images,
  };

  return multipleChoice.sharedImageId ? { ...result, sharedImageId: multipleChoice.sharedImageId } : result;
}

/**
 * Across/down clue counts of a crossword
 */
export function countClues(crossword: Crossword): { across: number; down: number } {
  return {
    across: crossword.clues.filter(clue => clue.orientation === 'across').length,
    down: crossword.clues.filter(clue => clue.orientation === 'down').length,
  };
}
