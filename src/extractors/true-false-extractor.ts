/**
 * True/False Extractor
 *
 * Authors write the statement followed by the answer word, e.g.
 * "Water boils at 100 degrees Celsius. True". The bold word is the answer;
 * a plain trailing word is the wrong one, so the answer is its negation.
 */

import { Logger, silentLogger } from '../logging/logger';
import { DocumentParagraph, TextRun } from '../models/document.model';
import { TrueFalseAnswer, TrueFalseQuestion } from '../models/question.model';
import { isBlank } from '../parsers/base-parser';

import { SectionClassifier, trueFalseSectionRules } from './section-classifier';

const TRUE_FALSE_ENDINGS = [/\b(true|false)\s*$/i, /\*\*(true|false)\*\*\s*$/i];
const BOOLEAN_TOKEN = /\b(true|false)\b/gi;

export interface TrueFalseExtractionOptions {
  logger?: Logger;
}

/**
 * Whether the paragraph text ends in a True/False answer word
 */
export function isTrueFalseStatement(text: string): boolean {
  const clean = text.trim();
  return TRUE_FALSE_ENDINGS.some(pattern => pattern.test(clean));
}

export function negateAnswer(answer: TrueFalseAnswer): TrueFalseAnswer {
  return answer === 'true' ? 'false' : 'true';
}

/**
 * Parse a statement and its answer from the paragraph runs.
 * Returns null when there is no answer word or no statement before it.
 */
export function parseTrueFalseRuns(runs: readonly TextRun[]): TrueFalseQuestion | null {
  const visibleRuns = runs.filter(run => !isBlank(run.text));
  const fullText = visibleRuns.map(run => run.text).join('');

  const matches = [...fullText.matchAll(BOOLEAN_TOKEN)];
  const last = matches[matches.length - 1];
  if (!last || last.index === undefined) {
    return null;
  }

  const token: TrueFalseAnswer = last[1].toLowerCase() === 'true' ? 'true' : 'false';
  const questionText = fullText.slice(0, last.index).trim();
  if (!questionText) {
    return null;
  }

  return {
    questionText,
    correctAnswer: isBoldAtOffset(visibleRuns, last.index) ? token : negateAnswer(token),
  };
}

/**
 * Boldness of the run covering a character offset; false past the last run
 */
function isBoldAtOffset(runs: readonly TextRun[], offset: number): boolean {
  let start = 0;
  for (const run of runs) {
    if (offset >= start && offset < start + run.text.length) {
      return run.bold;
    }
    start += run.text.length;
  }
  return false;
}

/**
 * Collect True/False questions from every True/False section
 */
export function extractTrueFalseQuestions(
  paragraphs: readonly DocumentParagraph[],
  options: TrueFalseExtractionOptions = {}
): TrueFalseQuestion[] {
  const logger = options.logger ?? silentLogger;
  const classifier = new SectionClassifier(trueFalseSectionRules);
  const questions: TrueFalseQuestion[] = [];

  for (const paragraph of paragraphs) {
    const transition = classifier.observe(paragraph);

    if (transition.type === 'enter') {
      logger.debug('Found True/False section', { header: transition.text });
    } else if (transition.type === 'exit') {
      logger.debug('End of True/False section', { header: transition.text });
    } else if (transition.type === 'inside' && isTrueFalseStatement(transition.text)) {
      const question = parseTrueFalseRuns(paragraph.runs);
      if (question) {
        questions.push(question);
        logger.debug('True/False question', {
          question: question.questionText,
          answer: question.correctAnswer,
        });
      }
    }
  }

  return questions;
}
