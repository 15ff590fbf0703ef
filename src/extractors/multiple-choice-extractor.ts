/**
 * Multiple-Choice Extractor
 *
 * A question is one paragraph with soft line breaks:
 *
 *   3. Which planet is closest to the sun?
 *   A. Venus
 *   B. Mercury      <- bold marks the correct option
 *   C. Earth
 *   D. Mars
 *
 * Correctness comes from run formatting, recovered per line by mapLinesToRuns.
 * Images are looked up in the paragraphs around the question, with the image
 * near the section header as fallback.
 */

import { Logger, silentLogger } from '../logging/logger';
import { DocumentParagraph, ImageRef } from '../models/document.model';
import { DEFAULT_EXTRACTOR_CONFIG, ImageSearchWindow } from '../models/extractor-config.model';
import { ChoiceOption, MultipleChoiceQuestion } from '../models/question.model';
import { isBlank, matchLine, paragraphText, splitLines } from '../parsers/base-parser';

import { mapLinesToRuns } from './run-line-mapper';
import { SectionClassifier, multipleChoiceSectionRules } from './section-classifier';

const QUESTION_STEM = /^(\d+)\.\s*(.+?)\?\s*$/;
const OPTION_LINE = /^([A-D])\.\s+(.+)$/;

export interface MultipleChoiceExtractionOptions {
  imageSearch?: ImageSearchWindow;
  logger?: Logger;
}

export interface MultipleChoiceExtraction {
  questions: MultipleChoiceQuestion[];

  /** Section image that at least one question fell back to (last one wins) */
  sharedImageId?: string;
}

/**
 * Question stem and options of a paragraph, or null when it is not a question
 */
export interface ParsedChoiceParagraph {
  questionText: string;
  options: ChoiceOption[];
}

export function parseMultipleChoiceParagraph(paragraph: DocumentParagraph): ParsedChoiceParagraph | null {
  const lines = splitLines(paragraphText(paragraph));
  const stemIndex = lines.findIndex(line => !isBlank(line));
  if (stemIndex === -1) {
    return null;
  }

  const stemMatch = matchLine(lines[stemIndex], QUESTION_STEM);
  if (!stemMatch) {
    return null;
  }

  const lineRuns = mapLinesToRuns(lines, paragraph.runs);
  const seenLetters = new Set<string>();
  const options: ChoiceOption[] = [];

  for (let i = stemIndex + 1; i < lines.length; i++) {
    const optionMatch = matchLine(lines[i], OPTION_LINE);
    if (!optionMatch || seenLetters.has(optionMatch[1])) {
      continue;
    }
    seenLetters.add(optionMatch[1]);

    options.push({
      text: stripTrailingPeriods(optionMatch[2].trim()),
      correct: lineRuns[i].some(run => run.bold && !isBlank(run.text)),
    });
  }

  if (options.length === 0) {
    return null;
  }

  return {
    questionText: ensureQuestionMark(stemMatch[2].trim()),
    options,
  };
}

function stripTrailingPeriods(text: string): string {
  return text.replace(/\.+$/, '');
}

function ensureQuestionMark(text: string): string {
  return text.endsWith('?') ? text : `${text}?`;
}

/**
 * First resolvable image in the paragraphs [index - before, index + after)
 */
export function findImageNearParagraph(
  paragraphs: readonly DocumentParagraph[],
  index: number,
  images: ReadonlyMap<string, ImageRef>,
  window: ImageSearchWindow = DEFAULT_EXTRACTOR_CONFIG.imageSearch
): string | undefined {
  const start = Math.max(0, index - window.before);
  const end = Math.min(paragraphs.length, index + window.after);

  for (let i = start; i < end; i++) {
    const id = paragraphs[i].imageRefIds.find(refId => images.has(refId));
    if (id) {
      return id;
    }
  }
  return undefined;
}

/**
 * Shared image of the current section. The section image counts as shared
 * only once a question of that section falls back to it.
 */
class SectionImageTracker {
  private sectionImageId: string | undefined;
  private used = false;
  private shared: string | undefined;

  get sectionImage(): string | undefined {
    return this.sectionImageId;
  }

  get sharedImageId(): string | undefined {
    return this.shared;
  }

  open(imageId: string | undefined): void {
    this.close();
    this.sectionImageId = imageId;
  }

  close(): void {
    if (this.sectionImageId && this.used) {
      this.shared = this.sectionImageId;
    }
    this.sectionImageId = undefined;
    this.used = false;
  }

  /** Section image for a question without its own, marking it used */
  fallback(): string | undefined {
    if (this.sectionImageId) {
      this.used = true;
    }
    return this.sectionImageId;
  }
}

/**
 * Collect multiple-choice questions from every quiz section
 */
export function extractMultipleChoiceQuestions(
  paragraphs: readonly DocumentParagraph[],
  images: ReadonlyMap<string, ImageRef>,
  options: MultipleChoiceExtractionOptions = {}
): MultipleChoiceExtraction {
  const logger = options.logger ?? silentLogger;
  const window = options.imageSearch ?? DEFAULT_EXTRACTOR_CONFIG.imageSearch;
  const classifier = new SectionClassifier(multipleChoiceSectionRules);
  const sectionImages = new SectionImageTracker();
  const questions: MultipleChoiceQuestion[] = [];

  for (let index = 0; index < paragraphs.length; index++) {
    const paragraph = paragraphs[index];
    const transition = classifier.observe(paragraph);

    if (transition.type === 'enter') {
      sectionImages.open(findImageNearParagraph(paragraphs, index, images, window));
      logger.debug('Found multiple-choice section', {
        header: transition.text,
        sectionImage: sectionImages.sectionImage ?? null,
      });
      continue;
    }

    if (transition.type === 'exit') {
      sectionImages.close();
      continue;
    }

    if (transition.type !== 'inside') {
      continue;
    }

    const parsed = parseMultipleChoiceParagraph(paragraph);
    if (!parsed) {
      continue;
    }

    const imageId = findImageNearParagraph(paragraphs, index, images, window) ?? sectionImages.fallback();
    questions.push(imageId ? { ...parsed, imageId } : parsed);
    logger.debug('Multiple-choice question', {
      question: parsed.questionText,
      options: parsed.options.length,
      image: imageId ?? null,
    });
  }

  sectionImages.close();

  const sharedImageId = sectionImages.sharedImageId;
  return sharedImageId ? { questions, sharedImageId } : { questions };
}
