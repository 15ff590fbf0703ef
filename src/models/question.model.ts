/**
 * Question records produced by the extraction passes.
 *
 * Records are created once per document and never mutated afterwards.
 */

import { ImageRef } from './document.model';

/**
 * One lettered option of a multiple-choice question, in authored order
 */
export interface ChoiceOption {
  readonly text: string;

  /** Bold-derived flag; several options may be marked */
  readonly correct: boolean;
}

export interface MultipleChoiceQuestion {
  /** Stem text, always ending in '?' */
  readonly questionText: string;

  /** One to four options, A to D */
  readonly options: readonly ChoiceOption[];

  /** Image relationship id: nearby image first, section image as fallback */
  readonly imageId?: string;
}

export type TrueFalseAnswer = 'true' | 'false';

export interface TrueFalseQuestion {
  readonly questionText: string;
  readonly correctAnswer: TrueFalseAnswer;
}

export type ClueOrientation = 'across' | 'down';

export interface CrosswordClue {
  readonly orientation: ClueOrientation;
  readonly clue: string;

  /** Uppercase, internal whitespace collapsed */
  readonly answer: string;
}

export interface Crossword {
  readonly title: string;
  readonly clues: readonly CrosswordClue[];
}

/**
 * Everything one document yields
 */
export interface ExtractionResult {
  readonly multipleChoice: readonly MultipleChoiceQuestion[];
  readonly trueFalse: readonly TrueFalseQuestion[];
  readonly crosswords: readonly Crossword[];
  readonly images: ReadonlyMap<string, ImageRef>;

  /** Section image that at least one question fell back to */
  readonly sharedImageId?: string;
}
