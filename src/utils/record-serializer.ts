/**
 * Plain-data form of the extraction records, the input contract of the
 * packaging step. Field names are part of that contract.
 */

import { ExtractionResult } from '../models/question.model';

export interface PlainChoiceOption {
  text: string;
  correct: boolean;
}

export interface PlainMultipleChoiceQuestion {
  question: string;
  options: PlainChoiceOption[];
  image_id: string | null;
}

export interface PlainTrueFalseQuestion {
  question: string;
  correct_answer: 'true' | 'false';
}

export interface PlainCrosswordClue {
  orientation: 'across' | 'down';
  clue: string;
  answer: string;
}

export interface PlainCrossword {
  title: string;
  clues: PlainCrosswordClue[];
}

export interface PlainImage {
  id: string;
  name: string;
  mime: string;
  size: number;
  width: number;
  height: number;
}

export interface PlainQuizRecords {
  multiple_choice: PlainMultipleChoiceQuestion[];
  true_false: PlainTrueFalseQuestion[];
  crosswords: PlainCrossword[];
  images: PlainImage[];
  shared_image_id: string | null;
}

/**
 * Convert extraction results to JSON-ready records
 */
export function toPlainRecords(result: ExtractionResult): PlainQuizRecords {
  return {
    multiple_choice: result.multipleChoice.map(question => ({
      question: question.questionText,
      options: question.options.map(option => ({ text: option.text, correct: option.correct })),
      image_id: question.imageId ?? null,
    })),
    true_false: result.trueFalse.map(question => ({
      question: question.questionText,
      correct_answer: question.correctAnswer,
    })),
    crosswords: result.crosswords.map(crossword => ({
      title: crossword.title,
      clues: crossword.clues.map(clue => ({
        orientation: clue.orientation,
        clue: clue.clue,
        answer: clue.answer,
      })),
    })),
    images: Array.from(result.images.values()).map(image => ({
      id: image.id,
      name: image.name,
      mime: image.mimeType,
      size: image.size,
      width: image.width,
      height: image.height,
    })),
    shared_image_id: result.sharedImageId ?? null,
  };
}
