/**
 * Crossword Extractor
 *
 * Clues and answers are authored as paragraph pairs, so the scan walks the
 * document with an explicit cursor and consumes a clue together with its
 * answer paragraph:
 *
 *   4. A frozen form of water        (numbered clue)
 *   ICE                              (all-caps answer paragraph)
 *
 *   Opposite of cold (4 letters)     (clue with a parenthetical)
 *   Answer: **HOT**                  (bold answer run)
 */

import { Logger, silentLogger } from '../logging/logger';
import { DocumentParagraph } from '../models/document.model';
import { ClueOrientation, Crossword, CrosswordClue } from '../models/question.model';
import { paragraphText, splitLines } from '../parsers/base-parser';

import { BoldRunAnswerMatcher, InlineAnswerMatcher, normalizeAnswer } from './crossword-answer-matcher';
import { SectionClassifier, crosswordSectionRules } from './section-classifier';

const CLUES_MARKER = /^Clues?:?\s*$/i;
const ORIENTATION = /^(Across|Down)/i;
const INLINE_CLUE = /^(\d+)\.\s+(.+)$/;
const NUMBERED_CLUE = /^(\d+)\.\s+(.+?)(?:\s*\(([^)]+)\))?\s*$/;
const ALL_CAPS_ANSWER = /^[A-Z][A-Z\s-]+$/;

export interface CrosswordExtractionOptions {
  /** Strategy for inline answers on orientation lines */
  answerMatcher?: InlineAnswerMatcher;
  logger?: Logger;
}

type ClueScan =
  | { readonly phase: 'awaiting-orientation' }
  | { readonly phase: 'collecting'; readonly orientation: ClueOrientation; readonly clueNumber: number };

interface CrosswordDraft {
  title: string;
  clues: CrosswordClue[];
}

const AWAITING_ORIENTATION: ClueScan = { phase: 'awaiting-orientation' };

class CrosswordScanner {
  private readonly classifier = new SectionClassifier(crosswordSectionRules);
  private readonly crosswords: Crossword[] = [];
  private draft: CrosswordDraft | null = null;
  private scan: ClueScan = AWAITING_ORIENTATION;

  constructor(
    private readonly paragraphs: readonly DocumentParagraph[],
    private readonly answerMatcher: InlineAnswerMatcher,
    private readonly logger: Logger
  ) {}

  run(): Crossword[] {
    let cursor = 0;
    while (cursor < this.paragraphs.length) {
      cursor += this.step(cursor);
    }
    this.flush();
    return this.crosswords;
  }

  /**
   * Handle the paragraph at the cursor; returns how many paragraphs it consumed
   */
  private step(index: number): number {
    const paragraph = this.paragraphs[index];
    const transition = this.classifier.observe(paragraph);

    switch (transition.type) {
      case 'enter':
        this.flush();
        if (transition.section.kind === 'crossword') {
          this.draft = { title: transition.section.title, clues: [] };
          this.scan = AWAITING_ORIENTATION;
          this.logger.debug('Found crossword', { title: transition.section.title });
        }
        return 1;
      case 'exit':
        this.flush();
        return 1;
      case 'inside':
        return this.consumeClue(index, paragraph, transition.text);
      default:
        return 1;
    }
  }

  private consumeClue(index: number, paragraph: DocumentParagraph, text: string): number {
    if (CLUES_MARKER.test(text)) {
      return 1;
    }

    const orientationMatch = ORIENTATION.exec(text);
    if (orientationMatch) {
      const orientation: ClueOrientation = orientationMatch[1].toLowerCase() === 'across' ? 'across' : 'down';
      this.scan = { phase: 'collecting', orientation, clueNumber: 1 };
      this.collectInlineClues(paragraph, orientation, text.slice(orientationMatch[0].length));
      return 1;
    }

    if (this.scan.phase !== 'collecting') {
      return 1;
    }
    const { orientation, clueNumber } = this.scan;
    const next = this.paragraphs[index + 1];

    const numbered = NUMBERED_CLUE.exec(text);
    if (numbered) {
      const answerText = next ? paragraphText(next).trim() : '';
      if (ALL_CAPS_ANSWER.test(answerText)) {
        this.addClue({ orientation, clue: numbered[2].trim(), answer: normalizeAnswer(answerText) }, numbered[1]);
        return 2;
      }
      return 1;
    }

    if (next && text.includes('(') && text.includes(')')) {
      const answer = next.runs
        .filter(run => run.bold)
        .map(run => run.text.trim().toUpperCase())
        .find(candidate => ALL_CAPS_ANSWER.test(candidate));
      if (answer) {
        this.addClue({ orientation, clue: text, answer: normalizeAnswer(answer) }, String(clueNumber));
        this.scan = { phase: 'collecting', orientation, clueNumber: clueNumber + 1 };
        return 2;
      }
    }

    return 1;
  }

  /**
   * "Across 1. Frozen water **ICE**": every inline clue pairs with every
   * answer the matcher finds in the paragraph.
   */
  private collectInlineClues(paragraph: DocumentParagraph, orientation: ClueOrientation, rest: string): void {
    const inlineText = rest.trim().replace(/^:\s*/, '');
    if (!inlineText) {
      return;
    }

    for (const line of splitLines(inlineText)) {
      const clueMatch = INLINE_CLUE.exec(line.trim());
      if (!clueMatch) {
        continue;
      }
      for (const answer of this.answerMatcher.matchAnswers(paragraph)) {
        this.addClue({ orientation, clue: clueMatch[2].trim(), answer }, clueMatch[1]);
      }
    }
  }

  private addClue(clue: CrosswordClue, clueNumber: string): void {
    if (!this.draft) {
      return;
    }
    this.draft.clues.push(clue);
    this.logger.debug(`Crossword clue ${clueNumber}`, { ...clue });
  }

  private flush(): void {
    if (this.draft && this.draft.clues.length > 0) {
      this.crosswords.push({ title: this.draft.title, clues: this.draft.clues });
    }
    this.draft = null;
  }
}

/**
 * Collect every crossword that gathered at least one clue
 */
export function extractCrosswords(
  paragraphs: readonly DocumentParagraph[],
  options: CrosswordExtractionOptions = {}
): Crossword[] {
  const scanner = new CrosswordScanner(
    paragraphs,
    options.answerMatcher ?? new BoldRunAnswerMatcher(),
    options.logger ?? silentLogger
  );
  return scanner.run();
}
