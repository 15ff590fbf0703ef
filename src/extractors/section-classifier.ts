/**
 * Section Classifier
 *
 * Tracks which activity section the scan is in, from header paragraphs alone.
 * Every extraction pass builds its own classifier from its own rule set, so
 * overlapping headers never leak state from one question type to another.
 *
 * Entry is checked before exit, and a paragraph that triggers a transition is
 * consumed by it: no paragraph enters and exits a section at once.
 */

import { DocumentParagraph } from '../models/document.model';
import { isBlank, isBoldHeading, paragraphText } from '../parsers/base-parser';

export type SectionState =
  | { readonly kind: 'none' }
  | { readonly kind: 'multiple-choice' }
  | { readonly kind: 'true-false' }
  | { readonly kind: 'crossword'; readonly partLabel: string; readonly title: string };

/**
 * Outcome of observing one paragraph. `text` is the trimmed paragraph text.
 */
export type SectionTransition =
  | { readonly type: 'blank' }
  | { readonly type: 'enter'; readonly section: SectionState; readonly previous: SectionState; readonly text: string }
  | { readonly type: 'exit'; readonly previous: SectionState; readonly text: string }
  | { readonly type: 'inside'; readonly section: SectionState; readonly text: string }
  | { readonly type: 'outside'; readonly text: string };

export interface SectionRules {
  readonly name: string;

  /** Section opened by this paragraph, or null */
  matchEntry(text: string, paragraph: DocumentParagraph): SectionState | null;

  /** Whether this paragraph closes the current section */
  matchExit(text: string, paragraph: DocumentParagraph): boolean;
}

export const NO_SECTION: SectionState = { kind: 'none' };

export class SectionClassifier {
  private state: SectionState = NO_SECTION;

  constructor(private readonly rules: SectionRules) {}

  get current(): SectionState {
    return this.state;
  }

  get name(): string {
    return this.rules.name;
  }

  observe(paragraph: DocumentParagraph): SectionTransition {
    const text = paragraphText(paragraph).trim();
    if (isBlank(text)) {
      return { type: 'blank' };
    }

    const entered = this.rules.matchEntry(text, paragraph);
    if (entered) {
      const previous = this.state;
      this.state = entered;
      return { type: 'enter', section: entered, previous, text };
    }

    if (this.state.kind === 'none') {
      return { type: 'outside', text };
    }

    if (this.rules.matchExit(text, paragraph)) {
      const previous = this.state;
      this.state = NO_SECTION;
      return { type: 'exit', previous, text };
    }

    return { type: 'inside', section: this.state, text };
  }

  reset(): void {
    this.state = NO_SECTION;
  }
}

// =============================================================================
// Rule sets
// =============================================================================

const MULTIPLE_CHOICE_HEADERS = [/Activity\s*1.*quiz/i, /quiz.*question/i];
const MULTIPLE_CHOICE_EXIT = /Activity\s*[2-9]/i;

export const multipleChoiceSectionRules: SectionRules = {
  name: 'multiple-choice',
  matchEntry: text =>
    MULTIPLE_CHOICE_HEADERS.some(pattern => pattern.test(text)) ? { kind: 'multiple-choice' } : null,
  matchExit: text => MULTIPLE_CHOICE_EXIT.test(text),
};

export const trueFalseSectionRules: SectionRules = {
  name: 'true-false',
  matchEntry: text => {
    const lower = text.toLowerCase();
    return lower.includes('true or false') || lower.includes('true/false') ? { kind: 'true-false' } : null;
  },
  matchExit: (text, paragraph) => {
    const lower = text.toLowerCase();
    return (
      isBoldHeading(paragraph) &&
      (lower.includes('activity') || lower.includes('quiz')) &&
      !lower.includes('true') &&
      !lower.includes('false')
    );
  },
};

const CROSSWORD_HEADER = /Activity\s*3,?\s*Part\s+([IVX]+)[\s\-–—]*Crossword\s*Puzzle:?(.*)$/i;
const CROSSWORD_EXITS = [/Unit\s*2/i, /Activity\s*4/i];

/**
 * Crossword title as presented to learners
 */
export function formatCrosswordTitle(partLabel: string, suffix: string): string {
  const title = `Activity 3, Part ${partLabel} - Crossword Puzzle`;
  return suffix ? `${title}: ${suffix}` : title;
}

export const crosswordSectionRules: SectionRules = {
  name: 'crossword',
  matchEntry: text => {
    const match = CROSSWORD_HEADER.exec(text);
    if (!match) {
      return null;
    }
    const partLabel = match[1].toUpperCase();
    return { kind: 'crossword', partLabel, title: formatCrosswordTitle(partLabel, match[2].trim()) };
  },
  matchExit: text => CROSSWORD_EXITS.some(pattern => pattern.test(text)),
};
