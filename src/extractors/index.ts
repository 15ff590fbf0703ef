/**
 * Extractors turn the paragraph sequence into question records.
 *
 * Each extractor runs its own pass with its own section classifier:
 * - multiple-choice: numbered stems with lettered options, bold = correct
 * - true-false: statements ending in a bold (or negated plain) answer word
 * - crossword: clue/answer paragraph pairs under Across/Down headings
 */

export * from './section-classifier';
export * from './run-line-mapper';
export * from './true-false-extractor';
export * from './multiple-choice-extractor';
export * from './crossword-answer-matcher';
export * from './crossword-extractor';
