/**
 * Tests for crossword-extractor
 */

import { extractCrosswords } from './crossword-extractor';
import { InlineAnswerMatcher } from './crossword-answer-matcher';
import { Logger } from '../logging/logger';
import { DocumentParagraph, TextRun } from '../models/document.model';

const plain = (text: string): TextRun => ({ text, bold: false });
const bold = (text: string): TextRun => ({ text, bold: true });
const para = (...runs: TextRun[]): DocumentParagraph => ({ runs, imageRefIds: [] });
const text = (value: string): DocumentParagraph => para(plain(value));

describe('crossword-extractor', () => {
  it('should pair numbered clues with all-caps answer paragraphs', () => {
    const paragraphs = [
      text('Activity 3, Part I - Crossword Puzzle: Water'),
      text('Clues:'),
      text('Across'),
      text('4. A frozen form of water'),
      text('ICE'),
      text('Down'),
      text('1. Falls from clouds (4 letters)'),
      text('  RAIN '),
      text('Unit 2'),
    ];

    expect(extractCrosswords(paragraphs)).toEqual([
      {
        title: 'Activity 3, Part I - Crossword Puzzle: Water',
        clues: [
          { orientation: 'across', clue: 'A frozen form of water', answer: 'ICE' },
          { orientation: 'down', clue: 'Falls from clouds', answer: 'RAIN' },
        ],
      },
    ]);
  });

  it('should collapse whitespace in multi-word answers', () => {
    const paragraphs = [
      text('Activity 3, Part I - Crossword Puzzle'),
      text('Across'),
      text('2. Our sun and its planets'),
      text('SOLAR   SYSTEM'),
    ];

    expect(extractCrosswords(paragraphs)[0].clues).toEqual([
      { orientation: 'across', clue: 'Our sun and its planets', answer: 'SOLAR SYSTEM' },
    ]);
  });

  it('should skip a numbered clue without an answer paragraph', () => {
    const paragraphs = [
      text('Activity 3, Part I - Crossword Puzzle'),
      text('Across'),
      text('2. Unanswered clue'),
      text('3. Largest ocean'),
      text('PACIFIC'),
      text('5. Last clue'),
    ];

    expect(extractCrosswords(paragraphs)[0].clues).toEqual([
      { orientation: 'across', clue: 'Largest ocean', answer: 'PACIFIC' },
    ]);
  });

  it('should not retry a numbered clue as a parenthetical clue', () => {
    const paragraphs = [
      text('Activity 3, Part I - Crossword Puzzle'),
      text('Down'),
      text('5. Bright object (star)'),
      para(plain('Answer: '), bold('SUN')),
      text('6. Red planet'),
      text('MARS'),
    ];

    expect(extractCrosswords(paragraphs)[0].clues).toEqual([{ orientation: 'down', clue: 'Red planet', answer: 'MARS' }]);
  });

  it('should pair a parenthetical clue with the bold answer that follows', () => {
    const paragraphs = [
      text('Activity 3, Part II - Crossword Puzzle'),
      text('Down'),
      text('Opposite of cold (3 letters)'),
      para(bold('Answer: '), bold(' hot ')),
    ];

    expect(extractCrosswords(paragraphs)).toEqual([
      {
        title: 'Activity 3, Part II - Crossword Puzzle',
        clues: [{ orientation: 'down', clue: 'Opposite of cold (3 letters)', answer: 'HOT' }],
      },
    ]);
  });

  it('should ignore a parenthetical clue without a bold answer', () => {
    const paragraphs = [
      text('Activity 3, Part II - Crossword Puzzle'),
      text('Across'),
      text('Opposite of wet (3 letters)'),
      text('DRY'),
    ];

    expect(extractCrosswords(paragraphs)).toEqual([]);
  });

  it('should number un-numbered clues per orientation', () => {
    const logger: jest.Mocked<Logger> = {
      debug: jest.fn(),
      info: jest.fn(),
      warn: jest.fn(),
      error: jest.fn(),
    };
    const paragraphs = [
      text('Activity 3, Part II - Crossword Puzzle'),
      text('Across'),
      text('Frozen water (3)'),
      para(bold('ICE')),
      text('Hot drink (3)'),
      para(bold('TEA')),
    ];

    extractCrosswords(paragraphs, { logger });

    expect(logger.debug).toHaveBeenCalledWith('Crossword clue 1', {
      orientation: 'across',
      clue: 'Frozen water (3)',
      answer: 'ICE',
    });
    expect(logger.debug).toHaveBeenCalledWith('Crossword clue 2', {
      orientation: 'across',
      clue: 'Hot drink (3)',
      answer: 'TEA',
    });
  });

  it('should ignore clues before the first orientation heading', () => {
    const paragraphs = [
      text('Activity 3, Part I - Crossword Puzzle'),
      text('1. Early clue'),
      text('EARLY'),
      text('Across'),
      text('2. Later clue'),
      text('LATER'),
    ];

    expect(extractCrosswords(paragraphs)[0].clues).toEqual([
      { orientation: 'across', clue: 'Later clue', answer: 'LATER' },
    ]);
  });

  it('should pair every inline clue with every bold answer', () => {
    const paragraphs = [
      text('Activity 3, Part I - Crossword Puzzle'),
      para(plain('Across:\n1. Frozen water\n2. Hot drink\n'), bold('ice'), plain(' '), bold('tea'), plain(' '), bold('ox')),
    ];

    expect(extractCrosswords(paragraphs)[0].clues).toEqual([
      { orientation: 'across', clue: 'Frozen water', answer: 'ICE' },
      { orientation: 'across', clue: 'Frozen water', answer: 'TEA' },
      { orientation: 'across', clue: 'Hot drink', answer: 'ICE' },
      { orientation: 'across', clue: 'Hot drink', answer: 'TEA' },
    ]);
  });

  it('should use a custom inline answer matcher', () => {
    const matcher: InlineAnswerMatcher = { matchAnswers: () => ['COMET'] };
    const paragraphs = [text('Activity 3, Part I - Crossword Puzzle'), text('Down 1. Icy visitor with a tail')];

    expect(extractCrosswords(paragraphs, { answerMatcher: matcher })[0].clues).toEqual([
      { orientation: 'down', clue: 'Icy visitor with a tail', answer: 'COMET' },
    ]);
  });

  it('should drop crosswords without clues', () => {
    const paragraphs = [
      text('Activity 3, Part I - Crossword Puzzle: Empty'),
      text('Across'),
      text('Activity 3, Part II - Crossword Puzzle: Filled'),
      text('Across'),
      text('1. Closest star'),
      text('SUN'),
    ];

    expect(extractCrosswords(paragraphs).map(crossword => crossword.title)).toEqual([
      'Activity 3, Part II - Crossword Puzzle: Filled',
    ]);
  });

  it('should start a new crossword at each header', () => {
    const paragraphs = [
      text('Activity 3, Part I - Crossword Puzzle'),
      text('Across'),
      text('1. Closest star'),
      text('SUN'),
      text('Activity 3, Part II - Crossword Puzzle'),
      text('2. Clue before any heading'),
      text('IGNORED'),
      text('Down'),
      text('1. Our planet'),
      text('EARTH'),
    ];

    expect(extractCrosswords(paragraphs)).toEqual([
      {
        title: 'Activity 3, Part I - Crossword Puzzle',
        clues: [{ orientation: 'across', clue: 'Closest star', answer: 'SUN' }],
      },
      {
        title: 'Activity 3, Part II - Crossword Puzzle',
        clues: [{ orientation: 'down', clue: 'Our planet', answer: 'EARTH' }],
      },
    ]);
  });

  it('should stop collecting at an exit header', () => {
    const paragraphs = [
      text('Activity 3, Part I - Crossword Puzzle'),
      text('Across'),
      text('1. Closest star'),
      text('SUN'),
      text('Activity 4: Reflection'),
      text('2. Outside clue'),
      text('OUTSIDE'),
    ];

    expect(extractCrosswords(paragraphs)).toEqual([
      {
        title: 'Activity 3, Part I - Crossword Puzzle',
        clues: [{ orientation: 'across', clue: 'Closest star', answer: 'SUN' }],
      },
    ]);
  });

  it('should return nothing for an empty document', () => {
    expect(extractCrosswords([])).toEqual([]);
  });
});
