/**
 * Tests for record-serializer
 */

import { toPlainRecords } from './record-serializer';
import { ExtractionResult } from '../models/question.model';

describe('record-serializer', () => {
  it('should use the snake_case field names of the records contract', () => {
    const result: ExtractionResult = {
      multipleChoice: [
        {
          questionText: 'Which planet is red?',
          options: [
            { text: 'Mars', correct: true },
            { text: 'Venus', correct: false },
          ],
          imageId: 'rId2',
        },
        { questionText: 'Which planet has rings?', options: [{ text: 'Saturn', correct: true }] },
      ],
      trueFalse: [{ questionText: 'The Moon is a planet.', correctAnswer: 'false' }],
      crosswords: [
        {
          title: 'Activity 3, Part I - Crossword Puzzle',
          clues: [{ orientation: 'across', clue: 'Closest star', answer: 'SUN' }],
        },
      ],
      images: new Map([
        [
          'rId2',
          {
            id: 'rId2',
            name: 'image_rId2.png',
            bytes: new Uint8Array([1, 2]),
            mimeType: 'image/png',
            size: 2,
            width: 600,
            height: 400,
          },
        ],
      ]),
      sharedImageId: 'rId2',
    };

    expect(toPlainRecords(result)).toEqual({
      multiple_choice: [
        {
          question: 'Which planet is red?',
          options: [
            { text: 'Mars', correct: true },
            { text: 'Venus', correct: false },
          ],
          image_id: 'rId2',
        },
        { question: 'Which planet has rings?', options: [{ text: 'Saturn', correct: true }], image_id: null },
      ],
      true_false: [{ question: 'The Moon is a planet.', correct_answer: 'false' }],
      crosswords: [
        {
          title: 'Activity 3, Part I - Crossword Puzzle',
          clues: [{ orientation: 'across', clue: 'Closest star', answer: 'SUN' }],
        },
      ],
      images: [{ id: 'rId2', name: 'image_rId2.png', mime: 'image/png', size: 2, width: 600, height: 400 }],
      shared_image_id: 'rId2',
    });
  });

  it('should write null for a missing shared image', () => {
    const records = toPlainRecords({ multipleChoice: [], trueFalse: [], crosswords: [], images: new Map() });

    expect(records).toEqual({
      multiple_choice: [],
      true_false: [],
      crosswords: [],
      images: [],
      shared_image_id: null,
    });
  });

  it('should leave image bytes out of the records', () => {
    const records = toPlainRecords({
      multipleChoice: [],
      trueFalse: [],
      crosswords: [],
      images: new Map([
        [
          'rId9',
          {
            id: 'rId9',
            name: 'image_rId9.gif',
            bytes: new Uint8Array([71]),
            mimeType: 'image/gif',
            size: 1,
            width: 10,
            height: 20,
          },
        ],
      ]),
    });

    expect(Object.keys(records.images[0])).toEqual(['id', 'name', 'mime', 'size', 'width', 'height']);
  });
});
