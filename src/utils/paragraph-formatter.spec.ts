import { describeParagraph } from './paragraph-formatter';

describe('paragraph-formatter', () => {
  it('should wrap bold runs in double asterisks', () => {
    const paragraph = {
      runs: [
        { text: 'Water is wet. ', bold: false },
        { text: 'True', bold: true },
      ],
      imageRefIds: [],
    };

    expect(describeParagraph(paragraph, 4)).toBe('[4] Water is wet. **True**');
  });

  it('should mark line breaks and leave bold whitespace unwrapped', () => {
    const paragraph = {
      runs: [
        { text: '1. Pick one?', bold: false },
        { text: ' ', bold: true },
        { text: '\nA. Yes', bold: false },
      ],
      imageRefIds: [],
    };

    expect(describeParagraph(paragraph, 0)).toBe('[0] 1. Pick one?  ↵ A. Yes');
  });

  it('should list embedded images', () => {
    const paragraph = { runs: [{ text: 'Quiz questions', bold: false }], imageRefIds: ['rId3', 'rId5'] };

    expect(describeParagraph(paragraph, 12)).toBe('[12] Quiz questions [images: rId3, rId5]');
  });

  it('should show empty paragraphs as empty', () => {
    expect(describeParagraph({ runs: [], imageRefIds: ['rId1'] }, 2)).toBe('[2] (empty) [images: rId1]');
  });
});
