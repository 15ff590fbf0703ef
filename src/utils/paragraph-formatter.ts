/**
 * Human-readable paragraph dump for checking authoring cues
 */

import { DocumentParagraph } from '../models/document.model';
import { isBlank } from '../parsers/base-parser';

const LINE_BREAK_MARK = ' ↵ ';

/**
 * Render a paragraph as `[index] text`, bold runs wrapped in `**`,
 * line breaks shown as ↵ and embedded images listed at the end.
 * @example
 * describeParagraph({ runs: [{ text: 'Water is wet. ', bold: false }, { text: 'True', bold: true }], imageRefIds: [] }, 4)
 * // returns '[4] Water is wet. **True**'
 */
export function describeParagraph(paragraph: DocumentParagraph, index: number): string {
  const body = paragraph.runs
    .map(run => (run.bold && !isBlank(run.text) ? `**${run.text}**` : run.text))
    .join('')
    .replace(/\n/g, LINE_BREAK_MARK);

  const images = paragraph.imageRefIds.length > 0 ? ` [images: ${paragraph.imageRefIds.join(', ')}]` : '';
  const text = isBlank(body) ? '(empty)' : body;

  return `[${index}] ${text}${images}`;
}
