/**
 * Quiz Docx Extractor
 *
 * Turns authored quiz documents into question records.
 *
 * Main entry points:
 * - loadDocx / parseDocx: read a .docx package into paragraphs and images
 * - extractQuizContent: run the multiple-choice, True/False and crossword passes
 * - toPlainRecords / writeExtractionRecords: hand the records to the packaging step
 *
 * @example
 * const document = await loadDocx('Activities-Module-1.docx');
 * const result = extractQuizContent(document, { logger: new ConsoleLogger('quiz') });
 * writeExtractionRecords(result, document, './output/Activities-Module-1');
 */

// Models
export * from './models';

// Logging
export * from './logging';

// Parsers
export { loadDocx, parseDocx, parseParagraphs, DocxParseOptions } from './parsers/docx-document-parser';
export { DocumentParseError } from './parsers/parser-result';
export { paragraphText, isBoldHeading } from './parsers/base-parser';

// Extractors
export * from './extractors';

// Services
export { extractQuizContent, countClues, ExtractionOptions, ExtractableDocument } from './services/extraction.service';
export { loadExtractorConfig, parseExtractorConfig, ConfigError } from './services/config.service';
export {
  writeExtractionRecords,
  buildRecordsFile,
  QuizRecordsFile,
  WrittenRecords,
  RECORDS_FILENAME,
  IMAGES_DIRNAME,
} from './services/records-writer.service';

// Utils
export * from './utils/record-serializer';
export { describeParagraph } from './utils/paragraph-formatter';
