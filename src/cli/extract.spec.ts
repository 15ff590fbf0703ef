/**
 * CLI Command Tests
 *
 * Tests for command parsing and option handling.
 */

import * as path from 'path';

import { buildProgram } from './extract';
import { ServiceContainer } from './service-container';
import { ConsoleLogger } from '../logging/console-logger';
import { silentLogger } from '../logging/logger';
import { DEFAULT_EXTRACTOR_CONFIG } from '../models/extractor-config.model';
import { QuizDocument } from '../models/document.model';
import { ExtractionResult } from '../models/question.model';

const document: QuizDocument = {
  sourcePath: 'unused',
  contentHash: 'hash',
  paragraphs: [],
  images: new Map(),
};

const emptyResult: ExtractionResult = { multipleChoice: [], trueFalse: [], crosswords: [], images: new Map() };

describe('quiz-extract CLI', () => {
  let log: jest.Mock;
  let loadConfig: jest.Mock;
  let loadDocument: jest.Mock;
  let writeRecords: jest.Mock;
  let container: ServiceContainer;

  beforeEach(() => {
    log = jest.fn();
    loadConfig = jest.fn(() => DEFAULT_EXTRACTOR_CONFIG);
    loadDocument = jest.fn(async () => document);
    writeRecords = jest.fn(() => ({ recordsPath: 'out/quiz-records.json', imagePaths: [] }));
    container = new ServiceContainer({
      console: { log, error: jest.fn() },
      process: { exit: jest.fn(), cwd: () => '/work' },
      extraction: { loadConfig, loadDocument, extract: () => emptyResult, writeRecords },
      loggerFactory: () => silentLogger,
    });
  });

  it('should run extract with default options', async () => {
    await buildProgram(container).parseAsync(['node', 'quiz-extract', 'extract', 'a.docx']);

    expect(loadConfig).toHaveBeenCalledWith(undefined);
    expect(loadDocument).toHaveBeenCalledWith(path.resolve('a.docx'), expect.any(Object));
    expect(writeRecords).toHaveBeenCalledWith(emptyResult, document, path.join(path.resolve('./output'), 'a'));
  });

  it('should parse extract options', async () => {
    await buildProgram(container).parseAsync([
      'node',
      'quiz-extract',
      'extract',
      'a.docx',
      'b.docx',
      '--output',
      'records',
      '-c',
      'extractor.yaml',
      '--dry-run',
    ]);

    expect(loadConfig).toHaveBeenCalledWith('extractor.yaml');
    expect(loadDocument).toHaveBeenCalledTimes(2);
    expect(writeRecords).not.toHaveBeenCalled();
    expect(log).toHaveBeenCalledWith(`Output: ${path.resolve('records')}`);
  });

  it('should run inspect', async () => {
    await buildProgram(container).parseAsync(['node', 'quiz-extract', 'inspect', 'a.docx']);

    expect(loadDocument).toHaveBeenCalledWith(path.resolve('a.docx'), expect.any(Object));
    expect(log).toHaveBeenCalledWith('Paragraphs: 0');
  });

  it('should create console loggers by default', () => {
    expect(new ServiceContainer().createLogger('extract', 'info')).toBeInstanceOf(ConsoleLogger);
  });

  it('should route default loggers through the container console', () => {
    const consoleMock = { log: jest.fn(), error: jest.fn() };
    const logger = new ServiceContainer({ console: consoleMock }).createLogger('extract', 'info');

    logger.debug('hidden');
    logger.info('Processing a.docx');
    logger.warn('Could not extract images', { file: 'a.docx' });

    expect(consoleMock.log.mock.calls).toEqual([['[extract] Processing a.docx']]);
    expect(consoleMock.error.mock.calls).toEqual([['[extract] Could not extract images', { file: 'a.docx' }]]);
  });
});
