/**
 * Service Container - Dependency Injection Container
 *
 * Provides the services the CLI handlers use, with every piece replaceable
 * for tests.
 */

import { ConsoleLogger } from '../logging/console-logger';
import { Logger, LogLevel } from '../logging/logger';
import { QuizDocument } from '../models/document.model';
import { ExtractorConfig } from '../models/extractor-config.model';
import { ExtractionResult } from '../models/question.model';
import { DocxParseOptions, loadDocx } from '../parsers/docx-document-parser';
import { loadExtractorConfig } from '../services/config.service';
import { ExtractableDocument, ExtractionOptions, extractQuizContent } from '../services/extraction.service';
import { WrittenRecords, writeExtractionRecords } from '../services/records-writer.service';

/**
 * Console operations interface (for testability)
 */
export interface IConsole {
  log(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

/**
 * Process operations interface (for testability)
 */
export interface IProcess {
  exit(code?: number): void;
  cwd(): string;
}

/**
 * Extraction service interface
 */
export interface IExtractionService {
  loadConfig(configPath?: string): ExtractorConfig;
  loadDocument(filePath: string, options: DocxParseOptions): Promise<QuizDocument>;
  extract(document: ExtractableDocument, options: ExtractionOptions): ExtractionResult;
  writeRecords(
    result: ExtractionResult,
    document: Pick<QuizDocument, 'sourcePath' | 'contentHash'>,
    outputDir: string
  ): WrittenRecords;
}

/**
 * Service container configuration
 */
export interface ServiceContainerConfig {
  console?: IConsole;
  process?: IProcess;
  extraction?: IExtractionService;
  loggerFactory?: (prefix: string, level: LogLevel) => Logger;
}

/**
 * Service container - manages all service dependencies
 */
export class ServiceContainer {
  public readonly console: IConsole;
  public readonly process: IProcess;
  public readonly extraction: IExtractionService;
  private readonly loggerFactory: (prefix: string, level: LogLevel) => Logger;

  constructor(config: ServiceContainerConfig = {}) {
    this.console = config.console ?? this.createRealConsole();
    this.process = config.process ?? this.createRealProcess();
    this.extraction = config.extraction ?? this.createRealExtraction();
    this.loggerFactory =
      config.loggerFactory ?? ((prefix, level) => new ConsoleLogger(prefix, level, this.console));
  }

  /**
   * Create a logger for one command run
   */
  createLogger(prefix: string, level: LogLevel): Logger {
    return this.loggerFactory(prefix, level);
  }

  // Private factory methods for real implementations

  private createRealConsole(): IConsole {
    return {
      log: console.log.bind(console),
      error: console.error.bind(console),
    };
  }

  private createRealProcess(): IProcess {
    return {
      exit: (code?: number) => process.exit(code),
      cwd: () => process.cwd(),
    };
  }

  private createRealExtraction(): IExtractionService {
    return {
      loadConfig: loadExtractorConfig,
      loadDocument: loadDocx,
      extract: extractQuizContent,
      writeRecords: writeExtractionRecords,
    };
  }
}
