#!/usr/bin/env node
/**
 * Quiz Extraction CLI
 *
 * Usage:
 *   quiz-extract extract Activities-Module-1.docx --output ./output
 *   quiz-extract extract a.docx b.docx --config extractor.yaml --verbose
 *   quiz-extract inspect Activities-Module-1.docx
 */

import { Command } from 'commander';

import { ExtractOptions, InspectOptions, handleExtract, handleInspect } from './handlers/extract-handlers';
import { ServiceContainer } from './service-container';

/**
 * Build the command tree around a service container
 */
export function buildProgram(container: ServiceContainer = new ServiceContainer()): Command {
  const program = new Command();

  program
    .name('quiz-extract')
    .description('Extract quiz records from authored .docx activity documents')
    .version('1.0.0');

  program
    .command('extract')
    .description('Extract multiple choice, True/False and crossword records')
    .argument('<files...>', '.docx files to process')
    .option('-o, --output <dir>', 'Output directory (one folder per document)', './output')
    .option('-c, --config <file>', 'YAML configuration file')
    .option('-v, --verbose', 'Verbose output', false)
    .option('--dry-run', 'Extract and report without writing files', false)
    .action(async (files: string[], options: ExtractOptions) => {
      await handleExtract(files, options, container);
    });

  program
    .command('inspect')
    .description('Print paragraphs with bold runs and images marked')
    .argument('<file>', '.docx file to inspect')
    .option('-c, --config <file>', 'YAML configuration file')
    .action(async (file: string, options: InspectOptions) => {
      await handleInspect(file, options, container);
    });

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error(`✗ ${err instanceof Error ? err.message : String(err)}`);
      process.exit(1);
    });
}
