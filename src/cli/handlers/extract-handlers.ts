/**
 * Extract Command Handlers
 *
 * Business logic for the CLI commands.
 * Handlers accept services via dependency injection for testability.
 */

import * as path from 'path';

import { ExtractorConfig } from '../../models/extractor-config.model';
import { toError } from '../../parsers/parser-result';
import { countClues } from '../../services/extraction.service';
import { describeParagraph } from '../../utils/paragraph-formatter';
import { ServiceContainer } from '../service-container';

/**
 * Options for extract command
 */
export interface ExtractOptions {
  output: string;
  config?: string;
  verbose: boolean;
  dryRun: boolean;
}

/**
 * Options for inspect command
 */
export interface InspectOptions {
  config?: string;
}

export interface ExtractSummary {
  processed: number;
  failed: string[];
}

function loadConfigOrExit(configPath: string | undefined, container: ServiceContainer): ExtractorConfig | null {
  try {
    return container.extraction.loadConfig(configPath);
  } catch (err) {
    container.console.error(`✗ Failed to load config: ${toError(err).message}`);
    container.process.exit(1);
    return null;
  }
}

/**
 * Handle extract command
 */
export async function handleExtract(
  files: string[],
  options: ExtractOptions,
  container: ServiceContainer
): Promise<ExtractSummary> {
  const summary: ExtractSummary = { processed: 0, failed: [] };

  const config = loadConfigOrExit(options.config, container);
  if (!config) {
    return summary;
  }

  const logger = container.createLogger('extract', options.verbose ? 'debug' : config.logLevel);
  const outputRoot = path.resolve(options.output);

  container.console.log('Quiz Document Extraction');
  container.console.log('========================');
  container.console.log(`Files: ${files.length}`);
  container.console.log(`Output: ${outputRoot}`);
  if (options.dryRun) {
    container.console.log('Mode: dry run (nothing written)');
  }

  for (const file of files) {
    const sourcePath = path.resolve(file);
    container.console.log(`\nProcessing: ${file}`);

    try {
      const document = await container.extraction.loadDocument(sourcePath, {
        images: config.images,
        logger,
      });
      const result = container.extraction.extract(document, {
        imageSearch: config.imageSearch,
        logger,
      });

      container.console.log(`  Multiple choice: ${result.multipleChoice.length}`);
      container.console.log(`  True/False: ${result.trueFalse.length}`);
      container.console.log(`  Crosswords: ${result.crosswords.length}`);
      for (const crossword of result.crosswords) {
        const counts = countClues(crossword);
        container.console.log(`    ${crossword.title} (${counts.across} across, ${counts.down} down)`);
      }
      container.console.log(`  Images: ${result.images.size}`);

      if (!options.dryRun) {
        const outputDir = path.join(outputRoot, path.parse(sourcePath).name);
        const written = container.extraction.writeRecords(result, document, outputDir);
        container.console.log(`  ✓ Wrote ${written.recordsPath}`);
      }
      summary.processed++;
    } catch (err) {
      summary.failed.push(file);
      container.console.error(`  ✗ ${file}: ${toError(err).message}`);
    }
  }

  container.console.log('');
  if (summary.failed.length === 0) {
    container.console.log(`✓ Extracted ${summary.processed} document(s)`);
  } else {
    container.console.error(
      `✗ ${summary.failed.length} of ${files.length} document(s) failed: ${summary.failed.join(', ')}`
    );
    container.process.exit(1);
  }

  return summary;
}

/**
 * Handle inspect command: dump paragraphs with their formatting cues
 */
export async function handleInspect(
  file: string,
  options: InspectOptions,
  container: ServiceContainer
): Promise<void> {
  const config = loadConfigOrExit(options.config, container);
  if (!config) {
    return;
  }

  const logger = container.createLogger('inspect', config.logLevel);

  try {
    const document = await container.extraction.loadDocument(path.resolve(file), {
      images: config.images,
      logger,
    });

    document.paragraphs.forEach((paragraph, index) => {
      container.console.log(describeParagraph(paragraph, index));
    });

    container.console.log('');
    container.console.log(`Paragraphs: ${document.paragraphs.length}`);
    container.console.log(`Images: ${document.images.size}`);
    for (const image of document.images.values()) {
      container.console.log(`  ${image.id}: ${image.name} (${image.mimeType}, ${image.size} bytes)`);
    }
  } catch (err) {
    container.console.error(`✗ Failed to inspect ${file}: ${toError(err).message}`);
    container.process.exit(1);
  }
}
