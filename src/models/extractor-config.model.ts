/**
 * Extractor Configuration Model
 *
 * Defaults can be overridden from a YAML file (see config.service).
 */

import { LogLevel } from '../logging/logger';

export interface ImageDefaults {
  /** Width reported for every embedded image */
  defaultWidth: number;

  /** Height reported for every embedded image */
  defaultHeight: number;
}

/**
 * Paragraph window searched for a question's image: [index - before, index + after)
 */
export interface ImageSearchWindow {
  before: number;
  after: number;
}

export interface ExtractorConfig {
  images: ImageDefaults;
  imageSearch: ImageSearchWindow;
  logLevel: LogLevel;
}

export const DEFAULT_EXTRACTOR_CONFIG: ExtractorConfig = {
  images: {
    defaultWidth: 600,
    defaultHeight: 400,
  },
  imageSearch: {
    before: 5,
    after: 3,
  },
  logLevel: 'info',
};
