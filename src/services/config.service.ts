/**
 * Config Service
 *
 * Loads extractor settings from a YAML file and merges them over the defaults:
 *
 *   images:
 *     defaultWidth: 600
 *     defaultHeight: 400
 *   imageSearch:
 *     before: 5
 *     after: 3
 *   logLevel: info
 */

import * as fs from 'fs';

import * as yaml from 'js-yaml';

import { isLogLevel, LOG_LEVELS } from '../logging/logger';
import { DEFAULT_EXTRACTOR_CONFIG, ExtractorConfig } from '../models/extractor-config.model';
import { toError } from '../parsers/parser-result';

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly configPath: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Load configuration; no path means defaults
 */
export function loadExtractorConfig(configPath?: string): ExtractorConfig {
  if (!configPath) {
    return cloneDefaults();
  }

  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file: ${toError(error).message}`, configPath);
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Invalid YAML: ${toError(error).message}`, configPath);
  }

  return parseExtractorConfig(parsed, configPath);
}

/**
 * Validate a parsed YAML document and merge it over the defaults.
 * Unknown keys are ignored.
 */
export function parseExtractorConfig(raw: unknown, configPath = '<inline>'): ExtractorConfig {
  const config = cloneDefaults();
  if (raw === undefined || raw === null) {
    return config;
  }
  if (!isRecord(raw)) {
    throw new ConfigError('Config root must be a mapping', configPath);
  }

  const images = readSection(raw, 'images', configPath);
  config.images.defaultWidth = readPositiveInteger(images, 'defaultWidth', config.images.defaultWidth, configPath);
  config.images.defaultHeight = readPositiveInteger(images, 'defaultHeight', config.images.defaultHeight, configPath);

  const imageSearch = readSection(raw, 'imageSearch', configPath);
  config.imageSearch.before = readNonNegativeInteger(imageSearch, 'before', config.imageSearch.before, configPath);
  config.imageSearch.after = readNonNegativeInteger(imageSearch, 'after', config.imageSearch.after, configPath);

  if (raw.logLevel !== undefined) {
    if (!isLogLevel(raw.logLevel)) {
      throw new ConfigError(`logLevel must be one of: ${LOG_LEVELS.join(', ')}`, configPath);
    }
    config.logLevel = raw.logLevel;
  }

  return config;
}

function cloneDefaults(): ExtractorConfig {
  return {
    images: { ...DEFAULT_EXTRACTOR_CONFIG.images },
    imageSearch: { ...DEFAULT_EXTRACTOR_CONFIG.imageSearch },
    logLevel: DEFAULT_EXTRACTOR_CONFIG.logLevel,
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readSection(raw: Record<string, unknown>, key: string, configPath: string): Record<string, unknown> {
  const section = raw[key];
  if (section === undefined || section === null) {
    return {};
  }
  if (!isRecord(section)) {
    throw new ConfigError(`${key} must be a mapping`, configPath);
  }
  return section;
}

function readPositiveInteger(
  section: Record<string, unknown>,
  key: string,
  fallback: number,
  configPath: string
): number {
  const value = readNonNegativeInteger(section, key, fallback, configPath);
  if (value === 0) {
    throw new ConfigError(`${key} must be greater than 0`, configPath);
  }
  return value;
}

function readNonNegativeInteger(
  section: Record<string, unknown>,
  key: string,
  fallback: number,
  configPath: string
): number {
  const value = section[key];
  if (value === undefined) {
    return fallback;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ConfigError(`${key} must be a non-negative integer`, configPath);
  }
  return value;
}
