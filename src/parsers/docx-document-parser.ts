/**
 * DOCX Document Parser
 *
 * Reads a .docx package into the paragraph/run model the extractors scan.
 * Structure only: which text is bold, where lines break, which paragraphs
 * carry images. Nothing here knows about quizzes.
 *
 * The package is opened with JSZip and the WordprocessingML is scanned with
 * regular expressions; only direct run formatting is considered.
 */

import * as fs from 'fs';
import * as path from 'path';

import JSZip from 'jszip';

import { Logger, silentLogger } from '../logging/logger';
import { DocumentParagraph, ImageRef, QuizDocument, TextRun } from '../models/document.model';
import { DEFAULT_EXTRACTOR_CONFIG, ImageDefaults } from '../models/extractor-config.model';

import { calculateContentHash } from './base-parser';
import { DocumentParseError, toError } from './parser-result';

const DOCUMENT_PART = 'word/document.xml';
const DOCUMENT_RELS_PART = 'word/_rels/document.xml.rels';
const CONTENT_TYPES_PART = '[Content_Types].xml';

const MIME_TYPES: Record<string, string> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  gif: 'image/gif',
  bmp: 'image/bmp',
  tif: 'image/tiff',
  tiff: 'image/tiff',
  webp: 'image/webp',
  svg: 'image/svg+xml',
  emf: 'image/x-emf',
  wmf: 'image/x-wmf',
};

const XML_ENTITY_MAP: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
};

/** Parts whose content duplicates or hides from the paragraph's own runs */
const HIDDEN_CONTENT_PATTERNS = [
  /<w:txbxContent\b[\s\S]*?<\/w:txbxContent>/g,
  /<mc:Fallback\b[\s\S]*?<\/mc:Fallback>/g,
];

/** Innermost table first, so nested tables are removed from the inside out */
const INNERMOST_TABLE_PATTERN = /<w:tbl\b(?:(?!<w:tbl\b)[\s\S])*?<\/w:tbl>/g;

const PARAGRAPH_PATTERN = /<w:p\b[^>]*\/>|<w:p\b[^>]*>([\s\S]*?)<\/w:p>/g;
const RUN_PATTERN = /<w:r\b[^>]*>([\s\S]*?)<\/w:r>/g;
const RUN_PROPERTIES_PATTERN = /<w:rPr\b[^>]*>([\s\S]*?)<\/w:rPr>/;
const PROPERTY_CHANGE_PATTERN = /<w:rPrChange\b[\s\S]*?<\/w:rPrChange>/g;
const BOLD_PATTERN = /<w:b(?:\s+w:val="([^"]*)")?\s*\/>/;
const RUN_CONTENT_PATTERN =
  /<w:t(?:\s[^>]*)?>([\s\S]*?)<\/w:t>|<w:t(?:\s[^>]*)?\/>|<w:tab\b[^>]*\/>|<w:(?:br|cr)\b[^>]*\/>|<w:noBreakHyphen\s*\/>/g;
const IMAGE_REF_PATTERN = /<a:blip\b[^>]*\br:embed="([^"]+)"|<v:imagedata\b[^>]*\br:id="([^"]+)"/g;
const RELATIONSHIP_PATTERN = /<Relationship\b([^>]*?)\/?>/g;
const DEFAULT_CONTENT_TYPE_PATTERN = /<Default\b([^>]*?)\/?>/g;
const OVERRIDE_CONTENT_TYPE_PATTERN = /<Override\b([^>]*?)\/?>/g;

export interface DocxParseOptions {
  /** Placeholder dimensions reported for every image */
  images?: ImageDefaults;

  /** Read paragraphs inside tables too; body paragraphs only by default */
  includeTables?: boolean;

  logger?: Logger;
}

export interface ParagraphParseOptions {
  includeTables?: boolean;
}

/**
 * Read and parse a .docx file from disk
 */
export async function loadDocx(filePath: string, options: DocxParseOptions = {}): Promise<QuizDocument> {
  let data: Buffer;
  try {
    data = fs.readFileSync(filePath);
  } catch (error) {
    throw new DocumentParseError(
      `Failed to read document: ${toError(error).message}`,
      filePath,
      toError(error)
    );
  }
  return parseDocx(data, filePath, options);
}

/**
 * Parse .docx package bytes
 */
export async function parseDocx(
  data: Uint8Array,
  sourcePath: string,
  options: DocxParseOptions = {}
): Promise<QuizDocument> {
  const logger = options.logger ?? silentLogger;
  const imageDefaults = options.images ?? DEFAULT_EXTRACTOR_CONFIG.images;

  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(data);
  } catch (error) {
    throw new DocumentParseError(
      `Not a readable .docx package: ${toError(error).message}`,
      sourcePath,
      toError(error)
    );
  }

  const documentFile = zip.file(DOCUMENT_PART);
  if (!documentFile) {
    throw new DocumentParseError(`Missing ${DOCUMENT_PART}`, sourcePath);
  }

  const documentXml = await documentFile.async('string');
  const paragraphs = parseParagraphs(documentXml, { includeTables: options.includeTables });
  const images = await extractImages(zip, imageDefaults, logger, sourcePath);

  logger.debug('Parsed document', {
    file: sourcePath,
    paragraphs: paragraphs.length,
    images: images.size,
  });

  return {
    sourcePath,
    contentHash: calculateContentHash(data),
    paragraphs,
    images,
  };
}

/**
 * Parse every paragraph of a WordprocessingML document part
 */
export function parseParagraphs(documentXml: string, options: ParagraphParseOptions = {}): DocumentParagraph[] {
  const bodyMatch = /<w:body\b[^>]*>([\s\S]*)<\/w:body>/.exec(documentXml);
  let body = bodyMatch ? bodyMatch[1] : documentXml;
  for (const pattern of HIDDEN_CONTENT_PATTERNS) {
    body = body.replace(pattern, '');
  }
  if (!options.includeTables) {
    body = removeTables(body);
  }

  const paragraphs: DocumentParagraph[] = [];
  for (const match of body.matchAll(PARAGRAPH_PATTERN)) {
    paragraphs.push(parseParagraph(match[1] ?? ''));
  }
  return paragraphs;
}

function removeTables(xml: string): string {
  let previous: string;
  let current = xml;
  do {
    previous = current;
    current = previous.replace(INNERMOST_TABLE_PATTERN, '');
  } while (current !== previous);
  return current;
}

function parseParagraph(paragraphXml: string): DocumentParagraph {
  const runs: TextRun[] = [];
  for (const match of paragraphXml.matchAll(RUN_PATTERN)) {
    runs.push(parseRun(match[1]));
  }

  const imageRefIds: string[] = [];
  for (const match of paragraphXml.matchAll(IMAGE_REF_PATTERN)) {
    const id = match[1] ?? match[2];
    if (id && !imageRefIds.includes(id)) {
      imageRefIds.push(id);
    }
  }

  return { runs, imageRefIds };
}

function parseRun(runXml: string): TextRun {
  // Tracked changes keep the previous formatting in a nested rPr
  const currentRun = runXml.replace(PROPERTY_CHANGE_PATTERN, '');
  const propertiesMatch = RUN_PROPERTIES_PATTERN.exec(currentRun);
  const bold = propertiesMatch ? isBoldEnabled(propertiesMatch[1]) : false;
  const content = propertiesMatch ? currentRun.replace(propertiesMatch[0], '') : currentRun;

  let text = '';
  for (const match of content.matchAll(RUN_CONTENT_PATTERN)) {
    const token = match[0];
    if (match[1] !== undefined) {
      text += decodeXml(match[1]);
    } else if (token.startsWith('<w:tab')) {
      text += '\t';
    } else if (token.startsWith('<w:br') || token.startsWith('<w:cr')) {
      text += '\n';
    } else if (token.startsWith('<w:noBreakHyphen')) {
      text += '-';
    }
  }

  return { text, bold };
}

function isBoldEnabled(propertiesXml: string): boolean {
  const match = BOLD_PATTERN.exec(propertiesXml);
  if (!match) {
    return false;
  }
  const value = match[1]?.toLowerCase();
  return value === undefined || !['0', 'false', 'off', 'none'].includes(value);
}

function decodeXml(value: string): string {
  return value.replace(/&(amp|lt|gt|quot|apos|#\d+|#x[0-9a-fA-F]+);/g, (entity, key: string) => {
    if (key.startsWith('#x')) {
      return String.fromCodePoint(parseInt(key.slice(2), 16));
    }
    if (key.startsWith('#')) {
      return String.fromCodePoint(parseInt(key.slice(1), 10));
    }
    return XML_ENTITY_MAP[key] ?? entity;
  });
}

interface PackageRelationship {
  id: string;
  target: string;
  type: string;
  external: boolean;
}

function parseRelationships(relsXml: string): PackageRelationship[] {
  const relationships: PackageRelationship[] = [];
  for (const match of relsXml.matchAll(RELATIONSHIP_PATTERN)) {
    const attributes = match[1];
    const id = /\bId="([^"]*)"/.exec(attributes)?.[1];
    const target = /\bTarget="([^"]*)"/.exec(attributes)?.[1];
    if (!id || !target) {
      continue;
    }
    relationships.push({
      id,
      target: decodeXml(target),
      type: /\bType="([^"]*)"/.exec(attributes)?.[1] ?? '',
      external: /\bTargetMode="External"/.test(attributes),
    });
  }
  return relationships;
}

function isImageRelationship(relationship: PackageRelationship): boolean {
  return (
    !relationship.external &&
    (relationship.type.endsWith('/image') || relationship.target.includes('image'))
  );
}

/**
 * Resolve a relationship target (relative to word/) to a package path
 */
function resolvePartPath(target: string): string {
  if (target.startsWith('/')) {
    return target.slice(1);
  }
  return path.posix.normalize(path.posix.join('word', target));
}

interface ContentTypes {
  defaults: Map<string, string>;
  overrides: Map<string, string>;
}

function readAttribute(attributes: string, name: string): string | undefined {
  const value = new RegExp(`\\b${name}="([^"]*)"`).exec(attributes)?.[1];
  return value === undefined ? undefined : decodeXml(value);
}

function parseContentTypes(contentTypesXml: string): ContentTypes {
  const defaults = new Map<string, string>();
  for (const match of contentTypesXml.matchAll(DEFAULT_CONTENT_TYPE_PATTERN)) {
    const extension = readAttribute(match[1], 'Extension');
    const contentType = readAttribute(match[1], 'ContentType');
    if (extension && contentType) {
      defaults.set(extension.toLowerCase(), contentType);
    }
  }

  const overrides = new Map<string, string>();
  for (const match of contentTypesXml.matchAll(OVERRIDE_CONTENT_TYPE_PATTERN)) {
    const partName = readAttribute(match[1], 'PartName');
    const contentType = readAttribute(match[1], 'ContentType');
    if (partName && contentType) {
      overrides.set(partName.replace(/^\//, '').toLowerCase(), contentType);
    }
  }

  return { defaults, overrides };
}

/**
 * Content type of a part: its override, then the default for its extension,
 * then a guess from the extension.
 */
function resolveMimeType(partPath: string, contentTypes: ContentTypes): string {
  const declared =
    contentTypes.overrides.get(partPath.toLowerCase()) ??
    contentTypes.defaults.get(path.posix.extname(partPath).slice(1).toLowerCase());
  return declared ?? MIME_TYPES[imageExtension(partPath)] ?? 'application/octet-stream';
}

function imageExtension(partPath: string): string {
  const ext = path.posix.extname(partPath).slice(1).toLowerCase();
  return ext === 'jpeg' ? 'jpg' : ext;
}

/**
 * Collect embedded images keyed by relationship id.
 * A damaged relationship part is reported and yields an empty map.
 */
async function extractImages(
  zip: JSZip,
  defaults: ImageDefaults,
  logger: Logger,
  sourcePath: string
): Promise<Map<string, ImageRef>> {
  const images = new Map<string, ImageRef>();

  try {
    const relsFile = zip.file(DOCUMENT_RELS_PART);
    if (!relsFile) {
      return images;
    }

    const contentTypesFile = zip.file(CONTENT_TYPES_PART);
    const contentTypes = contentTypesFile
      ? parseContentTypes(await contentTypesFile.async('string'))
      : { defaults: new Map<string, string>(), overrides: new Map<string, string>() };

    const relationships = parseRelationships(await relsFile.async('string'));
    for (const relationship of relationships.filter(isImageRelationship)) {
      const partPath = resolvePartPath(relationship.target);
      const imageFile = zip.file(partPath);
      if (!imageFile) {
        logger.warn('Image relationship points to a missing part', {
          file: sourcePath,
          id: relationship.id,
          target: relationship.target,
        });
        continue;
      }

      const bytes = await imageFile.async('uint8array');
      const ext = imageExtension(partPath);
      images.set(relationship.id, {
        id: relationship.id,
        name: `image_${relationship.id}.${ext}`,
        bytes,
        mimeType: resolveMimeType(partPath, contentTypes),
        size: bytes.length,
        width: defaults.defaultWidth,
        height: defaults.defaultHeight,
      });
    }
  } catch (error) {
    logger.warn('Could not extract images', {
      file: sourcePath,
      error: toError(error).message,
    });
    return new Map<string, ImageRef>();
  }

  return images;
}
