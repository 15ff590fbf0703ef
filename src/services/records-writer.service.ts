/**
 * Records Writer Service
 *
 * Writes one document's extraction to disk:
 *   <outputDir>/quiz-records.json
 *   <outputDir>/images/<image name>
 */

import * as fs from 'fs';
import * as path from 'path';

import { QuizDocument } from '../models/document.model';
import { ExtractionResult } from '../models/question.model';
import { PlainQuizRecords, toPlainRecords } from '../utils/record-serializer';

export const RECORDS_FILENAME = 'quiz-records.json';
export const IMAGES_DIRNAME = 'images';

export interface QuizRecordsFile extends PlainQuizRecords {
  source: string;
  content_hash: string;
}

export interface WrittenRecords {
  recordsPath: string;
  imagePaths: string[];
}

/**
 * Build the records file content without touching the disk
 */
export function buildRecordsFile(
  result: ExtractionResult,
  document: Pick<QuizDocument, 'sourcePath' | 'contentHash'>
): QuizRecordsFile {
  return {
    source: path.basename(document.sourcePath),
    content_hash: document.contentHash,
    ...toPlainRecords(result),
  };
}

/**
 * Write records and images into outputDir (created if missing)
 */
export function writeExtractionRecords(
  result: ExtractionResult,
  document: Pick<QuizDocument, 'sourcePath' | 'contentHash'>,
  outputDir: string
): WrittenRecords {
  if (!fs.existsSync(outputDir)) {
    fs.mkdirSync(outputDir, { recursive: true });
  }

  const recordsPath = path.join(outputDir, RECORDS_FILENAME);
  const content = JSON.stringify(buildRecordsFile(result, document), null, 2);
  fs.writeFileSync(recordsPath, content, 'utf-8');

  const imagePaths: string[] = [];
  if (result.images.size > 0) {
    const imagesDir = path.join(outputDir, IMAGES_DIRNAME);
    fs.mkdirSync(imagesDir, { recursive: true });
    for (const image of result.images.values()) {
      const imagePath = path.join(imagesDir, image.name);
      fs.writeFileSync(imagePath, image.bytes);
      imagePaths.push(imagePath);
    }
  }

  return { recordsPath, imagePaths };
}
