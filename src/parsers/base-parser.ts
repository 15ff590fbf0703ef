/**
 * Base Parser Utilities
 *
 * Paragraph and text helpers shared by the document parser and the extractors.
 */

import * as crypto from 'crypto';

import { DocumentParagraph } from '../models/document.model';

/**
 * Calculate SHA-256 hash of content for change detection
 */
export function calculateContentHash(content: Uint8Array | string): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}

/**
 * Full paragraph text: the run texts joined in order
 */
export function paragraphText(paragraph: DocumentParagraph): string {
  return paragraph.runs.map(run => run.text).join('');
}

/**
 * Split paragraph text on its internal line breaks.
 * Line lengths stay aligned with run offsets, so no trimming here.
 */
export function splitLines(text: string): string[] {
  return text.split('\n');
}

/**
 * Check if line matches a pattern
 */
export function matchLine(line: string, pattern: RegExp): RegExpExecArray | null {
  return pattern.exec(line.trim());
}

/**
 * Collapse every whitespace sequence to one space and trim
 */
export function collapseWhitespace(text: string): string {
  return text.split(/\s+/).filter(part => part.length > 0).join(' ');
}

export function isBlank(text: string): boolean {
  return text.trim().length === 0;
}

/**
 * True when the paragraph reads as a bold header: markdown-style `**` prefix,
 * or every non-blank run bold.
 */
export function isBoldHeading(paragraph: DocumentParagraph): boolean {
  if (paragraphText(paragraph).trim().startsWith('**')) {
    return true;
  }
  const visibleRuns = paragraph.runs.filter(run => !isBlank(run.text));
  return visibleRuns.length > 0 && visibleRuns.every(run => run.bold);
}
