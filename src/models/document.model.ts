/**
 * Document model
 *
 * Read-only view of an authored quiz document: paragraphs of formatted runs
 * plus the embedded images they reference. Produced by the docx parser,
 * consumed by the extractors.
 */

/**
 * Contiguous span of text sharing one formatting
 */
export interface TextRun {
  readonly text: string;
  readonly bold: boolean;
}

/**
 * Paragraph as authored. Line breaks inside the paragraph appear as `\n`
 * and tabs as `\t` in the run texts.
 */
export interface DocumentParagraph {
  readonly runs: readonly TextRun[];

  /** Relationship ids of images drawn inside this paragraph */
  readonly imageRefIds: readonly string[];
}

/**
 * Embedded image resolved from the package relationships
 */
export interface ImageRef {
  /** Relationship id (e.g. rId7) */
  readonly id: string;

  /** Output file name: image_<id>.<ext> */
  readonly name: string;

  readonly bytes: Uint8Array;
  readonly mimeType: string;

  /** Byte length */
  readonly size: number;

  /** Placeholder dimensions, the package does not carry usable sizes */
  readonly width: number;
  readonly height: number;
}

/**
 * A loaded quiz document
 */
export interface QuizDocument {
  /** Path the document was read from */
  readonly sourcePath: string;

  /** SHA-256 of the file bytes */
  readonly contentHash: string;

  /** Every body paragraph in document order, empty ones included */
  readonly paragraphs: readonly DocumentParagraph[];

  /** Images keyed by relationship id */
  readonly images: ReadonlyMap<string, ImageRef>;
}
