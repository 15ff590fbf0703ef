/**
 * Parser error types
 */

/**
 * Raised when a document package cannot be read at all.
 * Problems inside single paragraphs never raise; they are skipped.
 */
export class DocumentParseError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'DocumentParseError';
  }
}

/**
 * Normalize an unknown thrown value into an Error
 */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
