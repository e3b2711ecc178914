/**
 * Whole-document extraction failures
 *
 * @module extraction/errors
 */

export type ExtractionErrorCode =
  | 'UNREADABLE_DOCUMENT'
  | 'UNCLASSIFIABLE_DOCUMENT'
  | 'LOW_CONFIDENCE_EXTRACTION'
  | 'EMPTY_DOCUMENT';

export class ExtractionError extends Error {
  constructor(
    message: string,
    public readonly code: ExtractionErrorCode,
    public readonly fileName?: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'ExtractionError';
  }
}
