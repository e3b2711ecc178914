/**
 * Normalization failure conditions
 *
 * @module normalization/errors
 */

export type NormalizationErrorCode =
  | 'UNPARSEABLE_TEMPORAL'
  | 'UNPARSEABLE_NUMERIC'
  | 'UNKNOWN_ENUM_VALUE'
  | 'MISSING_REQUIRED_VALUE';

export class NormalizationError extends Error {
  constructor(
    message: string,
    public readonly code: NormalizationErrorCode,
    public readonly rawValue: string,
    public readonly field?: string,
    public readonly family?: string
  ) {
    super(message);
    this.name = 'NormalizationError';
  }

  /**
   * Same condition attributed to a named field
   */
  forField(field: string): NormalizationError {
    if (this.field !== undefined) {
      return this;
    }
    return new NormalizationError(
      `${field}: ${this.message}`,
      this.code,
      this.rawValue,
      field,
      this.family
    );
  }
}
