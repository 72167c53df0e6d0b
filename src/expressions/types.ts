/**
 * Compiled Expression Types
 *
 * The outcome of compiling or qualifying something. Failures are returned
 * as values, never thrown.
 */

/**
 * Behaviour shared by both variants
 */
export interface IExtractableExpression<T> {
  /**
   * Discriminant; `'valid'` exactly when isValid() is true
   */
  readonly kind: 'valid' | 'invalid';

  /**
   * Whether the expression can be used. Check this before extract().
   */
  isValid(): boolean;

  /**
   * The compiled fragment, or undefined for an invalid expression
   */
  extract(): T | undefined;

  /**
   * Why the expression is invalid, or undefined for a valid one
   */
  getValidationError(): string | undefined;
}
