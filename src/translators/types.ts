/**
 * Translator Types
 *
 * Translators hand compiled expressions to a SQL builder in the form that
 * builder understands.
 */

import { CompiledExpression } from '../expressions';

/**
 * Interface for an expression translator
 */
export interface ITranslator<T = unknown> {
  /**
   * Translate a compiled expression into the target format
   *
   * @param expression The expression to translate
   * @returns The translated fragment in the target format
   */
  translate(expression: CompiledExpression): T;

  /**
   * Check if an expression can be translated
   *
   * @param expression The expression to check
   * @returns true if the expression can be translated, false otherwise
   */
  canTranslate(expression: CompiledExpression): boolean;
}
