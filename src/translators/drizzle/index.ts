/**
 * Drizzle ORM Translator
 *
 * Converts valid compiled expressions into raw Drizzle ORM SQL chunks so
 * they can be embedded in Drizzle's `sql` template.
 */

import { SQL, sql } from 'drizzle-orm';
import { CompiledExpression } from '../../expressions';
import { ITranslator } from '../types';

/**
 * Error thrown when translation fails
 */
export class DrizzleTranslationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DrizzleTranslationError';
  }
}

/**
 * Translates compiled expressions to Drizzle ORM SQL
 *
 * @example
 * ```typescript
 * const translator = new DrizzleExpressionTranslator();
 * const query = sql`SELECT ${translator.translate(amount)} FROM ${translator.translate(sales)}`;
 * ```
 */
export class DrizzleExpressionTranslator implements ITranslator<SQL> {
  /**
   * @throws {DrizzleTranslationError} If the expression is invalid
   */
  public translate(expression: CompiledExpression): SQL {
    if (!expression.isValid()) {
      throw new DrizzleTranslationError(
        `Failed to translate expression: ${expression.validationError}`
      );
    }
    return sql.raw(expression.text);
  }

  public canTranslate(expression: CompiledExpression): boolean {
    return expression.isValid();
  }
}
