/**
 * Compiled expressions
 *
 * `CompiledExpression` is a closed union of ValidExpression and
 * InvalidExpression. Narrow with `isValid()` or a switch on `kind`.
 */

import { IExtractableExpression } from './types';

export * from './types';

/**
 * A SQL fragment that passed validation and can be spliced into a statement
 */
export class ValidExpression implements IExtractableExpression<string> {
  public readonly kind = 'valid';

  constructor(public readonly text: string) {}

  public isValid(): this is ValidExpression {
    return true;
  }

  public extract(): string {
    return this.text;
  }

  public getValidationError(): undefined {
    return undefined;
  }

  public toString(): string {
    return this.text;
  }
}

/**
 * A reference that could not be compiled. Carries no SQL text.
 */
export class InvalidExpression implements IExtractableExpression<string> {
  public readonly kind = 'invalid';

  constructor(public readonly validationError: string) {
    if (validationError.length === 0) {
      throw new TypeError('An invalid expression requires a validation error');
    }
  }

  public isValid(): this is ValidExpression {
    return false;
  }

  public extract(): undefined {
    return undefined;
  }

  public getValidationError(): string {
    return this.validationError;
  }

  public toString(): string {
    return `InvalidExpression(${this.validationError})`;
  }
}

export type CompiledExpression = ValidExpression | InvalidExpression;

export function validExpression(text: string): ValidExpression {
  return new ValidExpression(text);
}

export function invalidExpression(validationError: string): InvalidExpression {
  return new InvalidExpression(validationError);
}

export function isCompiledExpression(value: unknown): value is CompiledExpression {
  return value instanceof ValidExpression || value instanceof InvalidExpression;
}
