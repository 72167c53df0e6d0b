import {
  CompiledExpression,
  InvalidExpression,
  ValidExpression,
  invalidExpression,
  isCompiledExpression,
  validExpression
} from './index';

describe('compiled expressions', () => {
  describe('ValidExpression', () => {
    it('should expose its text', () => {
      const expression = validExpression('`amount`');

      expect(expression.kind).toBe('valid');
      expect(expression.isValid()).toBe(true);
      expect(expression.extract()).toBe('`amount`');
      expect(expression.getValidationError()).toBeUndefined();
      expect(String(expression)).toBe('`amount`');
    });
  });

  describe('InvalidExpression', () => {
    it('should expose its error and no text', () => {
      const expression = invalidExpression('Column region is not present in dataset');

      expect(expression.kind).toBe('invalid');
      expect(expression.isValid()).toBe(false);
      expect(expression.extract()).toBeUndefined();
      expect(expression.getValidationError()).toBe('Column region is not present in dataset');
    });

    it('should not throw when extracting', () => {
      expect(() => invalidExpression('nope').extract()).not.toThrow();
    });

    it('should require a non-empty error', () => {
      expect(() => new InvalidExpression('')).toThrow(TypeError);
    });
  });

  it('should narrow on isValid', () => {
    const expressions: CompiledExpression[] = [validExpression('x'), invalidExpression('bad')];
    const texts: string[] = [];
    const errors: string[] = [];

    for (const expression of expressions) {
      if (expression.isValid()) {
        texts.push(expression.text);
      } else {
        errors.push(expression.validationError);
      }
    }

    expect(texts).toEqual(['x']);
    expect(errors).toEqual(['bad']);
  });

  it('should recognise compiled expressions', () => {
    expect(isCompiledExpression(new ValidExpression(''))).toBe(true);
    expect(isCompiledExpression(invalidExpression('bad'))).toBe(true);
    expect(isCompiledExpression('`amount`')).toBe(false);
    expect(isCompiledExpression({ kind: 'valid', text: 'x' })).toBe(false);
  });
});
