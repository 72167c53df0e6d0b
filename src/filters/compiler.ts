/**
 * Filter compiler
 *
 * Turns a parsed filter into a SQL condition. Column references go through
 * the expression factory, so a filter on a column the relation does not
 * expose compiles to the same InvalidExpression the factory would return.
 */

import { ISqlDialect } from '../dialects';
import {
  CompiledExpression,
  invalidExpression,
  validExpression
} from '../expressions';
import { SqlExpressionFactory } from '../factory';
import { Relation } from '../relations';
import { FilterParseError, FilterParser } from './parser';
import { FilterExpression, FilterValue, IFilterComparison, IFilterLogical } from './types';

const SQL_OPERATORS = {
  '==': '=',
  '>': '>',
  '>=': '>=',
  '<': '<',
  '<=': '<=',
  LIKE: 'LIKE'
} as const;

/**
 * Compiles Lucene-style filters into SQL conditions for one factory
 *
 * @example
 * ```typescript
 * const compiler = new FilterCompiler(factory);
 * const condition = compiler.compile(sales, 'amount:>10 AND id:7');
 * condition.extract(); // (`amount` > 10) AND (`id` = 7)
 * ```
 */
export class FilterCompiler {
  private readonly parser = new FilterParser();

  constructor(private readonly factory: SqlExpressionFactory) {}

  /**
   * Parse and compile a filter; parse errors become an InvalidExpression
   */
  public compile(relation: Relation, filter: string): CompiledExpression {
    let expression: FilterExpression;
    try {
      expression = this.parser.parse(filter);
    } catch (error) {
      if (error instanceof FilterParseError) {
        return invalidExpression(`Failed to parse filter: ${error.message}`);
      }
      throw error;
    }
    return this.compileExpression(relation, expression);
  }

  /**
   * Compile an already parsed filter
   */
  public compileExpression(relation: Relation, expression: FilterExpression): CompiledExpression {
    switch (expression.type) {
      case 'comparison':
        return this.compileComparison(relation, expression);
      case 'logical':
        return this.compileLogical(relation, expression);
    }
  }

  private compileComparison(relation: Relation, expression: IFilterComparison): CompiledExpression {
    const column = this.factory.getQualifiedColumnName(relation, expression.field);
    if (!column.isValid()) {
      return column;
    }

    const { operator, value } = expression;

    if (value === null) {
      if (operator !== '==') {
        return invalidExpression(`Operator ${operator} cannot be used with null`);
      }
      return validExpression(`${column.text} IS NULL`);
    }

    if (operator === 'LIKE') {
      if (typeof value !== 'string') {
        return invalidExpression('LIKE requires a string pattern');
      }
      return validExpression(`${column.text} LIKE ${this.formatValue(wildcardToSqlPattern(value))}`);
    }

    return validExpression(`${column.text} ${SQL_OPERATORS[operator]} ${this.formatValue(value)}`);
  }

  private compileLogical(relation: Relation, expression: IFilterLogical): CompiledExpression {
    const left = this.compileExpression(relation, expression.left);
    if (!left.isValid()) {
      return left;
    }

    if (expression.operator === 'NOT') {
      const negatedNull = this.compileNotNull(relation, expression.left);
      return negatedNull ?? validExpression(`NOT (${left.text})`);
    }

    if (!expression.right) {
      return invalidExpression(`${expression.operator} requires two operands`);
    }

    const right = this.compileExpression(relation, expression.right);
    if (!right.isValid()) {
      return right;
    }

    return validExpression(`(${left.text}) ${expression.operator} (${right.text})`);
  }

  /**
   * `NOT column:null` reads better as `column IS NOT NULL`
   */
  private compileNotNull(
    relation: Relation,
    operand: FilterExpression
  ): CompiledExpression | undefined {
    if (operand.type !== 'comparison' || operand.value !== null || operand.operator !== '==') {
      return undefined;
    }
    const column = this.factory.getQualifiedColumnName(relation, operand.field);
    return column.isValid() ? validExpression(`${column.text} IS NOT NULL`) : column;
  }

  private formatValue(value: Exclude<FilterValue, null>): string {
    if (typeof value === 'string') {
      return quoteString(value, this.factory.dialect);
    }
    return String(value);
  }
}

/**
 * `*` becomes `%` and `?` becomes `_`; literal `%` and `_` are escaped
 */
export function wildcardToSqlPattern(pattern: string): string {
  return pattern
    .replace(/%/g, '\\%')
    .replace(/_/g, '\\_')
    .replace(/\*/g, '%')
    .replace(/\?/g, '_');
}

/**
 * Render a string literal using the dialect's escaping rules
 */
export function quoteString(value: string, dialect: ISqlDialect): string {
  const withBackslashes = dialect.backslashEscapes ? value.replace(/\\/g, '\\\\') : value;
  return `'${withBackslashes.split("'").join(dialect.escapedStringQuote)}'`;
}
