import { parse as liqeParse } from 'liqe';
import type { LiqeQuery } from 'liqe';
import {
  FilterComparisonOperator,
  FilterExpression,
  FilterValue,
  IFilterComparison,
  IFilterLogical
} from './types';

/**
 * Error thrown when a filter cannot be parsed
 */
export class FilterParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FilterParseError';
  }
}

const OPERATOR_MAP: Record<string, FilterComparisonOperator> = {
  ':': '==',
  ':=': '==',
  ':>': '>',
  ':>=': '>=',
  ':<': '<',
  ':<=': '<='
};

/**
 * Parses filter strings into a FilterExpression using Liqe
 */
export class FilterParser {
  /**
   * @throws {FilterParseError} If the filter is not valid Liqe syntax or uses
   * a construct that has no SQL counterpart here
   */
  public parse(filter: string): FilterExpression {
    let ast: LiqeQuery;
    try {
      ast = liqeParse(filter);
    } catch (error) {
      throw new FilterParseError(error instanceof Error ? error.message : String(error));
    }
    return this.convert(ast);
  }

  private convert(node: LiqeQuery): FilterExpression {
    switch (node.type) {
      case 'LogicalExpression':
        return this.logical(
          node.operator.operator === 'OR' ? 'OR' : 'AND',
          node.left,
          node.right
        );

      case 'UnaryOperator':
        return this.logical('NOT', node.operand);

      case 'ParenthesizedExpression':
        return this.convert(node.expression);

      case 'Tag': {
        if (node.field.type !== 'Field') {
          throw new FilterParseError('Filter terms must name a column');
        }
        if (node.expression.type !== 'LiteralExpression') {
          throw new FilterParseError(
            `Unsupported expression for column ${node.field.name}: ${node.expression.type}`
          );
        }

        const operator = this.convertOperator(node.operator.operator);
        const value = this.convertValue(node.expression.value);

        if (operator === '==' && typeof value === 'string' && /[*?]/.test(value)) {
          return this.comparison(node.field.name, 'LIKE', value);
        }
        return this.comparison(node.field.name, operator, value);
      }

      case 'EmptyExpression':
        throw new FilterParseError('Filter is empty');

      default:
        throw new FilterParseError('Unsupported filter syntax');
    }
  }

  private logical(
    operator: 'AND' | 'OR' | 'NOT',
    left: LiqeQuery,
    right?: LiqeQuery
  ): IFilterLogical {
    return {
      type: 'logical',
      operator,
      left: this.convert(left),
      ...(right && { right: this.convert(right) })
    };
  }

  private comparison(
    field: string,
    operator: FilterComparisonOperator,
    value: FilterValue
  ): IFilterComparison {
    return { type: 'comparison', field, operator, value };
  }

  private convertOperator(operator: string): FilterComparisonOperator {
    const mapped = OPERATOR_MAP[operator];
    if (!mapped) {
      throw new FilterParseError(`Unsupported operator: ${operator}`);
    }
    return mapped;
  }

  private convertValue(value: unknown): FilterValue {
    if (
      typeof value === 'string' ||
      typeof value === 'number' ||
      typeof value === 'boolean' ||
      value === null
    ) {
      return value;
    }
    throw new FilterParseError(`Unsupported value type: ${typeof value}`);
  }
}
