/**
 * Filter AST types
 *
 * Filters are written in a Lucene-like syntax (`status:"open" AND amount:>10`)
 * and compiled into SQL conditions against a dataset relation.
 */

/**
 * Comparison operators a filter term can use
 */
export type FilterComparisonOperator =
  | '=='
  | '>'
  | '>='
  | '<'
  | '<='
  | 'LIKE';

export type FilterLogicalOperator = 'AND' | 'OR' | 'NOT';

export type FilterValue = string | number | boolean | null;

export interface IFilterComparison {
  type: 'comparison';
  field: string;
  operator: FilterComparisonOperator;
  value: FilterValue;
}

export interface IFilterLogical {
  type: 'logical';
  operator: FilterLogicalOperator;
  left: FilterExpression;
  right?: FilterExpression;
}

export type FilterExpression = IFilterComparison | IFilterLogical;
