/**
 * pushdown-sql - expression compilation and identifier validation for SQL pushdown
 *
 * A planner hands relations (datasets and the columns they expose) to an
 * expression factory and gets back dialect-quoted SQL fragments, or an
 * invalid expression explaining why the reference cannot be pushed down.
 */

import { ISqlDialect } from './dialects';
import { IExpressionFactoryOptions, SqlExpressionFactory } from './factory';
import { FilterCompiler } from './filters';

/**
 * Create a new SqlExpressionFactory instance
 */
export function createExpressionFactory(
  options?: IExpressionFactoryOptions
): SqlExpressionFactory {
  return new SqlExpressionFactory(options);
}

/**
 * Options for createPushdown
 */
export interface IPushdownOptions extends IExpressionFactoryOptions {
  dialect: ISqlDialect;
}

/**
 * A factory and a filter compiler sharing one dialect
 */
export interface IPushdown {
  factory: SqlExpressionFactory;
  filters: FilterCompiler;
}

/**
 * Create a factory and a filter compiler bound to the same dialect
 */
export function createPushdown(options: IPushdownOptions): IPushdown {
  const factory = new SqlExpressionFactory(options);
  return {
    factory,
    filters: new FilterCompiler(factory)
  };
}

export * from './capabilities';
export * from './dialects';
export * from './expressions';
export * from './relations';
export * from './factory';
export * from './filters';
export * from './translators';
export * from './logging';
