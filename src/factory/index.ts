/**
 * SQL Expression Factory
 *
 * Compiles SQL strings into expressions and qualifies dataset and column
 * references for a single SQL dialect. Every reference is validated here, so
 * a ValidExpression can be spliced into generated SQL without further checks.
 */

import type { Logger } from 'pino';
import { Capability, ExpressionCapability } from '../capabilities';
import {
  BIGQUERY_DIALECT,
  IdentifierQualifier,
  ISqlDialect,
  createIdentifierQualifier,
  escapeIdentifierQuotes
} from '../dialects';
import {
  CompiledExpression,
  InvalidExpression,
  invalidExpression,
  validExpression
} from '../expressions';
import { IDatasetRelation, Relation, hasColumn } from '../relations';
import { EmbeddedQuotePolicy, IExpressionFactory, IExpressionFactoryOptions } from './types';

export * from './types';

export const UNSUPPORTED_RELATION_ERROR = 'relation is of unsupported kind';

interface IResolvedFactoryOptions {
  dialect: ISqlDialect;
  embeddedQuotes: EmbeddedQuotePolicy;
  logger: Logger | undefined;
}

/**
 * Factory for SQL expressions bound to one dialect
 *
 * @example
 * ```typescript
 * const factory = new SqlExpressionFactory();
 * const sales = createDatasetRelation({
 *   engine: 'bigquery',
 *   datasetIdentifier: 'sales',
 *   columns: ['id', 'amount']
 * });
 *
 * const amount = factory.getQualifiedColumnName(sales, 'amount');
 * if (amount.isValid()) {
 *   amount.extract(); // `amount`
 * }
 * ```
 */
export class SqlExpressionFactory implements IExpressionFactory {
  private readonly options: IResolvedFactoryOptions;
  private readonly qualifier: IdentifierQualifier;

  constructor(options: IExpressionFactoryOptions = {}) {
    this.options = {
      dialect: options.dialect ?? BIGQUERY_DIALECT,
      embeddedQuotes: options.embeddedQuotes ?? 'reject',
      logger: options.logger
    };
    this.qualifier = createIdentifierQualifier(this.options.dialect.identifierQuote);
  }

  public get dialect(): ISqlDialect {
    return this.options.dialect;
  }

  public getSupportedCapability(): Capability {
    return ExpressionCapability.SQL;
  }

  /**
   * Same as getSupportedCapability
   */
  public getType(): Capability {
    return this.getSupportedCapability();
  }

  public getCapabilities(): Set<Capability> {
    return new Set<Capability>([this.getSupportedCapability()]);
  }

  /**
   * The text is trusted as-is; an empty string compiles to an empty fragment.
   */
  public compile(rawText: string): CompiledExpression {
    return validExpression(rawText);
  }

  /**
   * Returns the dataset identifier wrapped in the dialect's quotes, or an
   * invalid expression if the relation is not a dataset of this engine.
   */
  public getQualifiedDatasetName(relation: Relation): CompiledExpression {
    const dataset = this.resolveRelation(relation);
    if (dataset === undefined) {
      return this.reject(UNSUPPORTED_RELATION_ERROR, relation);
    }

    return this.qualifyReference(dataset.datasetIdentifier, relation);
  }

  /**
   * Returns the column wrapped in the dialect's quotes. The expression is
   * invalid if the relation is not a dataset of this engine or does not
   * expose the column.
   */
  public getQualifiedColumnName(relation: Relation, column: string): CompiledExpression {
    const dataset = this.resolveRelation(relation);
    if (dataset === undefined) {
      return this.reject(UNSUPPORTED_RELATION_ERROR, relation, column);
    }

    if (!hasColumn(dataset, column)) {
      return this.reject(`Column ${column} is not present in dataset`, relation, column);
    }

    return this.qualifyReference(column, relation, column);
  }

  /**
   * Wrap an identifier in the dialect's quotes without any validation
   */
  public qualify(identifier: string): string {
    return this.qualifier(identifier);
  }

  /**
   * Anything that is not a well-formed dataset relation of this engine
   * resolves to undefined, including values outside the Relation union.
   */
  private resolveRelation(relation: Relation): IDatasetRelation | undefined {
    if (typeof relation !== 'object' || relation === null) {
      return undefined;
    }

    switch (relation.kind) {
      case 'dataset':
        return relation.engine === this.options.dialect.engine &&
          typeof relation.datasetIdentifier === 'string' &&
          relation.columns instanceof Set
          ? relation
          : undefined;
      case 'opaque':
        return undefined;
      default: {
        const unreachable: never = relation;
        void unreachable;
        return undefined;
      }
    }
  }

  private qualifyReference(
    identifier: string,
    relation: Relation,
    column?: string
  ): CompiledExpression {
    const { identifierQuote, escapedIdentifierQuote } = this.options.dialect;

    if (!identifier.includes(identifierQuote)) {
      return validExpression(this.qualifier(identifier));
    }

    if (this.options.embeddedQuotes === 'escape') {
      return validExpression(
        this.qualifier(escapeIdentifierQuotes(identifier, identifierQuote, escapedIdentifierQuote))
      );
    }

    return this.reject(
      `Identifier ${identifier} contains the quote character ${identifierQuote}`,
      relation,
      column
    );
  }

  private reject(reason: string, relation: Relation, column?: string): InvalidExpression {
    this.options.logger?.debug(
      {
        relation: describeRelation(relation),
        ...(column !== undefined && { column }),
        reason
      },
      'Rejected SQL reference'
    );
    return invalidExpression(reason);
  }
}

function describeRelation(relation: Relation): string {
  if (typeof relation !== 'object' || relation === null) {
    return 'unknown';
  }

  switch (relation.kind) {
    case 'dataset':
      return `${relation.engine}:${relation.datasetIdentifier}`;
    case 'opaque':
      return relation.description ?? 'opaque';
    default: {
      const unreachable: never = relation;
      void unreachable;
      return 'unknown';
    }
  }
}
