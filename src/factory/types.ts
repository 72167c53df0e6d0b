/**
 * Expression Factory Types
 */

import type { Logger } from 'pino';
import { Capability } from '../capabilities';
import { ISqlDialect } from '../dialects';
import { CompiledExpression } from '../expressions';
import { Relation } from '../relations';

/**
 * How identifiers that contain the dialect's quote character are handled
 *
 * - `reject`: the reference compiles to an InvalidExpression
 * - `escape`: each embedded quote is replaced by the dialect's escape sequence
 */
export type EmbeddedQuotePolicy = 'reject' | 'escape';

/**
 * Options for configuring an expression factory
 */
export interface IExpressionFactoryOptions {
  /**
   * Quoting rules of the target engine
   * @default BIGQUERY_DIALECT
   */
  dialect?: ISqlDialect;

  /**
   * @default 'reject'
   */
  embeddedQuotes?: EmbeddedQuotePolicy;

  /**
   * Receives a debug entry for every rejected reference. Nothing is logged
   * when omitted.
   */
  logger?: Logger;
}

/**
 * Interface for an expression factory
 */
export interface IExpressionFactory {
  /**
   * The one capability this factory emits
   */
  getSupportedCapability(): Capability;

  /**
   * A new set holding every capability this factory emits
   */
  getCapabilities(): Set<Capability>;

  /**
   * Wrap caller-supplied text as a valid expression without inspecting it
   */
  compile(rawText: string): CompiledExpression;

  /**
   * Quote the dataset identifier of a relation
   */
  getQualifiedDatasetName(relation: Relation): CompiledExpression;

  /**
   * Quote a column after checking the relation exposes it
   */
  getQualifiedColumnName(relation: Relation, column: string): CompiledExpression;
}
