/**
 * SQL dialects
 *
 * Built-in quoting rules for the engines pushdown targets most often, plus
 * createDialect for anything else.
 */

import { IDialectOptions, ISqlDialect } from './types';

export * from './types';
export * from './qualifier';

/**
 * Error thrown when a dialect is configured with unusable quoting rules
 */
export class DialectConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DialectConfigurationError';
  }
}

/**
 * Create a validated, frozen dialect
 *
 * @throws {DialectConfigurationError} If the name or engine is empty, or the
 * quote is not exactly one character
 *
 * @example
 * ```typescript
 * const snowflake = createDialect({
 *   name: 'Snowflake',
 *   engine: 'snowflake',
 *   identifierQuote: '"'
 * });
 * ```
 */
export function createDialect(options: IDialectOptions): ISqlDialect {
  const { name, engine, identifierQuote } = options;

  if (name.trim().length === 0) {
    throw new DialectConfigurationError('Dialect name must not be empty');
  }
  if (engine.trim().length === 0) {
    throw new DialectConfigurationError(`Dialect ${name} must declare an engine`);
  }
  if ([...identifierQuote].length !== 1) {
    throw new DialectConfigurationError(
      `Dialect ${name} identifier quote must be a single character, got "${identifierQuote}"`
    );
  }

  const escapedIdentifierQuote =
    options.escapedIdentifierQuote ?? `${identifierQuote}${identifierQuote}`;
  if (escapedIdentifierQuote.length === 0) {
    throw new DialectConfigurationError(`Dialect ${name} escape sequence must not be empty`);
  }

  return Object.freeze({
    name,
    engine,
    identifierQuote,
    escapedIdentifierQuote,
    escapedStringQuote: options.escapedStringQuote ?? "''",
    backslashEscapes: options.backslashEscapes ?? false
  });
}

/**
 * GoogleSQL: backtick-quoted identifiers, backslash escapes
 */
export const BIGQUERY_DIALECT: ISqlDialect = createDialect({
  name: 'BigQuery',
  engine: 'bigquery',
  identifierQuote: '`',
  escapedIdentifierQuote: '\\`',
  escapedStringQuote: "\\'",
  backslashEscapes: true
});

/**
 * ANSI SQL (PostgreSQL, SQLite, Snowflake, ...)
 */
export const ANSI_DIALECT: ISqlDialect = createDialect({
  name: 'ANSI',
  engine: 'ansi',
  identifierQuote: '"'
});

/**
 * MySQL / MariaDB
 */
export const MYSQL_DIALECT: ISqlDialect = createDialect({
  name: 'MySQL',
  engine: 'mysql',
  identifierQuote: '`',
  backslashEscapes: true
});
