/**
 * Dialect Types
 *
 * A dialect describes how a target SQL engine quotes identifiers. Each
 * expression factory is bound to exactly one dialect.
 */

/**
 * Identifier quoting rules for one SQL engine
 */
export interface ISqlDialect {
  /**
   * Human readable name, e.g. "BigQuery"
   */
  readonly name: string;

  /**
   * Engine tag that dataset relations must carry to be understood by a
   * factory using this dialect
   */
  readonly engine: string;

  /**
   * Single character placed before and after an identifier
   */
  readonly identifierQuote: string;

  /**
   * Sequence that stands for one quote character inside a quoted identifier
   */
  readonly escapedIdentifierQuote: string;

  /**
   * Sequence that stands for a single quote inside a string literal
   */
  readonly escapedStringQuote: string;

  /**
   * Whether backslash is an escape character inside string literals
   */
  readonly backslashEscapes: boolean;
}

/**
 * Options accepted by createDialect
 */
export interface IDialectOptions {
  name: string;
  engine: string;
  identifierQuote: string;

  /**
   * Defaults to the quote character doubled (ANSI SQL)
   */
  escapedIdentifierQuote?: string;

  /**
   * @default "''"
   */
  escapedStringQuote?: string;

  /**
   * @default false
   */
  backslashEscapes?: boolean;
}

/**
 * Maps a raw identifier to its quoted form
 */
export type IdentifierQualifier = (identifier: string) => string;
