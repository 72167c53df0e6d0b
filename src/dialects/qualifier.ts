import { IdentifierQualifier } from './types';

/**
 * Build a qualifier that wraps identifiers in the given quote character.
 *
 * The identifier is used as-is: no trimming, no case folding and no escaping
 * of embedded quotes. Callers that need escaping go through
 * `escapeIdentifierQuotes` first.
 */
export function createIdentifierQualifier(quote: string): IdentifierQualifier {
  return (identifier: string): string => `${quote}${identifier}${quote}`;
}

/**
 * Replace every occurrence of `quote` inside `identifier` with `escaped`
 */
export function escapeIdentifierQuotes(
  identifier: string,
  quote: string,
  escaped: string
): string {
  return identifier.split(quote).join(escaped);
}
