/**
 * Symbol normalization and resolution
 * Turns caller input into the code sent to the provider
 */

import { InvalidSymbolError } from '@vnquote/contracts';
import { INDEX_ALIASES, INDEX_MARKER, lookupAlias } from './aliases.js';

/**
 * Trim and upper-case a raw symbol
 *
 * @throws {InvalidSymbolError} If nothing is left after trimming
 *
 * @example
 * ```typescript
 * normalizeSymbol(' vcb ')   // → 'VCB'
 * ```
 */
export function normalizeSymbol(raw: string): string {
  const symbol = typeof raw === 'string' ? raw.trim().toUpperCase() : '';
  if (!symbol) {
    throw new InvalidSymbolError('Symbol must be a non-empty string', { symbol: String(raw) });
  }
  return symbol;
}

/**
 * Resolve a caller symbol to its provider code
 *
 * Symbols carrying the index marker must be keys of the alias table; every
 * other symbol is returned as normalized, without an exchange lookup.
 *
 * @param raw - Symbol as the caller wrote it
 * @param aliases - Alias table to resolve index names against
 * @throws {InvalidSymbolError} For an index name missing from `aliases`
 *
 * @example
 * ```typescript
 * resolveSymbol('UPCOMINDEX')  // → 'HNXUpcomIndex'
 * resolveSymbol('fpt')         // → 'FPT'
 * resolveSymbol('HOSEINDEX')   // throws, lists VNINDEX, HNXINDEX, UPCOMINDEX
 * ```
 */
export function resolveSymbol(
  raw: string,
  aliases: Readonly<Record<string, string>> = INDEX_ALIASES
): string {
  const symbol = normalizeSymbol(raw);

  if (!symbol.includes(INDEX_MARKER)) {
    return symbol;
  }

  const code = lookupAlias(symbol, aliases);
  if (code === undefined) {
    const validAliases = Object.keys(aliases);
    throw new InvalidSymbolError(
      `Unknown index symbol ${symbol}. Valid values: ${validAliases.join(', ')}`,
      { symbol, validAliases }
    );
  }
  return code;
}
