/**
 * Index aliases
 * Maps the index names callers use to the codes the VCI chart API expects
 */

/**
 * Substring that marks a symbol as an index alias
 */
export const INDEX_MARKER = 'INDEX';

/**
 * Alias table: caller-facing index name → provider-native instrument code
 */
export const INDEX_ALIASES: Readonly<Record<string, string>> = Object.freeze({
  VNINDEX: 'VNINDEX',
  HNXINDEX: 'HNXIndex',
  UPCOMINDEX: 'HNXUpcomIndex',
});

/**
 * Index codes that need no alias (they carry no marker)
 */
export const PLAIN_INDEX_CODES: ReadonlySet<string> = new Set([
  'VN30',
  'VN100',
  'HNX30',
  'VNMIDCAP',
  'VNSMALLCAP',
  'VNALLSHARE',
  'VNX50',
  'VNXALLSHARE',
  'VNDIAMOND',
  'VNFINLEAD',
  'VNFINSELECT',
]);

/**
 * Look up an alias
 *
 * @returns Provider code, or undefined when `symbol` is not a key of `aliases`
 *
 * @example
 * ```typescript
 * lookupAlias('HNXINDEX')   // → 'HNXIndex'
 * lookupAlias('VCB')        // → undefined
 * ```
 */
export function lookupAlias(
  symbol: string,
  aliases: Readonly<Record<string, string>> = INDEX_ALIASES
): string | undefined {
  return Object.prototype.hasOwnProperty.call(aliases, symbol) ? aliases[symbol] : undefined;
}

/**
 * True when `symbol` is an alias key or the provider code of one
 */
export function isIndexSymbol(
  symbol: string,
  aliases: Readonly<Record<string, string>> = INDEX_ALIASES
): boolean {
  return (
    lookupAlias(symbol, aliases) !== undefined ||
    Object.values(aliases).includes(symbol) ||
    PLAIN_INDEX_CODES.has(symbol.toUpperCase())
  );
}
