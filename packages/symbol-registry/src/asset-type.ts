/**
 * Asset type classification
 * Infers the instrument class from the shape of its code
 */

import type { AssetType } from '@vnquote/contracts';
import { INDEX_ALIASES, isIndexSymbol } from './aliases.js';

/** Index futures: VN30F2403, VN30F1M, VN100F2Q */
const INDEX_FUTURE_PATTERN = /^VN(30|100)F(\d{4}|\d{1,2}[MQ])$/;

/** Government bond futures: GB05F2406, GB10F2409 */
const BOND_FUTURE_PATTERN = /^GB(05|10)F\d{4}$/;

/** Covered warrants: CFPT2401, CVNM2315 */
const COVERED_WARRANT_PATTERN = /^C[A-Z]{3}\d{4}$/;

/** Fund certificates: FUEVFVND, FUESSV30, E1VFVN30 */
const ETF_PATTERN = /^(FUE[A-Z0-9]{5}|E1VFVN30)$/;

/** Listed shares: VCB, FPT, HPG */
const STOCK_PATTERN = /^[A-Z0-9]{3}$/;

/**
 * Classify a symbol
 *
 * @param symbol - Caller symbol or provider code
 * @returns Asset type, 'unknown' when no pattern matches
 *
 * @example
 * ```typescript
 * getAssetType('VNINDEX')    // → 'index'
 * getAssetType('VCB')        // → 'stock'
 * getAssetType('VN30F2403')  // → 'derivative'
 * getAssetType('CFPT2401')   // → 'covered_warrant'
 * ```
 */
export function getAssetType(
  symbol: string,
  aliases: Readonly<Record<string, string>> = INDEX_ALIASES
): AssetType {
  const code = symbol.trim().toUpperCase();

  if (isIndexSymbol(symbol.trim(), aliases) || isIndexSymbol(code, aliases)) {
    return 'index';
  }
  if (STOCK_PATTERN.test(code)) {
    return 'stock';
  }
  if (INDEX_FUTURE_PATTERN.test(code) || BOND_FUTURE_PATTERN.test(code)) {
    return 'derivative';
  }
  if (ETF_PATTERN.test(code)) {
    return 'etf';
  }
  if (COVERED_WARRANT_PATTERN.test(code)) {
    return 'covered_warrant';
  }
  return 'unknown';
}
