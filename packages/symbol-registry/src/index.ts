/**
 * @vnquote/symbol-registry
 * Symbol cleanup, index alias resolution and asset-type classification
 */

export { INDEX_MARKER, INDEX_ALIASES, PLAIN_INDEX_CODES, lookupAlias, isIndexSymbol } from './aliases.js';
export { normalizeSymbol, resolveSymbol } from './normalize.js';
export { getAssetType } from './asset-type.js';
