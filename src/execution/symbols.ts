/** BASE_QUOTE 분리에 쓰는 quote 통화 (긴 것부터 매칭) */
const KNOWN_QUOTES = ['USDT', 'USDC', 'BUSD', 'BTC', 'ETH'];

/**
 * 심볼 정규화: BTCUSDT / btc_usdt → BTC_USDT
 * quote를 알 수 없으면 대문자 그대로 반환.
 */
export function normalizeSymbol(symbol: string): string {
  const upper = symbol.trim().toUpperCase();
  if (upper.includes('_')) return upper;
  for (const quote of KNOWN_QUOTES) {
    if (upper.length > quote.length && upper.endsWith(quote)) {
      return `${upper.slice(0, -quote.length)}_${quote}`;
    }
  }
  return upper;
}

/** BTC_USDT → BTC */
export function baseAsset(symbol: string): string {
  const normalized = normalizeSymbol(symbol);
  const idx = normalized.indexOf('_');
  return idx > 0 ? normalized.slice(0, idx) : normalized;
}

/** BTC_USDT → USDT */
export function quoteAsset(symbol: string): string {
  const normalized = normalizeSymbol(symbol);
  const idx = normalized.indexOf('_');
  return idx > 0 ? normalized.slice(idx + 1) : '';
}
