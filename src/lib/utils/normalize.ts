// ============================================================
// Symbol normalization
// ============================================================
// Store keys are uppercase with separators removed; an OTC
// suffix is kept as "-OTC".
// ============================================================

/**
 * @example
 * normalizeSymbol('#eurusd_otc') // 'EURUSD-OTC'
 * normalizeSymbol('EUR/USD')     // 'EURUSD'
 * normalizeSymbol('btc-usdt')    // 'BTCUSDT'
 */
export function normalizeSymbol(raw: string): string {
  let s = raw.trim();
  if (s.startsWith('#')) s = s.slice(1);

  const isOTC = /[-_ ]?otc$/i.test(s);
  if (isOTC) s = s.replace(/[-_ ]?otc$/i, '');

  s = s.replace(/[/\-\s_]+/g, '').toUpperCase();

  return isOTC ? `${s}-OTC` : s;
}
