// ============================================
// Bigint Amount Helpers
// ============================================

/** `a - b`, floored at zero. */
export function saturatingSub(a: bigint, b: bigint): bigint {
  return a > b ? a - b : 0n;
}

/** Parse a non-negative integer amount in base units. Returns null on anything else. */
export function parseAmount(raw: string): bigint | null {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  return BigInt(trimmed);
}
