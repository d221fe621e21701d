/** floor(revenue * rate / denominator) */
export function computeExpected(revenue: bigint, rate: bigint, denominator: bigint): bigint {
  if (denominator <= 0n) throw new Error("rate denominator must be > 0");
  return (revenue * rate) / denominator;
}

/** paid >= floor(expected * numerator / denominator) */
export function isWithinTolerance(paid: bigint, expected: bigint, numerator: bigint, denominator: bigint): boolean {
  if (denominator <= 0n) throw new Error("tolerance denominator must be > 0");
  return paid >= (expected * numerator) / denominator;
}
