// Narrowing conversions for the fixed-width numeric codecs. They wrap the way
// two's-complement integers do; non-finite values become 0.

export function toByte(value: number): number {
  return Number.isFinite(value) ? (Math.trunc(value) << 24) >> 24 : 0;
}

export function toShort(value: number): number {
  return Number.isFinite(value) ? (Math.trunc(value) << 16) >> 16 : 0;
}

export function toInt(value: number): number {
  return Number.isFinite(value) ? Math.trunc(value) | 0 : 0;
}

export function toFloat(value: number): number {
  return Math.fround(value);
}

export function toLong(value: bigint): bigint {
  return BigInt.asIntN(64, value);
}
