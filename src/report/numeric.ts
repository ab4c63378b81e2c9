/**
 * Optional counters and the reducers used to combine them.
 *
 * A counter is a 64-bit unsigned value that a probe may not have measured at
 * all. `undefined` means "not measured" and is never the same as zero.
 */

export type OptionalCounter = bigint | undefined;

export type Reducer = (dst: bigint, src: bigint) => bigint;

const U64_BITS = 64;

/**
 * Addition modulo 2^64. Overflow wraps silently; there is no saturation.
 */
export const sum: Reducer = (dst, src) => BigInt.asUintN(U64_BITS, dst + src);

export const max: Reducer = (dst, src) => (dst > src ? dst : src);

/**
 * Combine two optional counters. An absent `src` leaves `dst` as is, an
 * absent `dst` takes `src`, otherwise the reducer decides.
 */
export function mergeCounter(dst: OptionalCounter, src: OptionalCounter, reducer: Reducer): OptionalCounter {
  if (src === undefined) {
    return dst;
  }
  if (dst === undefined) {
    return src;
  }
  return reducer(dst, src);
}

/** Wire representation of a counter: a JSON integer, or a decimal string past 2^53. */
export type WireCounter = number | string;

/**
 * Parse a wire counter. Returns undefined for anything that is not a
 * non-negative integer within 64 bits.
 */
export function parseCounter(value: WireCounter): OptionalCounter {
  if (typeof value === 'number') {
    if (!Number.isSafeInteger(value) || value < 0) {
      return undefined;
    }
    return BigInt(value);
  }
  if (!/^[0-9]+$/.test(value)) {
    return undefined;
  }
  const parsed = BigInt(value);
  return parsed === BigInt.asUintN(U64_BITS, parsed) ? parsed : undefined;
}

export function formatCounter(value: bigint): WireCounter {
  return value <= BigInt(Number.MAX_SAFE_INTEGER) ? Number(value) : value.toString();
}
