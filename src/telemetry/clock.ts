/**
 * Nanosecond clock anchored to the wall clock once, then advanced by the
 * monotonic timer.
 */

export type Clock = () => bigint;

const NANOS_PER_MILLI = 1_000_000n;
const NANOS_PER_SECOND = 1_000_000_000n;

const originEpoch = BigInt(Date.now()) * NANOS_PER_MILLI;
const originMonotonic = process.hrtime.bigint();

export const getCurrentTimeNanoseconds: Clock = () =>
  originEpoch + (process.hrtime.bigint() - originMonotonic);

/**
 * Format nanoseconds since epoch as ISO 8601, keeping all nine fractional
 * digits: `2022-06-20T14:51:23.544826062Z`.
 */
export function formatTimestamp(nanoseconds: bigint): string {
  const seconds = nanoseconds / NANOS_PER_SECOND;
  const fraction = (nanoseconds % NANOS_PER_SECOND).toString().padStart(9, '0');
  const iso = new Date(Number(seconds) * 1000).toISOString();
  return `${iso.slice(0, 19)}.${fraction}Z`;
}
