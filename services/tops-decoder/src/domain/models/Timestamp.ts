/**
 * ドメイン層: UTC ナノ秒精度のタイムスタンプ
 *
 * フィードの時刻はエポックからのナノ秒（符号付き 64bit）で届く。
 * number ではナノ秒の桁が落ちるため bigint のまま保持する。
 */
export interface Timestamp {
  /** Unix エポックからの経過ナノ秒（UTC） */
  readonly epochNanoseconds: bigint;
}

const NANOS_PER_MILLI = 1_000_000n;
const NANOS_PER_SECOND = 1_000_000_000n;

/**
 * エポックナノ秒から Timestamp を生成する。
 */
export function timestampFromNanos(epochNanoseconds: bigint): Timestamp {
  return { epochNanoseconds };
}

/**
 * 負の値でも切り捨て方向（-∞ 方向）に割る。
 */
function floorDiv(value: bigint, divisor: bigint): bigint {
  const quotient = value / divisor;
  return value % divisor < 0n ? quotient - 1n : quotient;
}

/**
 * ミリ秒精度の Date に変換する（ミリ秒未満は切り捨て）。
 */
export function timestampToDate(timestamp: Timestamp): Date {
  return new Date(Number(floorDiv(timestamp.epochNanoseconds, NANOS_PER_MILLI)));
}

/**
 * ナノ秒 9 桁の小数部を持つ ISO-8601 文字列に変換する。
 * @example timestampToIsoString(timestampFromNanos(1492448400000000000n)) // '2017-04-17T17:00:00.000000000Z'
 */
export function timestampToIsoString(timestamp: Timestamp): string {
  const seconds = floorDiv(timestamp.epochNanoseconds, NANOS_PER_SECOND);
  const fraction = timestamp.epochNanoseconds - seconds * NANOS_PER_SECOND;
  const wholeSeconds = new Date(Number(seconds) * 1000).toISOString().slice(0, 19);
  return `${wholeSeconds}.${fraction.toString().padStart(9, '0')}Z`;
}
