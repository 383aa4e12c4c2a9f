import { timestampToIsoString } from '@/domain/models/Timestamp';
import type { TopsMessage } from '@/domain/models/TopsMessage';

/**
 * JSON.stringify は bigint を扱えないため 10 進文字列に置き換える。
 */
function replaceBigInt(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * メッセージを JSON 文字列にする（bigint は 10 進文字列）。
 */
export function serializeMessage(message: TopsMessage): string {
  return JSON.stringify(message, replaceBigInt);
}

/**
 * Redis Stream のフィールド列（field, value, field, value, ...）に変換する。
 * symbol / ts を持たないメッセージは空文字列。
 */
export function toStreamFields(message: TopsMessage): string[] {
  const symbol = 'symbol' in message ? message.symbol : '';
  const ts = 'timestamp' in message ? message.timestamp.epochNanoseconds.toString() : '';
  return ['type', message.type, 'symbol', symbol, 'ts', ts, 'data', serializeMessage(message)];
}

/**
 * ログ出力向けの要約（ナノ秒まで含む ISO 時刻付き）。
 */
export function summarizeMessage(message: TopsMessage): Record<string, string | number | boolean> {
  switch (message.type) {
    case 'system_event':
      return { type: message.type, kind: message.kind, time: timestampToIsoString(message.timestamp) };
    case 'quote_update':
      return {
        type: message.type,
        symbol: message.symbol,
        time: timestampToIsoString(message.timestamp),
        bid: `${message.bidSize}@${message.bidPrice}`,
        ask: `${message.askSize}@${message.askPrice}`,
        available: message.available,
      };
    case 'trade_report':
      return {
        type: message.type,
        symbol: message.symbol,
        time: timestampToIsoString(message.timestamp),
        trade: `${message.size}@${message.price}`,
        id: message.id.toString(),
      };
    case 'opaque':
      return { type: message.type, kind: message.kind };
  }
}
