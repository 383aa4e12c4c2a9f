import type { MessageDecoder } from '@/application/interfaces/MessageDecoder';
import type { DecodeResult } from '@/domain/models/DecodeResult';
import { stringSymbol, type SymbolFactory } from '@/domain/models/SymbolFactory';
import { findLayout, messageLength } from './MessageLayout';

/**
 * 先頭のタグで種別を決め、固定長の本体をデコードする。
 *
 * - 空入力、またはタグは一致したが長さが足りない: incomplete
 * - タグは一致したがフィールド制約違反: malformed
 * - どのタグにも一致しない: unrecognized_tag
 *
 * 入力はコピーせず参照し、成功時の remaining も同じバッファの subarray を返す。
 */
function decodeWith<S>(input: Uint8Array, toSymbol: SymbolFactory<S>): DecodeResult<S> {
  if (input.length === 0) {
    return { success: false, error: { kind: 'incomplete', tag: null, needed: 1, available: 0 } };
  }

  const tag = input[0];
  const layout = findLayout(tag);
  if (!layout) {
    return { success: false, error: { kind: 'unrecognized_tag', tag } };
  }

  const length = messageLength(layout);
  if (input.length < length) {
    return { success: false, error: { kind: 'incomplete', tag, needed: length, available: input.length } };
  }

  const view = new DataView(input.buffer, input.byteOffset, length);
  const result = layout.decode(view, toSymbol);
  if (!result.ok) {
    return { success: false, error: { kind: 'malformed', tag, length, reason: result.reason } };
  }

  return { success: true, message: result.message, remaining: input.subarray(length) };
}

/**
 * 1 メッセージをデコードする。シンボルファクトリ省略時はシンボルを文字列で返す。
 * @param input メッセージ境界から始まるバイト列
 * @param toSymbol シンボル表現を生成する関数
 */
export function decodeMessage(input: Uint8Array): DecodeResult<string>;
export function decodeMessage<S>(input: Uint8Array, toSymbol: SymbolFactory<S>): DecodeResult<S>;
export function decodeMessage<S>(
  input: Uint8Array,
  toSymbol?: SymbolFactory<S>
): DecodeResult<S> | DecodeResult<string> {
  return toSymbol ? decodeWith(input, toSymbol) : decodeWith(input, stringSymbol);
}

/**
 * インフラ層: MessageDecoder 実装
 *
 * 責務: TOPS v1.6 のバイト列 → TopsMessage への変換。状態は持たない。
 */
export class TopsMessageDecoder<S = string> implements MessageDecoder<S> {
  /**
   * @param toSymbol シンボル表現を生成する関数（例: stringSymbol, SymbolInterner#factory）
   */
  constructor(private readonly toSymbol: SymbolFactory<S>) {}

  decode(input: Uint8Array): DecodeResult<S> {
    return decodeWith(input, this.toSymbol);
  }
}
