import { TextDecoder } from 'node:util';
import type { SymbolFactory } from '@/domain/models/SymbolFactory';
import { type Timestamp, timestampFromNanos } from '@/domain/models/Timestamp';

/**
 * インフラ層: フィールド単位のデコード処理
 *
 * すべてリトルエンディアン。呼び出し側（ディスパッチャ）がメッセージ長を
 * 先に検証しているため、ここでは境界チェックを行わない。
 */

// フィールド幅（バイト）
export const TAG_SIZE = 1;
export const FLAGS_SIZE = 1;
export const UINT32_SIZE = 4;
export const INT64_SIZE = 8;
export const PRICE_SIZE = 8;
export const TIMESTAMP_SIZE = 8;
export const SYMBOL_WIDTH = 8;

// 価格は 1/10000 ドル単位の固定小数点
export const PRICE_SCALE = 10_000;

const ASCII_SPACE = 0x20;
// 先頭の BOM も銘柄のバイト列としてそのまま残す
const textDecoder = new TextDecoder('utf-8', { ignoreBOM: true });

/**
 * フラグバイトの読み取り結果。予約ビットが立っている場合は失敗。
 */
export type FlagByte =
  | { readonly ok: true; readonly flags: readonly boolean[] }
  | { readonly ok: false; readonly reservedBits: number };

export function readUint32(view: DataView, offset: number): number {
  return view.getUint32(offset, true);
}

export function readInt64(view: DataView, offset: number): bigint {
  return view.getBigInt64(offset, true);
}

/**
 * 固定小数点価格（8 バイト符号付き整数 / 10000）を読む。
 */
export function readPrice(view: DataView, offset: number): number {
  return Number(view.getBigInt64(offset, true)) / PRICE_SCALE;
}

/**
 * エポックナノ秒のタイムスタンプを読む。
 */
export function readTimestamp(view: DataView, offset: number): Timestamp {
  return timestampFromNanos(view.getBigInt64(offset, true));
}

/**
 * 空白埋めの固定長テキストを読み、末尾の空白だけを除いてシンボルに変換する。
 * 先頭や途中の空白はそのまま残す。
 */
export function readPaddedText<S>(
  view: DataView,
  offset: number,
  width: number,
  toSymbol: SymbolFactory<S>
): S {
  const bytes = new Uint8Array(view.buffer, view.byteOffset + offset, width);
  let end = width;
  while (end > 0 && bytes[end - 1] === ASCII_SPACE) {
    end -= 1;
  }
  return toSymbol(textDecoder.decode(bytes.subarray(0, end)));
}

/**
 * 1 バイトを MSB から順にビットとして読み、先頭 flagCount 個をフラグとして返す。
 * 残り (8 - flagCount) ビットは予約ビットで、1 つでも立っていれば失敗とする。
 */
export function readFlags(view: DataView, offset: number, flagCount: number): FlagByte {
  const byte = view.getUint8(offset);
  const reservedMask = (1 << (8 - flagCount)) - 1;
  const reservedBits = byte & reservedMask;
  if (reservedBits !== 0) {
    return { ok: false, reservedBits };
  }

  const flags: boolean[] = [];
  for (let i = 0; i < flagCount; i += 1) {
    flags.push((byte & (0x80 >> i)) !== 0);
  }
  return { ok: true, flags };
}
