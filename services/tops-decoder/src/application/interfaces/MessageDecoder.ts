import type { DecodeResult } from '@/domain/models/DecodeResult';

/**
 * メッセージデコーダのインターフェイス（インフラ層で実装される）。
 *
 * @template S シンボルの表現
 */
export interface MessageDecoder<S = string> {
  /**
   * メッセージ境界から始まるバイト列を 1 メッセージ分デコードする。
   * 状態を持たないため、同じ入力には常に同じ結果を返す。
   * @param input メッセージ境界から始まるバイト列（コピーせず参照する）
   * @returns デコード結果（成功時は未消費のバイト列を含む）
   */
  decode(input: Uint8Array): DecodeResult<S>;
}
