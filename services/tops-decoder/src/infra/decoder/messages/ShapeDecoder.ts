import type { SymbolFactory } from '@/domain/models/SymbolFactory';
import type { TopsMessage } from '@/domain/models/TopsMessage';

/**
 * メッセージ本体のデコード結果。
 * タグと長さはディスパッチャが検証済みなので、失敗はフィールド制約違反のみ。
 */
export type ShapeResult<S> =
  | { readonly ok: true; readonly message: TopsMessage<S> }
  | { readonly ok: false; readonly reason: string };

/**
 * 1 メッセージ分（タグを含む）の DataView を受け取り、レコードを組み立てる。
 */
export type ShapeDecoder = <S>(view: DataView, toSymbol: SymbolFactory<S>) => ShapeResult<S>;
