import type { MessageDecoder } from '@/application/interfaces/MessageDecoder';
import type { DecodeFailure, IncompleteFailure } from '@/domain/models/DecodeResult';
import type { TopsMessage } from '@/domain/models/TopsMessage';

/**
 * ストリーム上の 1 件分の結果。受信順に並ぶ。
 * incomplete は次のチャンク待ちになるだけなのでここには現れない。
 */
export type StreamItem<S> =
  | { readonly ok: true; readonly message: TopsMessage<S>; readonly offset: number }
  | { readonly ok: false; readonly failure: DecodeFailure; readonly offset: number };

/**
 * アプリケーション層: チャンク単位で届くバイト列を逐次デコードする
 *
 * 責務: チャンク境界をまたぐメッセージのために未消費のバイト列を保持する。
 * - incomplete: 次のチャンクを待つ
 * - unrecognized_tag: 1 バイト捨てて再同期を試みる
 * - malformed: そのメッセージの固定長分を捨てる
 *
 * フィードごとに 1 インスタンスを使う（内部バッファを持つため共有しない）。
 */
export class StreamingMessageDecoder<S = string> {
  private buffer: Uint8Array = new Uint8Array(0);
  /** buffer 先頭のストリーム上の位置 */
  private bufferOffset = 0;

  constructor(private readonly decoder: MessageDecoder<S>) {}

  /**
   * バッファ中の未消費バイト数。
   */
  get pending(): number {
    return this.buffer.length;
  }

  /**
   * バッファに残っている途中までのメッセージを incomplete として返す。
   * 入力終端で呼ぶ。バッファが空なら null。
   */
  pendingFailure(): { readonly failure: IncompleteFailure; readonly offset: number } | null {
    if (this.buffer.length === 0) {
      return null;
    }
    const result = this.decoder.decode(this.buffer);
    if (result.success || result.error.kind !== 'incomplete') {
      return null;
    }
    return { failure: result.error, offset: this.bufferOffset };
  }

  /**
   * チャンクを追加し、完全に揃ったメッセージをすべてデコードする。
   * @param chunk 受信したバイト列
   * @returns 受信順の結果（メッセージと読み飛ばした失敗）
   */
  push(chunk: Uint8Array): StreamItem<S>[] {
    const items: StreamItem<S>[] = [];
    let input = this.append(chunk);
    let offset = this.bufferOffset;

    while (input.length > 0) {
      const result = this.decoder.decode(input);
      if (result.success) {
        items.push({ ok: true, message: result.message, offset });
        offset += input.length - result.remaining.length;
        input = result.remaining;
        continue;
      }

      const { error } = result;
      if (error.kind === 'incomplete') {
        break;
      }
      items.push({ ok: false, failure: error, offset });
      // malformed は長さが分かっているので丸ごと、未知タグは 1 バイトだけ捨てる
      const skip = error.kind === 'malformed' ? error.length : 1;
      offset += skip;
      input = input.subarray(skip);
    }

    // 残りはコピーしておく（呼び出し側がチャンクのバッファを再利用しても影響を受けない）
    this.buffer = input.slice();
    this.bufferOffset = offset;
    return items;
  }

  /**
   * バッファを破棄する（セッションのリセット時など）。位置の計数も 0 に戻す。
   */
  reset(): void {
    this.buffer = new Uint8Array(0);
    this.bufferOffset = 0;
  }

  private append(chunk: Uint8Array): Uint8Array {
    if (this.buffer.length === 0) {
      return chunk;
    }
    const merged = new Uint8Array(this.buffer.length + chunk.length);
    merged.set(this.buffer, 0);
    merged.set(chunk, this.buffer.length);
    return merged;
  }
}
