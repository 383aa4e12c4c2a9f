import type { TopsMessage } from './TopsMessage';

/**
 * バイト列がまだ 1 メッセージ分に足りない。
 * ストリーミング側はバッファして再試行すればよく、データ破損ではない。
 */
export interface IncompleteFailure {
  readonly kind: 'incomplete';
  /** 判明していればタグバイト。空入力の場合は null */
  readonly tag: number | null;
  /** 判定に必要な総バイト数（タグを含む） */
  readonly needed: number;
  /** 手元にあるバイト数 */
  readonly available: number;
}

/**
 * タグは認識できたが本体がフィールドの制約に違反している（予約ビット非ゼロなど）。
 */
export interface MalformedFailure {
  readonly kind: 'malformed';
  readonly tag: number;
  /** このメッセージ種別の総バイト数（タグを含む）。読み飛ばしに使う */
  readonly length: number;
  readonly reason: string;
}

/**
 * 先頭バイトがどのメッセージ種別のタグにも一致しない。
 */
export interface UnrecognizedTagFailure {
  readonly kind: 'unrecognized_tag';
  readonly tag: number;
}

export type DecodeFailure = IncompleteFailure | MalformedFailure | UnrecognizedTagFailure;

export type DecodeFailureKind = DecodeFailure['kind'];

/**
 * デコード結果。成功時は完全なレコードと未消費のバイト列、失敗時はレコードなし。
 */
export type DecodeResult<S = string> =
  | {
      readonly success: true;
      readonly message: TopsMessage<S>;
      readonly remaining: Uint8Array;
    }
  | {
      readonly success: false;
      readonly error: DecodeFailure;
    };

/**
 * 失敗内容をログ向けの 1 行に整形する。
 */
export function describeFailure(failure: DecodeFailure): string {
  switch (failure.kind) {
    case 'incomplete':
      return `incomplete message: need ${failure.needed} bytes, have ${failure.available}`;
    case 'malformed':
      return `malformed message 0x${hex(failure.tag)}: ${failure.reason}`;
    case 'unrecognized_tag':
      return `unrecognized message tag 0x${hex(failure.tag)}`;
  }
}

function hex(byte: number): string {
  return byte.toString(16).padStart(2, '0');
}
