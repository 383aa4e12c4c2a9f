import { type DecodeFailure, describeFailure } from '@/domain/models/DecodeResult';

/**
 * エラーポリシーが abort のとき、最初のデコード失敗で投げられる。
 */
export class FeedDecodeError extends Error {
  constructor(
    readonly failure: DecodeFailure,
    /** フィード先頭からのバイト位置（分かる範囲で） */
    readonly offset: number
  ) {
    super(`${describeFailure(failure)} at byte ${offset}`);
    this.name = 'FeedDecodeError';
  }
}
