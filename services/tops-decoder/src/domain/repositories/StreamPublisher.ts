import type { TopsMessage } from '@/domain/models/TopsMessage';

/**
 * デコード済みメッセージの配信先インターフェイス（インフラ層で実装される）。
 */
export interface StreamPublisher {
  /**
   * デコード済みメッセージを配信する。
   * @param message デコード済みメッセージ
   */
  publish(message: TopsMessage): Promise<void>;

  /**
   * 配信先との接続を閉じる。
   */
  close(): Promise<void>;
}
