import type { DecodeFailureKind } from '@/domain/models/DecodeResult';
import type { TopsMessageType } from '@/domain/models/TopsMessage';

/**
 * メトリクスレジストリの最小インターフェース
 * prom-client の Registry 型を抽象化
 */
export interface MetricsRegistry {
  contentType: string;
}

/**
 * メトリクス収集インターフェース
 *
 * 責務: デコード・配信に関するメトリクスの収集・保持・公開を抽象化
 */
export interface MetricsCollector {
  /**
   * デコードに成功したメッセージ数をカウント
   * @param type メッセージ種別（system_event, quote_update, trade_report, opaque）
   */
  incrementDecoded(type: TopsMessageType): void;

  /**
   * デコード失敗数をカウント
   * @param kind 失敗種別（incomplete, malformed, unrecognized_tag）
   */
  incrementDecodeFailure(kind: DecodeFailureKind): void;

  /**
   * 配信メッセージ数をカウント
   * @param stream ストリーム名（tops:quote_update など）
   */
  incrementPublished(stream: string): void;

  /**
   * エラー数をカウント
   * @param errorType エラータイプ（publish_error, source_error）
   */
  incrementError(errorType: string): void;

  /**
   * Prometheus 形式のメトリクス文字列を取得
   */
  getMetrics(): Promise<string>;

  /**
   * メトリクスレジストリを取得（HTTP サーバーで使用）
   */
  getRegistry(): MetricsRegistry;
}
