/**
 * ロガーインターフェース
 *
 * 構造化ログの出力先を抽象化する。実装は pino（infra/logger）。
 * テストでは LoggerMock に差し替える。
 */
export interface Logger {
  /** デバッグレベル（デコード済みメッセージの逐次出力など） */
  debug(msg: string, meta?: object): void;

  /** 情報レベル（起動・終了、フィード処理のサマリ） */
  info(msg: string, meta?: object): void;

  /** 警告レベル（デコード失敗、末尾の不完全なバイト列） */
  warn(msg: string, meta?: object): void;

  /** エラーレベル（配信失敗、起動失敗） */
  error(msg: string, meta?: object): void;

  /**
   * コンテキスト（component, feed など）を自動付与する子ロガーを作成する。
   * @param bindings 子ロガーに付与するコンテキスト情報
   */
  child(bindings: object): Logger;
}
