import type { Timestamp } from './Timestamp';

/**
 * ドメイン層: TOPS メッセージの型定義（DTO 的な型のみ）
 *
 * 注意: デコーダはフィードの業務的な意味（板の再構築、集計など）を解釈しない。
 * ここにはワイヤ上のフィールドをそのまま写した不変の値だけを置く。
 */

/**
 * システムイベントの種別。
 */
export type SystemEventKind =
  | 'start_of_messages'
  | 'start_of_system_hours'
  | 'start_of_regular_hours'
  | 'end_of_regular_hours'
  | 'end_of_system_hours'
  | 'end_of_messages';

/**
 * 取引セッション（フラグバイトの 1 ビットから決まる）。
 */
export type MarketSession = 'regular' | 'out_of_hours';

/**
 * ペイロードを解釈しない管理系メッセージの種別。
 */
export type OpaqueMessageKind =
  | 'security_directory'
  | 'trading_status'
  | 'retail_liquidity_indicator'
  | 'operational_halt_status'
  | 'short_sale_price_test_status'
  | 'official_price'
  | 'trade_break'
  | 'auction_information';

export interface SystemEvent {
  readonly type: 'system_event';
  readonly kind: SystemEventKind;
  readonly timestamp: Timestamp;
}

/**
 * 最良気配の更新。
 *
 * @template S シンボルの表現（文字列、インターン済み ID など）
 */
export interface QuoteUpdate<S = string> {
  readonly type: 'quote_update';
  /** ワイヤ上の「取引不可」フラグの否定 */
  readonly available: boolean;
  readonly session: MarketSession;
  readonly timestamp: Timestamp;
  readonly symbol: S;
  readonly bidSize: number;
  readonly bidPrice: number;
  readonly askSize: number;
  readonly askPrice: number;
}

export interface SaleCondition {
  readonly intermarketSweep: boolean;
  readonly extendedHours: boolean;
  readonly oddLot: boolean;
  readonly tradeThroughExempt: boolean;
  readonly singlePrice: boolean;
}

/**
 * 約定報告。
 *
 * @template S シンボルの表現
 */
export interface TradeReport<S = string> {
  readonly type: 'trade_report';
  readonly saleCondition: SaleCondition;
  readonly timestamp: Timestamp;
  readonly symbol: S;
  readonly size: number;
  readonly price: number;
  /** 約定 ID（符号付き 64bit）。順序はデコーダでは検証しない */
  readonly id: bigint;
}

/**
 * 種別だけが観測できる管理系メッセージ。
 */
export interface OpaqueMessage {
  readonly type: 'opaque';
  readonly kind: OpaqueMessageKind;
}

/**
 * デコード 1 回につき必ずいずれか 1 つが完全な形で得られる。
 */
export type TopsMessage<S = string> = SystemEvent | QuoteUpdate<S> | TradeReport<S> | OpaqueMessage;

/**
 * メッセージの大分類（`type` フィールドの値）。
 */
export type TopsMessageType = TopsMessage['type'];
