import type { TopsMessageType } from '@/domain/models/TopsMessage';
import { OPAQUE_MESSAGE_LAYOUTS, opaqueDecoder } from './messages/OpaqueMessageDecoder';
import { decodeQuoteUpdate, QUOTE_UPDATE_BODY_LENGTH, QUOTE_UPDATE_TAG } from './messages/QuoteUpdateDecoder';
import type { ShapeDecoder } from './messages/ShapeDecoder';
import { decodeSystemEvent, SYSTEM_EVENT_BODY_LENGTH, SYSTEM_EVENT_TAG } from './messages/SystemEventDecoder';
import { decodeTradeReport, TRADE_REPORT_BODY_LENGTH, TRADE_REPORT_TAG } from './messages/TradeReportDecoder';

/**
 * メッセージ種別ごとのタグ・固定長・本体デコーダ。
 * 長さのプレフィックスはないため、メッセージ長はタグから決まる。
 */
export interface MessageLayout {
  /** ログ・メトリクス用の名前 */
  readonly name: string;
  readonly type: TopsMessageType;
  readonly tag: number;
  /** タグを除いた本体のバイト数 */
  readonly bodyLength: number;
  readonly decode: ShapeDecoder;
}

function opaque(kind: keyof typeof OPAQUE_MESSAGE_LAYOUTS): MessageLayout {
  const { tag, bodyLength } = OPAQUE_MESSAGE_LAYOUTS[kind];
  return { name: kind, type: 'opaque', tag, bodyLength, decode: opaqueDecoder(kind) };
}

/**
 * ディスパッチの優先順。先頭から順に試し、最初にタグが一致したものを採用する。
 */
export const MESSAGE_LAYOUTS: readonly MessageLayout[] = [
  {
    name: 'system_event',
    type: 'system_event',
    tag: SYSTEM_EVENT_TAG,
    bodyLength: SYSTEM_EVENT_BODY_LENGTH,
    decode: decodeSystemEvent,
  },
  opaque('security_directory'),
  opaque('trading_status'),
  opaque('retail_liquidity_indicator'),
  opaque('operational_halt_status'),
  opaque('short_sale_price_test_status'),
  {
    name: 'quote_update',
    type: 'quote_update',
    tag: QUOTE_UPDATE_TAG,
    bodyLength: QUOTE_UPDATE_BODY_LENGTH,
    decode: decodeQuoteUpdate,
  },
  {
    name: 'trade_report',
    type: 'trade_report',
    tag: TRADE_REPORT_TAG,
    bodyLength: TRADE_REPORT_BODY_LENGTH,
    decode: decodeTradeReport,
  },
  opaque('official_price'),
  opaque('trade_break'),
  opaque('auction_information'),
];

/**
 * タグに対応するレイアウトを返す。未知のタグなら undefined。
 */
export function findLayout(tag: number): MessageLayout | undefined {
  return MESSAGE_LAYOUTS.find((layout) => layout.tag === tag);
}

/**
 * タグを含むメッセージ全体のバイト数。
 */
export function messageLength(layout: MessageLayout): number {
  return 1 + layout.bodyLength;
}
