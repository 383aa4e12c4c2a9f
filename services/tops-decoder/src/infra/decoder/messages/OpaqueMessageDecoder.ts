import type { OpaqueMessageKind } from '@/domain/models/TopsMessage';
import type { ShapeDecoder } from './ShapeDecoder';

/**
 * 種別とタグ・長さだけが分かっている管理系メッセージ。
 * 本体は長さ分だけ読み飛ばし、フィールドは解釈しない。
 */
export const OPAQUE_MESSAGE_LAYOUTS: Readonly<Record<OpaqueMessageKind, { tag: number; bodyLength: number }>> = {
  security_directory: { tag: 0x44, bodyLength: 30 },
  trading_status: { tag: 0x48, bodyLength: 21 },
  retail_liquidity_indicator: { tag: 0x49, bodyLength: 17 },
  operational_halt_status: { tag: 0x4f, bodyLength: 17 },
  short_sale_price_test_status: { tag: 0x50, bodyLength: 18 },
  official_price: { tag: 0x58, bodyLength: 25 },
  trade_break: { tag: 0x42, bodyLength: 37 },
  auction_information: { tag: 0x41, bodyLength: 79 },
};

export function opaqueDecoder(kind: OpaqueMessageKind): ShapeDecoder {
  return () => ({ ok: true, message: { type: 'opaque', kind } });
}
