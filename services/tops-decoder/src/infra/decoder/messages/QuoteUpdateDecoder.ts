import type { SymbolFactory } from '@/domain/models/SymbolFactory';
import {
  FLAGS_SIZE,
  PRICE_SIZE,
  readFlags,
  readPaddedText,
  readPrice,
  readTimestamp,
  readUint32,
  SYMBOL_WIDTH,
  TAG_SIZE,
  TIMESTAMP_SIZE,
  UINT32_SIZE,
} from '../primitives';
import type { ShapeResult } from './ShapeDecoder';

/**
 * Quote Update レイアウト
 *
 *   Offset  Size  Field
 *   ------  ----  -----------
 *   0       1     tag (0x51)
 *   1       1     flags: bit7 = 取引不可, bit6 = 時間外, 残り 6 bit 予約
 *   2       8     timestamp
 *   10      8     symbol（空白埋め）
 *   18      4     bid size
 *   22      8     bid price
 *   30      8     ask price
 *   38      4     ask size
 *
 * 買い側は (size, price)、売り側は (price, size) の順で並ぶ。
 */
export const QUOTE_UPDATE_TAG = 0x51;

const OFFSET_FLAGS = TAG_SIZE;
const OFFSET_TIMESTAMP = OFFSET_FLAGS + FLAGS_SIZE;
const OFFSET_SYMBOL = OFFSET_TIMESTAMP + TIMESTAMP_SIZE;
const OFFSET_BID_SIZE = OFFSET_SYMBOL + SYMBOL_WIDTH;
const OFFSET_BID_PRICE = OFFSET_BID_SIZE + UINT32_SIZE;
const OFFSET_ASK_PRICE = OFFSET_BID_PRICE + PRICE_SIZE;
const OFFSET_ASK_SIZE = OFFSET_ASK_PRICE + PRICE_SIZE;

export const QUOTE_UPDATE_BODY_LENGTH = OFFSET_ASK_SIZE + UINT32_SIZE - TAG_SIZE;

const QUOTE_FLAG_COUNT = 2;

export function decodeQuoteUpdate<S>(view: DataView, toSymbol: SymbolFactory<S>): ShapeResult<S> {
  const flagByte = readFlags(view, OFFSET_FLAGS, QUOTE_FLAG_COUNT);
  if (!flagByte.ok) {
    return {
      ok: false,
      reason: `quote update flags have reserved bits set (0x${flagByte.reservedBits.toString(16)})`,
    };
  }
  const [notAvailable, outOfHours] = flagByte.flags;

  return {
    ok: true,
    message: {
      type: 'quote_update',
      available: !notAvailable,
      session: outOfHours ? 'out_of_hours' : 'regular',
      timestamp: readTimestamp(view, OFFSET_TIMESTAMP),
      symbol: readPaddedText(view, OFFSET_SYMBOL, SYMBOL_WIDTH, toSymbol),
      bidSize: readUint32(view, OFFSET_BID_SIZE),
      bidPrice: readPrice(view, OFFSET_BID_PRICE),
      askSize: readUint32(view, OFFSET_ASK_SIZE),
      askPrice: readPrice(view, OFFSET_ASK_PRICE),
    },
  };
}
