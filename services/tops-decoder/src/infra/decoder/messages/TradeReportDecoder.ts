import type { SymbolFactory } from '@/domain/models/SymbolFactory';
import {
  FLAGS_SIZE,
  INT64_SIZE,
  PRICE_SIZE,
  readFlags,
  readInt64,
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
 * Trade Report レイアウト
 *
 *   Offset  Size  Field
 *   ------  ----  -----------
 *   0       1     tag (0x54)
 *   1       1     sale condition flags（5 bit + 予約 3 bit）
 *   2       8     timestamp
 *   10      8     symbol（空白埋め）
 *   18      4     size
 *   22      8     price
 *   30      8     trade id
 */
export const TRADE_REPORT_TAG = 0x54;

const OFFSET_FLAGS = TAG_SIZE;
const OFFSET_TIMESTAMP = OFFSET_FLAGS + FLAGS_SIZE;
const OFFSET_SYMBOL = OFFSET_TIMESTAMP + TIMESTAMP_SIZE;
const OFFSET_SIZE = OFFSET_SYMBOL + SYMBOL_WIDTH;
const OFFSET_PRICE = OFFSET_SIZE + UINT32_SIZE;
const OFFSET_ID = OFFSET_PRICE + PRICE_SIZE;

export const TRADE_REPORT_BODY_LENGTH = OFFSET_ID + INT64_SIZE - TAG_SIZE;

const SALE_CONDITION_FLAG_COUNT = 5;

export function decodeTradeReport<S>(view: DataView, toSymbol: SymbolFactory<S>): ShapeResult<S> {
  const flagByte = readFlags(view, OFFSET_FLAGS, SALE_CONDITION_FLAG_COUNT);
  if (!flagByte.ok) {
    return {
      ok: false,
      reason: `sale condition flags have reserved bits set (0x${flagByte.reservedBits.toString(16)})`,
    };
  }
  const [intermarketSweep, extendedHours, oddLot, tradeThroughExempt, singlePrice] = flagByte.flags;

  return {
    ok: true,
    message: {
      type: 'trade_report',
      saleCondition: { intermarketSweep, extendedHours, oddLot, tradeThroughExempt, singlePrice },
      timestamp: readTimestamp(view, OFFSET_TIMESTAMP),
      symbol: readPaddedText(view, OFFSET_SYMBOL, SYMBOL_WIDTH, toSymbol),
      size: readUint32(view, OFFSET_SIZE),
      price: readPrice(view, OFFSET_PRICE),
      id: readInt64(view, OFFSET_ID),
    },
  };
}
