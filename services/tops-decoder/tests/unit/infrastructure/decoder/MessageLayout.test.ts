import { describe, expect, it } from 'vitest';
import { findLayout, MESSAGE_LAYOUTS, messageLength } from '@/infra/decoder/MessageLayout';

/**
 * 単体テスト: MessageLayout
 *
 * タグと固定長の表は上流フィードとバイト単位で一致している必要がある。
 */
describe('MessageLayout', () => {
  it('ディスパッチの優先順とタグ・本体長が表どおりである', () => {
    expect(MESSAGE_LAYOUTS.map(({ name, tag, bodyLength }) => [name, tag, bodyLength])).toEqual([
      ['system_event', 0x53, 9],
      ['security_directory', 0x44, 30],
      ['trading_status', 0x48, 21],
      ['retail_liquidity_indicator', 0x49, 17],
      ['operational_halt_status', 0x4f, 17],
      ['short_sale_price_test_status', 0x50, 18],
      ['quote_update', 0x51, 41],
      ['trade_report', 0x54, 37],
      ['official_price', 0x58, 25],
      ['trade_break', 0x42, 37],
      ['auction_information', 0x41, 79],
    ]);
  });

  it('トップレベルのタグは重複しない', () => {
    const tags = MESSAGE_LAYOUTS.map((layout) => layout.tag);

    expect(new Set(tags).size).toBe(tags.length);
  });

  it('0x4F はトップレベルでは operational_halt_status', () => {
    expect(findLayout(0x4f)?.name).toBe('operational_halt_status');
  });

  it('未知のタグは undefined', () => {
    expect(findLayout(0xff)).toBeUndefined();
  });

  it('messageLength はタグの 1 バイトを含む', () => {
    const quote = findLayout(0x51);

    expect(quote && messageLength(quote)).toBe(42);
  });
});
