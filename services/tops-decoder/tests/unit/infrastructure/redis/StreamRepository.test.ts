import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { timestampFromNanos } from '@/domain/models/Timestamp';
import type { OpaqueMessage, QuoteUpdate, TradeReport } from '@/domain/models/TopsMessage';
import { StreamRepository } from '@/infra/redis/StreamRepository';

// ioredis をモック
const mockXadd = vi.fn().mockResolvedValue('1234567890-0');
const mockQuit = vi.fn().mockResolvedValue('OK');

vi.mock('ioredis', () => {
  class MockRedis {
    xadd = mockXadd;
    quit = mockQuit;
  }

  return {
    default: MockRedis,
  };
});

const quote: QuoteUpdate = {
  type: 'quote_update',
  available: true,
  session: 'regular',
  timestamp: timestampFromNanos(1471980632572715948n),
  symbol: 'ZIEXT',
  bidSize: 9700,
  bidPrice: 99.05,
  askSize: 1000,
  askPrice: 99.07,
};

const trade: TradeReport = {
  type: 'trade_report',
  saleCondition: {
    intermarketSweep: false,
    extendedHours: true,
    oddLot: false,
    tradeThroughExempt: false,
    singlePrice: false,
  },
  timestamp: timestampFromNanos(1471980683662974915n),
  symbol: 'ZIEXT',
  size: 100,
  price: 99.05,
  id: 429974n,
};

/**
 * 単体テスト: StreamRepository
 *
 * 優先度3: Infrastructure層の外部依存あり
 * - Stream 名とフィールドの並び
 * - bigint を含むデータのシリアライズ
 * - Redis エラー時のハンドリング
 * - close() の動作
 */
describe('StreamRepository', () => {
  let publisher: StreamRepository;
  let loggerMock: LoggerMock;
  let mockMetrics: MetricsCollector;

  beforeEach(() => {
    mockXadd.mockClear();
    mockQuit.mockClear();
    mockXadd.mockResolvedValue('1234567890-0');
    mockQuit.mockResolvedValue('OK');

    loggerMock = new LoggerMock();
    mockMetrics = {
      incrementDecoded: vi.fn(),
      incrementDecodeFailure: vi.fn(),
      incrementPublished: vi.fn(),
      incrementError: vi.fn(),
      getMetrics: vi.fn(async () => ''),
      getRegistry: vi.fn(() => ({ contentType: 'text/plain' })),
    };

    publisher = new StreamRepository('redis://localhost:6379/0', loggerMock, mockMetrics);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('publish()', () => {
    it('quote_update を tops:quote_update に配信する', async () => {
      await publisher.publish(quote);

      expect(mockXadd).toHaveBeenCalledWith(
        'tops:quote_update',
        '*',
        'type',
        'quote_update',
        'symbol',
        'ZIEXT',
        'ts',
        '1471980632572715948',
        'data',
        expect.any(String)
      );
      expect(mockMetrics.incrementPublished).toHaveBeenCalledWith('tops:quote_update');
    });

    it('bigint のフィールドは 10 進文字列として JSON に書き込む', async () => {
      await publisher.publish(trade);

      const callArgs = mockXadd.mock.calls[0];
      const data: unknown = JSON.parse(callArgs[callArgs.indexOf('data') + 1]);

      expect(data).toEqual({
        type: 'trade_report',
        saleCondition: {
          intermarketSweep: false,
          extendedHours: true,
          oddLot: false,
          tradeThroughExempt: false,
          singlePrice: false,
        },
        timestamp: { epochNanoseconds: '1471980683662974915' },
        symbol: 'ZIEXT',
        size: 100,
        price: 99.05,
        id: '429974',
      });
    });

    it('symbol と timestamp を持たないメッセージは空文字列で埋める', async () => {
      const opaque: OpaqueMessage = { type: 'opaque', kind: 'trade_break' };

      await publisher.publish(opaque);

      expect(mockXadd).toHaveBeenCalledWith(
        'tops:opaque',
        '*',
        'type',
        'opaque',
        'symbol',
        '',
        'ts',
        '',
        'data',
        '{"type":"opaque","kind":"trade_break"}'
      );
    });

    it('Redis エラー時はエラーを記録して再送出する', async () => {
      const redisError = new Error('Redis connection failed');
      mockXadd.mockRejectedValueOnce(redisError);

      await expect(publisher.publish(quote)).rejects.toThrow('Redis connection failed');
      expect(mockMetrics.incrementError).toHaveBeenCalledWith('publish_error');
      expect(mockMetrics.incrementPublished).not.toHaveBeenCalled();
      expect(loggerMock.error).toHaveBeenCalledWith('failed to publish message', {
        stream: 'tops:quote_update',
        err: redisError,
      });
    });
  });

  describe('close()', () => {
    it('Redis 接続を閉じる', async () => {
      await publisher.close();

      expect(mockQuit).toHaveBeenCalledTimes(1);
    });
  });
});
