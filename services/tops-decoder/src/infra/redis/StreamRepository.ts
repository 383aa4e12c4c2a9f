import Redis from 'ioredis';
import type { Logger } from '@/application/interfaces/Logger';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import type { TopsMessage } from '@/domain/models/TopsMessage';
import type { StreamPublisher } from '@/domain/repositories/StreamPublisher';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { toStreamFields } from '@/infra/publisher/MessageSerializer';

/**
 * インフラ層: Redis Stream への書き込み実装
 *
 * 責務: デコード済みメッセージを `tops:<type>` に XADD する（実装の詳細を担当）。
 */
export class StreamRepository implements StreamPublisher {
  private readonly redis: Redis;
  private readonly logger: Logger;

  /**
   * @param redisUrl Redis 接続 URL
   * @param logger ロガー（オプショナル、未指定の場合は LoggerFactory から取得）
   * @param metricsCollector メトリクスコレクター（オプショナル）
   */
  constructor(
    redisUrl: string,
    logger?: Logger,
    private readonly metricsCollector?: MetricsCollector
  ) {
    this.redis = new Redis(redisUrl);
    this.logger = (logger ?? LoggerFactory.create()).child({ component: 'StreamRepository' });
  }

  /**
   * デコード済みメッセージを Redis Stream に配信する。
   * @param message デコード済みメッセージ
   */
  async publish(message: TopsMessage): Promise<void> {
    const stream = StreamRepository.streamName(message);
    try {
      await this.redis.xadd(stream, '*', ...toStreamFields(message));
      this.metricsCollector?.incrementPublished(stream);
    } catch (error) {
      this.metricsCollector?.incrementError('publish_error');
      this.logger.error('failed to publish message', { stream, err: error });
      throw error;
    }
  }

  /**
   * Redis 接続を閉じる。
   */
  async close(): Promise<void> {
    await this.redis.quit();
  }

  /**
   * メッセージ種別から Redis Stream 名を取得する。
   */
  static streamName(message: TopsMessage): string {
    return `tops:${message.type}`;
  }
}
