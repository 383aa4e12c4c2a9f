import type { Logger } from '@/application/interfaces/Logger';
import type { MessageDecoder } from '@/application/interfaces/MessageDecoder';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { FeedDecodeError } from '@/domain/errors/FeedDecodeError';
import { describeFailure } from '@/domain/models/DecodeResult';
import type { StreamPublisher } from '@/domain/repositories/StreamPublisher';
import { StreamingMessageDecoder } from '@/application/handlers/StreamingMessageDecoder';

/**
 * デコード失敗時の振る舞い。
 * - skip: 壊れたデータを読み飛ばして続行する
 * - abort: FeedDecodeError を投げて停止する
 */
export type DecodeErrorPolicy = 'skip' | 'abort';

export interface DecodeFeedOptions {
  errorPolicy?: DecodeErrorPolicy;
  metricsCollector?: MetricsCollector;
}

/**
 * フィード 1 本の処理結果。
 */
export interface FeedSummary {
  readonly messages: number;
  readonly failures: number;
  /** 入力終端で 1 メッセージに満たなかったバイト数 */
  readonly trailingBytes: number;
}

/**
 * アプリケーション層: フィードのデコード・配信ユースケース
 *
 * 責務: バイト列のソースを逐次デコードし、得られたメッセージを順に配信する司令塔。
 *
 * 注意: バイトレイアウトの知識は持たず、MessageDecoder と StreamPublisher を組み合わせるだけ。
 */
export class DecodeFeedUsecase {
  private readonly errorPolicy: DecodeErrorPolicy;
  private readonly metricsCollector?: MetricsCollector;

  constructor(
    private readonly decoder: MessageDecoder,
    private readonly publisher: StreamPublisher,
    private readonly logger: Logger,
    options: DecodeFeedOptions = {}
  ) {
    this.errorPolicy = options.errorPolicy ?? 'skip';
    this.metricsCollector = options.metricsCollector;
  }

  /**
   * ソースを最後まで読み、デコードしたメッセージを配信する。
   * @param source バイト列のチャンクを返す非同期イテラブル（ファイル、ソケットなど）
   * @returns 処理件数のサマリ
   * @throws {FeedDecodeError} errorPolicy が abort でデコードに失敗した場合
   */
  async execute(source: AsyncIterable<Uint8Array>): Promise<FeedSummary> {
    const stream = new StreamingMessageDecoder(this.decoder);
    let messages = 0;
    let failures = 0;

    for await (const chunk of source) {
      for (const item of stream.push(chunk)) {
        if (item.ok) {
          this.metricsCollector?.incrementDecoded(item.message.type);
          // 1 件ずつ await して配信順を保つ
          await this.publisher.publish(item.message);
          messages += 1;
          continue;
        }

        failures += 1;
        this.metricsCollector?.incrementDecodeFailure(item.failure.kind);
        if (this.errorPolicy === 'abort') {
          throw new FeedDecodeError(item.failure, item.offset);
        }
        this.logger.warn('skipped undecodable bytes', {
          offset: item.offset,
          reason: describeFailure(item.failure),
        });
      }
    }

    const trailingBytes = stream.pending;
    const tail = stream.pendingFailure();
    if (tail) {
      failures += 1;
      this.metricsCollector?.incrementDecodeFailure(tail.failure.kind);
      if (this.errorPolicy === 'abort') {
        throw new FeedDecodeError(tail.failure, tail.offset);
      }
      this.logger.warn('feed ended inside a message', { offset: tail.offset, trailingBytes });
    }

    const summary: FeedSummary = { messages, failures, trailingBytes };
    this.logger.info('feed decoded', { ...summary });
    return summary;
  }
}
