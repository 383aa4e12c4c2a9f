import { Counter, Registry } from 'prom-client';
import type { MetricsCollector, MetricsRegistry } from '@/application/interfaces/MetricsCollector';
import type { DecodeFailureKind } from '@/domain/models/DecodeResult';
import type { TopsMessageType } from '@/domain/models/TopsMessage';

/**
 * Prometheus メトリクスコレクター実装
 * テストで別レジストリを使用するため、シングルトンパターンの実装にはしていない。
 *
 * 責務: prom-client を使用してデコード・配信のメトリクスを収集・保持
 */
export class PrometheusMetricsCollector implements MetricsCollector {
  private readonly register: Registry;
  private readonly decodedCounter: Counter;
  private readonly decodeFailureCounter: Counter;
  private readonly publishedCounter: Counter;
  private readonly errorCounter: Counter;

  constructor() {
    this.register = new Registry();

    // デコード成功数（メッセージ種別ごと）
    this.decodedCounter = new Counter({
      name: 'tops_messages_decoded_total',
      help: 'Total number of TOPS messages decoded',
      labelNames: ['type'],
      registers: [this.register],
    });

    // デコード失敗数（失敗種別ごと）
    this.decodeFailureCounter = new Counter({
      name: 'tops_decode_failures_total',
      help: 'Total number of TOPS decode failures',
      labelNames: ['kind'],
      registers: [this.register],
    });

    this.publishedCounter = new Counter({
      name: 'tops_messages_published_total',
      help: 'Total number of decoded messages published downstream',
      labelNames: ['stream'],
      registers: [this.register],
    });

    this.errorCounter = new Counter({
      name: 'tops_errors_total',
      help: 'Total number of errors',
      labelNames: ['error_type'],
      registers: [this.register],
    });
  }

  incrementDecoded(type: TopsMessageType): void {
    this.decodedCounter.inc({ type });
  }

  incrementDecodeFailure(kind: DecodeFailureKind): void {
    this.decodeFailureCounter.inc({ kind });
  }

  incrementPublished(stream: string): void {
    this.publishedCounter.inc({ stream });
  }

  incrementError(errorType: string): void {
    this.errorCounter.inc({ error_type: errorType });
  }

  async getMetrics(): Promise<string> {
    return await this.register.metrics();
  }

  getRegistry(): MetricsRegistry {
    return this.register;
  }
}
