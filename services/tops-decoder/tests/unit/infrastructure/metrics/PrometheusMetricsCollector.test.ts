import { describe, expect, it } from 'vitest';
import { PrometheusMetricsCollector } from '@/infra/metrics/PrometheusMetricsCollector';

/**
 * 単体テスト: PrometheusMetricsCollector
 *
 * インスタンスごとに Registry を持つため、テスト間でカウンタは共有されない。
 */
describe('PrometheusMetricsCollector', () => {
  it('デコード成功数をメッセージ種別ごとに数える', async () => {
    const collector = new PrometheusMetricsCollector();

    collector.incrementDecoded('quote_update');
    collector.incrementDecoded('quote_update');
    collector.incrementDecoded('trade_report');

    const metrics = await collector.getMetrics();
    expect(metrics).toContain('tops_messages_decoded_total{type="quote_update"} 2');
    expect(metrics).toContain('tops_messages_decoded_total{type="trade_report"} 1');
  });

  it('デコード失敗・配信・エラーを数える', async () => {
    const collector = new PrometheusMetricsCollector();

    collector.incrementDecodeFailure('malformed');
    collector.incrementPublished('tops:opaque');
    collector.incrementError('publish_error');

    const metrics = await collector.getMetrics();
    expect(metrics).toContain('tops_decode_failures_total{kind="malformed"} 1');
    expect(metrics).toContain('tops_messages_published_total{stream="tops:opaque"} 1');
    expect(metrics).toContain('tops_errors_total{error_type="publish_error"} 1');
  });

  it('別インスタンスのカウンタは独立している', async () => {
    const first = new PrometheusMetricsCollector();
    const second = new PrometheusMetricsCollector();

    first.incrementDecoded('opaque');

    expect(await second.getMetrics()).not.toContain('tops_messages_decoded_total{type="opaque"}');
  });

  it('Registry の contentType は Prometheus テキスト形式', () => {
    expect(new PrometheusMetricsCollector().getRegistry().contentType).toContain('text/plain');
  });
});
