import 'dotenv/config';
import process from 'node:process';
import type { Logger } from '@/application/interfaces/Logger';
import { DecodeFeedUsecase } from '@/application/usecases/DecodeFeedUsecase';
import { stringSymbol } from '@/domain/models/SymbolFactory';
import type { StreamPublisher } from '@/domain/repositories/StreamPublisher';
import { loadConfig } from '@/infra/config/loadConfig';
import { TopsMessageDecoder } from '@/infra/decoder/TopsMessageDecoder';
import { LoggerFactory } from '@/infra/logger/LoggerFactory';
import { MetricsServer } from '@/infra/metrics/MetricsServer';
import { PrometheusMetricsCollector } from '@/infra/metrics/PrometheusMetricsCollector';
import { LogPublisher } from '@/infra/publisher/LogPublisher';
import { StreamRepository } from '@/infra/redis/StreamRepository';
import { readFeedFile } from '@/infra/source/FileFeedSource';

/**
 * エントリーポイント: 設定の読み込み、依存関係の注入、シグナルハンドリング
 *
 * 責務:
 * - `.env` 読み込みと環境変数の検証
 * - コンポーネントの生成と初期化
 * - シグナルハンドリング
 *
 * 注意: バイトレイアウトや配信の詳細は main.ts に置かず、ただ「配線するだけ」にする。
 */
async function bootstrap(logger: Logger): Promise<void> {
  const config = loadConfig(process.env);

  const metricsCollector = new PrometheusMetricsCollector();
  const metricsServer =
    config.metricsPort === null ? null : new MetricsServer(metricsCollector, config.metricsPort, logger);

  // REDIS_URL が無ければ配信せずログに流す（ローカルでのフィード確認用）
  const publisher: StreamPublisher = config.redisUrl
    ? new StreamRepository(config.redisUrl, logger, metricsCollector)
    : new LogPublisher(logger);

  const usecase = new DecodeFeedUsecase(new TopsMessageDecoder(stringSymbol), publisher, logger, {
    errorPolicy: config.errorPolicy,
    metricsCollector,
  });

  let closed = false;
  const close = async () => {
    if (closed) {
      return;
    }
    closed = true;
    await publisher.close();
    await metricsServer?.stop();
  };

  const shutdown = (signal: string) => {
    logger.info('Shutting down decoder...', { signal });
    close().then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('Failed to shut down cleanly', { err: error });
        process.exit(1);
      }
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  try {
    await metricsServer?.start();
    logger.info('decoding feed', { path: config.feedInputPath, errorPolicy: config.errorPolicy });
    await usecase.execute(readFeedFile(config.feedInputPath));
  } finally {
    await close();
  }
}

const logger = LoggerFactory.create().child({ component: 'main' });

bootstrap(logger).catch((error: unknown) => {
  logger.error('Failed to decode feed', { err: error });
  process.exit(1);
});
