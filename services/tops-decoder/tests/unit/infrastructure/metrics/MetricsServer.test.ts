import { createServer, type Server } from 'node:net';
import { LoggerMock } from '@test/unit/helpers/mocks/LoggerMock';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
import { MetricsServer } from '@/infra/metrics/MetricsServer';

function createResponse() {
  return {
    statusCode: 0,
    setHeader: vi.fn(),
    end: vi.fn(),
  };
}

/**
 * 単体テスト: MetricsServer のリクエスト処理
 *
 * リクエスト処理はソケットを開かず handle() を直接呼ぶ。
 * 起動失敗のケースのみループバックで使用中のポートを用意する。
 */
describe('MetricsServer', () => {
  let mockMetrics: MetricsCollector;
  let loggerMock: LoggerMock;
  let server: MetricsServer;

  beforeEach(() => {
    mockMetrics = {
      incrementDecoded: vi.fn(),
      incrementDecodeFailure: vi.fn(),
      incrementPublished: vi.fn(),
      incrementError: vi.fn(),
      getMetrics: vi.fn(async () => 'tops_errors_total 0\n'),
      getRegistry: vi.fn(() => ({ contentType: 'text/plain; version=0.0.4; charset=utf-8' })),
    };
    loggerMock = new LoggerMock();
    server = new MetricsServer(mockMetrics, 9464, loggerMock);
  });

  it('GET /metrics でメトリクスを返す', async () => {
    const res = createResponse();

    await server.handle({ url: '/metrics', method: 'GET' }, res);

    expect(res.statusCode).toBe(200);
    expect(res.setHeader).toHaveBeenCalledWith('Content-Type', 'text/plain; version=0.0.4; charset=utf-8');
    expect(res.end).toHaveBeenCalledWith('tops_errors_total 0\n');
  });

  it('それ以外のパスやメソッドは 404', async () => {
    const wrongPath = createResponse();
    const wrongMethod = createResponse();

    await server.handle({ url: '/health', method: 'GET' }, wrongPath);
    await server.handle({ url: '/metrics', method: 'POST' }, wrongMethod);

    expect(wrongPath.statusCode).toBe(404);
    expect(wrongMethod.statusCode).toBe(404);
    expect(mockMetrics.getMetrics).not.toHaveBeenCalled();
  });

  it('メトリクスの取得に失敗した場合は 500 を返してログに残す', async () => {
    const failure = new Error('registry broken');
    vi.mocked(mockMetrics.getMetrics).mockRejectedValue(failure);
    const res = createResponse();

    await server.handle({ url: '/metrics', method: 'GET' }, res);

    expect(res.statusCode).toBe(500);
    expect(res.end).toHaveBeenCalledWith('Internal Server Error');
    expect(loggerMock.error).toHaveBeenCalledWith('Failed to get metrics', { err: failure });
  });

  it('起動していない状態で stop() しても解決する', async () => {
    await expect(server.stop()).resolves.toBeUndefined();
  });

  describe('start()', () => {
    let blocker: Server | null = null;

    afterEach(async () => {
      const current = blocker;
      blocker = null;
      if (current) {
        await new Promise<void>((resolve) => current.close(() => resolve()));
      }
    });

    async function occupyPort(): Promise<number> {
      const occupied = createServer();
      blocker = occupied;
      await new Promise<void>((resolve) => occupied.listen(0, resolve));
      const address = occupied.address();
      if (address === null || typeof address === 'string') {
        throw new Error('expected a TCP address');
      }
      return address.port;
    }

    it('ポートが使用中なら reject し、エラーをログに残す', async () => {
      const port = await occupyPort();
      const busy = new MetricsServer(mockMetrics, port, loggerMock);

      await expect(busy.start()).rejects.toMatchObject({ code: 'EADDRINUSE' });
      expect(loggerMock.error).toHaveBeenCalledWith(
        'Metrics server failed to start',
        expect.objectContaining({ port })
      );
      await expect(busy.stop()).resolves.toBeUndefined();
    });
  });
});
