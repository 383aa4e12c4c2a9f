import type { DecodeErrorPolicy } from '@/application/usecases/DecodeFeedUsecase';

/**
 * 起動時の設定値。
 */
export interface AppConfig {
  /** TOPS メッセージを連結したバイナリファイル */
  readonly feedInputPath: string;
  /** 未設定なら Redis へは配信せずログに出す */
  readonly redisUrl: string | null;
  /** 未設定ならメトリクスサーバーを起動しない */
  readonly metricsPort: number | null;
  readonly errorPolicy: DecodeErrorPolicy;
}

type Env = Readonly<Record<string, string | undefined>>;

/**
 * 必須環境変数を取得する。未設定の場合はエラーを投げる。
 * @param env 環境変数
 * @param key 環境変数名
 * @throws {Error} 環境変数が未設定の場合
 */
function requireEnv(env: Env, key: string): string {
  const value = env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function optionalEnv(env: Env, key: string): string | null {
  const value = env[key]?.trim();
  return value ? value : null;
}

function parsePort(key: string, value: string | null): number | null {
  if (value === null) {
    return null;
  }
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new Error(`Invalid port in ${key}: ${value}`);
  }
  return port;
}

function parseErrorPolicy(value: string | null): DecodeErrorPolicy {
  if (value === null || value === 'skip') {
    return 'skip';
  }
  if (value === 'abort') {
    return 'abort';
  }
  throw new Error(`Invalid DECODE_ERROR_POLICY: ${value} (expected skip or abort)`);
}

/**
 * 環境変数から設定を組み立てる。不正な値は起動時に落として気付けるようにする。
 * @param env 環境変数（通常は process.env）
 */
export function loadConfig(env: Env): AppConfig {
  return {
    feedInputPath: requireEnv(env, 'FEED_INPUT_PATH'),
    redisUrl: optionalEnv(env, 'REDIS_URL'),
    metricsPort: parsePort('METRICS_PORT', optionalEnv(env, 'METRICS_PORT')),
    errorPolicy: parseErrorPolicy(optionalEnv(env, 'DECODE_ERROR_POLICY')),
  };
}
