import pino from 'pino';
import type { Logger } from '@/application/interfaces/Logger';

/**
 * PinoLogger の生成オプション
 */
export interface PinoLoggerOptions {
  /** ログレベル。未指定なら `LOG_LEVEL`、それも無ければ info */
  level?: string;
  /** true なら pino-pretty で人間可読形式、false なら JSON 形式 */
  pretty?: boolean;
  /** JSON 出力先（テスト用）。pretty の場合は無視される */
  destination?: pino.DestinationStream;
}

/**
 * pino を使用したロガー実装
 *
 * 開発環境では `pino-pretty` を使用して人間可読形式で出力。
 * 本番環境では JSON 形式で出力。子ロガーも同じクラスで包む。
 */
export class PinoLogger implements Logger {
  private constructor(private readonly pinoLogger: pino.Logger) {}

  static create(options: PinoLoggerOptions = {}): PinoLogger {
    const level = options.level ?? process.env.LOG_LEVEL ?? 'info';
    const usePretty = options.pretty ?? process.env.NODE_ENV !== 'production';

    if (usePretty) {
      return new PinoLogger(
        pino({
          level,
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'HH:MM:ss.l',
              ignore: 'pid,hostname',
            },
          },
        })
      );
    }

    return new PinoLogger(options.destination ? pino({ level }, options.destination) : pino({ level }));
  }

  debug(msg: string, meta: object = {}): void {
    this.pinoLogger.debug(meta, msg);
  }

  info(msg: string, meta: object = {}): void {
    this.pinoLogger.info(meta, msg);
  }

  warn(msg: string, meta: object = {}): void {
    this.pinoLogger.warn(meta, msg);
  }

  error(msg: string, meta: object = {}): void {
    this.pinoLogger.error(meta, msg);
  }

  child(bindings: object): Logger {
    return new PinoLogger(this.pinoLogger.child(bindings));
  }
}
