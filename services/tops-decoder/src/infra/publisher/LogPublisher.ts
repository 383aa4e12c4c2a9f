import type { Logger } from '@/application/interfaces/Logger';
import type { TopsMessage } from '@/domain/models/TopsMessage';
import type { StreamPublisher } from '@/domain/repositories/StreamPublisher';
import { summarizeMessage } from './MessageSerializer';

/**
 * インフラ層: 配信先を持たない場合の StreamPublisher 実装
 *
 * デコード済みメッセージを debug レベルでログに流すだけ。
 */
export class LogPublisher implements StreamPublisher {
  private readonly logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'LogPublisher' });
  }

  async publish(message: TopsMessage): Promise<void> {
    this.logger.debug('decoded message', summarizeMessage(message));
  }

  async close(): Promise<void> {}
}
