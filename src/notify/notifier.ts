/**
 * 通知服务
 */
import { NotificationConfig, errorMessage } from '../types';
import { logger } from '../utils/logger';
import { BarkNotifier } from './bark';
import { TelegramNotifier } from './telegram';

export interface Notifier {
  readonly name: string;
  send(title: string, body: string): Promise<void>;
}

/**
 * 根据配置创建通知渠道
 */
export function createNotifiers(config: NotificationConfig): Notifier[] {
  const notifiers: Notifier[] = [];
  if (config.telegram) {
    notifiers.push(new TelegramNotifier(config.telegram.token, config.telegram.chatId));
  }
  if (config.barkUrl) {
    notifiers.push(new BarkNotifier(config.barkUrl));
  }
  return notifiers;
}

/**
 * 尽力而为地发送到所有渠道,任何失败只记录日志
 */
export class NotificationService {
  constructor(private notifiers: readonly Notifier[]) {}

  /**
   * @returns 发送成功的渠道数
   */
  async notify(title: string, body: string): Promise<number> {
    if (this.notifiers.length === 0) {
      logger.debug('Notification', '未配置通知渠道 (TG_TOKEN/TG_CHAT_ID 或 BARK_URL),跳过发送通知');
      return 0;
    }

    const results = await Promise.allSettled(this.notifiers.map(async (notifier) => notifier.send(title, body)));

    let delivered = 0;
    results.forEach((result, i) => {
      const name = this.notifiers[i]?.name ?? 'unknown';
      if (result.status === 'fulfilled') {
        delivered++;
        logger.info('Notification', `${name} 通知已成功发送`);
      } else {
        logger.error('Notification', `发送 ${name} 通知时发生错误: ${errorMessage(result.reason)}`);
      }
    });
    return delivered;
  }
}
