/**
 * 一次完整运行: 配置校验 → 续期 → 退出码
 */
import { loadConfig, loadLogConfig, loadNotificationConfig } from './config';
import { NotificationService, createNotifiers } from './notify/notifier';
import { formatConfigError, formatCrash } from './notify/messages';
import { RenewalRunner, RunnerDeps } from './runner';
import { AppConfig, errorMessage } from './types';
import { logger } from './utils/logger';

type Env = Record<string, string | undefined>;

export interface MainOptions {
  createRunner?: (config: AppConfig) => Pick<RenewalRunner, 'run'>;
  runnerDeps?: Partial<RunnerDeps>;
  notifications?: NotificationService;
}

/**
 * 返回进程退出码
 */
export async function main(env: Env = process.env, options: MainOptions = {}): Promise<number> {
  const logConfig = loadLogConfig(env);
  logger.setLevel(logConfig.level);
  logger.setLogFile(logConfig.file);

  let config: AppConfig;
  try {
    config = loadConfig(env);
  } catch (error) {
    const message = errorMessage(error);
    logger.error('Main', `配置错误: ${message}`);
    const notifications =
      options.notifications ?? new NotificationService(createNotifiers(loadNotificationConfig(env)));
    const text = formatConfigError(message);
    await notifications.notify(text.title, text.body);
    return 1;
  }
  logger.info('Main', '环境变量验证通过');

  const runnerDeps = options.notifications
    ? { ...options.runnerDeps, notifications: options.notifications }
    : options.runnerDeps;
  const runner = options.createRunner?.(config) ?? new RenewalRunner(config, runnerDeps);

  try {
    const outcome = await runner.run();
    return outcome.exitCode;
  } catch (error) {
    logger.error('Main', `脚本执行异常: ${errorMessage(error)}`, error);
    const notifications = options.notifications ?? new NotificationService(createNotifiers(config.notifications));
    const text = formatCrash(errorMessage(error));
    await notifications.notify(text.title, text.body);
    return 1;
  } finally {
    logger.info('Main', '脚本执行结束');
  }
}
