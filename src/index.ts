#!/usr/bin/env node
/**
 * 入口: DigitalPlat 域名自动续期
 */
import { closeActiveSessions } from './browser/controller';
import { loadDotEnv } from './config';
import { main } from './main';
import { logger } from './utils/logger';

loadDotEnv();

process.on('SIGINT', () => {
  logger.info('Main', '收到终止信号,正在关闭浏览器后停止');
  closeActiveSessions()
    .catch((error: unknown) => {
      logger.error('Main', '关闭浏览器失败', error);
    })
    .finally(() => {
      process.exit(130);
    });
});

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('Main', '未捕获的错误', error);
    process.exitCode = 1;
  });
