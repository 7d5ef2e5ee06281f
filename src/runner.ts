/**
 * 续期运行器
 *
 * 一次尝试 = 新浏览器会话 + 登录 + 读取域名 + 逐个续期,整体有界重试。
 */
import * as path from 'path';
import * as fs from 'fs/promises';
import { BrowserController, BrowserSession, Page, SessionFactory, withBrowserSession } from './browser/controller';
import { NotificationService, createNotifiers } from './notify/notifier';
import { formatFinalFailure, formatReport } from './notify/messages';
import { buildResultRecord, saveResults } from './storage/results';
import { DomainListReader } from './tasks/domains';
import { LoginProcessor } from './tasks/login';
import { RenewalExecutor, processDomains } from './tasks/renewal';
import { AppConfig, DomainReport, DomainRow, ErrorType, LoginCredentials, RenewalError, errorMessage } from './types';
import { formatTimestamp, logger } from './utils/logger';
import { delay, withRetry } from './utils/retry';

/**
 * 一次尝试中用到的页面任务
 */
export interface AttemptTasks {
  login(credentials: LoginCredentials): Promise<boolean>;
  readDomains(): Promise<DomainRow[]>;
  processDomains(rows: readonly DomainRow[]): Promise<DomainReport>;
}

export type TasksFactory = (page: Page, config: AppConfig) => AttemptTasks;

export interface RunnerDeps {
  sessionFactory: SessionFactory;
  tasksFactory: TasksFactory;
  notifications: NotificationService;
  saveResults: typeof saveResults;
  sleep: (ms: number) => Promise<void>;
  now: () => Date;
}

export interface RunOutcome {
  exitCode: number;
  attempts: number;
  report?: DomainReport;
  error?: string;
}

/**
 * 默认的页面任务组装
 */
export const createAttemptTasks: TasksFactory = (page, config) => {
  const reader = new DomainListReader(page, config.urls, config.timeouts);
  const executor = new RenewalExecutor(page, reader, config.timeouts);
  const login = new LoginProcessor(page, config.urls, config.timeouts);

  return {
    login: (credentials) => login.login(credentials),
    readDomains: () => reader.readDomains(),
    processDomains: (rows) => processDomains(rows, executor),
  };
};

export function defaultDeps(config: AppConfig): RunnerDeps {
  return {
    sessionFactory: () => new BrowserController(config.browser),
    tasksFactory: createAttemptTasks,
    notifications: new NotificationService(createNotifiers(config.notifications)),
    saveResults,
    sleep: delay,
    now: () => new Date(),
  };
}

export class RenewalRunner {
  private deps: RunnerDeps;

  constructor(
    private config: AppConfig,
    deps: Partial<RunnerDeps> = {}
  ) {
    this.deps = { ...defaultDeps(config), ...deps };
  }

  /**
   * 单次完整尝试
   */
  async runAttempt(attempt: number): Promise<DomainReport> {
    const maxRetries = this.config.retry.maxRetries;
    logger.info('RenewalRunner', `🔄 尝试 #${attempt}/${maxRetries}`);

    return withBrowserSession(this.deps.sessionFactory, async (session) => {
      try {
        const tasks = this.deps.tasksFactory(session.getCurrentPage(), this.config);

        if (!(await tasks.login(this.config.credentials))) {
          throw new RenewalError(ErrorType.VERIFY_ERROR, '登录失败');
        }

        const rows = await tasks.readDomains();
        return await tasks.processDomains(rows);
      } catch (error) {
        await this.captureFailure(session, attempt);
        throw error;
      }
    });
  }

  /**
   * 失败截图,截图本身失败只记录日志
   */
  private async captureFailure(session: BrowserSession, attempt: number): Promise<void> {
    const file = path.join(this.config.output.screenshotDir, `attempt_${attempt}_failed.png`);
    try {
      await fs.mkdir(this.config.output.screenshotDir, { recursive: true });
      await session.screenshot(file);
    } catch (error) {
      logger.warn('RenewalRunner', '保存失败截图时出错', error);
    }
  }

  /**
   * 完整运行,返回进程退出码
   */
  async run(): Promise<RunOutcome> {
    const startedAt = Date.now();
    const { maxRetries } = this.config.retry;
    logger.info('RenewalRunner', '🚀 DigitalPlat 自动续期脚本启动');

    const outcome = await withRetry((attempt) => this.runAttempt(attempt), this.config.retry, {
      sleep: this.deps.sleep,
      onAttemptFailed: (error, attempt) => {
        logger.error('RenewalRunner', `尝试 #${attempt} 失败: ${errorMessage(error)}`);
      },
    });

    let result: RunOutcome;
    if (outcome.ok) {
      const report = outcome.value;
      const message = formatReport(report, outcome.attempts, maxRetries, formatTimestamp(this.deps.now()));

      await this.deps.saveResults(
        this.config.output.resultFile,
        buildResultRecord(report, outcome.attempts, this.deps.now())
      );
      await this.deps.notifications.notify(message.title, message.body);

      logger.info(
        'RenewalRunner',
        `📊 续期完成 - 成功: ${report.renewed.length}, 跳过: ${report.skipped.length}, 失败: ${report.failed.length}`
      );
      result = { exitCode: 0, attempts: outcome.attempts, report };
    } else {
      const lastError = errorMessage(outcome.error);
      const message = formatFinalFailure(outcome.attempts, lastError);

      await this.deps.saveResults(
        this.config.output.resultFile,
        buildResultRecord({ renewed: [], failed: [], skipped: [], errors: [lastError] }, outcome.attempts, this.deps.now())
      );
      await this.deps.notifications.notify(message.title, message.body);

      logger.error('RenewalRunner', `续期彻底失败,已尝试 ${outcome.attempts} 次: ${lastError}`);
      result = { exitCode: 1, attempts: outcome.attempts, error: lastError };
    }

    logger.info('RenewalRunner', `📊 本次执行耗时: ${((Date.now() - startedAt) / 1000).toFixed(1)}秒`);
    return result;
  }
}
