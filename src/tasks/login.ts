/**
 * 登录处理器
 */
import type { Page } from '../browser/controller';
import { waitForChallenge } from '../browser/controller';
import { LoginCredentials, SiteUrls, StepTimeouts, RenewalError, ErrorType, errorMessage } from '../types';
import { logger } from '../utils/logger';
import { delay } from '../utils/retry';

export const EMAIL_SELECTOR = 'input[name="email"]';
export const PASSWORD_SELECTOR = 'input[name="password"]';
export const SUBMIT_SELECTOR = 'button[type="submit"]';
const ERROR_SELECTOR = '.error, .alert-danger, [class*="error"], [role="alert"]';

/**
 * 登录成功后所在页面
 */
export const PANEL_PATH = '/panel/main';

const random = (min: number, max: number) => Math.random() * (max - min) + min;

export class LoginProcessor {
  constructor(
    private page: Page,
    private urls: SiteUrls,
    private timeouts: Pick<StepTimeouts, 'challenge' | 'loginForm' | 'loginResult'>
  ) {}

  /**
   * 执行登录操作
   * 返回 false 表示提交后未进入面板; 页面异常时抛出 RenewalError
   * 不做内部重试,由调用方整体重试
   */
  async login(credentials: LoginCredentials): Promise<boolean> {
    logger.info('LoginProcessor', '正在访问登录页面...');

    try {
      await this.page.goto(this.urls.login, { waitUntil: 'domcontentloaded' });
    } catch (error) {
      throw new RenewalError(ErrorType.NETWORK_ERROR, `登录页面加载失败: ${errorMessage(error)}`);
    }

    await waitForChallenge(this.page, this.timeouts.challenge);

    if (this.page.url().includes(PANEL_PATH)) {
      logger.info('LoginProcessor', '检测到已登录状态,跳过登录流程');
      return true;
    }

    await this.fillLoginForm(credentials);
    await this.submitLogin();

    return this.waitForLoginResult();
  }

  /**
   * 等待输入框变为可见后填写
   */
  private async fillLoginForm(credentials: LoginCredentials): Promise<void> {
    logger.info('LoginProcessor', '等待登录表单变为可见...');

    await this.waitVisible(EMAIL_SELECTOR, this.timeouts.loginForm, 'Email 输入框未变为可见');
    // 邮箱框出现后页面脚本可能还在渲染密码框
    await this.waitVisible(PASSWORD_SELECTOR, 30000, 'Password 输入框未变为可见');

    logger.info('LoginProcessor', '正在填写登录表单...');
    await this.page.type(EMAIL_SELECTOR, credentials.email, { delay: 50 });
    await delay(random(500, 1500));
    await this.page.type(PASSWORD_SELECTOR, credentials.password, { delay: 50 });
    await delay(random(500, 1500));
  }

  private async waitVisible(selector: string, timeout: number, failure: string): Promise<void> {
    try {
      await this.page.waitForSelector(selector, { visible: true, timeout });
    } catch (error) {
      throw new RenewalError(ErrorType.PARSE_ERROR, `登录失败: ${failure} (${errorMessage(error)})`);
    }
  }

  /**
   * 提交登录表单
   */
  private async submitLogin(): Promise<void> {
    logger.info('LoginProcessor', '正在点击登录按钮...');

    const button = await this.page.$(SUBMIT_SELECTOR);
    if (button) {
      await button.click();
    } else {
      logger.info('LoginProcessor', '未找到登录按钮,尝试按回车键提交');
      await this.page.keyboard.press('Enter');
    }
  }

  /**
   * 等待跳转到面板页面
   */
  private async waitForLoginResult(): Promise<boolean> {
    try {
      await this.page.waitForFunction(
        (panelPath) => window.location.href.includes(panelPath),
        { timeout: this.timeouts.loginResult, polling: 500 },
        PANEL_PATH
      );
      logger.info('LoginProcessor', '✅ 登录成功');
      return true;
    } catch (error) {
      // 超时后 URL 可能已经变化
      if (this.page.url().includes(PANEL_PATH)) {
        logger.info('LoginProcessor', '✅ 登录成功');
        return true;
      }

      const reason = await this.readErrorText();
      logger.error('LoginProcessor', `登录状态验证失败${reason ? `: ${reason}` : ''}`, error);
      return false;
    }
  }

  /**
   * 读取页面上第一个错误提示
   */
  private async readErrorText(): Promise<string | null> {
    try {
      return await this.page.evaluate((selector) => {
        const element = document.querySelector(selector);
        const text = element?.textContent?.trim();
        return text ? text.slice(0, 200) : null;
      }, ERROR_SELECTOR);
    } catch (error) {
      logger.debug('LoginProcessor', '读取错误提示失败', error);
      return null;
    }
  }
}
