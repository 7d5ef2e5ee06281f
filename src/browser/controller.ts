/**
 * 浏览器控制器
 */
import { connect } from 'puppeteer-real-browser';
import { BrowserConfig, ProxyConfig, RenewalError, ErrorType, errorMessage } from '../types';
import { logger } from '../utils/logger';
import { delay } from '../utils/retry';

type ConnectResult = Awaited<ReturnType<typeof connect>>;
export type Browser = ConnectResult['browser'];
export type Page = ConnectResult['page'];

/**
 * 固定的启动参数 (无头运行于 CI 容器)
 */
export const BASE_BROWSER_ARGS: readonly string[] = [
  '--no-sandbox',
  '--disable-setuid-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
  '--disable-software-rasterizer',
  '--disable-blink-features=AutomationControlled',
  '--disable-breakpad',
  '--disable-client-side-phishing-detection',
  '--disable-infobars',
  '--no-first-run',
  '--no-default-browser-check',
  '--hide-scrollbars',
  '--mute-audio',
];

/**
 * 挑战页面特征
 */
const CHALLENGE_SELECTORS = 'div#challenge-form, .challenge-form, #challenge-stage, iframe[src*="challenges.cloudflare.com"]';

/**
 * 挑战完成后可能出现的页面
 */
const LOGIN_FORM_SELECTOR = "input[name='email'], input[type='email']";

/**
 * 一次尝试所持有的浏览器会话
 */
export interface BrowserSession {
  launch(): Promise<void>;
  getCurrentPage(): Page;
  screenshot(filePath: string): Promise<void>;
  close(): Promise<void>;
}

export class BrowserController implements BrowserSession {
  private browser: Browser | null = null;
  private currentPage: Page | null = null;
  private config: BrowserConfig;

  constructor(config: BrowserConfig) {
    this.config = config;
  }

  /**
   * 生成启动参数
   * socks 代理只能通过 --proxy-server 传入; http 代理交给 connect() 的 proxy 选项 (支持认证)
   */
  buildLaunchArgs(): string[] {
    const args = [
      ...BASE_BROWSER_ARGS,
      `--window-size=${this.config.windowWidth},${this.config.windowHeight}`,
      `--user-agent=${this.config.userAgent}`,
    ];

    const proxy = this.config.proxy;
    if (proxy && isSocksProxy(proxy)) {
      args.push(`--proxy-server=${proxy.protocol}://${proxy.host}:${proxy.port}`);
    }

    return args;
  }

  /**
   * 启动浏览器
   */
  async launch(): Promise<void> {
    try {
      logger.info('BrowserController', '正在启动浏览器...');

      const proxy = this.config.proxy;
      if (proxy) {
        logger.debug('BrowserController', `使用代理 ${proxy.protocol}://${proxy.host}:${proxy.port}`);
      } else {
        logger.warn('BrowserController', '未配置代理,将直接连接');
      }

      const { browser, page } = await connect({
        headless: this.config.headless,
        turnstile: true, // 自动处理 Cloudflare Turnstile
        args: this.buildLaunchArgs(),
        proxy:
          proxy && !isSocksProxy(proxy)
            ? { host: proxy.host, port: proxy.port, username: proxy.username, password: proxy.password }
            : undefined,
        customConfig: {
          chromePath: this.config.executablePath,
        },
        connectOption: {
          defaultViewport: {
            width: this.config.windowWidth,
            height: this.config.windowHeight,
          },
        },
      });

      this.browser = browser;
      this.currentPage = page;

      logger.info('BrowserController', '浏览器启动成功');

      await this.configurePage(page);
    } catch (error) {
      logger.error('BrowserController', '浏览器启动失败', error);
      // 启动到一半失败时也要释放已创建的浏览器
      await this.close();
      throw new RenewalError(ErrorType.BROWSER_ERROR, `浏览器启动失败: ${errorMessage(error)}`);
    }
  }

  /**
   * 配置页面
   */
  private async configurePage(page: Page): Promise<void> {
    page.on('console', (msg) => {
      const type = msg.type();
      const text = msg.text();

      if (type === 'error') {
        logger.debug('BrowserConsole', text);
      } else if (/Turnstile|Cloudflare|challenge|captcha/i.test(text)) {
        logger.info('BrowserConsole', text);
      }
    });

    page.on('pageerror', (error) => {
      logger.debug('PageError', errorMessage(error));
    });

    page.setDefaultTimeout(this.config.timeout);
    page.setDefaultNavigationTimeout(this.config.timeout);

    await page.setUserAgent(this.config.userAgent);
    await page.setExtraHTTPHeaders({
      'Accept-Language': 'en-US,en;q=0.9,zh-CN;q=0.8,zh;q=0.7',
    });

    logger.debug('BrowserController', '页面配置完成');
  }

  /**
   * 获取当前页面
   */
  getCurrentPage(): Page {
    if (!this.currentPage) {
      throw new RenewalError(ErrorType.BROWSER_ERROR, '当前没有活动页面,请先调用 launch() 方法');
    }
    return this.currentPage;
  }

  /**
   * 截图
   */
  async screenshot(filePath: string): Promise<void> {
    const page = this.getCurrentPage();

    try {
      await page.screenshot({ path: filePath, fullPage: true });
      logger.info('BrowserController', `截图已保存到: ${filePath}`);
    } catch (error) {
      throw new RenewalError(ErrorType.BROWSER_ERROR, `截图失败: ${errorMessage(error)}`);
    }
  }

  /**
   * 关闭浏览器 (重复调用无副作用)
   */
  async close(): Promise<void> {
    const browser = this.browser;
    if (!browser) {
      return;
    }
    this.browser = null;
    this.currentPage = null;

    try {
      await browser.close();
      logger.info('BrowserController', '浏览器已关闭');
    } catch (error) {
      logger.error('BrowserController', '关闭浏览器失败', error);
    }
  }
}

function isSocksProxy(proxy: ProxyConfig): boolean {
  return proxy.protocol === 'socks4' || proxy.protocol === 'socks5';
}

/**
 * 轮询等待挑战页面结束
 */
export async function waitForChallenge(page: Page, timeoutMs: number, pollMs = 3000): Promise<void> {
  logger.info('BrowserController', '正在等待 Cloudflare 验证...');
  const deadline = Date.now() + timeoutMs;

  while (Date.now() < deadline) {
    // 挑战通过时页面会跳转,轮询中的执行上下文随之销毁,下一轮再读
    const state = await page
      .evaluate(
        (challengeSelector, formSelector) => ({
          challenge: document.querySelector(challengeSelector) !== null,
          loginForm: document.querySelector(formSelector) !== null,
          url: window.location.href,
        }),
        CHALLENGE_SELECTORS,
        LOGIN_FORM_SELECTOR
      )
      .catch((error: unknown) => {
        logger.debug('BrowserController', `页面跳转中: ${errorMessage(error)}`);
        return null;
      });

    if (state?.challenge) {
      logger.debug('BrowserController', '检测到挑战页面,等待自动验证...');
    } else if (state && (state.loginForm || state.url.includes('auth/login'))) {
      logger.info('BrowserController', '已通过 Cloudflare 验证,进入登录页面');
      return;
    } else if (state?.url.includes('panel/main')) {
      logger.info('BrowserController', '已直接进入面板页面');
      return;
    }

    await delay(pollMs);
  }

  throw new RenewalError(ErrorType.VERIFY_ERROR, `Cloudflare 验证超时 (${Math.round(timeoutMs / 1000)}s)`);
}

/**
 * 浏览器会话工厂
 */
export type SessionFactory = () => BrowserSession;

const activeSessions = new Set<BrowserSession>();

/**
 * 作用域内使用浏览器: 无论成功或失败,退出时恰好关闭一次
 */
export async function withBrowserSession<T>(
  factory: SessionFactory,
  fn: (session: BrowserSession) => Promise<T>
): Promise<T> {
  const session = factory();
  activeSessions.add(session);
  try {
    await session.launch();
    return await fn(session);
  } finally {
    activeSessions.delete(session);
    await session.close();
  }
}

/**
 * 关闭所有仍在使用中的会话 (进程收到终止信号时)
 */
export async function closeActiveSessions(): Promise<void> {
  const sessions = [...activeSessions];
  activeSessions.clear();
  await Promise.allSettled(sessions.map(async (session) => session.close()));
}
