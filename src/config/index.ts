/**
 * 配置加载
 *
 * 所有环境变量在启动时经 zod 校验一次,构建成 AppConfig 后显式传递。
 */
import * as fs from 'fs';
import dotenv from 'dotenv';
import { z } from 'zod';
import { AppConfig, ErrorType, NotificationConfig, ProxyConfig, RenewalError } from '../types';
import type { LogLevel } from '../utils/logger';

export const DEFAULT_BASE_URL = 'https://dash.domain.digitalplat.org';
export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

type Env = Record<string, string | undefined>;

// GitHub Actions 中未设置的 secret 会以空字符串出现
const emptyToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const requiredString = (name: string) =>
  z.preprocess(
    emptyToUndefined,
    z.string({ required_error: `缺少必需的环境变量: ${name}` }).trim().min(1, `缺少必需的环境变量: ${name}`)
  );

const optionalString = z.preprocess(emptyToUndefined, z.string().trim().optional());

const positiveInt = (fallback: number) =>
  z.preprocess(emptyToUndefined, z.coerce.number().int().positive().default(fallback));

const booleanFlag = (fallback: boolean) =>
  z.preprocess(
    (value) => {
      const normalized = emptyToUndefined(value);
      return typeof normalized === 'string' ? normalized.toLowerCase() : normalized;
    },
    z
      .enum(['true', 'false', '1', '0', 'yes', 'no'])
      .default(fallback ? 'true' : 'false')
      .transform((value) => value === 'true' || value === '1' || value === 'yes')
  );

const EnvSchema = z.object({
  DP_EMAIL: requiredString('DP_EMAIL'),
  DP_PASSWORD: requiredString('DP_PASSWORD'),
  TG_TOKEN: optionalString,
  TG_CHAT_ID: optionalString,
  BARK_URL: optionalString,
  PROXY_URL: optionalString,
  HEADLESS: booleanFlag(true),
  CHROME_PATH: optionalString,
  USER_AGENT: optionalString,
  MAX_RETRIES: positiveInt(3),
  RETRY_DELAY_MS: positiveInt(30000),
  BROWSER_TIMEOUT_MS: positiveInt(120000),
  LOGIN_TIMEOUT_MS: positiveInt(180000),
  RESULT_FILE: z.preprocess(emptyToUndefined, z.string().default('renewal_results.json')),
  SCREENSHOT_DIR: z.preprocess(emptyToUndefined, z.string().default('screenshots')),
  DP_BASE_URL: z.preprocess(emptyToUndefined, z.string().url().default(DEFAULT_BASE_URL)),
});

const LogSchema = z.object({
  LOG_LEVEL: z.preprocess(
    (value) => {
      const normalized = emptyToUndefined(value);
      return typeof normalized === 'string' ? normalized.toUpperCase() : normalized;
    },
    z.enum(['DEBUG', 'INFO', 'WARN', 'ERROR', 'NONE']).default('INFO')
  ),
  LOG_FILE: z.preprocess(emptyToUndefined, z.string().default('renewal.log')),
});

/**
 * 如果存在 .env 文件则加载
 */
export function loadDotEnv(filePath = '.env'): void {
  if (fs.existsSync(filePath)) {
    dotenv.config({ path: filePath });
  }
}

const PROXY_PROTOCOLS = ['http', 'https', 'socks4', 'socks5'] as const;

function isProxyProtocol(value: string): value is ProxyConfig['protocol'] {
  return PROXY_PROTOCOLS.some((protocol) => protocol === value);
}

/**
 * 解析代理地址 http://[user:pass@]host:port 或 socks5://host:port
 */
export function parseProxyUrl(proxyUrl: string): ProxyConfig {
  let url: URL;
  try {
    url = new URL(proxyUrl);
  } catch {
    throw new RenewalError(ErrorType.CONFIG_ERROR, `PROXY_URL 格式无效: ${proxyUrl}`);
  }

  const protocol = url.protocol.replace(/:$/, '');
  if (!isProxyProtocol(protocol)) {
    throw new RenewalError(ErrorType.CONFIG_ERROR, `PROXY_URL 不支持的协议: ${protocol}`);
  }
  if (!url.hostname) {
    throw new RenewalError(ErrorType.CONFIG_ERROR, `PROXY_URL 缺少主机名: ${proxyUrl}`);
  }

  const defaultPort = protocol === 'https' ? 443 : protocol === 'http' ? 80 : 1080;
  const proxy: ProxyConfig = {
    protocol,
    host: url.hostname,
    port: url.port ? Number(url.port) : defaultPort,
  };
  if (url.username && (protocol === 'socks4' || protocol === 'socks5')) {
    // socks 代理只能经 --proxy-server 传给 Chrome,无法携带认证信息
    throw new RenewalError(ErrorType.CONFIG_ERROR, 'PROXY_URL: socks 代理不支持用户名密码认证');
  }
  if (url.username) {
    proxy.username = decodeURIComponent(url.username);
    proxy.password = decodeURIComponent(url.password);
  }
  return proxy;
}

/**
 * 只读取通知相关的配置,从不抛错 (配置错误时也要能发通知)
 */
export function loadNotificationConfig(env: Env = process.env): NotificationConfig {
  const read = (name: string) => {
    const value = env[name]?.trim();
    return value ? value : undefined;
  };

  const token = read('TG_TOKEN');
  const chatId = read('TG_CHAT_ID');
  const barkUrl = read('BARK_URL');

  const config: NotificationConfig = {};
  if (token && chatId) {
    config.telegram = { token, chatId };
  }
  if (barkUrl) {
    config.barkUrl = barkUrl;
  }
  return config;
}

export function loadLogConfig(env: Env = process.env): { level: LogLevel; file: string } {
  const parsed = LogSchema.safeParse(env);
  if (!parsed.success) {
    return { level: 'INFO', file: 'renewal.log' };
  }
  return { level: parsed.data.LOG_LEVEL, file: parsed.data.LOG_FILE };
}

/**
 * 校验环境变量并构建运行配置
 * @throws RenewalError(CONFIG_ERROR) 列出所有缺失或无效的变量
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) =>
      issue.message.startsWith('缺少必需的环境变量') ? issue.message : `${issue.path.join('.')}: ${issue.message}`
    );
    throw new RenewalError(ErrorType.CONFIG_ERROR, issues.join('; '));
  }

  const values = parsed.data;
  const baseUrl = values.DP_BASE_URL.replace(/\/+$/, '');

  return {
    credentials: {
      email: values.DP_EMAIL,
      password: values.DP_PASSWORD,
    },
    urls: {
      login: `${baseUrl}/auth/login`,
      domains: `${baseUrl}/panel/main?page=%2Fpanel%2Fdomains`,
    },
    browser: {
      headless: values.HEADLESS,
      proxy: values.PROXY_URL ? parseProxyUrl(values.PROXY_URL) : undefined,
      userAgent: values.USER_AGENT ?? DEFAULT_USER_AGENT,
      windowWidth: 1280,
      windowHeight: 720,
      timeout: values.BROWSER_TIMEOUT_MS,
      executablePath: values.CHROME_PATH,
    },
    retry: {
      maxRetries: values.MAX_RETRIES,
      retryInterval: values.RETRY_DELAY_MS,
    },
    timeouts: {
      challenge: values.LOGIN_TIMEOUT_MS,
      loginForm: values.LOGIN_TIMEOUT_MS,
      loginResult: 60000,
      domainTable: 60000,
      confirmation: 15000,
      optionalStep: 5000,
    },
    notifications: loadNotificationConfig(env),
    output: {
      resultFile: values.RESULT_FILE,
      screenshotDir: values.SCREENSHOT_DIR,
    },
  };
}
