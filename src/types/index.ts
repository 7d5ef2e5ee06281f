/**
 * 登录凭证
 */
export interface LoginCredentials {
  email: string;
  password: string;
}

/**
 * 代理配置 (puppeteer-real-browser 的 proxy 选项)
 */
export interface ProxyConfig {
  protocol: 'http' | 'https' | 'socks4' | 'socks5';
  host: string;
  port: number;
  username?: string;
  password?: string;
}

/**
 * 浏览器配置
 */
export interface BrowserConfig {
  headless: boolean;
  proxy?: ProxyConfig;
  userAgent: string;
  windowWidth: number;
  windowHeight: number;
  timeout: number;
  executablePath?: string;
}

/**
 * 重试策略
 */
export interface RetryPolicy {
  maxRetries: number;
  retryInterval: number;
}

/**
 * 通知配置
 */
export interface NotificationConfig {
  telegram?: {
    token: string;
    chatId: string;
  };
  /** Bark 推送地址,如 https://api.day.app/<key> */
  barkUrl?: string;
}

/**
 * 站点地址
 */
export interface SiteUrls {
  login: string;
  domains: string;
}

/**
 * 各步骤的超时 (毫秒)
 */
export interface StepTimeouts {
  challenge: number;
  loginForm: number;
  loginResult: number;
  domainTable: number;
  confirmation: number;
  optionalStep: number;
}

/**
 * 输出路径
 */
export interface OutputConfig {
  resultFile: string;
  screenshotDir: string;
}

/**
 * 完整运行配置 (启动时构建一次)
 */
export interface AppConfig {
  credentials: LoginCredentials;
  urls: SiteUrls;
  browser: BrowserConfig;
  retry: RetryPolicy;
  timeouts: StepTimeouts;
  notifications: NotificationConfig;
  output: OutputConfig;
}

/**
 * 域名列表中的一行
 */
export interface DomainRow {
  index: number;
  name: string;
  renewable: boolean;
}

/**
 * 单个域名的续期结果
 */
export interface DomainOutcome {
  domain: string;
  status: 'renewed' | 'failed' | 'skipped';
  message?: string;
}

/**
 * 一次尝试的汇总
 */
export interface DomainReport {
  renewed: string[];
  failed: string[];
  skipped: string[];
  errors: string[];
}

/**
 * 写入结果文件的记录
 */
export interface RenewalResultRecord {
  timestamp: string;
  attempt: number;
  renewed_count: number;
  failed_count: number;
  skipped_count: number;
  renewed_domains: string[];
  failed_domains: string[];
  skipped_domains: string[];
  errors: string[];
}

/**
 * 错误类型
 */
export enum ErrorType {
  CONFIG_ERROR = 'CONFIG_ERROR',
  NETWORK_ERROR = 'NETWORK_ERROR',
  BROWSER_ERROR = 'BROWSER_ERROR',
  PARSE_ERROR = 'PARSE_ERROR',
  VERIFY_ERROR = 'VERIFY_ERROR',
  BUSINESS_ERROR = 'BUSINESS_ERROR',
}

/**
 * 自定义错误类
 */
export class RenewalError extends Error {
  constructor(
    public type: ErrorType,
    message: string,
    public code?: string
  ) {
    super(message);
    this.name = 'RenewalError';
  }
}

/**
 * 取错误消息
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
