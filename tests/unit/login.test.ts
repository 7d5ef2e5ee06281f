import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { LoginProcessor } from '../../src/tasks/login';
import type { Page } from '../../src/browser/controller';
import { ErrorType } from '../../src/types';
import { logger } from '../../src/utils/logger';

const urls = {
  login: 'https://dash.example.test/auth/login',
  domains: 'https://dash.example.test/panel/main?page=%2Fpanel%2Fdomains',
};
const timeouts = { challenge: 60000, loginForm: 60000, loginResult: 60000 };
const credentials = { email: 'user@example.com', password: 'test-password' };

function createPage(currentUrl = urls.login) {
  return {
    goto: vi.fn().mockResolvedValue(null),
    url: vi.fn(() => currentUrl),
    evaluate: vi.fn().mockResolvedValue({ challenge: false, loginForm: true, url: currentUrl }),
    waitForSelector: vi.fn().mockResolvedValue({}),
    type: vi.fn().mockResolvedValue(undefined),
    $: vi.fn().mockResolvedValue({ click: vi.fn().mockResolvedValue(undefined) }),
    keyboard: { press: vi.fn().mockResolvedValue(undefined) },
    waitForFunction: vi.fn().mockResolvedValue({}),
  };
}

describe('LoginProcessor', () => {
  beforeEach(() => {
    logger.setLevel('NONE');
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('已在面板页面时直接返回 true', async () => {
    const fake = createPage('https://dash.example.test/panel/main');

    const result = await new LoginProcessor(fake as unknown as Page, urls, timeouts).login(credentials);

    expect(result).toBe(true);
    expect(fake.goto).toHaveBeenCalledWith(urls.login, { waitUntil: 'domcontentloaded' });
    expect(fake.type).not.toHaveBeenCalled();
  });

  it('填写表单并在跳转到面板后返回 true', async () => {
    vi.useFakeTimers();
    const fake = createPage();
    fake.$.mockResolvedValue(null);

    const result = new LoginProcessor(fake as unknown as Page, urls, timeouts).login(credentials);
    await vi.runAllTimersAsync();

    await expect(result).resolves.toBe(true);
    expect(fake.waitForSelector.mock.calls.map(([selector]) => selector)).toEqual([
      'input[name="email"]',
      'input[name="password"]',
    ]);
    expect(fake.type).toHaveBeenCalledWith('input[name="email"]', 'user@example.com', { delay: 50 });
    expect(fake.type).toHaveBeenCalledWith('input[name="password"]', 'test-password', { delay: 50 });
    expect(fake.keyboard.press).toHaveBeenCalledWith('Enter');
  });

  it('等待面板超时后返回 false', async () => {
    vi.useFakeTimers();
    const fake = createPage();
    fake.evaluate
      .mockResolvedValueOnce({ challenge: false, loginForm: true, url: urls.login })
      .mockResolvedValueOnce('Invalid email or password');
    fake.waitForFunction.mockRejectedValue(new Error('Waiting failed: 60000ms exceeded'));

    const result = new LoginProcessor(fake as unknown as Page, urls, timeouts).login(credentials);
    await vi.runAllTimersAsync();

    await expect(result).resolves.toBe(false);
    expect(fake.evaluate).toHaveBeenCalledTimes(2);
  });

  it('Email 输入框始终不可见时抛出 PARSE_ERROR', async () => {
    const fake = createPage();
    fake.waitForSelector.mockRejectedValue(new Error('Waiting for selector `input[name="email"]` failed'));

    await expect(new LoginProcessor(fake as unknown as Page, urls, timeouts).login(credentials)).rejects.toMatchObject({
      type: ErrorType.PARSE_ERROR,
      message: '登录失败: Email 输入框未变为可见 (Waiting for selector `input[name="email"]` failed)',
    });
    expect(fake.type).not.toHaveBeenCalled();
  });

  it('登录页面加载失败时抛出 NETWORK_ERROR', async () => {
    const fake = createPage();
    fake.goto.mockRejectedValue(new Error('net::ERR_CONNECTION_RESET'));

    await expect(new LoginProcessor(fake as unknown as Page, urls, timeouts).login(credentials)).rejects.toMatchObject({
      type: ErrorType.NETWORK_ERROR,
      message: '登录页面加载失败: net::ERR_CONNECTION_RESET',
    });
  });
});
