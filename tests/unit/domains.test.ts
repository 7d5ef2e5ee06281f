import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DomainListReader, UNKNOWN_DOMAIN } from '../../src/tasks/domains';
import type { Page } from '../../src/browser/controller';
import { ErrorType } from '../../src/types';
import { logger } from '../../src/utils/logger';

const urls = {
  login: 'https://dash.example.test/auth/login',
  domains: 'https://dash.example.test/panel/main?page=%2Fpanel%2Fdomains',
};

class FakeRow {
  constructor(
    private name: string | null,
    private actions: string[]
  ) {}

  querySelector(selector: string): { textContent: string } | null {
    return selector === 'td:nth-child(2)' && this.name !== null ? { textContent: `\n  ${this.name}\n` } : null;
  }

  querySelectorAll(): { textContent: string }[] {
    return this.actions.map((textContent) => ({ textContent }));
  }
}

function createPage(rows: FakeRow[]) {
  return {
    goto: vi.fn().mockResolvedValue(null),
    waitForSelector: vi.fn().mockResolvedValue({}),
    $$eval: vi.fn(
      async (_selector: string, fn: (trs: FakeRow[], ...args: unknown[]) => unknown, ...args: unknown[]) =>
        fn(rows, ...args)
    ),
  };
}

describe('DomainListReader', () => {
  beforeEach(() => {
    logger.setLevel('NONE');
  });

  it('读取域名与是否可续期', async () => {
    const fake = createPage([
      new FakeRow('alpha.dpdns.org', ['Manage', 'Renew']),
      new FakeRow(null, ['续期']),
      new FakeRow('gamma.dpdns.org', ['Manage']),
    ]);

    const rows = await new DomainListReader(fake as unknown as Page, urls, { domainTable: 60000 }).readDomains();

    expect(rows).toEqual([
      { index: 0, name: 'alpha.dpdns.org', renewable: true },
      { index: 1, name: UNKNOWN_DOMAIN, renewable: true },
      { index: 2, name: 'gamma.dpdns.org', renewable: false },
    ]);
    expect(fake.goto).toHaveBeenCalledWith(urls.domains, { waitUntil: 'networkidle2' });
    expect(fake.waitForSelector).toHaveBeenCalledWith('table tbody tr', { timeout: 60000 });
  });

  it('表格始终没有出现时抛出 NETWORK_ERROR', async () => {
    const fake = createPage([]);
    fake.waitForSelector.mockRejectedValue(new Error('Waiting for selector `table tbody tr` failed'));

    await expect(
      new DomainListReader(fake as unknown as Page, urls, { domainTable: 60000 }).readDomains()
    ).rejects.toMatchObject({
      type: ErrorType.NETWORK_ERROR,
      message: '域名列表加载超时: Waiting for selector `table tbody tr` failed',
    });
    expect(fake.$$eval).not.toHaveBeenCalled();
  });

  it('列表页面加载失败时抛出 NETWORK_ERROR', async () => {
    const fake = createPage([]);
    fake.goto.mockRejectedValue(new Error('net::ERR_TIMED_OUT'));

    await expect(
      new DomainListReader(fake as unknown as Page, urls, { domainTable: 60000 }).readDomains()
    ).rejects.toMatchObject({ type: ErrorType.NETWORK_ERROR, message: '域名列表页面加载失败: net::ERR_TIMED_OUT' });
  });
});
