/**
 * 表格行操作单元测试
 *
 * 页面函数直接在假的表格行上执行
 */
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { clickRowAction } from '../../src/browser/selectors';
import type { Page } from '../../src/browser/controller';
import { ROW_SELECTOR, RENEW_TEXT_PATTERN, UNKNOWN_DOMAIN } from '../../src/tasks/domains';

class FakeElement {
  clicks = 0;

  constructor(public textContent: string | null) {}

  click(): void {
    this.clicks++;
  }

  scrollIntoView(): void {}
}

class FakeRow {
  constructor(
    private name: string | null,
    public actions: FakeElement[]
  ) {}

  querySelector(selector: string): { textContent: string } | null {
    return selector === 'td:nth-child(2)' && this.name !== null ? { textContent: ` ${this.name} ` } : null;
  }

  querySelectorAll(): FakeElement[] {
    return this.actions;
  }
}

function createPage(rows: FakeRow[]) {
  return {
    $$eval: vi.fn(
      async (_selector: string, fn: (trs: FakeRow[], ...args: unknown[]) => unknown, ...args: unknown[]) =>
        fn(rows, ...args)
    ),
  };
}

describe('clickRowAction', () => {
  beforeEach(() => {
    vi.stubGlobal('HTMLElement', FakeElement);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('同名的行按位置分别点击', async () => {
    const first = new FakeElement('Renew');
    const second = new FakeElement('Renew');
    const page = createPage([new FakeRow(null, [first]), new FakeRow(null, [second])]);

    const result = await clickRowAction(
      page as unknown as Page,
      ROW_SELECTOR,
      { index: 1, name: UNKNOWN_DOMAIN },
      RENEW_TEXT_PATTERN,
      UNKNOWN_DOMAIN
    );

    expect(result).toBe('clicked');
    expect(first.clicks).toBe(0);
    expect(second.clicks).toBe(1);
  });

  it('行内域名与记录不一致时不点击', async () => {
    const renew = new FakeElement('续期');
    const page = createPage([new FakeRow('alpha.dpdns.org', [renew])]);

    const result = await clickRowAction(
      page as unknown as Page,
      ROW_SELECTOR,
      { index: 0, name: 'beta.dpdns.org' },
      RENEW_TEXT_PATTERN,
      UNKNOWN_DOMAIN
    );

    expect(result).toBe('name-mismatch');
    expect(renew.clicks).toBe(0);
  });

  it('行号超出表格时返回 row-missing', async () => {
    const page = createPage([new FakeRow('alpha.dpdns.org', [new FakeElement('Renew')])]);

    await expect(
      clickRowAction(page as unknown as Page, ROW_SELECTOR, { index: 3, name: 'alpha.dpdns.org' }, RENEW_TEXT_PATTERN, UNKNOWN_DOMAIN)
    ).resolves.toBe('row-missing');
  });

  it('行内没有续期按钮时返回 no-action', async () => {
    const manage = new FakeElement('Manage');
    const page = createPage([new FakeRow('alpha.dpdns.org', [manage])]);

    await expect(
      clickRowAction(page as unknown as Page, ROW_SELECTOR, { index: 0, name: 'alpha.dpdns.org' }, RENEW_TEXT_PATTERN, UNKNOWN_DOMAIN)
    ).resolves.toBe('no-action');
    expect(manage.clicks).toBe(0);
  });
});
