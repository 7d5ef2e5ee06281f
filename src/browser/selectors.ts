/**
 * 按文本查找并点击页面元素
 */
import type { Page } from './controller';
import { errorMessage } from '../types';

export type ClickResult = { found: true; text: string } | { found: false; error: string };

const CLICKABLE = 'button, a, input[type="submit"], input[type="button"]';
const CLICK_MARKER = 'data-renew-click-target';

/**
 * 等待第一个可见且文本包含 texts 之一的可点击元素出现并点击
 * 超时返回 found: false,不抛错
 */
export async function waitAndClickByText(
  page: Page,
  texts: readonly string[],
  timeout: number,
  scope = 'body'
): Promise<ClickResult> {
  try {
    const handle = await page.waitForFunction(
      (scopeSelector, clickable, candidates, marker) => {
        const root = document.querySelector(scopeSelector);
        if (!root) return false;
        const wanted = candidates.map((text) => text.toLowerCase());
        for (const el of Array.from(root.querySelectorAll(clickable))) {
          if (!(el instanceof HTMLElement) || el.offsetParent === null) continue;
          const label = (el.textContent || (el instanceof HTMLInputElement ? el.value : '')).trim().toLowerCase();
          if (label && wanted.some((text) => label.includes(text))) {
            el.setAttribute(marker, '1');
            return true;
          }
        }
        return false;
      },
      { timeout, polling: 500 },
      scope,
      CLICKABLE,
      [...texts],
      CLICK_MARKER
    );
    await handle.dispose();

    const text = await page.$eval(`[${CLICK_MARKER}]`, (el, marker) => {
      el.removeAttribute(marker);
      if (el instanceof HTMLElement) {
        el.scrollIntoView({ block: 'center' });
        el.click();
      }
      return el.textContent?.trim() ?? '';
    }, CLICK_MARKER);

    return { found: true, text };
  } catch (error) {
    return { found: false, error: errorMessage(error) };
  }
}

/**
 * 等待复选框出现并勾选 (已勾选时不动)
 */
export async function waitAndCheck(page: Page, selector: string, timeout: number): Promise<ClickResult> {
  try {
    await page.waitForSelector(selector, { visible: true, timeout });
  } catch (error) {
    return { found: false, error: errorMessage(error) };
  }

  const checked = await page.$eval(selector, (el) => {
    if (!(el instanceof HTMLInputElement)) return false;
    if (!el.checked) {
      el.click();
    }
    return el.checked;
  });

  return checked ? { found: true, text: selector } : { found: false, error: `无法勾选: ${selector}` };
}

export type RowActionResult = 'clicked' | 'row-missing' | 'name-mismatch' | 'no-action';

/**
 * 按行号定位表格行,确认域名一致后点击行内匹配 pattern 的元素
 * 同名的行 (包括读不出名字的行) 各自按位置处理
 */
export async function clickRowAction(
  page: Page,
  rowSelector: string,
  target: { index: number; name: string },
  pattern: string,
  fallbackName: string
): Promise<RowActionResult> {
  return page.$$eval(
    rowSelector,
    (trs, index, domain, actionPattern, clickable, fallback): RowActionResult => {
      const row = trs[index];
      if (!row) return 'row-missing';

      const cell = row.querySelector('td:nth-child(2)') ?? row.querySelector('td:first-child');
      if ((cell?.textContent?.trim() || fallback) !== domain) return 'name-mismatch';

      const matcher = new RegExp(actionPattern, 'i');
      const action = Array.from(row.querySelectorAll(clickable)).find((el) => matcher.test(el.textContent ?? ''));
      if (!(action instanceof HTMLElement)) return 'no-action';

      action.scrollIntoView({ block: 'center' });
      action.click();
      return 'clicked';
    },
    target.index,
    target.name,
    pattern,
    CLICKABLE,
    fallbackName
  );
}

/**
 * 读取第一个可见的错误提示
 */
export async function readVisibleText(page: Page, selector: string): Promise<string | null> {
  return page.evaluate((sel) => {
    for (const el of Array.from(document.querySelectorAll(sel))) {
      if (el instanceof HTMLElement && el.offsetParent !== null) {
        const text = el.textContent?.trim();
        if (text) return text.slice(0, 200);
      }
    }
    return null;
  }, selector);
}
