/**
 * 域名列表读取
 */
import type { Page } from '../browser/controller';
import { DomainRow, SiteUrls, StepTimeouts, RenewalError, ErrorType, errorMessage } from '../types';
import { logger } from '../utils/logger';

export const ROW_SELECTOR = 'table tbody tr';
export const UNKNOWN_DOMAIN = '未知域名';

/**
 * 续期按钮文本 (不区分大小写,包含即可)
 */
export const RENEW_TEXT_PATTERN = 'renew|续期|prolong';

export class DomainListReader {
  constructor(
    private page: Page,
    private urls: SiteUrls,
    private timeouts: Pick<StepTimeouts, 'domainTable'>
  ) {}

  /**
   * 打开域名列表页面并等待表格出现
   */
  async open(): Promise<void> {
    logger.info('DomainListReader', '正在加载域名列表...');

    try {
      await this.page.goto(this.urls.domains, { waitUntil: 'networkidle2' });
    } catch (error) {
      throw new RenewalError(ErrorType.NETWORK_ERROR, `域名列表页面加载失败: ${errorMessage(error)}`);
    }

    try {
      await this.page.waitForSelector(ROW_SELECTOR, { timeout: this.timeouts.domainTable });
    } catch (error) {
      throw new RenewalError(ErrorType.NETWORK_ERROR, `域名列表加载超时: ${errorMessage(error)}`);
    }
  }

  /**
   * 读取所有域名行
   */
  async readDomains(): Promise<DomainRow[]> {
    await this.open();

    const rows = await this.page.$$eval(
      ROW_SELECTOR,
      (trs, pattern, unknown) => {
        const renewText = new RegExp(pattern, 'i');
        return trs.map((tr, index) => {
          const cell = tr.querySelector('td:nth-child(2)') ?? tr.querySelector('td:first-child');
          const name = cell?.textContent?.trim() || unknown;
          const renewable = Array.from(tr.querySelectorAll('button, a')).some((el) =>
            renewText.test(el.textContent ?? '')
          );
          return { index, name, renewable };
        });
      },
      RENEW_TEXT_PATTERN,
      UNKNOWN_DOMAIN
    );

    logger.info('DomainListReader', `发现 ${rows.length} 个域名`);
    return rows;
  }
}
