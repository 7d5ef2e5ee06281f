/**
 * 续期执行器
 */
import type { Page } from '../browser/controller';
import { clickRowAction, readVisibleText, waitAndCheck, waitAndClickByText } from '../browser/selectors';
import { DomainOutcome, DomainReport, DomainRow, StepTimeouts, RenewalError, ErrorType, errorMessage } from '../types';
import { logger } from '../utils/logger';
import { delay } from '../utils/retry';
import { ROW_SELECTOR, RENEW_TEXT_PATTERN, UNKNOWN_DOMAIN } from './domains';

const CONFIRM_TEXTS = ['确认', 'Confirm', 'Continue', 'Order Now'] as const;
const CHECKOUT_TEXTS = ['Checkout', 'Complete Order', 'Place Order', '结账', '提交订单'] as const;
const TERMS_SELECTOR =
  'input[type="checkbox"][name*="agree" i], input[type="checkbox"][name*="terms" i], input[type="checkbox"][name*="tos" i], input[type="checkbox"]#accepttos';
const ERROR_BANNER_SELECTOR = '.alert-danger, .errorbox, [role="alert"].alert-danger';

const random = (min: number, max: number) => Math.random() * (max - min) + min;

/**
 * 回到域名列表 (续期流程可能跳转到结账页)
 */
export interface DomainListPage {
  open(): Promise<void>;
}

/**
 * 单个域名续期接口
 */
export interface DomainRenewer {
  renewDomain(row: DomainRow): Promise<DomainOutcome>;
}

export class RenewalExecutor implements DomainRenewer {
  private processed = 0;

  constructor(
    private page: Page,
    private list: DomainListPage,
    private timeouts: Pick<StepTimeouts, 'confirmation' | 'optionalStep'>
  ) {}

  /**
   * 续期流程: 续期链接 → 订单确认 → 同意条款 → 结账
   * 失败时抛出 RenewalError
   */
  async renewDomain(row: DomainRow): Promise<DomainOutcome> {
    if (this.processed > 0) {
      await this.list.open();
    }
    this.processed++;

    const action = await clickRowAction(this.page, ROW_SELECTOR, row, RENEW_TEXT_PATTERN, UNKNOWN_DOMAIN);
    if (action === 'row-missing') {
      throw new RenewalError(ErrorType.PARSE_ERROR, `第 ${row.index + 1} 行已不在域名列表中`);
    }
    if (action === 'name-mismatch') {
      throw new RenewalError(ErrorType.PARSE_ERROR, `第 ${row.index + 1} 行的域名已变化`);
    }
    if (action === 'no-action') {
      throw new RenewalError(ErrorType.PARSE_ERROR, '未找到续期按钮');
    }

    const confirm = await waitAndClickByText(this.page, CONFIRM_TEXTS, this.timeouts.confirmation);
    if (!confirm.found) {
      throw new RenewalError(ErrorType.VERIFY_ERROR, `确认按钮超时: ${confirm.error}`);
    }
    logger.debug('RenewalExecutor', `${row.name} - 已点击 "${confirm.text}"`);

    const terms = await waitAndCheck(this.page, TERMS_SELECTOR, this.timeouts.optionalStep);
    if (terms.found) {
      logger.debug('RenewalExecutor', `${row.name} - 已同意服务条款`);
    }

    const checkout = await waitAndClickByText(this.page, CHECKOUT_TEXTS, this.timeouts.optionalStep);
    if (checkout.found) {
      logger.debug('RenewalExecutor', `${row.name} - 已点击 "${checkout.text}"`);
    }

    // 等待操作完成
    await delay(3000 + random(0, 1000));

    const failure = await readVisibleText(this.page, ERROR_BANNER_SELECTOR);
    if (failure) {
      throw new RenewalError(ErrorType.BUSINESS_ERROR, failure);
    }

    return { domain: row.name, status: 'renewed' };
  }
}

/**
 * 逐行处理域名,单行失败不影响其余行
 */
export async function processDomains(rows: readonly DomainRow[], renewer: DomainRenewer): Promise<DomainReport> {
  const report: DomainReport = { renewed: [], failed: [], skipped: [], errors: [] };
  const total = rows.length;

  for (const [i, row] of rows.entries()) {
    const prefix = `[${i + 1}/${total}] ${row.name}`;

    if (!row.renewable) {
      report.skipped.push(row.name);
      logger.warn('RenewalExecutor', `${prefix} - 无需续期`);
      continue;
    }

    logger.info('RenewalExecutor', `${prefix} - 正在续期...`);
    try {
      const outcome = await renewer.renewDomain(row);
      if (outcome.status === 'renewed') {
        report.renewed.push(outcome.domain);
        logger.info('RenewalExecutor', `${prefix} - ✅ 续期成功`);
      } else if (outcome.status === 'skipped') {
        report.skipped.push(outcome.domain);
        logger.warn('RenewalExecutor', `${prefix} - 无需续期${outcome.message ? `: ${outcome.message}` : ''}`);
      } else {
        const message = `${row.name} - ${outcome.message ?? '续期失败'}`;
        report.failed.push(outcome.domain);
        report.errors.push(message);
        logger.error('RenewalExecutor', `[${i + 1}/${total}] ${message}`);
      }
    } catch (error) {
      const message = `${row.name} - 处理失败: ${errorMessage(error).slice(0, 80)}`;
      report.failed.push(row.name);
      report.errors.push(message);
      logger.error('RenewalExecutor', `[${i + 1}/${total}] ${message}`);
    }
  }

  return report;
}
