/**
 * 结果文件
 */
import * as fs from 'fs/promises';
import * as path from 'path';
import { DomainReport, RenewalResultRecord } from '../types';
import { logger } from '../utils/logger';

export function buildResultRecord(report: DomainReport, attempt: number, now: Date = new Date()): RenewalResultRecord {
  return {
    timestamp: now.toISOString(),
    attempt,
    renewed_count: report.renewed.length,
    failed_count: report.failed.length,
    skipped_count: report.skipped.length,
    renewed_domains: [...report.renewed],
    failed_domains: [...report.failed],
    skipped_domains: [...report.skipped],
    errors: [...report.errors],
  };
}

/**
 * 保存处理结果 (每次运行覆盖),失败只记录日志
 */
export async function saveResults(filePath: string, record: RenewalResultRecord): Promise<boolean> {
  try {
    await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
    await fs.writeFile(filePath, `${JSON.stringify(record, null, 2)}\n`, 'utf-8');
    logger.info('Results', `处理结果已保存到 ${filePath}`);
    return true;
  } catch (error) {
    logger.error('Results', '保存结果时发生错误', error);
    return false;
  }
}
