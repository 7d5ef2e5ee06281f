/**
 * 通知文案
 */
import { DomainReport } from '../types';

export interface NotificationMessage {
  title: string;
  body: string;
}

const MAX_LISTED_DOMAINS = 5;

/**
 * 转义 Telegram Markdown 的控制字符,用于错误文本和域名等动态内容
 */
export function escapeMarkdown(text: string): string {
  return text.replace(/[_*`[]/g, '\\$&');
}

/**
 * 去掉 Markdown 标记,还原转义字符 (Bark 等纯文本渠道)
 */
export function toPlainText(text: string): string {
  return text.replace(/(?<!\\)\*/g, '').replace(/\\([_*`[])/g, '$1');
}

/**
 * 一次成功尝试的续期报告; 有错误时改为带最后一条错误的摘要
 */
export function formatReport(
  report: DomainReport,
  attempt: number,
  maxRetries: number,
  time: string
): NotificationMessage {
  const title = 'DigitalPlat 续期完成';

  if (report.errors.length > 0) {
    const lastError = report.errors[report.errors.length - 1] ?? '无';
    const body =
      `⚠️ *DigitalPlat 续期报告* ⚠️\n` +
      `⏱️ 时间: ${time}\n` +
      `🔄 尝试: ${attempt}/${maxRetries}\n` +
      `✅ 成功: ${report.renewed.length}\n` +
      `⏭️ 跳过: ${report.skipped.length}\n` +
      `❌ 失败: ${report.failed.length}\n\n` +
      `最后错误: ${escapeMarkdown(lastError.slice(0, 200))}`;
    return { title, body };
  }

  let body =
    `✅ *DigitalPlat 续期成功* ✅\n` +
    `⏱️ 时间: ${time}\n` +
    `🔄 尝试次数: ${attempt}\n` +
    `✔️ 成功: ${report.renewed.length}个\n` +
    `⏭️ 跳过: ${report.skipped.length}个`;

  if (report.renewed.length > 0) {
    const listed = report.renewed.slice(0, MAX_LISTED_DOMAINS).map((d) => `• ${escapeMarkdown(d)}`);
    body += '\n\n🎉 成功续期:\n' + listed.join('\n');
    if (report.renewed.length > MAX_LISTED_DOMAINS) {
      body += `\n...等 ${report.renewed.length} 个域名`;
    }
  }

  return { title, body };
}

export function formatFinalFailure(maxRetries: number, lastError: string): NotificationMessage {
  return {
    title: '❌ DigitalPlat 续期彻底失败',
    body: `已重试 ${maxRetries} 次\n最后错误: ${escapeMarkdown(lastError)}\n请立即手动检查!`,
  };
}

export function formatConfigError(message: string): NotificationMessage {
  return {
    title: 'DigitalPlat 脚本配置错误',
    body: `错误: ${escapeMarkdown(message)}\n请在 GitHub Secrets 中配置。`,
  };
}

export function formatCrash(message: string): NotificationMessage {
  return {
    title: '🔥 续期脚本执行异常',
    body: `错误: ${escapeMarkdown(message)}`,
  };
}
