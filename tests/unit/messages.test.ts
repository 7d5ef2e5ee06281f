import { describe, it, expect } from 'vitest';
import { formatConfigError, formatFinalFailure, formatReport } from '../../src/notify/messages';

describe('通知文案', () => {
  it('全部成功时列出前 5 个域名', () => {
    const renewed = ['a', 'b', 'c', 'd', 'e', 'f'].map((n) => `${n}.dpdns.org`);
    const message = formatReport({ renewed, failed: [], skipped: ['z.dpdns.org'], errors: [] }, 1, 3, '2026-01-02 03:04:05');

    expect(message.title).toBe('DigitalPlat 续期完成');
    expect(message.body).toBe(
      [
        '✅ *DigitalPlat 续期成功* ✅',
        '⏱️ 时间: 2026-01-02 03:04:05',
        '🔄 尝试次数: 1',
        '✔️ 成功: 6个',
        '⏭️ 跳过: 1个',
        '',
        '🎉 成功续期:',
        '• a.dpdns.org',
        '• b.dpdns.org',
        '• c.dpdns.org',
        '• d.dpdns.org',
        '• e.dpdns.org',
        '...等 6 个域名',
      ].join('\n')
    );
  });

  it('没有续期任何域名时不输出列表', () => {
    const message = formatReport({ renewed: [], failed: [], skipped: ['z.dpdns.org'], errors: [] }, 2, 3, 't');
    expect(message.body.endsWith('⏭️ 跳过: 1个')).toBe(true);
  });

  it('有错误时输出摘要和最后一条错误', () => {
    const message = formatReport(
      { renewed: ['a.dpdns.org'], failed: ['b.dpdns.org'], skipped: [], errors: ['first', 'b.dpdns.org - 处理失败: x'] },
      2,
      3,
      '2026-01-02 03:04:05'
    );

    expect(message.body).toBe(
      [
        '⚠️ *DigitalPlat 续期报告* ⚠️',
        '⏱️ 时间: 2026-01-02 03:04:05',
        '🔄 尝试: 2/3',
        '✅ 成功: 1',
        '⏭️ 跳过: 0',
        '❌ 失败: 1',
        '',
        '最后错误: b.dpdns.org - 处理失败: x',
      ].join('\n')
    );
  });

  it('最终失败消息包含重试次数和错误', () => {
    expect(formatFinalFailure(3, '登录失败')).toEqual({
      title: '❌ DigitalPlat 续期彻底失败',
      body: '已重试 3 次\n最后错误: 登录失败\n请立即手动检查!',
    });
  });

  it('配置错误消息', () => {
    expect(formatConfigError('缺少必需的环境变量: DP_EMAIL').body).toBe(
      '错误: 缺少必需的环境变量: DP\\_EMAIL\n请在 GitHub Secrets 中配置。'
    );
  });

  it('错误文本中的 Markdown 字符被转义', () => {
    const message = formatFinalFailure(3, '页面导航失败: net::ERR_PROXY_CONNECTION_FAILED at https://dash.example.test/auth/login');

    expect(message.body).toBe(
      '已重试 3 次\n最后错误: 页面导航失败: net::ERR\\_PROXY\\_CONNECTION\\_FAILED at https://dash.example.test/auth/login\n请立即手动检查!'
    );
  });

  it('域名和错误里的 * [ ` 也被转义', () => {
    const message = formatReport(
      { renewed: [], failed: ['my_site.dpdns.org'], skipped: [], errors: ['my_site.dpdns.org - 处理失败: [*`x`*]'] },
      1,
      3,
      't'
    );

    expect(message.body.split('\n').pop()).toBe('最后错误: my\\_site.dpdns.org - 处理失败: \\[\\*\\`x\\`\\*]');
  });

  it('成功列表中的域名被转义', () => {
    const message = formatReport({ renewed: ['my_site.dpdns.org'], failed: [], skipped: [], errors: [] }, 1, 3, 't');

    expect(message.body.split('\n').pop()).toBe('• my\\_site.dpdns.org');
  });
});
