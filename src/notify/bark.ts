/**
 * Bark 推送 (iOS)
 */
import axios from 'axios';
import { toPlainText } from './messages';
import type { Notifier } from './notifier';

export class BarkNotifier implements Notifier {
  readonly name = 'Bark';

  constructor(
    private url: string,
    private group = 'DigitalPlat',
    private timeoutMs = 15000
  ) {}

  async send(title: string, body: string): Promise<void> {
    await axios.post(
      this.url,
      {
        title,
        // Bark 不渲染 Markdown
        body: toPlainText(body),
        group: this.group,
      },
      { timeout: this.timeoutMs }
    );
  }
}
