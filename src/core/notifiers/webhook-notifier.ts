import axios from 'axios';
import { WebhookChannelConfig } from '../../common/interfaces/monitor.interfaces';
import { Notifier, NotifierOptions, RenderedAlert } from '../../common/interfaces/notifier.interface';
import { renderTemplate } from '../alert-router';
import { toNotifierError } from './http-errors';

/**
 * POSTs the rendered payload template to the configured URL
 */
export class WebhookNotifier implements Notifier {
  readonly channel = 'webhook' as const;

  constructor(
    private readonly settings: WebhookChannelConfig,
    private readonly options: NotifierOptions,
  ) {}

  async send(alert: RenderedAlert): Promise<void> {
    const body = renderTemplate(this.settings.payload, alert.message);
    try {
      await axios.post(this.settings.url, body, {
        headers: { 'Content-Type': 'application/json', ...this.settings.headers },
        timeout: this.options.deliveryTimeoutMs,
      });
    } catch (error) {
      throw toNotifierError(`Webhook ${this.settings.url}`, error);
    }
  }
}
