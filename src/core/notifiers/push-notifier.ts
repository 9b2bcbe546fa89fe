import axios from 'axios';
import { PushChannelConfig } from '../../common/interfaces/monitor.interfaces';
import { Notifier, NotifierOptions, RenderedAlert } from '../../common/interfaces/notifier.interface';
import { NotifierError } from '../../common/errors';
import { renderTemplate } from '../alert-router';
import { toNotifierError } from './http-errors';

/**
 * Sends one push request per device token.
 *
 * Every token is attempted; when some fail the first failure is raised after
 * the others have been sent.
 */
export class PushNotifier implements Notifier {
  readonly channel = 'push' as const;

  constructor(
    private readonly settings: PushChannelConfig,
    private readonly options: NotifierOptions,
  ) {}

  async send(alert: RenderedAlert): Promise<void> {
    const notification = renderTemplate(this.settings.payload, alert.message);
    const failures: NotifierError[] = [];

    for (const token of this.settings.deviceTokens) {
      try {
        await axios.post(
          this.settings.apiUrl,
          { to: token, notification },
          {
            headers: {
              Authorization: `Bearer ${this.settings.apiKey}`,
              'Content-Type': 'application/json',
            },
            timeout: this.options.deliveryTimeoutMs,
          },
        );
      } catch (error) {
        failures.push(toNotifierError(`Push service ${this.settings.apiUrl}`, error));
      }
    }

    const [first] = failures;
    if (first) {
      if (failures.length > 1) {
        console.warn(`⚠️ Push delivery failed for ${failures.length}/${this.settings.deviceTokens.length} device tokens`);
      }
      throw first;
    }
  }
}
