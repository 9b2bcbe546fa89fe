import {
  AlertOrigin,
  AlertRetryPolicy,
  ChannelId,
  DeliveryResult,
  JsonValue,
  MonitorConfiguration,
  PatternMatch,
} from '../common/interfaces/monitor.interfaces';
import { Notifier, RenderedAlert } from '../common/interfaces/notifier.interface';
import { NotifierError, errorMessage } from '../common/errors';
import { delay, withTimeout } from '../utils/utils';
import { DELIVERY_TIMEOUT_DEFAULT_MS, ALERT_BACKOFF_DEFAULT_MS, ALERT_MAX_BACKOFF_DEFAULT_MS } from '../common/time.constants';

export const ALERT_MESSAGE_PLACEHOLDER = '{{alert_message}}';

export const DEFAULT_RETRY_POLICY: AlertRetryPolicy = {
  maxAttempts: 3,
  backoffMs: ALERT_BACKOFF_DEFAULT_MS,
  maxBackoffMs: ALERT_MAX_BACKOFF_DEFAULT_MS,
};

export interface AlertRouterOptions {
  deliveryTimeoutMs?: number;
  retryPolicy?: AlertRetryPolicy;
}

/**
 * Text body shared by every channel
 */
export function renderAlertMessage(match: PatternMatch, origin: AlertOrigin): string {
  return [
    `Alert: Suspicious activity detected in log file: ${origin.source}`,
    `Pattern: ${match.patternName}`,
    `Severity: ${match.severity}`,
    `Time: ${origin.timestamp.toISOString()}`,
    `Log Entry: ${match.matchedText}`,
  ].join('\n');
}

/**
 * Substitutes the alert message into every string of a JSON template.
 * Object keys are left as written.
 */
export function renderTemplate(template: JsonValue, message: string): JsonValue {
  if (typeof template === 'string') {
    return template.split(ALERT_MESSAGE_PLACEHOLDER).join(message);
  }
  if (Array.isArray(template)) {
    return template.map(item => renderTemplate(item, message));
  }
  if (template !== null && typeof template === 'object') {
    const rendered: { [key: string]: JsonValue } = {};
    for (const [key, value] of Object.entries(template)) {
      rendered[key] = renderTemplate(value, message);
    }
    return rendered;
  }
  return template;
}

/**
 * Routes pattern matches to notification channels.
 *
 * One router is built per configuration snapshot. Delivery failures are
 * reported in the returned results and logged, never thrown.
 */
export class AlertRouter {
  private readonly notifiers: Map<ChannelId, Notifier>;
  private readonly deliveryTimeoutMs: number;
  private readonly retryPolicy: AlertRetryPolicy;

  constructor(
    private readonly config: MonitorConfiguration,
    notifiers: readonly Notifier[],
    options: AlertRouterOptions = {},
  ) {
    this.notifiers = new Map(notifiers.map(notifier => [notifier.channel, notifier]));
    this.deliveryTimeoutMs = options.deliveryTimeoutMs ?? DELIVERY_TIMEOUT_DEFAULT_MS;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
  }

  /**
   * Explicit alert methods win over the severity routing. Order is kept,
   * duplicates dropped.
   */
  resolveChannels(match: PatternMatch): ChannelId[] {
    const channels = match.alertMethods.length > 0
      ? match.alertMethods
      : this.config.severityLevels[match.severity];
    return Array.from(new Set(channels));
  }

  /**
   * Delivers one match to all of its channels concurrently and waits for all
   * of them.
   */
  async dispatch(match: PatternMatch, origin: AlertOrigin): Promise<DeliveryResult[]> {
    const channels = this.resolveChannels(match);
    if (channels.length === 0) {
      console.log(`ℹ️  Pattern "${match.patternName}" matched but no channel is routed for severity ${match.severity}`);
      return [];
    }

    const alert: RenderedAlert = { match, origin, message: renderAlertMessage(match, origin) };
    return Promise.all(channels.map(channel => this.deliver(channel, alert)));
  }

  private async deliver(channel: ChannelId, alert: RenderedAlert): Promise<DeliveryResult> {
    const settings = this.config.channels[channel];
    const notifier = this.notifiers.get(channel);
    if (!settings || !settings.enabled || !notifier) {
      const reason = `Channel "${channel}" is not enabled`;
      console.log(`ℹ️  ${reason} - skipping alert for pattern "${alert.match.patternName}"`);
      return { channel, status: 'skipped', error: reason };
    }

    try {
      await this.sendWithRetry(notifier, alert);
      return { channel, status: 'delivered' };
    } catch (error) {
      const reason = errorMessage(error);
      console.error(`❌ ${channel} delivery failed for pattern "${alert.match.patternName}": ${reason}`);
      return { channel, status: 'failed', error: reason };
    }
  }

  /**
   * Send with retry logic and exponential backoff. Only retryable notifier
   * errors are attempted again.
   */
  private async sendWithRetry(notifier: Notifier, alert: RenderedAlert): Promise<void> {
    const { maxAttempts, backoffMs, maxBackoffMs } = this.retryPolicy;
    let attempt = 1;
    let currentBackoff = Math.min(backoffMs, maxBackoffMs);

    while (true) {
      try {
        await withTimeout(
          notifier.send(alert),
          this.deliveryTimeoutMs,
          () => new NotifierError('Timeout', `${notifier.channel} delivery timed out after ${this.deliveryTimeoutMs}ms`),
        );
        return;
      } catch (error) {
        const retryable = error instanceof NotifierError && error.retryable;
        if (!retryable || attempt >= maxAttempts) {
          throw error;
        }

        console.warn(`⚠️ ${notifier.channel} delivery failed (attempt ${attempt}/${maxAttempts}): ${errorMessage(error)}`);
        await delay(currentBackoff);
        currentBackoff = Math.min(currentBackoff * 2, maxBackoffMs);
        attempt++;
      }
    }
  }
}
