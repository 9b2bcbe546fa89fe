import { ChannelSettings } from '../../common/interfaces/monitor.interfaces';
import { Notifier, NotifierOptions } from '../../common/interfaces/notifier.interface';
import { ConsoleNotifier } from './console-notifier';
import { EmailNotifier } from './email-notifier';
import { PushNotifier } from './push-notifier';
import { WebhookNotifier } from './webhook-notifier';

export { ConsoleNotifier, EmailNotifier, PushNotifier, WebhookNotifier };

/**
 * Builds a notifier for every enabled channel
 */
export function createNotifiers(channels: ChannelSettings, options: NotifierOptions): Notifier[] {
  const notifiers: Notifier[] = [];

  if (channels.console?.enabled) {
    notifiers.push(new ConsoleNotifier());
  }
  if (channels.email?.enabled) {
    notifiers.push(new EmailNotifier(channels.email, options));
  }
  if (channels.webhook?.enabled) {
    notifiers.push(new WebhookNotifier(channels.webhook, options));
  }
  if (channels.push?.enabled) {
    notifiers.push(new PushNotifier(channels.push, options));
  }

  return notifiers;
}
