import { AlertOrigin, ChannelId, ChannelSettings, PatternMatch } from './monitor.interfaces';

/**
 * A match ready to be delivered, with its rendered message text
 */
export interface RenderedAlert {
  match: PatternMatch;
  origin: AlertOrigin;
  message: string;
}

/**
 * Delivers alerts through one channel
 */
export interface Notifier {
  readonly channel: ChannelId;

  /**
   * @throws {NotifierError} when the transport rejects or cannot be reached
   */
  send(alert: RenderedAlert): Promise<void>;
}

export interface NotifierOptions {
  /** Per-request timeout for network transports */
  deliveryTimeoutMs: number;
}

/**
 * Builds the notifiers of the enabled channels of a configuration
 */
export type NotifierFactory = (channels: ChannelSettings, options: NotifierOptions) => Notifier[];
