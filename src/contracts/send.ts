export type Channel = 'email' | 'sms' | 'log' | (string & {});

export interface OutboundMessage {
  title: string;
  message: string;
  destination: string;
}

export type SendResult =
  | { ok: true; messageId?: string }
  | { ok: false; error: string };

export interface SendOptions {
  signal?: AbortSignal;
}

/**
 * A delivery channel. Implementations report provider failures through the
 * result instead of throwing; a throw is still treated as a failed send.
 */
export interface Notifier {
  readonly channel: Channel;
  send(message: OutboundMessage, options?: SendOptions): Promise<SendResult>;
}
