import type { Notifier, OutboundMessage, SendResult } from '../contracts/send';
import type { Logger } from '../logger';

/** Writes each message to the log instead of delivering it. */
export class LogNotifier implements Notifier {
  readonly channel = 'log';

  constructor(private readonly logger: Logger) {}

  async send(message: OutboundMessage): Promise<SendResult> {
    this.logger.info(`[${this.channel}] '${message.title}' to ${message.destination}: ${message.message}`);
    return { ok: true };
  }
}
