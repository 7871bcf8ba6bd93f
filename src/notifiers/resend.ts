import { Resend } from 'resend';

import type { Notifier, OutboundMessage, SendOptions, SendResult } from '../contracts/send';
import { errorMessage } from '../errors';

export const PROVIDER_NAME = 'resend';

type EmailPayload = {
  from: string;
  to: string;
  subject: string;
  text: string;
};

type EmailResponse = {
  data: { id: string } | null;
  error: { message: string } | null;
};

/** The slice of the Resend client this notifier calls. */
export interface EmailClient {
  send(payload: EmailPayload): Promise<EmailResponse>;
}

export class ResendEmailNotifier implements Notifier {
  readonly channel = 'email';

  constructor(
    private readonly client: EmailClient,
    private readonly from: string,
  ) {}

  static fromApiKey(apiKey: string, from: string): ResendEmailNotifier {
    return new ResendEmailNotifier(new Resend(apiKey).emails, from);
  }

  async send(message: OutboundMessage, options: SendOptions = {}): Promise<SendResult> {
    if (options.signal?.aborted) {
      return { ok: false, error: 'send aborted before request' };
    }
    try {
      const result = await this.client.send({
        from: this.from,
        to: message.destination,
        subject: message.title,
        text: message.message,
      });
      if (result.error) {
        return { ok: false, error: `${PROVIDER_NAME}: ${result.error.message}` };
      }
      return { ok: true, messageId: result.data?.id };
    } catch (error) {
      return { ok: false, error: `${PROVIDER_NAME}: ${errorMessage(error)}` };
    }
  }
}
