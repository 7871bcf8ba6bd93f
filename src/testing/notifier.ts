import type { Notifier, OutboundMessage, SendOptions, SendResult } from '../contracts/send';

export interface RecordingNotifierOptions {
  channel?: string;
  /** Destinations that get a failed result. */
  failFor?: Iterable<string>;
  /** Destinations whose send never settles unless aborted. */
  hangFor?: Iterable<string>;
  /** Destinations whose send throws. */
  throwFor?: Iterable<string>;
  delayMs?: number;
}

/** In-process notifier for tests: records every call and fails on request. */
export class RecordingNotifier implements Notifier {
  readonly channel: string;
  readonly sent: OutboundMessage[] = [];
  inFlight = 0;
  maxInFlight = 0;
  private readonly failFor: Set<string>;
  private readonly hangFor: Set<string>;
  private readonly throwFor: Set<string>;
  private readonly delayMs: number;

  constructor(options: RecordingNotifierOptions = {}) {
    this.channel = options.channel ?? 'email';
    this.failFor = new Set(options.failFor);
    this.hangFor = new Set(options.hangFor);
    this.throwFor = new Set(options.throwFor);
    this.delayMs = options.delayMs ?? 0;
  }

  destinations(): string[] {
    return this.sent.map((message) => message.destination);
  }

  async send(message: OutboundMessage, options: SendOptions = {}): Promise<SendResult> {
    this.sent.push(message);
    this.inFlight += 1;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.hangFor.has(message.destination)) {
        await new Promise<void>((resolve) => {
          options.signal?.addEventListener('abort', () => resolve(), { once: true });
        });
        return { ok: false, error: 'aborted' };
      }
      if (this.delayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.delayMs));
      }
      if (this.throwFor.has(message.destination)) {
        throw new Error(`transport down for ${message.destination}`);
      }
      if (this.failFor.has(message.destination)) {
        return { ok: false, error: `rejected ${message.destination}` };
      }
      return { ok: true, messageId: `msg-${this.sent.length}` };
    } finally {
      this.inFlight -= 1;
    }
  }
}
