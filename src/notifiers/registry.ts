import type { Channel, Notifier } from '../contracts/send';

export class UnknownChannelError extends Error {
  constructor(readonly channel: string) {
    super(`Unsupported channel: ${channel}`);
    this.name = 'UnknownChannelError';
  }
}

/** Channel name to notifier lookup. One implementation per channel. */
export class NotifierRegistry {
  private readonly notifiers = new Map<string, Notifier>();

  constructor(notifiers: Iterable<Notifier> = []) {
    for (const notifier of notifiers) {
      this.register(notifier);
    }
  }

  register(notifier: Notifier): this {
    if (this.notifiers.has(notifier.channel)) {
      throw new Error(`Notifier already registered for channel ${notifier.channel}`);
    }
    this.notifiers.set(notifier.channel, notifier);
    return this;
  }

  has(channel: Channel): boolean {
    return this.notifiers.has(channel);
  }

  get(channel: Channel): Notifier {
    const notifier = this.notifiers.get(channel);
    if (!notifier) throw new UnknownChannelError(channel);
    return notifier;
  }

  channels(): string[] {
    return [...this.notifiers.keys()];
  }
}
