import type { CampaignStatus, Recipient, RecipientFailure } from '../contracts/campaign';
import { CAMPAIGN_STATUSES, DISPATCHABLE_STATUSES } from '../contracts/campaign';
import type { Channel, Notifier, SendResult } from '../contracts/send';
import { errorMessage, InvalidStateTransitionError, NotFoundError } from '../errors';
import type { NotifierRegistry } from '../notifiers/registry';
import { mapWithConcurrency, withTimeout } from './concurrency';
import type { JobDependencies, JobRunOptions } from './types';

export const DEFAULT_DISPATCH_CONCURRENCY = 10;
export const DEFAULT_SEND_TIMEOUT_MS = 10_000;

export interface DispatchSettings {
  channel: Channel;
  concurrency: number;
  sendTimeoutMs: number;
}

export interface DispatchDependencies extends JobDependencies {
  notifiers: NotifierRegistry;
  settings: DispatchSettings;
  now?: () => Date;
}

export interface DispatchReport {
  campaignId: number;
  status: CampaignStatus;
  attempted: number;
  delivered: number;
  failures: RecipientFailure[];
}

type Outcome = { recipient: Recipient; result: SendResult };

async function deliver(
  notifier: Notifier,
  recipient: Recipient,
  content: { title: string; message: string },
  timeoutMs: number,
  jobSignal?: AbortSignal,
): Promise<Outcome> {
  try {
    const result = await withTimeout(
      `send to ${recipient.email}`,
      timeoutMs,
      (signal) => notifier.send({ ...content, destination: recipient.email }, { signal }),
      jobSignal,
    );
    return { recipient, result };
  } catch (error) {
    return { recipient, result: { ok: false, error: errorMessage(error) } };
  }
}

/**
 * Sends a linked campaign to every recipient that has not opted out.
 *
 * Only campaigns in `ready` or `send_failed` are sent; anything else throws
 * InvalidStateTransitionError before the notifier is touched. The status is
 * written once, after every send has settled: `sent` when all succeeded,
 * otherwise `send_failed` with the failed recipients recorded alongside.
 * Individual failures are never retried here.
 */
export async function runDispatchJob(
  deps: DispatchDependencies,
  campaignId: number,
  options: JobRunOptions = {},
): Promise<DispatchReport> {
  const { store, logger, notifiers, settings } = deps;
  const campaign = await store.getCampaign(campaignId);
  if (!campaign) {
    throw new NotFoundError('campaign', campaignId);
  }
  if (!DISPATCHABLE_STATUSES.includes(campaign.status)) {
    throw new InvalidStateTransitionError(campaignId, campaign.status, CAMPAIGN_STATUSES.sent);
  }

  const notifier = notifiers.get(settings.channel);
  const eligible = await store.listEligibleRecipients(campaignId);
  if (eligible.length === 0) {
    logger.warn(`Campaign ${campaignId} has no eligible recipients`);
  }

  const content = { title: campaign.title, message: campaign.message };
  const outcomes = await mapWithConcurrency(
    eligible,
    settings.concurrency,
    (recipient) => deliver(notifier, recipient, content, settings.sendTimeoutMs, options.signal),
    options.signal,
  );

  const failures: RecipientFailure[] = [];
  for (const { recipient, result } of outcomes) {
    if (!result.ok) {
      failures.push({ recipientId: recipient.id, email: recipient.email, error: result.error });
    }
  }
  const status = failures.length === 0 ? CAMPAIGN_STATUSES.sent : CAMPAIGN_STATUSES.sendFailed;
  const delivered = outcomes.length - failures.length;

  await store.completeDispatch(campaignId, status, {
    attempted: outcomes.length,
    delivered,
    failures,
    completedAt: (deps.now ?? (() => new Date()))(),
  });

  if (failures.length > 0) {
    logger.error(
      `Campaign ${campaignId} ${status}: ${failures.length} of ${outcomes.length} sends failed via ${notifier.channel}`,
    );
  } else {
    logger.info(`Campaign ${campaignId} sent to ${delivered} recipients via ${notifier.channel}`);
  }

  return { campaignId, status, attempted: outcomes.length, delivered, failures };
}
