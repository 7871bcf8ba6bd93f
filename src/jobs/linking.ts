import type { RecipientEntry } from '../contracts/campaign';
import { CAMPAIGN_STATUSES } from '../contracts/campaign';
import { InvalidStateTransitionError, NotFoundError } from '../errors';
import { normalizeEntries } from './normalize';
import type { JobDependencies, JobRunOptions } from './types';

export interface LinkingJobInput {
  campaignId: number;
  entries: readonly RecipientEntry[];
}

export interface LinkingReport {
  campaignId: number;
  /** Unique addresses linked by this run, including pairs that already existed. */
  linked: number;
  created: number;
  alreadyLinked: number;
  skipped: string[];
}

const CLOSED_STATUSES: readonly string[] = [CAMPAIGN_STATUSES.sent, CAMPAIGN_STATUSES.sendFailed];

/**
 * Resolves raw target addresses into recipients and links them to the
 * campaign. Safe to run again with the same input: recipients are upserted by
 * normalized email and links are idempotent, so a retried run converges on the
 * same rows. Existing recipients are never modified.
 */
export async function runLinkingJob(
  { store, logger }: JobDependencies,
  input: LinkingJobInput,
  options: JobRunOptions = {},
): Promise<LinkingReport> {
  const { campaignId } = input;
  const campaign = await store.getCampaign(campaignId);
  if (!campaign) {
    throw new NotFoundError('campaign', campaignId);
  }
  if (CLOSED_STATUSES.includes(campaign.status)) {
    throw new InvalidStateTransitionError(campaignId, campaign.status, CAMPAIGN_STATUSES.processing);
  }
  if (campaign.status !== CAMPAIGN_STATUSES.processing) {
    await store.setCampaignStatus(campaignId, CAMPAIGN_STATUSES.processing);
  }

  const { entries, skipped } = normalizeEntries(input.entries);
  for (const raw of skipped) {
    logger.warn(`Campaign ${campaignId}: skipping invalid address "${raw}"`);
  }

  let created = 0;
  let alreadyLinked = 0;
  for (const entry of entries) {
    options.signal?.throwIfAborted();
    const upserted = await store.upsertRecipient(entry.email, entry.name);
    if (upserted.created) created += 1;
    const inserted = await store.linkRecipientToCampaign(campaignId, upserted.recipient.id);
    if (!inserted) alreadyLinked += 1;
  }

  options.signal?.throwIfAborted();
  await store.setCampaignStatus(campaignId, CAMPAIGN_STATUSES.ready);
  logger.info(
    `Campaign ${campaignId}: linked ${entries.length} recipients (${created} new, ${alreadyLinked} already linked, ${skipped.length} skipped)`,
  );

  return { campaignId, linked: entries.length, created, alreadyLinked, skipped };
}
