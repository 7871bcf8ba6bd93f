import { CAMPAIGN_STATUSES, DISPATCHABLE_STATUSES } from '../contracts/campaign';
import { errorMessage, isTerminalError } from '../errors';
import { runDispatchJob, type DispatchDependencies } from '../jobs/dispatch';
import { runLinkingJob } from '../jobs/linking';
import { jobLabel, type JobContext, type JobHandler, type JobRequest } from './types';

/**
 * Routes queued jobs to the linking and dispatch jobs and applies the
 * redelivery policy: missing campaigns, refused transitions and invalid input
 * end the job, everything else is rethrown for another attempt.
 */
export function createJobHandler(deps: DispatchDependencies): JobHandler {
  const { store, logger } = deps;

  async function execute(job: JobRequest, context: JobContext): Promise<void> {
    switch (job.kind) {
      case 'link':
        await runLinkingJob(deps, { campaignId: job.campaignId, entries: job.entries }, context);
        return;
      case 'dispatch':
        await runDispatchJob(deps, job.campaignId, context);
        return;
    }
  }

  return {
    async run(job, context) {
      try {
        await execute(job, context);
      } catch (error) {
        if (isTerminalError(error)) {
          logger.error(`${jobLabel(job)} dropped: ${errorMessage(error)}`);
          return;
        }
        logger.warn(
          `${jobLabel(job)} attempt ${context.attempt}/${context.maxAttempts} failed: ${errorMessage(error)}`,
        );
        throw error;
      }
    },

    async exhausted(job, error) {
      logger.error(`${jobLabel(job)} gave up: ${errorMessage(error)}`);
      if (job.kind === 'link') {
        logger.error(`Campaign ${job.campaignId} left in ${CAMPAIGN_STATUSES.processing} for inspection`);
        return;
      }
      try {
        const campaign = await store.getCampaign(job.campaignId);
        if (!campaign) return;
        // A campaign still being linked (or already sent) keeps its status.
        if (!DISPATCHABLE_STATUSES.includes(campaign.status)) {
          logger.error(
            `Campaign ${job.campaignId} left in ${campaign.status}; not marked ${CAMPAIGN_STATUSES.sendFailed}`,
          );
          return;
        }
        await store.setCampaignStatus(job.campaignId, CAMPAIGN_STATUSES.sendFailed);
      } catch (statusError) {
        logger.error(
          `Campaign ${job.campaignId}: could not record ${CAMPAIGN_STATUSES.sendFailed}: ${errorMessage(statusError)}`,
        );
      }
    },
  };
}
