import type { RecipientEntry } from './contracts/campaign';
import type { CampaignStore } from './contracts/store';
import { NotFoundError } from './errors';
import type { JobQueue } from './queue/types';

/** Producer side of the pipeline, used by the request layer. */
export class JobSubmitter {
  constructor(
    private readonly campaigns: Pick<CampaignStore, 'getCampaign'>,
    private readonly queue: JobQueue,
  ) {}

  async submitLinkingJob(campaignId: number, entries: readonly RecipientEntry[]): Promise<void> {
    await this.queue.enqueue({ kind: 'link', campaignId, entries: [...entries] });
  }

  /** Throws NotFoundError when the campaign does not exist; the state gate is checked by the job. */
  async submitDispatchJob(campaignId: number): Promise<void> {
    const campaign = await this.campaigns.getCampaign(campaignId);
    if (!campaign) {
      throw new NotFoundError('campaign', campaignId);
    }
    await this.queue.enqueue({ kind: 'dispatch', campaignId });
  }
}
