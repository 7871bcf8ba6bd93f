import type {
  Campaign,
  CampaignStatus,
  DispatchSummary,
  Group,
  Recipient,
} from '../contracts/campaign';
import { CAMPAIGN_STATUSES } from '../contracts/campaign';
import type {
  DataAccess,
  GroupAssignment,
  GroupPatch,
  RecipientPatch,
  UpsertRecipientResult,
} from '../contracts/store';
import { NotFoundError } from '../errors';
import { normalizeEmail } from '../jobs/normalize';

type Clock = () => Date;

function linkKey(campaignId: number, recipientId: number): string {
  return `${campaignId}:${recipientId}`;
}

function copyCampaign(campaign: Campaign): Campaign {
  return {
    ...campaign,
    lastDispatch: campaign.lastDispatch
      ? { ...campaign.lastDispatch, failures: campaign.lastDispatch.failures.map((f) => ({ ...f })) }
      : null,
  };
}

/**
 * Process-local store used by tests and single-process development runs.
 * Rows are copied on the way in and out so callers never hold live state.
 */
export class InMemoryStore implements DataAccess {
  private readonly recipients = new Map<number, Recipient>();
  private readonly recipientIdsByEmail = new Map<string, number>();
  private readonly groups = new Map<number, Group>();
  private readonly campaigns = new Map<number, Campaign>();
  private readonly links = new Set<string>();
  private readonly linkOrder: Array<{ campaignId: number; recipientId: number }> = [];
  private nextRecipientId = 1;
  private nextGroupId = 1;
  private nextCampaignId = 1;

  constructor(private readonly now: Clock = () => new Date()) {}

  async findRecipientByEmail(email: string): Promise<Recipient | null> {
    const id = this.recipientIdsByEmail.get(normalizeEmail(email));
    return id === undefined ? null : this.readRecipient(id);
  }

  async getRecipient(recipientId: number): Promise<Recipient | null> {
    return this.readRecipient(recipientId);
  }

  async upsertRecipient(email: string, name?: string): Promise<UpsertRecipientResult> {
    const normalized = normalizeEmail(email);
    const existingId = this.recipientIdsByEmail.get(normalized);
    if (existingId !== undefined) {
      return { recipient: this.requireRecipient(existingId), created: false };
    }
    const timestamp = this.now();
    const recipient: Recipient = {
      id: this.nextRecipientId++,
      email: normalized,
      name: name ?? null,
      optOut: false,
      optOutReason: null,
      groupId: null,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.recipients.set(recipient.id, recipient);
    this.recipientIdsByEmail.set(normalized, recipient.id);
    return { recipient: { ...recipient }, created: true };
  }

  async setRecipientOptOut(email: string, optOut: boolean, reason?: string): Promise<Recipient> {
    const normalized = normalizeEmail(email);
    const id = this.recipientIdsByEmail.get(normalized);
    if (id === undefined) {
      throw new NotFoundError('recipient', normalized);
    }
    return this.writeRecipient(id, {
      optOut,
      optOutReason: optOut ? reason ?? null : null,
    });
  }

  async updateRecipient(recipientId: number, patch: RecipientPatch): Promise<Recipient> {
    this.requireRecipient(recipientId);
    if (patch.groupId !== undefined && patch.groupId !== null && !this.groups.has(patch.groupId)) {
      throw new NotFoundError('group', patch.groupId);
    }
    const changes: Partial<Recipient> = {};
    if (patch.name !== undefined) changes.name = patch.name;
    if (patch.groupId !== undefined) changes.groupId = patch.groupId;
    if (patch.optOut !== undefined) {
      changes.optOut = patch.optOut;
      if (!patch.optOut) changes.optOutReason = null;
    }
    return this.writeRecipient(recipientId, changes);
  }

  async listRecipients(options: { includeOptedOut?: boolean } = {}): Promise<Recipient[]> {
    return [...this.recipients.values()]
      .filter((recipient) => options.includeOptedOut || !recipient.optOut)
      .map((recipient) => ({ ...recipient }));
  }

  async createGroup(name: string, description?: string): Promise<Group> {
    const existing = [...this.groups.values()].find((group) => group.name === name);
    if (existing) return { ...existing };
    const timestamp = this.now();
    const group: Group = {
      id: this.nextGroupId++,
      name,
      description: description ?? null,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.groups.set(group.id, group);
    return { ...group };
  }

  async getGroup(groupId: number): Promise<Group | null> {
    const group = this.groups.get(groupId);
    return group ? { ...group } : null;
  }

  async listGroups(): Promise<Group[]> {
    return [...this.groups.values()].map((group) => ({ ...group }));
  }

  async updateGroup(groupId: number, patch: GroupPatch): Promise<Group> {
    const group = this.groups.get(groupId);
    if (!group) throw new NotFoundError('group', groupId);
    const updated: Group = {
      ...group,
      name: patch.name ?? group.name,
      description: patch.description === undefined ? group.description : patch.description,
      updatedAt: this.now(),
    };
    this.groups.set(groupId, updated);
    return { ...updated };
  }

  async assignRecipientsToGroup(groupId: number, emails: string[]): Promise<GroupAssignment> {
    if (!this.groups.has(groupId)) throw new NotFoundError('group', groupId);
    const assigned: Recipient[] = [];
    const skipped: string[] = [];
    for (const email of emails) {
      const { recipient } = await this.upsertRecipient(email);
      if (recipient.optOut) {
        skipped.push(recipient.email);
        continue;
      }
      assigned.push(this.writeRecipient(recipient.id, { groupId }));
    }
    return { assigned, skipped };
  }

  async listGroupRecipients(
    groupId: number,
    options: { activeOnly?: boolean } = {},
  ): Promise<Recipient[]> {
    const activeOnly = options.activeOnly ?? true;
    return [...this.recipients.values()]
      .filter((recipient) => recipient.groupId === groupId)
      .filter((recipient) => !activeOnly || !recipient.optOut)
      .map((recipient) => ({ ...recipient }));
  }

  async createCampaign(input: { title: string; message: string }): Promise<Campaign> {
    const timestamp = this.now();
    const campaign: Campaign = {
      id: this.nextCampaignId++,
      title: input.title,
      message: input.message,
      status: CAMPAIGN_STATUSES.pending,
      lastDispatch: null,
      createdAt: timestamp,
      updatedAt: timestamp,
    };
    this.campaigns.set(campaign.id, campaign);
    return copyCampaign(campaign);
  }

  async getCampaign(campaignId: number): Promise<Campaign | null> {
    const campaign = this.campaigns.get(campaignId);
    return campaign ? copyCampaign(campaign) : null;
  }

  async listCampaigns(): Promise<Campaign[]> {
    return [...this.campaigns.values()].map(copyCampaign);
  }

  async setCampaignStatus(campaignId: number, status: CampaignStatus): Promise<void> {
    const campaign = this.requireCampaign(campaignId);
    this.campaigns.set(campaignId, { ...campaign, status, updatedAt: this.now() });
  }

  async completeDispatch(
    campaignId: number,
    status: CampaignStatus,
    summary: DispatchSummary,
  ): Promise<void> {
    const campaign = this.requireCampaign(campaignId);
    this.campaigns.set(campaignId, {
      ...campaign,
      status,
      lastDispatch: { ...summary, failures: summary.failures.map((f) => ({ ...f })) },
      updatedAt: this.now(),
    });
  }

  async linkRecipientToCampaign(campaignId: number, recipientId: number): Promise<boolean> {
    this.requireCampaign(campaignId);
    this.requireRecipient(recipientId);
    const key = linkKey(campaignId, recipientId);
    if (this.links.has(key)) return false;
    this.links.add(key);
    this.linkOrder.push({ campaignId, recipientId });
    return true;
  }

  async listCampaignRecipients(campaignId: number): Promise<Recipient[]> {
    return this.linkOrder
      .filter((link) => link.campaignId === campaignId)
      .map((link) => this.requireRecipient(link.recipientId));
  }

  async listEligibleRecipients(campaignId: number): Promise<Recipient[]> {
    const linked = await this.listCampaignRecipients(campaignId);
    return linked.filter((recipient) => !recipient.optOut);
  }

  /** Number of association rows, for assertions in tests. */
  countLinks(campaignId?: number): number {
    if (campaignId === undefined) return this.linkOrder.length;
    return this.linkOrder.filter((link) => link.campaignId === campaignId).length;
  }

  private readRecipient(recipientId: number): Recipient | null {
    const recipient = this.recipients.get(recipientId);
    return recipient ? { ...recipient } : null;
  }

  private requireRecipient(recipientId: number): Recipient {
    const recipient = this.readRecipient(recipientId);
    if (!recipient) throw new NotFoundError('recipient', recipientId);
    return recipient;
  }

  private writeRecipient(recipientId: number, changes: Partial<Recipient>): Recipient {
    const updated = { ...this.requireRecipient(recipientId), ...changes, updatedAt: this.now() };
    this.recipients.set(recipientId, updated);
    return { ...updated };
  }

  private requireCampaign(campaignId: number): Campaign {
    const campaign = this.campaigns.get(campaignId);
    if (!campaign) throw new NotFoundError('campaign', campaignId);
    return campaign;
  }
}
