import type { Campaign, CampaignStatus, DispatchSummary, Group, Recipient } from './campaign';

export interface UpsertRecipientResult {
  recipient: Recipient;
  created: boolean;
}

export interface RecipientPatch {
  name?: string | null;
  groupId?: number | null;
  optOut?: boolean;
}

export interface GroupPatch {
  name?: string;
  description?: string | null;
}

export interface GroupAssignment {
  assigned: Recipient[];
  skipped: string[];
}

/**
 * Recipient identities, keyed by normalized email. Every email argument is
 * normalized by the store before it is used as a key.
 */
export interface RecipientStore {
  findRecipientByEmail(email: string): Promise<Recipient | null>;
  getRecipient(recipientId: number): Promise<Recipient | null>;
  /** Creates the recipient if absent; an existing row is returned untouched. */
  upsertRecipient(email: string, name?: string): Promise<UpsertRecipientResult>;
  /** Throws NotFoundError for an unknown email. */
  setRecipientOptOut(email: string, optOut: boolean, reason?: string): Promise<Recipient>;
  updateRecipient(recipientId: number, patch: RecipientPatch): Promise<Recipient>;
  listRecipients(options?: { includeOptedOut?: boolean }): Promise<Recipient[]>;
}

export interface GroupStore {
  /** Returns the existing group when the name is taken. */
  createGroup(name: string, description?: string): Promise<Group>;
  getGroup(groupId: number): Promise<Group | null>;
  listGroups(): Promise<Group[]>;
  updateGroup(groupId: number, patch: GroupPatch): Promise<Group>;
  /** Creates unknown recipients; opted-out recipients are left out of the group. */
  assignRecipientsToGroup(groupId: number, emails: string[]): Promise<GroupAssignment>;
  listGroupRecipients(groupId: number, options?: { activeOnly?: boolean }): Promise<Recipient[]>;
}

export interface CampaignStore {
  createCampaign(input: { title: string; message: string }): Promise<Campaign>;
  getCampaign(campaignId: number): Promise<Campaign | null>;
  listCampaigns(): Promise<Campaign[]>;
  setCampaignStatus(campaignId: number, status: CampaignStatus): Promise<void>;
  /** Writes the final dispatch status and its summary in a single update. */
  completeDispatch(
    campaignId: number,
    status: CampaignStatus,
    summary: DispatchSummary,
  ): Promise<void>;
  /** Returns false when the pair was already linked. */
  linkRecipientToCampaign(campaignId: number, recipientId: number): Promise<boolean>;
  listCampaignRecipients(campaignId: number): Promise<Recipient[]>;
  listEligibleRecipients(campaignId: number): Promise<Recipient[]>;
}

export interface DataAccess extends RecipientStore, GroupStore, CampaignStore {}
