export const CAMPAIGN_STATUSES = {
  pending: 'pending',
  processing: 'processing',
  ready: 'ready',
  sent: 'sent',
  sendFailed: 'send_failed',
} as const;

export type CampaignStatus = (typeof CAMPAIGN_STATUSES)[keyof typeof CAMPAIGN_STATUSES];

export const DISPATCHABLE_STATUSES: readonly CampaignStatus[] = [
  CAMPAIGN_STATUSES.ready,
  CAMPAIGN_STATUSES.sendFailed,
];

export function isCampaignStatus(value: string): value is CampaignStatus {
  return (Object.values(CAMPAIGN_STATUSES) as string[]).includes(value);
}

export interface Recipient {
  id: number;
  email: string;
  name: string | null;
  optOut: boolean;
  optOutReason: string | null;
  groupId: number | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface Group {
  id: number;
  name: string;
  description: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface RecipientFailure {
  recipientId: number;
  email: string;
  error: string;
}

export interface DispatchSummary {
  attempted: number;
  delivered: number;
  failures: RecipientFailure[];
  completedAt: Date;
}

export interface Campaign {
  id: number;
  title: string;
  message: string;
  status: CampaignStatus;
  lastDispatch: DispatchSummary | null;
  createdAt: Date;
  updatedAt: Date;
}

/** A target address as supplied by the operator, optionally with a display name. */
export type RecipientEntry = string | { email: string; name?: string };
