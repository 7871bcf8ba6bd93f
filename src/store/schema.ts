import {
  boolean,
  index,
  integer,
  jsonb,
  pgTable,
  primaryKey,
  serial,
  text,
  timestamp,
} from 'drizzle-orm/pg-core';

/** Serialized form of a DispatchSummary; dates are ISO strings. */
export type StoredDispatchSummary = {
  attempted: number;
  delivered: number;
  failures: Array<{ recipientId: number; email: string; error: string }>;
  completedAt: string;
};

export const groups = pgTable('groups', {
  id: serial('id').primaryKey(),
  name: text('name').notNull().unique(),
  description: text('description'),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

export const recipients = pgTable(
  'recipients',
  {
    id: serial('id').primaryKey(),
    /** Always stored trimmed and lowercased. */
    email: text('email').notNull().unique(),
    name: text('name'),
    optOut: boolean('opt_out').notNull().default(false),
    optOutReason: text('opt_out_reason'),
    groupId: integer('group_id').references(() => groups.id, { onDelete: 'set null' }),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [index('idx_recipients_group').on(table.groupId)],
);

export const campaigns = pgTable('campaigns', {
  id: serial('id').primaryKey(),
  title: text('title').notNull(),
  message: text('message').notNull(),
  status: text('status').notNull().default('pending'),
  lastDispatch: jsonb('last_dispatch').$type<StoredDispatchSummary>(),
  createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

export const campaignRecipients = pgTable(
  'campaign_recipients',
  {
    campaignId: integer('campaign_id')
      .notNull()
      .references(() => campaigns.id, { onDelete: 'cascade' }),
    recipientId: integer('recipient_id')
      .notNull()
      .references(() => recipients.id),
    linkedAt: timestamp('linked_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    primaryKey({ columns: [table.campaignId, table.recipientId] }),
    index('idx_campaign_recipients_recipient').on(table.recipientId),
  ],
);

export const schema = { groups, recipients, campaigns, campaignRecipients };
