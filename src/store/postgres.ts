import { and, asc, eq } from 'drizzle-orm';
import { drizzle } from 'drizzle-orm/node-postgres';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { Pool } from 'pg';

import type {
  Campaign,
  CampaignStatus,
  DispatchSummary,
  Group,
  Recipient,
} from '../contracts/campaign';
import { isCampaignStatus } from '../contracts/campaign';
import type {
  DataAccess,
  GroupAssignment,
  GroupPatch,
  RecipientPatch,
  UpsertRecipientResult,
} from '../contracts/store';
import { NotFoundError, TransientStoreError } from '../errors';
import { normalizeEmail } from '../jobs/normalize';
import {
  campaignRecipients,
  campaigns,
  groups,
  recipients,
  schema,
  type StoredDispatchSummary,
} from './schema';

const SCHEMA_FILE = path.resolve(__dirname, '..', '..', 'sql', 'schema.sql');

// Connection-level failures and Postgres classes 08, 53, 57 and 40 (retryable).
const TRANSIENT_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EAI_AGAIN',
]);
const TRANSIENT_SQLSTATE_PREFIXES = ['08', '53', '57', '40'];
const FOREIGN_KEY_VIOLATION = '23503';

type RecipientRow = typeof recipients.$inferSelect;
type GroupRow = typeof groups.$inferSelect;
type CampaignRow = typeof campaigns.$inferSelect;

/** Any drizzle Postgres database over this schema (node-postgres in production). */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

function readErrorCode(error: unknown): string | null {
  if (typeof error !== 'object' || error === null || !('code' in error)) return null;
  return typeof error.code === 'string' ? error.code : null;
}

function readConstraint(error: unknown): string {
  if (typeof error !== 'object' || error === null || !('constraint' in error)) return '';
  return typeof error.constraint === 'string' ? error.constraint : '';
}

export function isTransientDatabaseError(error: unknown): boolean {
  const code = readErrorCode(error);
  if (code) {
    if (TRANSIENT_ERROR_CODES.has(code)) return true;
    if (code.length === 5 && TRANSIENT_SQLSTATE_PREFIXES.some((prefix) => code.startsWith(prefix))) {
      return true;
    }
  }
  return error instanceof Error && /connection terminated|timeout exceeded when trying to connect/i.test(error.message);
}

function toRecipient(row: RecipientRow): Recipient {
  return {
    id: row.id,
    email: row.email,
    name: row.name,
    optOut: row.optOut,
    optOutReason: row.optOutReason,
    groupId: row.groupId,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function toGroup(row: GroupRow): Group {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

function toDispatchSummary(stored: StoredDispatchSummary | null): DispatchSummary | null {
  if (!stored) return null;
  return {
    attempted: stored.attempted,
    delivered: stored.delivered,
    failures: stored.failures,
    completedAt: new Date(stored.completedAt),
  };
}

function toCampaign(row: CampaignRow): Campaign {
  if (!isCampaignStatus(row.status)) {
    throw new Error(`campaign ${row.id} has unknown status ${row.status}`);
  }
  return {
    id: row.id,
    title: row.title,
    message: row.message,
    status: row.status,
    lastDispatch: toDispatchSummary(row.lastDispatch),
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

export function readSchemaSql(): Promise<string> {
  return readFile(SCHEMA_FILE, 'utf8');
}

export async function ensureSchema(pool: Pool): Promise<void> {
  await pool.query(await readSchemaSql());
}

/** DataAccess over Postgres. Connection failures surface as TransientStoreError. */
export class PostgresStore implements DataAccess {
  constructor(private readonly db: Database) {}

  static fromPool(pool: Pool): PostgresStore {
    return new PostgresStore(drizzle(pool, { schema }));
  }

  private async run<T>(operation: string, work: (db: Database) => Promise<T>): Promise<T> {
    try {
      return await work(this.db);
    } catch (error) {
      if (isTransientDatabaseError(error)) {
        throw new TransientStoreError(operation, error);
      }
      throw error;
    }
  }

  findRecipientByEmail(email: string): Promise<Recipient | null> {
    return this.run('findRecipientByEmail', async (db) => {
      const [row] = await db
        .select()
        .from(recipients)
        .where(eq(recipients.email, normalizeEmail(email)))
        .limit(1);
      return row ? toRecipient(row) : null;
    });
  }

  getRecipient(recipientId: number): Promise<Recipient | null> {
    return this.run('getRecipient', async (db) => {
      const [row] = await db.select().from(recipients).where(eq(recipients.id, recipientId)).limit(1);
      return row ? toRecipient(row) : null;
    });
  }

  upsertRecipient(email: string, name?: string): Promise<UpsertRecipientResult> {
    const normalized = normalizeEmail(email);
    return this.run('upsertRecipient', async (db) => {
      const [inserted] = await db
        .insert(recipients)
        .values({ email: normalized, name: name ?? null })
        .onConflictDoNothing({ target: recipients.email })
        .returning();
      if (inserted) {
        return { recipient: toRecipient(inserted), created: true };
      }
      const [existing] = await db
        .select()
        .from(recipients)
        .where(eq(recipients.email, normalized))
        .limit(1);
      if (!existing) {
        throw new Error(`recipient ${normalized} vanished during upsert`);
      }
      return { recipient: toRecipient(existing), created: false };
    });
  }

  setRecipientOptOut(email: string, optOut: boolean, reason?: string): Promise<Recipient> {
    const normalized = normalizeEmail(email);
    return this.run('setRecipientOptOut', async (db) => {
      const [row] = await db
        .update(recipients)
        .set({ optOut, optOutReason: optOut ? reason ?? null : null, updatedAt: new Date() })
        .where(eq(recipients.email, normalized))
        .returning();
      if (!row) throw new NotFoundError('recipient', normalized);
      return toRecipient(row);
    });
  }

  updateRecipient(recipientId: number, patch: RecipientPatch): Promise<Recipient> {
    return this.run('updateRecipient', async (db) => {
      if (patch.groupId !== undefined && patch.groupId !== null) {
        const [group] = await db.select({ id: groups.id }).from(groups).where(eq(groups.id, patch.groupId));
        if (!group) throw new NotFoundError('group', patch.groupId);
      }
      const changes: Partial<typeof recipients.$inferInsert> = { updatedAt: new Date() };
      if (patch.name !== undefined) changes.name = patch.name;
      if (patch.groupId !== undefined) changes.groupId = patch.groupId;
      if (patch.optOut !== undefined) {
        changes.optOut = patch.optOut;
        if (!patch.optOut) changes.optOutReason = null;
      }
      const [row] = await db
        .update(recipients)
        .set(changes)
        .where(eq(recipients.id, recipientId))
        .returning();
      if (!row) throw new NotFoundError('recipient', recipientId);
      return toRecipient(row);
    });
  }

  listRecipients(options: { includeOptedOut?: boolean } = {}): Promise<Recipient[]> {
    return this.run('listRecipients', async (db) => {
      const rows = await db
        .select()
        .from(recipients)
        .where(options.includeOptedOut ? undefined : eq(recipients.optOut, false))
        .orderBy(asc(recipients.id));
      return rows.map(toRecipient);
    });
  }

  createGroup(name: string, description?: string): Promise<Group> {
    return this.run('createGroup', async (db) => {
      const [inserted] = await db
        .insert(groups)
        .values({ name, description: description ?? null })
        .onConflictDoNothing({ target: groups.name })
        .returning();
      if (inserted) return toGroup(inserted);
      const [existing] = await db.select().from(groups).where(eq(groups.name, name)).limit(1);
      if (!existing) throw new Error(`group ${name} vanished during create`);
      return toGroup(existing);
    });
  }

  getGroup(groupId: number): Promise<Group | null> {
    return this.run('getGroup', async (db) => {
      const [row] = await db.select().from(groups).where(eq(groups.id, groupId)).limit(1);
      return row ? toGroup(row) : null;
    });
  }

  listGroups(): Promise<Group[]> {
    return this.run('listGroups', async (db) => {
      const rows = await db.select().from(groups).orderBy(asc(groups.id));
      return rows.map(toGroup);
    });
  }

  updateGroup(groupId: number, patch: GroupPatch): Promise<Group> {
    return this.run('updateGroup', async (db) => {
      const changes: Partial<typeof groups.$inferInsert> = { updatedAt: new Date() };
      if (patch.name !== undefined) changes.name = patch.name;
      if (patch.description !== undefined) changes.description = patch.description;
      const [row] = await db.update(groups).set(changes).where(eq(groups.id, groupId)).returning();
      if (!row) throw new NotFoundError('group', groupId);
      return toGroup(row);
    });
  }

  async assignRecipientsToGroup(groupId: number, emails: string[]): Promise<GroupAssignment> {
    const group = await this.getGroup(groupId);
    if (!group) throw new NotFoundError('group', groupId);

    const assigned: Recipient[] = [];
    const skipped: string[] = [];
    for (const email of emails) {
      const { recipient } = await this.upsertRecipient(email);
      const row = await this.run('assignRecipientsToGroup', async (db) => {
        const [updated] = await db
          .update(recipients)
          .set({ groupId, updatedAt: new Date() })
          .where(and(eq(recipients.id, recipient.id), eq(recipients.optOut, false)))
          .returning();
        return updated;
      });
      if (row) {
        assigned.push(toRecipient(row));
      } else {
        skipped.push(recipient.email);
      }
    }
    return { assigned, skipped };
  }

  listGroupRecipients(groupId: number, options: { activeOnly?: boolean } = {}): Promise<Recipient[]> {
    const activeOnly = options.activeOnly ?? true;
    return this.run('listGroupRecipients', async (db) => {
      const rows = await db
        .select()
        .from(recipients)
        .where(
          activeOnly
            ? and(eq(recipients.groupId, groupId), eq(recipients.optOut, false))
            : eq(recipients.groupId, groupId),
        )
        .orderBy(asc(recipients.id));
      return rows.map(toRecipient);
    });
  }

  createCampaign(input: { title: string; message: string }): Promise<Campaign> {
    return this.run('createCampaign', async (db) => {
      const [row] = await db
        .insert(campaigns)
        .values({ title: input.title, message: input.message })
        .returning();
      if (!row) throw new Error('campaign insert returned no row');
      return toCampaign(row);
    });
  }

  getCampaign(campaignId: number): Promise<Campaign | null> {
    return this.run('getCampaign', async (db) => {
      const [row] = await db.select().from(campaigns).where(eq(campaigns.id, campaignId)).limit(1);
      return row ? toCampaign(row) : null;
    });
  }

  listCampaigns(): Promise<Campaign[]> {
    return this.run('listCampaigns', async (db) => {
      const rows = await db.select().from(campaigns).orderBy(asc(campaigns.id));
      return rows.map(toCampaign);
    });
  }

  setCampaignStatus(campaignId: number, status: CampaignStatus): Promise<void> {
    return this.run('setCampaignStatus', async (db) => {
      const updated = await db
        .update(campaigns)
        .set({ status, updatedAt: new Date() })
        .where(eq(campaigns.id, campaignId))
        .returning({ id: campaigns.id });
      if (updated.length === 0) throw new NotFoundError('campaign', campaignId);
    });
  }

  completeDispatch(campaignId: number, status: CampaignStatus, summary: DispatchSummary): Promise<void> {
    const stored: StoredDispatchSummary = {
      attempted: summary.attempted,
      delivered: summary.delivered,
      failures: summary.failures,
      completedAt: summary.completedAt.toISOString(),
    };
    return this.run('completeDispatch', async (db) => {
      const updated = await db
        .update(campaigns)
        .set({ status, lastDispatch: stored, updatedAt: new Date() })
        .where(eq(campaigns.id, campaignId))
        .returning({ id: campaigns.id });
      if (updated.length === 0) throw new NotFoundError('campaign', campaignId);
    });
  }

  linkRecipientToCampaign(campaignId: number, recipientId: number): Promise<boolean> {
    return this.run('linkRecipientToCampaign', async (db) => {
      try {
        const inserted = await db
          .insert(campaignRecipients)
          .values({ campaignId, recipientId })
          .onConflictDoNothing()
          .returning({ campaignId: campaignRecipients.campaignId });
        return inserted.length > 0;
      } catch (error) {
        if (readErrorCode(error) === FOREIGN_KEY_VIOLATION) {
          throw readConstraint(error).includes('recipient_id')
            ? new NotFoundError('recipient', recipientId)
            : new NotFoundError('campaign', campaignId);
        }
        throw error;
      }
    });
  }

  listCampaignRecipients(campaignId: number): Promise<Recipient[]> {
    return this.run('listCampaignRecipients', async (db) => {
      const rows = await db
        .select()
        .from(recipients)
        .innerJoin(campaignRecipients, eq(campaignRecipients.recipientId, recipients.id))
        .where(eq(campaignRecipients.campaignId, campaignId))
        .orderBy(asc(campaignRecipients.linkedAt), asc(recipients.id));
      return rows.map((row) => toRecipient(row.recipients));
    });
  }

  listEligibleRecipients(campaignId: number): Promise<Recipient[]> {
    return this.run('listEligibleRecipients', async (db) => {
      const rows = await db
        .select()
        .from(recipients)
        .innerJoin(campaignRecipients, eq(campaignRecipients.recipientId, recipients.id))
        .where(and(eq(campaignRecipients.campaignId, campaignId), eq(recipients.optOut, false)))
        .orderBy(asc(recipients.id));
      return rows.map((row) => toRecipient(row.recipients));
    });
  }
}
