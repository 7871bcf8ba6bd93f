import type { RecipientEntry } from '../contracts/campaign';

const EMAIL_REGEX = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
const MAX_EMAIL_LENGTH = 320;

export interface NormalizedEntry {
  email: string;
  name?: string;
}

export interface NormalizedBatch {
  entries: NormalizedEntry[];
  skipped: string[];
}

export function normalizeEmail(raw: string): string {
  return raw.trim().toLowerCase();
}

export function isValidEmail(email: string): boolean {
  return email.length > 0 && email.length <= MAX_EMAIL_LENGTH && EMAIL_REGEX.test(email);
}

function readName(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Normalizes a batch of target addresses. Order is kept, later duplicates are
 * dropped (the first occurrence keeps its name) and unusable entries are
 * returned in `skipped` as given.
 */
export function normalizeEntries(raw: readonly RecipientEntry[]): NormalizedBatch {
  const seen = new Map<string, NormalizedEntry>();
  const skipped: string[] = [];

  for (const item of raw) {
    const rawEmail = typeof item === 'string' ? item : item.email;
    const email = normalizeEmail(rawEmail);
    if (!isValidEmail(email)) {
      skipped.push(rawEmail);
      continue;
    }
    if (seen.has(email)) continue;
    const name = typeof item === 'string' ? undefined : readName(item.name);
    seen.set(email, name ? { email, name } : { email });
  }

  return { entries: [...seen.values()], skipped };
}

/** Accepts either a list or a comma separated string of addresses. */
export function parseRecipientList(value: string | readonly string[]): string[] {
  const parts = typeof value === 'string' ? value.split(',') : value;
  return parts.map((part) => part.trim()).filter((part) => part.length > 0);
}
