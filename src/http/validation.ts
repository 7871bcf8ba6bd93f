import type { RecipientEntry } from '../contracts/campaign';
import type { GroupPatch, RecipientPatch } from '../contracts/store';
import { ValidationError } from '../errors';
import { isValidEmail, normalizeEmail, parseRecipientList } from '../jobs/normalize';

const MAX_TITLE_LENGTH = 180;
const MAX_MESSAGE_LENGTH = 100_000;
const MAX_NAME_LENGTH = 200;
const MAX_REASON_LENGTH = 500;
const MAX_RECIPIENTS_PER_REQUEST = 10_000;

type Body = Record<string, unknown>;

export function readBody(value: unknown): Body {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ValidationError('request body must be a JSON object');
  }
  return Object.fromEntries(Object.entries(value));
}

function requireText(body: Body, field: string, maxLength: number): string {
  const value = body[field];
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError(`${field} is required`, field);
  }
  const trimmed = value.trim();
  if (trimmed.length > maxLength) {
    throw new ValidationError(`${field} must be <= ${maxLength} characters`, field);
  }
  return trimmed;
}

function optionalText(body: Body, field: string, maxLength: number): string | undefined {
  if (body[field] === undefined || body[field] === null) return undefined;
  return requireText(body, field, maxLength);
}

function requireEmail(body: Body, field = 'email'): string {
  const value = body[field];
  if (typeof value !== 'string' || !isValidEmail(normalizeEmail(value))) {
    throw new ValidationError(`Valid "${field}" email is required`, field);
  }
  return normalizeEmail(value);
}

function optionalId(body: Body, field: string): number | null | undefined {
  const value = body[field];
  if (value === undefined) return undefined;
  if (value === null) return null;
  if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 1) {
    throw new ValidationError(`${field} must be a positive integer`, field);
  }
  return value;
}

export function parseId(raw: string, field = 'id'): number {
  if (!/^\d+$/.test(raw)) {
    throw new ValidationError(`${field} must be a positive integer`, field);
  }
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isSafeInteger(parsed) || parsed < 1) {
    throw new ValidationError(`${field} must be a positive integer`, field);
  }
  return parsed;
}

export function parseBooleanQuery(value: unknown, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  throw new ValidationError('boolean query parameters must be true or false');
}

function readEntry(value: unknown, index: number): RecipientEntry {
  if (typeof value === 'string') return value;
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    const entry = readBody(value);
    if (typeof entry.email !== 'string') {
      throw new ValidationError(`recipientEmails[${index}].email must be a string`, 'recipientEmails');
    }
    const name = typeof entry.name === 'string' ? entry.name : undefined;
    return name ? { email: entry.email, name } : { email: entry.email };
  }
  throw new ValidationError(`recipientEmails[${index}] must be a string or { email, name }`, 'recipientEmails');
}

/** Accepts an array of addresses or `{ email, name }` objects, or a comma separated string. */
export function readRecipientEntries(body: Body, field = 'recipientEmails'): RecipientEntry[] {
  const value = body[field];
  let entries: RecipientEntry[];
  if (typeof value === 'string') {
    entries = parseRecipientList(value);
  } else if (Array.isArray(value)) {
    entries = value.map(readEntry);
  } else {
    throw new ValidationError(`${field} must be a list of email addresses`, field);
  }
  if (entries.length > MAX_RECIPIENTS_PER_REQUEST) {
    throw new ValidationError(`${field} accepts at most ${MAX_RECIPIENTS_PER_REQUEST} entries`, field);
  }
  return entries;
}

export function validateCampaignCreate(value: unknown) {
  const body = readBody(value);
  return {
    title: requireText(body, 'title', MAX_TITLE_LENGTH),
    message: requireText(body, 'message', MAX_MESSAGE_LENGTH),
    recipientEmails: readRecipientEntries(body),
  };
}

export function validateRecipientCreate(value: unknown) {
  const body = readBody(value);
  return {
    email: requireEmail(body),
    name: optionalText(body, 'name', MAX_NAME_LENGTH),
    groupId: optionalId(body, 'groupId') ?? undefined,
  };
}

export function validateRecipientPatch(value: unknown): RecipientPatch {
  const body = readBody(value);
  const patch: RecipientPatch = {};
  if (body.name === null) {
    patch.name = null;
  } else if (body.name !== undefined) {
    patch.name = requireText(body, 'name', MAX_NAME_LENGTH);
  }
  const groupId = optionalId(body, 'groupId');
  if (groupId !== undefined) patch.groupId = groupId;
  if (body.optOut !== undefined) {
    if (typeof body.optOut !== 'boolean') {
      throw new ValidationError('optOut must be a boolean', 'optOut');
    }
    patch.optOut = body.optOut;
  }
  return patch;
}

export function validateOptOut(value: unknown) {
  const body = readBody(value);
  return { email: requireEmail(body), reason: optionalText(body, 'reason', MAX_REASON_LENGTH) };
}

export function validateOptIn(value: unknown) {
  return { email: requireEmail(readBody(value)) };
}

export function validateGroupCreate(value: unknown) {
  const body = readBody(value);
  return {
    name: requireText(body, 'name', MAX_NAME_LENGTH),
    description: optionalText(body, 'description', MAX_REASON_LENGTH),
  };
}

export function validateGroupPatch(value: unknown): GroupPatch {
  const body = readBody(value);
  const patch: GroupPatch = {};
  const name = optionalText(body, 'name', MAX_NAME_LENGTH);
  if (name !== undefined) patch.name = name;
  if (body.description === null) {
    patch.description = null;
  } else if (body.description !== undefined) {
    patch.description = requireText(body, 'description', MAX_REASON_LENGTH);
  }
  return patch;
}

export function validateGroupRecipients(value: unknown): string[] {
  const entries = readRecipientEntries(readBody(value));
  return entries.map((entry) => {
    const email = normalizeEmail(typeof entry === 'string' ? entry : entry.email);
    if (!isValidEmail(email)) {
      throw new ValidationError(`Invalid email address: ${email}`, 'recipientEmails');
    }
    return email;
  });
}
