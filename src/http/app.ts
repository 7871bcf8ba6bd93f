import express, { type NextFunction, type Request, type Response } from 'express';
import rateLimit, { ipKeyGenerator } from 'express-rate-limit';

import type { DataAccess } from '../contracts/store';
import { errorMessage, NotFoundError, PipelineError, type ErrorCode } from '../errors';
import type { Logger } from '../logger';
import type { JobSubmitter } from '../submission';
import { RESEND_SIGNATURE_HEADER, readSuppressionEvent, verifyWebhookSignature } from '../webhooks/resend';
import {
  parseBooleanQuery,
  parseId,
  validateCampaignCreate,
  validateGroupCreate,
  validateGroupPatch,
  validateGroupRecipients,
  validateOptIn,
  validateOptOut,
  validateRecipientCreate,
  validateRecipientPatch,
} from './validation';

type RawBodyRequest = Request & { rawBody?: string };

const JSON_BODY_LIMIT = '1mb';
const SEND_RATE_LIMIT = 30;
const SEND_WINDOW_MS = 60_000;
const WEBHOOK_TOLERANCE_SECONDS = 300;

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  NOT_FOUND: 404,
  INVALID_STATE_TRANSITION: 409,
  VALIDATION_ERROR: 400,
  TRANSIENT_STORE_ERROR: 503,
};

export interface AppDependencies {
  store: DataAccess;
  submitter: JobSubmitter;
  logger: Logger;
  webhookSecret?: string;
  sendRateLimit?: number;
}

type Handler = (req: Request, res: Response) => Promise<void>;

function route(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction) => {
    handler(req, res).catch(next);
  };
}

export function createApp({ store, submitter, logger, webhookSecret, sendRateLimit }: AppDependencies) {
  const app = express();

  app.use(
    express.json({
      limit: JSON_BODY_LIMIT,
      verify: (req, _res, buf) => {
        (req as RawBodyRequest).rawBody = buf.toString('utf8');
      },
    }),
  );

  const sendLimiter = rateLimit({
    windowMs: SEND_WINDOW_MS,
    limit: sendRateLimit ?? SEND_RATE_LIMIT,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req, res) => {
      res.status(429).json({ error: { code: 'RATE_LIMITED', message: 'Too many requests' } });
    },
    keyGenerator: (req) => ipKeyGenerator(req.ip || ''),
  });

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: Date.now() });
  });

  // Campaigns

  app.post(
    '/campaigns',
    route(async (req, res) => {
      const input = validateCampaignCreate(req.body);
      const campaign = await store.createCampaign({ title: input.title, message: input.message });
      await submitter.submitLinkingJob(campaign.id, input.recipientEmails);
      res.status(201).json({ ...campaign, recipientEmails: input.recipientEmails, recipients: [] });
    }),
  );

  app.get(
    '/campaigns',
    route(async (_req, res) => {
      res.json(await store.listCampaigns());
    }),
  );

  app.get(
    '/campaigns/:id',
    route(async (req, res) => {
      const campaignId = parseId(req.params.id);
      const campaign = await store.getCampaign(campaignId);
      if (!campaign) throw new NotFoundError('campaign', campaignId);
      const recipients = await store.listCampaignRecipients(campaignId);
      res.json({ ...campaign, recipients });
    }),
  );

  app.post(
    '/campaigns/:id/send',
    sendLimiter,
    route(async (req, res) => {
      const campaignId = parseId(req.params.id);
      await submitter.submitDispatchJob(campaignId);
      res.status(202).json({ status: 'queued', campaignId });
    }),
  );

  // Recipients

  app.post(
    '/recipients',
    route(async (req, res) => {
      const input = validateRecipientCreate(req.body);
      const { recipient, created } = await store.upsertRecipient(input.email, input.name);
      const result =
        input.groupId === undefined
          ? recipient
          : await store.updateRecipient(recipient.id, { groupId: input.groupId });
      res.status(created ? 201 : 200).json(result);
    }),
  );

  app.get(
    '/recipients',
    route(async (req, res) => {
      const includeOptedOut = parseBooleanQuery(req.query.includeOptedOut, false);
      res.json(await store.listRecipients({ includeOptedOut }));
    }),
  );

  app.get(
    '/recipients/active',
    route(async (_req, res) => {
      res.json(await store.listRecipients({ includeOptedOut: false }));
    }),
  );

  app.post(
    '/recipients/opt-out',
    route(async (req, res) => {
      const input = validateOptOut(req.body);
      const recipient = await store.setRecipientOptOut(input.email, true, input.reason);
      logger.info(`Recipient ${recipient.email} opted out. Reason: ${input.reason ?? 'none given'}`);
      res.json(recipient);
    }),
  );

  app.post(
    '/recipients/opt-in',
    route(async (req, res) => {
      const input = validateOptIn(req.body);
      const recipient = await store.setRecipientOptOut(input.email, false);
      logger.info(`Recipient ${recipient.email} opted in`);
      res.json(recipient);
    }),
  );

  app.patch(
    '/recipients/:id',
    route(async (req, res) => {
      const recipientId = parseId(req.params.id);
      res.json(await store.updateRecipient(recipientId, validateRecipientPatch(req.body)));
    }),
  );

  // Groups

  app.post(
    '/groups',
    route(async (req, res) => {
      const input = validateGroupCreate(req.body);
      res.status(201).json(await store.createGroup(input.name, input.description));
    }),
  );

  app.get(
    '/groups',
    route(async (_req, res) => {
      res.json(await store.listGroups());
    }),
  );

  app.patch(
    '/groups/:id',
    route(async (req, res) => {
      const groupId = parseId(req.params.id);
      res.json(await store.updateGroup(groupId, validateGroupPatch(req.body)));
    }),
  );

  app.patch(
    '/groups/:id/recipients',
    route(async (req, res) => {
      const groupId = parseId(req.params.id);
      const { assigned, skipped } = await store.assignRecipientsToGroup(
        groupId,
        validateGroupRecipients(req.body),
      );
      for (const email of skipped) {
        logger.warn(`Group ${groupId}: skipping opted-out recipient ${email}`);
      }
      res.json(assigned);
    }),
  );

  app.get(
    '/groups/:id/recipients',
    route(async (req, res) => {
      const groupId = parseId(req.params.id);
      const group = await store.getGroup(groupId);
      if (!group) throw new NotFoundError('group', groupId);
      const activeOnly = parseBooleanQuery(req.query.activeOnly, true);
      res.json(await store.listGroupRecipients(groupId, { activeOnly }));
    }),
  );

  // Provider events

  app.post(
    '/webhooks/provider',
    route(async (req, res) => {
      if (!webhookSecret) {
        res.status(503).send('EMAIL_WEBHOOK_SECRET not configured');
        return;
      }
      const rawBody = (req as RawBodyRequest).rawBody;
      if (!rawBody) {
        res.status(400).send('Missing raw request body');
        return;
      }
      const verification = verifyWebhookSignature({
        secret: webhookSecret,
        signatureHeader: req.headers[RESEND_SIGNATURE_HEADER],
        payload: rawBody,
        toleranceSeconds: WEBHOOK_TOLERANCE_SECONDS,
      });
      if (!verification.ok) {
        res.status(401).send(verification.reason);
        return;
      }

      const event = readSuppressionEvent(req.body);
      if (event) {
        try {
          await store.setRecipientOptOut(event.email, true, event.reason);
          logger.info(`Recipient ${event.email} opted out after ${event.reason}`);
        } catch (error) {
          if (!(error instanceof NotFoundError)) throw error;
          logger.info(`Ignoring ${event.reason} for unknown recipient ${event.email}`);
        }
      }
      res.status(204).end();
    }),
  );

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof PipelineError) {
      res.status(STATUS_BY_CODE[error.code]).json({ error: { code: error.code, message: error.message } });
      return;
    }
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: { code: 'VALIDATION_ERROR', message: 'Malformed JSON body' } });
      return;
    }
    logger.error(`Unhandled request error: ${errorMessage(error)}`);
    res.status(500).json({ error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } });
  });

  return app;
}
