/**
 * Inbound Plane webhook verification and dispatch
 */

import { createHmac, timingSafeEqual } from 'crypto';
import { z } from 'zod';
import { AuthenticationError, ValidationError } from './errors';
import { Logger, silentLogger } from './logger';
import { SyncEngine } from './sync-engine';
import { emptySyncState, SyncState, WebhookAction } from './types';

export const SIGNATURE_HEADER = 'X-Plane-Signature';

export type SingleIssueReconciler = Pick<SyncEngine, 'runSingleIssueReconciliation'>;

export interface WebhookProcessorOptions {
  /** Without a secret every delivery is accepted unverified */
  secret?: string;
  logger?: Logger;
}

export interface WebhookDelivery {
  action: WebhookAction;
  issueId: string;
  projectId?: string;
  actor?: string;
  createdAt?: string;
}

const ACTIONS: Record<string, WebhookAction> = {
  created: 'created',
  create: 'created',
  updated: 'updated',
  update: 'updated',
  deleted: 'deleted',
  delete: 'deleted',
};

const envelopeSchema = z.object({
  event: z.string().optional(),
});

const issueDataSchema = z
  .object({
    id: z.string().min(1),
    project: z.union([z.string(), z.object({ id: z.string() })]).nullish(),
    project_id: z.string().nullish(),
  })
  .passthrough();

const payloadSchema = z.object({
  event: z.string().optional(),
  action: z
    .string()
    .transform((value) => value.toLowerCase())
    .refine((value) => value in ACTIONS, 'must be created, updated or deleted'),
  data: z.union([z.string().min(1), issueDataSchema]),
  actor: z.union([z.string(), z.object({ id: z.string() }).passthrough()]).nullish(),
  created_at: z.string().nullish(),
  workspace: z.unknown().optional(),
});

/**
 * Constant-time check of the hex HMAC-SHA256 of the raw body
 */
export function verifySignature(payload: string | Buffer, signature: string | undefined, secret: string | undefined): boolean {
  if (!secret) return true;
  if (!signature) return false;

  const expected = createHmac('sha256', secret).update(payload).digest();
  const provided = Buffer.from(signature.trim().toLowerCase(), 'hex');

  // Hex decoding stops at the first invalid character, so malformed input has the wrong length
  if (provided.length !== expected.length) return false;
  return timingSafeEqual(provided, expected);
}

export function signatureFromHeaders(headers: Record<string, string | string[] | undefined>): string | undefined {
  const wanted = SIGNATURE_HEADER.toLowerCase();
  for (const [name, value] of Object.entries(headers)) {
    if (name.toLowerCase() === wanted) {
      return Array.isArray(value) ? value[0] : value;
    }
  }
  return undefined;
}

/**
 * Decode a delivery; null for deliveries that are not about issues
 */
export function parseWebhookPayload(body: unknown): WebhookDelivery | null {
  const envelope = envelopeSchema.safeParse(body);
  if (envelope.success && envelope.data.event && envelope.data.event.toLowerCase() !== 'issue') {
    return null;
  }

  const parsed = payloadSchema.safeParse(body);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ValidationError(`Malformed webhook payload: ${details.join('; ')}`);
  }

  const { data } = parsed.data;
  const action = ACTIONS[parsed.data.action];
  const issueId = typeof data === 'string' ? data : data.id;

  let projectId: string | undefined;
  if (typeof data !== 'string') {
    projectId = data.project_id ?? (typeof data.project === 'string' ? data.project : data.project?.id) ?? undefined;
  }

  if (action !== 'deleted' && !projectId) {
    throw new ValidationError(`Malformed webhook payload: ${action} delivery for issue ${issueId} has no project`);
  }

  const actor = parsed.data.actor;
  return {
    action,
    issueId,
    projectId,
    actor: typeof actor === 'string' ? actor : actor?.id,
    createdAt: parsed.data.created_at ?? undefined,
  };
}

export class WebhookProcessor {
  private engine: SingleIssueReconciler;
  private secret?: string;
  private logger: Logger;
  private warnedUnverified = false;

  constructor(engine: SingleIssueReconciler, options: WebhookProcessorOptions = {}) {
    this.engine = engine;
    this.secret = options.secret;
    this.logger = (options.logger ?? silentLogger).child('Webhook');
  }

  verify(payload: string | Buffer, signature: string | undefined): boolean {
    return verifySignature(payload, signature, this.secret);
  }

  /**
   * Verify, decode and reconcile one delivery
   *
   * Throws AuthenticationError on a bad signature and ValidationError on a
   * malformed body; neither reaches the engine.
   */
  async handle(rawBody: string | Buffer, signature: string | undefined): Promise<SyncState> {
    if (!this.secret && !this.warnedUnverified) {
      this.logger.warn('No webhook secret configured; signatures are not verified');
      this.warnedUnverified = true;
    }
    if (!this.verify(rawBody, signature)) {
      this.logger.warn('Rejected delivery with an invalid signature');
      throw new AuthenticationError();
    }

    let body: unknown;
    try {
      body = JSON.parse(rawBody.toString());
    } catch (error) {
      throw new ValidationError('Webhook body is not valid JSON', { cause: error });
    }

    const delivery = parseWebhookPayload(body);
    if (!delivery) {
      this.logger.debug('Ignoring non-issue delivery');
      return emptySyncState();
    }

    this.logger.info(`${delivery.action} issue ${delivery.issueId}${delivery.actor ? ` by ${delivery.actor}` : ''}`);
    return this.engine.runSingleIssueReconciliation(delivery.issueId, delivery.action, {
      projectId: delivery.projectId,
    });
  }

  async handleRequest(rawBody: string | Buffer, headers: Record<string, string | string[] | undefined>): Promise<SyncState> {
    return this.handle(rawBody, signatureFromHeaders(headers));
  }
}
