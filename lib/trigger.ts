import { createHmac, timingSafeEqual } from 'crypto';
import { z } from 'zod';
import { SignatureError, ValidationError } from './errors';
import { triggerLogger } from './logger';
import type { DbHelpers } from './db';
import type { Release } from './models';

const ZERO_SHA = /^0{40}$/;

export const PushEventSchema = z.object({
  ref: z.string().min(1),
  after: z.string().regex(/^[0-9a-f]{40}$/, 'after must be a full commit sha'),
  repository: z.object({
    full_name: z.string().min(1),
  }),
  pusher: z.object({ name: z.string() }).optional(),
  head_commit: z.object({ message: z.string() }).nullable().optional(),
});

export type PushEvent = z.infer<typeof PushEventSchema>;

export interface PushDelivery {
  event?: string;
  deliveryId?: string;
  signature?: string;
  body: Buffer;
}

export type TriggerOutcome =
  | { kind: 'pong' }
  | { kind: 'ignored'; reason: string }
  | { kind: 'duplicate'; deliveryId: string }
  | { kind: 'queued'; releases: Release[] };

export function signPayload(secret: string, body: Buffer | string): string {
  return `sha256=${createHmac('sha256', secret).update(body).digest('hex')}`;
}

/**
 * Constant-time check of an `X-Hub-Signature-256` header against the body.
 */
export function verifySignature(secret: string, body: Buffer, header: string | undefined): boolean {
  if (!header) return false;
  const expected = Buffer.from(signPayload(secret, body));
  const received = Buffer.from(header);
  return expected.length === received.length && timingSafeEqual(expected, received);
}

export interface PushTriggerOptions {
  db: DbHelpers;
  /** Starts applying a recorded release */
  dispatch: (releaseId: number) => void;
  secret?: string;
  trackedBranch: string;
}

/**
 * Turns verified push deliveries into releases. Each delivery is recorded in the
 * same transaction as its release, so a redelivered push never reaches the
 * executor twice.
 */
export class PushTrigger {
  constructor(private readonly options: PushTriggerOptions) {}

  handle(delivery: PushDelivery): TriggerOutcome {
    const { secret } = this.options;
    if (!secret) {
      throw new SignatureError('Webhook secret is not configured');
    }
    if (!verifySignature(secret, delivery.body, delivery.signature)) {
      throw new SignatureError();
    }

    if (delivery.event === 'ping') {
      return { kind: 'pong' };
    }
    if (delivery.event !== 'push') {
      return { kind: 'ignored', reason: `event ${delivery.event ?? 'unknown'} is not handled` };
    }
    if (!delivery.deliveryId) {
      throw new ValidationError('Missing X-GitHub-Delivery header');
    }

    const event = parsePushEvent(delivery.body);
    return this.accept(delivery.deliveryId, event);
  }

  private accept(deliveryId: string, event: PushEvent): TriggerOutcome {
    const { db, trackedBranch } = this.options;
    const log = triggerLogger.child({ deliveryId, ref: event.ref, commit: event.after });

    if (event.ref !== `refs/heads/${trackedBranch}`) {
      log.info('Push to untracked ref ignored');
      return { kind: 'ignored', reason: `${event.ref} is not tracked` };
    }
    if (ZERO_SHA.test(event.after)) {
      log.info('Branch deletion ignored');
      return { kind: 'ignored', reason: 'branch deleted' };
    }

    const targets = db.getTargetsForBranch(trackedBranch);
    if (targets.length === 0) {
      log.warn('No target follows the tracked branch');
      return { kind: 'ignored', reason: `no target follows ${trackedBranch}` };
    }

    // One delivery fans out to every target on the branch; each pair is recorded once
    const releases: Release[] = [];
    for (const target of targets) {
      const release = db.recordPush({
        targetId: target.id,
        deliveryId: `${deliveryId}:${target.id}`,
        commit: event.after,
        ref: event.ref,
        pusher: event.pusher?.name ?? null,
        message: event.head_commit?.message ?? null,
      });
      if (release) releases.push(release);
    }

    if (releases.length === 0) {
      log.info('Delivery already recorded');
      return { kind: 'duplicate', deliveryId };
    }

    for (const release of releases) {
      log.info({ targetId: release.targetId, releaseId: release.id }, 'Release queued');
      this.options.dispatch(release.id);
    }
    return { kind: 'queued', releases };
  }
}

function parsePushEvent(body: Buffer): PushEvent {
  let json: unknown;
  try {
    json = JSON.parse(body.toString('utf8'));
  } catch (error) {
    throw new ValidationError('Push payload is not valid JSON', {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  const result = PushEventSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid push payload: ${issues.join('; ')}`, { issues });
  }
  return result.data;
}
