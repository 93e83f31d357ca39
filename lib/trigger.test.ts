import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest';
import { createDatabase, createDbHelpers, type DbHelpers } from './db';
import { SignatureError, ValidationError } from './errors';
import { PushTrigger, signPayload, verifySignature, type PushDelivery } from './trigger';
import { makeNewTarget } from './testing';

const SECRET = 'test-secret';
const SHA = '3f786850e387550fdab836ed7e6dc881de23001b';

const pushBody = (overrides: Record<string, unknown> = {}) =>
  JSON.stringify({
    ref: 'refs/heads/main',
    after: SHA,
    repository: { full_name: 'team/api' },
    pusher: { name: 'dev' },
    head_commit: { message: 'Fix login redirect' },
    ...overrides,
  });

const delivery = (body: string, overrides: Partial<PushDelivery> = {}): PushDelivery => ({
  event: 'push',
  deliveryId: 'delivery-1',
  signature: signPayload(SECRET, body),
  body: Buffer.from(body),
  ...overrides,
});

describe('verifySignature', () => {
  const body = Buffer.from(pushBody());

  it('accepts the HMAC of the body', () => {
    expect(verifySignature(SECRET, body, signPayload(SECRET, body))).toBe(true);
  });

  it('rejects a signature made with another secret', () => {
    expect(verifySignature(SECRET, body, signPayload('other-secret', body))).toBe(false);
  });

  it('rejects a signature of a different body', () => {
    expect(verifySignature(SECRET, body, signPayload(SECRET, '{}'))).toBe(false);
  });

  it('rejects a missing or truncated header', () => {
    expect(verifySignature(SECRET, body, undefined)).toBe(false);
    expect(verifySignature(SECRET, body, 'sha256=abc')).toBe(false);
  });
});

describe('PushTrigger', () => {
  let db: DbHelpers;
  let dispatch: Mock<(releaseId: number) => void>;
  let trigger: PushTrigger;
  let targetId: number;

  beforeEach(() => {
    db = createDbHelpers(createDatabase(':memory:'));
    targetId = db.createTarget(makeNewTarget());
    dispatch = vi.fn<(releaseId: number) => void>();
    trigger = new PushTrigger({ db, dispatch, secret: SECRET, trackedBranch: 'main' });
  });

  it('records one release per push and dispatches it once', () => {
    const outcome = trigger.handle(delivery(pushBody()));

    expect(outcome.kind).toBe('queued');
    if (outcome.kind !== 'queued') return;
    expect(outcome.releases).toHaveLength(1);
    const [release] = outcome.releases;
    expect(release).toMatchObject({
      targetId,
      commit: SHA,
      ref: 'refs/heads/main',
      deliveryId: `delivery-1:${targetId}`,
      pusher: 'dev',
      message: 'Fix login redirect',
      status: 'queued',
    });
    expect(dispatch).toHaveBeenCalledTimes(1);
    expect(dispatch).toHaveBeenCalledWith(release.id);
  });

  it('does not dispatch a redelivered push again', () => {
    const body = pushBody();
    trigger.handle(delivery(body));
    const outcome = trigger.handle(delivery(body));

    expect(outcome).toEqual({ kind: 'duplicate', deliveryId: 'delivery-1' });
    expect(dispatch).toHaveBeenCalledTimes(1);
    expect(db.getTargetReleases(targetId)).toHaveLength(1);
  });

  it('dispatches every distinct push', () => {
    const body = pushBody();
    trigger.handle(delivery(body, { deliveryId: 'delivery-1' }));
    trigger.handle(delivery(body, { deliveryId: 'delivery-2' }));
    trigger.handle(delivery(body, { deliveryId: 'delivery-3' }));

    expect(dispatch).toHaveBeenCalledTimes(3);
    expect(db.getTargetReleases(targetId)).toHaveLength(3);
  });

  it('fans a push out to every target on the branch', () => {
    const secondId = db.createTarget(makeNewTarget({ name: 'worker', unitName: 'worker.service' }));

    const outcome = trigger.handle(delivery(pushBody()));

    expect(outcome.kind).toBe('queued');
    if (outcome.kind !== 'queued') return;
    expect(outcome.releases.map((release) => release.targetId)).toEqual([targetId, secondId]);
    expect(dispatch).toHaveBeenCalledTimes(2);
  });

  it('rejects a delivery with a bad signature', () => {
    const body = pushBody();
    expect(() => trigger.handle(delivery(body, { signature: signPayload('wrong-secret', body) })))
      .toThrow(SignatureError);
    expect(dispatch).not.toHaveBeenCalled();
  });

  it('rejects every delivery while no secret is configured', () => {
    const open = new PushTrigger({ db, dispatch, trackedBranch: 'main' });
    expect(() => open.handle(delivery(pushBody()))).toThrow('Webhook secret is not configured');
  });

  it('answers ping events', () => {
    const body = JSON.stringify({ zen: 'Keep it logically awesome.' });
    expect(trigger.handle(delivery(body, { event: 'ping' }))).toEqual({ kind: 'pong' });
  });

  it('ignores other event types', () => {
    const body = '{}';
    expect(trigger.handle(delivery(body, { event: 'issues' }))).toEqual({
      kind: 'ignored',
      reason: 'event issues is not handled',
    });
  });

  it('ignores pushes to other branches', () => {
    const outcome = trigger.handle(delivery(pushBody({ ref: 'refs/heads/feature/login' })));

    expect(outcome).toEqual({ kind: 'ignored', reason: 'refs/heads/feature/login is not tracked' });
    expect(dispatch).not.toHaveBeenCalled();
    expect(db.getTargetReleases(targetId)).toEqual([]);
  });

  it('ignores branch deletions', () => {
    const outcome = trigger.handle(delivery(pushBody({ after: '0'.repeat(40) })));

    expect(outcome).toEqual({ kind: 'ignored', reason: 'branch deleted' });
    expect(dispatch).not.toHaveBeenCalled();
  });

  it('ignores pushes when no target follows the branch', () => {
    db.deleteTarget(targetId);
    expect(trigger.handle(delivery(pushBody()))).toEqual({ kind: 'ignored', reason: 'no target follows main' });
  });

  it('rejects a payload without a commit sha', () => {
    expect(() => trigger.handle(delivery(pushBody({ after: 'HEAD' })))).toThrow(ValidationError);
  });

  it('rejects a body that is not JSON', () => {
    expect(() => trigger.handle(delivery('ref=main'))).toThrow('Push payload is not valid JSON');
  });

  it('requires a delivery id', () => {
    expect(() => trigger.handle(delivery(pushBody(), { deliveryId: undefined })))
      .toThrow('Missing X-GitHub-Delivery header');
  });
});
