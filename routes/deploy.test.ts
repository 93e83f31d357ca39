import { describe, it, expect, beforeEach, vi, type MockInstance } from 'vitest';
import { Server } from 'socket.io';
import { createDatabase, createDbHelpers, type DbHelpers } from '../lib/db';
import { DeployExecutor } from '../lib/executor';
import { TargetLocks } from '../lib/locks';
import { FakeRunner, invoke, makeNewTarget } from '../lib/testing';
import type { AppContext } from '../lib/context';
import { deployHandlers } from './deploy';
import type { Ack } from './ack';

describe('deploy events', () => {
  let db: DbHelpers;
  let executor: DeployExecutor;
  let dispatch: MockInstance<(releaseId: number) => void>;
  let handlers: ReturnType<typeof deployHandlers>;
  let targetId: number;

  beforeEach(() => {
    db = createDbHelpers(createDatabase(':memory:'));
    targetId = db.createTarget(makeNewTarget());
    executor = new DeployExecutor({ db, createRunner: () => new FakeRunner(), locks: new TargetLocks() });
    dispatch = vi.spyOn(executor, 'dispatch').mockImplementation(() => undefined);
    const ctx: AppContext = {
      io: new Server(),
      db,
      executor,
      openRunner: () => new FakeRunner(),
      deployDefaults: { user: 'ubuntu', sshPort: 22, branch: 'main' },
    };
    handlers = deployHandlers(ctx, () => 'alice');
  });

  const push = (commit: string, deliveryId: string) => {
    const release = db.recordPush({ targetId, deliveryId, commit, ref: 'refs/heads/main', pusher: 'dev' });
    if (!release) throw new Error('push not recorded');
    return release;
  };

  it('queues a manual release of the branch head', async () => {
    const ack = await invoke<Ack>(handlers['deploy:trigger'], { targetId });

    expect(ack).toMatchObject({ success: true, message: 'Release #1 queued' });
    const [release] = db.getTargetReleases(targetId);
    expect(release).toMatchObject({ id: 1, commit: 'HEAD', ref: 'refs/heads/main', pusher: 'alice', status: 'queued' });
    expect(dispatch).toHaveBeenCalledWith(1);
  });

  it('refuses an unknown target', async () => {
    await expect(invoke<Ack>(handlers['deploy:trigger'], { targetId: 99 }))
      .resolves.toEqual({ success: false, error: 'Target 99 not found' });
    expect(dispatch).not.toHaveBeenCalled();
  });

  it('lists the newest releases first', async () => {
    push('c1', 'delivery-1');
    push('c2', 'delivery-2');

    const ack = await invoke<Ack>(handlers['deploy:releases'], { targetId, limit: 1 });

    expect(ack.success).toBe(true);
    if (!ack.success) return;
    expect(ack.data).toEqual({ releases: [expect.objectContaining({ commit: 'c2' })] });
  });

  it('returns one release and its log', async () => {
    const release = push('c1', 'delivery-1');
    db.appendReleaseLog(release.id, 'fetching', 'git pull --ff-only origin main');

    const status = await invoke<Ack>(handlers['deploy:status'], { releaseId: release.id });
    const logs = await invoke<Ack>(handlers['deploy:logs'], { releaseId: release.id });

    expect(status).toEqual({ success: true, data: { release } });
    expect(logs).toMatchObject({
      success: true,
      data: { logs: [{ releaseId: release.id, step: 'fetching', message: 'git pull --ff-only origin main' }] },
    });
    await expect(invoke<Ack>(handlers['deploy:logs'], { releaseId: 42 }))
      .resolves.toEqual({ success: false, error: 'Release 42 not found' });
  });

  it('queues a rollback to the previous live release', async () => {
    const first = push('c1', 'delivery-1');
    db.updateRelease(first.id, { status: 'live', appliedCommit: 'c1' });
    const second = push('c2', 'delivery-2');
    db.updateRelease(second.id, { status: 'live', appliedCommit: 'c2' });

    const ack = await invoke<Ack>(handlers['deploy:rollback'], { targetId });

    expect(ack).toMatchObject({ success: true, message: 'Rollback release #3 queued' });
    expect(db.getRelease(3)).toMatchObject({ commit: 'c1', pusher: 'alice' });
    expect(dispatch).toHaveBeenCalledWith(3);
  });

  it('refuses a rollback with nothing to go back to', async () => {
    await expect(invoke<Ack>(handlers['deploy:rollback'], { targetId }))
      .resolves.toEqual({ success: false, error: 'api has no earlier live release to roll back to' });
  });
});
