import { describe, it, expect, beforeEach, vi } from 'vitest';
import { createDatabase, createDbHelpers, type DbHelpers } from '../lib/db';
import { DeployExecutor } from '../lib/executor';
import { TargetLocks } from '../lib/locks';
import { FakeRunner, FakeService, invoke, makeNewTarget } from '../lib/testing';
import { serviceHandlers, type LogStreamSink } from './service';
import type { Ack } from './ack';

describe('service events', () => {
  let db: DbHelpers;
  let runner: FakeRunner;
  let service: FakeService;
  let emitted: Array<{ targetId: number; data: string }>;
  let targetId: number;
  let locks: TargetLocks;

  const setup = () => {
    const sink: LogStreamSink = {
      emit: (_event, payload) => emitted.push({ targetId: payload.targetId, data: payload.data }),
    };
    return serviceHandlers({ db, openRunner: () => runner, createService: () => service, locks }, sink);
  };

  beforeEach(() => {
    db = createDbHelpers(createDatabase(':memory:'));
    targetId = db.createTarget(makeNewTarget());
    runner = new FakeRunner();
    service = new FakeService('api.service');
    emitted = [];
    locks = new TargetLocks();
  });

  it('reports the service status and closes the session', async () => {
    const { handlers } = setup();

    const ack = await invoke<Ack>(handlers['service:status'], { targetId });

    expect(ack).toEqual({
      success: true,
      data: {
        status: {
          name: 'api.service',
          state: 'running',
          pid: 100,
          startedAt: '2026-01-01T00:00:00.000Z',
          lastExitCode: null,
          restarts: 0,
        },
      },
    });
    expect(runner.closed).toBe(true);
  });

  it('restarts the service and returns its new state', async () => {
    const { handlers } = setup();

    const ack = await invoke<Ack>(handlers['service:restart'], { targetId });

    expect(ack).toMatchObject({ success: true, message: 'Service api.service restarted', data: { status: { pid: 101 } } });
    expect(service.actions).toEqual(['restart']);
  });

  it('waits for a release holding the target before restarting', async () => {
    const { handlers } = setup();
    let finishRelease = () => {};
    const release = locks.withTargetLock(targetId, () => new Promise<void>((resolve) => {
      finishRelease = resolve;
    }));

    const restarting = invoke<Ack>(handlers['service:restart'], { targetId });
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(service.actions).toEqual([]);

    finishRelease();
    await release;

    await expect(restarting).resolves.toMatchObject({ success: true, message: 'Service api.service restarted' });
    expect(service.actions).toEqual(['restart']);
  });

  it('restarts only after a release in progress has gone live', async () => {
    runner.on('git rev-parse HEAD', 'aaaaaaa1111\n').on('git log -1', 'bbbbbbb2222\tFix crash\n').on('curl', '200');
    service.restartDelayMs = 20;
    const executor = new DeployExecutor({
      db,
      createRunner: () => runner,
      createService: () => service,
      detectionWindowMs: 30,
      pollIntervalMs: 5,
      locks,
    });
    const queued = db.recordPush({
      targetId,
      deliveryId: 'delivery-1',
      commit: 'bbbbbbb2222',
      ref: 'refs/heads/main',
      pusher: 'dev',
    });
    if (!queued) throw new Error('push not recorded');
    const { handlers } = setup();

    const applying = executor.apply(queued.id);
    await vi.waitFor(() => expect(service.actions).toEqual(['restart']));
    const restart = await invoke<Ack>(handlers['service:restart'], { targetId });

    expect((await applying).status).toBe('live');
    expect(restart).toMatchObject({ success: true, data: { status: { pid: 102 } } });
    expect(service.actions).toEqual(['restart', 'restart']);
  });

  it('stops the service', async () => {
    const { handlers } = setup();

    const ack = await invoke<Ack>(handlers['service:stop'], { targetId });

    expect(ack).toMatchObject({ success: true, data: { status: { state: 'stopped', pid: null } } });
  });

  it('returns the tail of the log', async () => {
    service.writeLog('booting');
    service.writeLog('listening on 5000');
    const { handlers } = setup();

    const ack = await invoke<Ack>(handlers['service:logs'], { targetId, lines: 1 });

    expect(ack).toEqual({ success: true, data: { logs: 'listening on 5000' } });
  });

  it('streams log lines until the stream is stopped', async () => {
    const { handlers } = setup();

    await invoke<Ack>(handlers['service:stream-logs'], { targetId });
    service.writeLog('GET /health 200');
    const stopped = await invoke<Ack>(handlers['service:stop-stream'], { targetId });
    service.writeLog('GET /health 200');

    expect(emitted).toEqual([{ targetId, data: 'GET /health 200\n' }]);
    expect(stopped).toEqual({ success: true, message: `Stopped streaming logs for target ${targetId}` });
    expect(runner.closed).toBe(true);
  });

  it('stops every stream when the operator leaves', async () => {
    const { handlers, closeAll } = setup();
    await invoke<Ack>(handlers['service:stream-logs'], { targetId });

    closeAll();
    service.writeLog('after disconnect');

    expect(emitted).toEqual([]);
  });

  it('refuses to stop a stream that is not running', async () => {
    const { handlers } = setup();

    await expect(invoke<Ack>(handlers['service:stop-stream'], { targetId })).resolves.toEqual({
      success: false,
      error: `No active log stream found for target ${targetId}`,
    });
  });

  it('reports an unreachable host', async () => {
    runner.connectError = new Error('connect ECONNREFUSED 203.0.113.10:22');
    const { handlers } = setup();

    await expect(invoke<Ack>(handlers['service:status'], { targetId })).resolves.toEqual({
      success: false,
      error: 'connect ECONNREFUSED 203.0.113.10:22',
    });
  });
});
