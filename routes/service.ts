import type { Socket } from 'socket.io';
import { z } from 'zod';
import { createServiceController } from '../lib/services';
import { onTarget, requireTarget, type AppContext } from '../lib/context';
import { targetLocks } from '../lib/locks';
import { socketLogger } from '../lib/logger';
import type { CommandRunner } from '../lib/runner';
import type { DeploymentTarget, ServiceController } from '../lib/models';
import { withAck, type AckHandler } from './ack';

const TargetInput = z.object({ targetId: z.coerce.number().int().positive() });
const LogsInput = TargetInput.extend({
  lines: z.coerce.number().int().min(1).max(10000).default(200),
  since: z.string().min(1).optional(),
});

export type ServiceFactory = (target: DeploymentTarget, runner: CommandRunner) => ServiceController;

export interface ServiceRouteContext extends Pick<AppContext, 'db' | 'openRunner' | 'locks'> {
  createService?: ServiceFactory;
}

export interface LogStreamSink {
  emit(event: 'service:log-stream', payload: { targetId: number; data: string; timestamp: string }): void;
}

export function serviceHandlers(ctx: ServiceRouteContext, sink: LogStreamSink) {
  const createService: ServiceFactory = ctx.createService ?? ((target, runner) =>
    createServiceController(target, runner, ctx.db));
  const locks = ctx.locks ?? targetLocks;
  const streams = new Map<number, () => void>();

  const withService = <T>(targetId: number, fn: (service: ServiceController) => Promise<T>) =>
    onTarget(ctx, targetId, (target, runner) => fn(createService(target, runner)));

  // Waits for a release in progress on the target
  const lifecycle = (event: string, action: 'start' | 'stop' | 'restart' | 'enable', verb: string) =>
    withAck(event, TargetInput, async ({ targetId }) => {
      const status = await locks.withTargetLock(targetId, () => withService(targetId, async (service) => {
        await service[action]();
        return service.status();
      }));
      return { data: { status }, message: `Service ${status.name} ${verb}` };
    });

  const stopStream = (targetId: number): boolean => {
    const stop = streams.get(targetId);
    if (!stop) return false;
    stop();
    streams.delete(targetId);
    return true;
  };

  const handlers: Record<string, AckHandler> = {
    'service:status': withAck('service:status', TargetInput, async ({ targetId }) => ({
      data: { status: await withService(targetId, (service) => service.status()) },
    })),
    'service:start': lifecycle('service:start', 'start', 'started'),
    'service:stop': lifecycle('service:stop', 'stop', 'stopped'),
    'service:restart': lifecycle('service:restart', 'restart', 'restarted'),
    'service:enable': lifecycle('service:enable', 'enable', 'enabled'),

    'service:logs': withAck('service:logs', LogsInput, async ({ targetId, lines, since }) => ({
      data: { logs: await withService(targetId, (service) => service.logs({ lines, since })) },
    })),

    // Follow the service log; the session stays open until the stream is stopped
    'service:stream-logs': withAck('service:stream-logs', TargetInput, async ({ targetId }) => {
      const target = requireTarget(ctx.db, targetId);
      stopStream(targetId);

      const runner = ctx.openRunner(target);
      await runner.connect();
      const stopFollowing = createService(target, runner).streamLogs((data) => {
        sink.emit('service:log-stream', { targetId, data, timestamp: new Date().toISOString() });
      });

      streams.set(targetId, () => {
        stopFollowing();
        runner.close().catch((error: unknown) =>
          socketLogger.warn({ err: error, targetId }, 'Failed to close log stream session'));
      });
      return { message: `Started streaming logs for ${target.unitName}` };
    }),

    'service:stop-stream': withAck('service:stop-stream', TargetInput, ({ targetId }) => {
      if (!stopStream(targetId)) {
        throw new Error(`No active log stream found for target ${targetId}`);
      }
      return { message: `Stopped streaming logs for target ${targetId}` };
    }),
  };

  const closeAll = () => {
    for (const targetId of Array.from(streams.keys())) {
      stopStream(targetId);
    }
  };

  return { handlers, closeAll };
}

export default (ctx: AppContext, socket: Socket) => {
  const { handlers, closeAll } = serviceHandlers(ctx, {
    emit: (event, payload) => {
      socket.emit(event, payload);
    },
  });
  for (const [event, handler] of Object.entries(handlers)) {
    socket.on(event, handler);
  }
  // Auto-cleanup when socket disconnects
  socket.on('disconnect', closeAll);
};
