import type { Socket } from 'socket.io';
import { z } from 'zod';
import { NotFoundError } from '../lib/errors';
import { requireTarget, type AppContext } from '../lib/context';
import { currentUser } from '../lib/auth';
import { withAck, type AckHandler } from './ack';

const TargetInput = z.object({ targetId: z.coerce.number().int().positive() });
const ReleaseInput = z.object({ releaseId: z.coerce.number().int().positive() });
const ReleasesInput = TargetInput.extend({
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

export function deployHandlers(ctx: AppContext, operator: () => string): Record<string, AckHandler> {
  const { db, executor } = ctx;

  return {
    // Queue a release of the branch head, the same path a push takes
    'deploy:trigger': withAck('deploy:trigger', TargetInput, ({ targetId }) => {
      const release = executor.queueManual(targetId, operator());
      executor.dispatch(release.id);
      return { data: { release }, message: `Release #${release.id} queued` };
    }),

    'deploy:releases': withAck('deploy:releases', ReleasesInput, ({ targetId, limit }) => {
      requireTarget(db, targetId);
      return { data: { releases: db.getTargetReleases(targetId, limit) } };
    }),

    'deploy:status': withAck('deploy:status', ReleaseInput, ({ releaseId }) => {
      const release = db.getRelease(releaseId);
      if (!release) throw NotFoundError.release(releaseId);
      return { data: { release } };
    }),

    'deploy:logs': withAck('deploy:logs', ReleaseInput, ({ releaseId }) => {
      if (!db.getRelease(releaseId)) throw NotFoundError.release(releaseId);
      return { data: { logs: db.getReleaseLogs(releaseId) } };
    }),

    // Redeploy the live release before the current one
    'deploy:rollback': withAck('deploy:rollback', TargetInput, ({ targetId }) => {
      const release = executor.queueRollback(targetId, operator());
      executor.dispatch(release.id);
      return { data: { release }, message: `Rollback release #${release.id} queued` };
    }),
  };
}

export default (ctx: AppContext, socket: Socket) => {
  const handlers = deployHandlers(ctx, () => currentUser(socket)?.username ?? 'operator');
  for (const [event, handler] of Object.entries(handlers)) {
    socket.on(event, handler);
  }
};
