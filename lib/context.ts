import type { Server } from 'socket.io';
import { NotFoundError } from './errors';
import type { DbHelpers } from './db';
import type { DeployExecutor } from './executor';
import type { TargetLocks } from './locks';
import type { CommandRunner } from './runner';
import type { DeploymentTarget } from './models';

export interface DeployDefaults {
  host?: string;
  user: string;
  sshPort: number;
  branch: string;
}

/**
 * Everything a route needs, built once in index.ts.
 */
export interface AppContext {
  io: Server;
  db: DbHelpers;
  executor: DeployExecutor;
  openRunner: (target: DeploymentTarget) => CommandRunner;
  deployDefaults: DeployDefaults;
  /** Shared with the executor; defaults to the process-wide locks */
  locks?: TargetLocks;
}

export function requireTarget(db: DbHelpers, targetId: number): DeploymentTarget {
  const target = db.getTargetById(targetId);
  if (!target) throw NotFoundError.target(targetId);
  return target;
}

/**
 * Open a session to the target, run `fn` and close the session again.
 */
export async function onTarget<T>(
  ctx: Pick<AppContext, 'db' | 'openRunner'>,
  targetId: number,
  fn: (target: DeploymentTarget, runner: CommandRunner) => Promise<T>,
): Promise<T> {
  const target = requireTarget(ctx.db, targetId);
  const runner = ctx.openRunner(target);
  try {
    await runner.connect();
    return await fn(target, runner);
  } finally {
    await runner.close();
  }
}
