import { randomUUID } from 'crypto';
import type { Server } from 'socket.io';
import {
  ConnectivityError,
  NotFoundError,
  PushgateError,
  RestartError,
  UpdateError,
  ValidationError,
  errorMessage,
} from './errors';
import { executorLogger } from './logger';
import { targetLocks, type TargetLocks } from './locks';
import { createRunner, DeadlineRunner, type CommandRunner, type RunnerDefaults } from './runner';
import { createSourceControl, type SourceControl } from './git';
import { createServiceController } from './services';
import { waitUntilReady, type ProbeOptions } from './health';
import type { DbHelpers, PushRecord, ReleaseUpdate } from './db';
import type {
  DeployStep,
  DeploymentTarget,
  Release,
  ServiceController,
  ServiceStatus,
} from './models';

/** Ref recorded on releases that move a target back to an earlier commit */
export const ROLLBACK_REF = 'rollback';

export interface ExecutorOptions {
  db: DbHelpers;
  runnerDefaults?: RunnerDefaults;
  createRunner?: (target: DeploymentTarget) => CommandRunner;
  createService?: (target: DeploymentTarget, runner: CommandRunner) => ServiceController;
  createSource?: (target: DeploymentTarget, runner: CommandRunner) => SourceControl;
  /** Upper bound for a whole release session */
  sessionTimeoutMs?: number;
  /** Fresh budget for putting the target back once a step has failed */
  rollbackTimeoutMs?: number;
  /** How long the restarted service must stay up before the release counts as live */
  detectionWindowMs?: number;
  pollIntervalMs?: number;
  probe?: ProbeOptions;
  locks?: TargetLocks;
  now?: () => number;
}

interface Session {
  release: Release;
  target: DeploymentTarget;
  runner: CommandRunner;
  source: SourceControl;
  service: ServiceController;
}

const shortSha = (sha: string) => sha.slice(0, 7);

/**
 * Applies releases to their target one step at a time:
 * connecting → fetching → installing → restarting → verifying → live.
 *
 * A failure before the restart puts the working copy back and leaves the running
 * process alone. A failure at or after the restart rolls the target back to the
 * previous commit.
 */
export class DeployExecutor {
  private io: Server | null = null;
  private readonly db: DbHelpers;
  private readonly locks: TargetLocks;
  private readonly sessionTimeoutMs: number;
  private readonly rollbackTimeoutMs: number;
  private readonly detectionWindowMs: number;
  private readonly pollIntervalMs: number;
  private readonly probe: ProbeOptions;
  private readonly now: () => number;
  private readonly openRunner: (target: DeploymentTarget) => CommandRunner;
  private readonly openService: (target: DeploymentTarget, runner: CommandRunner) => ServiceController;
  private readonly openSource: (target: DeploymentTarget, runner: CommandRunner) => SourceControl;

  constructor(options: ExecutorOptions) {
    this.db = options.db;
    this.locks = options.locks ?? targetLocks;
    this.sessionTimeoutMs = options.sessionTimeoutMs ?? 10 * 60 * 1000;
    this.rollbackTimeoutMs = options.rollbackTimeoutMs ?? 5 * 60 * 1000;
    this.detectionWindowMs = options.detectionWindowMs ?? 5000;
    this.pollIntervalMs = options.pollIntervalMs ?? 1000;
    this.probe = options.probe ?? {};
    this.now = options.now ?? Date.now;
    this.openRunner = options.createRunner ?? ((target) => createRunner(target, options.runnerDefaults));
    this.openService = options.createService ?? ((target, runner) => createServiceController(target, runner, this.db));
    this.openSource = options.createSource ?? createSourceControl;
  }

  // Set the Socket.IO server instance for real-time updates
  setSocketServer(io: Server) {
    this.io = io;
  }

  private log(release: Release, step: DeployStep | null, message: string, level: 'info' | 'error' = 'info') {
    this.db.appendReleaseLog(release.id, step, message);
    executorLogger[level]({ releaseId: release.id, targetId: release.targetId, step }, message);
    this.io?.emit('deploy:log', { releaseId: release.id, targetId: release.targetId, step, message });
  }

  // Command output goes to the release log as it arrives
  private output(release: Release, step: DeployStep) {
    return (chunk: string) => {
      const text = chunk.trimEnd();
      if (!text) return;
      this.db.appendReleaseLog(release.id, step, text);
      this.io?.emit('deploy:log', { releaseId: release.id, targetId: release.targetId, step, message: text });
    };
  }

  private update(releaseId: number, changes: ReleaseUpdate): Release {
    this.db.updateRelease(releaseId, changes);
    const release = this.db.getRelease(releaseId);
    if (!release) throw NotFoundError.release(releaseId);
    this.io?.emit('deploy:release', release);
    return release;
  }

  private fail(release: Release, step: DeployStep, error: unknown): Release {
    const message = errorMessage(error);
    this.log(release, step, `Failed: ${message}`, 'error');
    return this.update(release.id, { status: 'failed', failedStep: step, error: message });
  }

  /**
   * Apply a queued release. Releases of one target are applied one at a time;
   * a release that is no longer queued is returned untouched.
   */
  async apply(releaseId: number): Promise<Release> {
    const queued = this.db.getRelease(releaseId);
    if (!queued) throw NotFoundError.release(releaseId);
    const target = this.db.getTargetById(queued.targetId);
    if (!target) throw NotFoundError.target(queued.targetId);

    return this.locks.withTargetLock(target.id, async () => {
      const release = this.db.getRelease(releaseId) ?? queued;
      if (release.status !== 'queued') {
        executorLogger.debug({ releaseId, status: release.status }, 'Release already processed');
        return release;
      }
      return this.execute(release, target);
    });
  }

  private async execute(release: Release, target: DeploymentTarget): Promise<Release> {
    this.db.markReleaseStarted(release.id);
    const started = this.update(release.id, {});
    const connection = this.openRunner(target);
    const runner = new DeadlineRunner(connection, this.now() + this.sessionTimeoutMs, this.now);

    try {
      return await this.runSteps(started, target, runner, connection);
    } finally {
      await runner.close().catch((error: unknown) =>
        executorLogger.warn({ err: error, releaseId: release.id }, 'Failed to close session'));
    }
  }

  private async runSteps(
    release: Release,
    target: DeploymentTarget,
    runner: CommandRunner,
    connection: CommandRunner,
  ): Promise<Release> {
    this.log(release, 'connecting', `Connecting to ${target.sshUser}@${target.host}:${target.sshPort}`);
    try {
      await runner.connect();
    } catch (error) {
      return this.fail(release, 'connecting', error);
    }

    const session: Session = {
      release,
      target,
      runner,
      source: this.openSource(target, runner),
      service: this.openService(target, runner),
    };

    let step: DeployStep = 'fetching';
    let previousCommit: string;
    try {
      previousCommit = await session.source.currentCommit();
    } catch (error) {
      return this.fail(release, step, asStepError(step, error, target));
    }
    this.db.updateRelease(release.id, { previousCommit });

    let appliedCommit: string;
    try {
      appliedCommit = await this.fetch(session);
      step = 'installing';
      await this.install(session, step);
    } catch (error) {
      await this.revertWorkingCopy(this.recovery(session, connection), step, previousCommit);
      return this.fail(release, step, asStepError(step, error, target));
    }
    this.update(release.id, { appliedCommit });

    step = 'restarting';
    try {
      this.log(release, step, `Restarting ${session.service.name}`);
      await session.service.restart();
      step = 'verifying';
      await this.verify(session, step);
    } catch (error) {
      return this.rollBack(this.recovery(session, connection), step, asStepError(step, error, target), previousCommit);
    }

    this.log(release, 'verifying', `Release ${shortSha(appliedCommit)} is live`);
    return this.update(release.id, { status: 'live', failedStep: null, error: null });
  }

  /**
   * The same connection with its own deadline, so a step that ran out the
   * session budget can still be undone.
   */
  private recovery(session: Session, connection: CommandRunner): Session {
    const runner = new DeadlineRunner(connection, this.now() + this.rollbackTimeoutMs, this.now);
    return {
      ...session,
      runner,
      source: this.openSource(session.target, runner),
      service: this.openService(session.target, runner),
    };
  }

  private async fetch({ release, target, source }: Session): Promise<string> {
    if (release.ref === ROLLBACK_REF) {
      this.log(release, 'fetching', `Resetting working copy to ${shortSha(release.commit)}`);
      await source.resetTo(release.commit);
    } else {
      this.log(release, 'fetching', `Pulling origin/${target.branch} into ${target.workingDirectory}`);
      await source.pull(target.branch, this.output(release, 'fetching'));
    }
    const head = await source.describeHead();
    this.log(release, 'fetching', `Working copy at ${shortSha(head.hash)} ${head.message}`.trimEnd());
    return head.hash;
  }

  private async install({ release, target, runner }: Session, step: DeployStep): Promise<void> {
    if (!target.installCommand) return;
    this.log(release, step, `Running ${target.installCommand}`);
    await runner.run(target.installCommand, {
      cwd: target.workingDirectory,
      onOutput: this.output(release, step),
    });
  }

  private async revertWorkingCopy({ release, source }: Session, step: DeployStep, previousCommit: string) {
    try {
      await source.resetTo(previousCommit);
      this.log(release, step, `Working copy reset to ${shortSha(previousCommit)}; service left running`);
    } catch (error) {
      this.log(release, step, `Could not reset working copy: ${errorMessage(error)}`, 'error');
    }
  }

  private async verify(session: Session, step: DeployStep): Promise<void> {
    const status = await this.verifyRunning(session.service);
    this.log(session.release, step, `${session.service.name} running (pid ${status.pid ?? 'unknown'})`);
    const probe = await waitUntilReady(session.runner, session.target, this.probe);
    if (probe) {
      this.log(session.release, step, `Readiness probe ${probe.url} answered ${probe.statusCode}`);
    }
  }

  /**
   * Watch the service through the detection window. It must not stop, crash-loop
   * or be replaced by a new process, and must end the window running.
   */
  async verifyRunning(service: ServiceController): Promise<ServiceStatus> {
    const deadline = this.now() + this.detectionWindowMs;
    let status = await service.status();
    const startedAt = status.startedAt;

    for (;;) {
      if (status.state === 'stopped' || status.state === 'crash-looping') {
        throw new RestartError(`${service.name} is ${status.state} after restart`, {
          state: status.state,
          lastExitCode: status.lastExitCode,
        });
      }
      if (status.startedAt !== startedAt) {
        throw new RestartError(`${service.name} restarted during the detection window`, {
          lastExitCode: status.lastExitCode,
        });
      }
      const remaining = deadline - this.now();
      if (remaining <= 0) break;
      await sleep(Math.min(this.pollIntervalMs, remaining));
      status = await service.status();
    }

    if (status.state !== 'running') {
      throw new RestartError(
        `${service.name} did not reach running within ${this.detectionWindowMs}ms (${status.state})`,
      );
    }
    return status;
  }

  private async rollBack(session: Session, failedStep: DeployStep, error: PushgateError, previousCommit: string) {
    const { release } = session;
    const reason = errorMessage(error);
    this.log(release, failedStep, `Failed: ${reason}`, 'error');
    this.update(release.id, { failedStep, error: reason });

    try {
      this.log(release, 'rolling_back', `Rolling back to ${shortSha(previousCommit)}`);
      await session.source.resetTo(previousCommit);
      await this.install(session, 'rolling_back');
      await session.service.restart();
      await this.verify(session, 'rolling_back');
    } catch (rollbackError) {
      const message = `${reason}; rollback failed: ${errorMessage(rollbackError)}`;
      this.log(release, 'rolling_back', `Rollback failed: ${errorMessage(rollbackError)}`, 'error');
      return this.update(release.id, { status: 'failed', failedStep: 'rolling_back', error: message });
    }

    this.log(release, 'rolling_back', `Rolled back to ${shortSha(previousCommit)}`);
    return this.update(release.id, { status: 'rolled_back' });
  }

  /**
   * Queue a release of whatever the tracked branch points to now.
   */
  queueManual(targetId: number, operator: string): Release {
    const target = this.db.getTargetById(targetId);
    if (!target) throw NotFoundError.target(targetId);
    return this.record({
      targetId,
      deliveryId: `manual-${randomUUID()}`,
      commit: 'HEAD',
      ref: `refs/heads/${target.branch}`,
      pusher: operator,
      message: 'Manual deploy',
    });
  }

  /**
   * Queue a release that moves the target back to the live release before the
   * current one.
   */
  queueRollback(targetId: number, operator: string): Release {
    const target = this.db.getTargetById(targetId);
    if (!target) throw NotFoundError.target(targetId);
    const current = this.db.getLastLiveRelease(targetId);
    const candidate = current ? this.db.getLastLiveRelease(targetId, current.id) : undefined;
    if (!candidate) {
      throw new ValidationError(`${target.name} has no earlier live release to roll back to`);
    }
    return this.record({
      targetId,
      deliveryId: `rollback-${randomUUID()}`,
      commit: candidate.appliedCommit ?? candidate.commit,
      ref: ROLLBACK_REF,
      pusher: operator,
      message: `Roll back to release #${candidate.id}`,
    });
  }

  private record(push: PushRecord): Release {
    const release = this.db.recordPush(push);
    if (!release) {
      throw new ValidationError(`Delivery ${push.deliveryId} was already recorded`);
    }
    this.io?.emit('deploy:release', release);
    return release;
  }

  /**
   * Start applying a release in the background. Failures end up on the release
   * record; anything thrown outside the steps is logged here.
   */
  dispatch(releaseId: number): void {
    this.apply(releaseId).catch((error: unknown) =>
      executorLogger.error({ err: error, releaseId }, 'Release could not be applied'));
  }

  /**
   * Called once at startup. Releases cut off mid-apply are marked failed; queued
   * releases are dispatched again.
   */
  recover(): { interrupted: number; requeued: number } {
    const interrupted = this.db.getReleasesByStatus('applying');
    for (const release of interrupted) {
      this.log(release, null, 'Interrupted by a controller restart', 'error');
      this.update(release.id, { status: 'failed', error: 'Interrupted by a controller restart' });
    }
    const queued = this.db.getReleasesByStatus('queued');
    for (const release of queued) {
      this.dispatch(release.id);
    }
    return { interrupted: interrupted.length, requeued: queued.length };
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// Classify a step failure; connectivity and already-classified errors keep their class
function asStepError(step: DeployStep, error: unknown, target: DeploymentTarget): PushgateError {
  if (error instanceof ConnectivityError || (error instanceof PushgateError && error.code !== 'COMMAND_FAILED')) {
    return error;
  }
  const message = errorMessage(error);
  switch (step) {
    case 'fetching':
      return new UpdateError(`Fetching ${target.branch} failed: ${message}`, { step });
    case 'installing':
      return new UpdateError(`Install command failed: ${message}`, { step });
    default:
      return new RestartError(`Restarting ${target.unitName} failed: ${message}`, { step });
  }
}
