import { spawn } from 'child_process';
import { EventEmitter } from 'events';
import fs from 'fs';
import { Mutex } from 'async-mutex';
import { parse } from 'dotenv';
import { supervisorLogger } from './logger';
import type {
  DeploymentTarget,
  LogOptions,
  ManagedService,
  RestartPolicy,
  ServiceState,
  ServiceStatus,
  ServiceUnit,
} from './models';

export interface LaunchSpec {
  command: string;
  cwd?: string;
  env?: Record<string, string>;
  /** Read on every launch, so a rewritten env file applies on the next restart */
  envFile?: string;
}

function loadEnvFile(file: string | undefined): Record<string, string> {
  if (!file || !fs.existsSync(file)) return {};
  return parse(fs.readFileSync(file));
}

/**
 * A running child as seen by the supervisor.
 */
export interface ProcessHandle {
  readonly pid: number | null;
  onOutput(listener: (chunk: string, stream: 'stdout' | 'stderr') => void): void;
  /** Called exactly once, also when the process could not be spawned */
  onExit(listener: (code: number | null, signal: NodeJS.Signals | null) => void): void;
  kill(signal?: NodeJS.Signals): void;
}

export type ProcessLauncher = (spec: LaunchSpec) => ProcessHandle;

export const spawnProcess: ProcessLauncher = (spec) => {
  const child = spawn('sh', ['-c', spec.command], {
    cwd: spec.cwd,
    env: { ...process.env, ...loadEnvFile(spec.envFile), ...spec.env },
    stdio: ['ignore', 'pipe', 'pipe'],
  });

  const exitListeners: Array<(code: number | null, signal: NodeJS.Signals | null) => void> = [];
  let exited = false;
  const finish = (code: number | null, signal: NodeJS.Signals | null) => {
    if (exited) return;
    exited = true;
    exitListeners.forEach((listener) => listener(code, signal));
  };

  child.on('exit', finish);
  child.on('error', (error) => {
    supervisorLogger.error({ err: error, command: spec.command }, 'Failed to spawn supervised process');
    finish(127, null);
  });

  return {
    pid: child.pid ?? null,
    onOutput(listener) {
      child.stdout.on('data', (data: Buffer) => listener(data.toString(), 'stdout'));
      child.stderr.on('data', (data: Buffer) => listener(data.toString(), 'stderr'));
    },
    onExit(listener) {
      exitListeners.push(listener);
    },
    kill(signal) {
      child.kill(signal);
    },
  };
};

export interface SupervisorOptions extends LaunchSpec {
  name: string;
  restartPolicy?: RestartPolicy;
  /** How long a fresh process must stay up before it counts as running */
  detectionWindowMs?: number;
  /** Fixed delay between automatic restarts; a run shorter than this is a crash loop */
  backoffMs?: number;
  /** Starts out enabled, e.g. restored from the database */
  enabled?: boolean;
  /** Called when the service is enabled */
  onEnable?: () => void;
  /** Grace period between SIGTERM and SIGKILL on stop */
  killTimeoutMs?: number;
  maxLogLines?: number;
  launcher?: ProcessLauncher;
  now?: () => number;
}

/**
 * Supervises one process: launches it, watches it through the detection window,
 * restarts it according to the restart policy and keeps a bounded log tail.
 *
 * Emits `state` (state, previous) on every transition and `log` for each line.
 */
export class ProcessSupervisor extends EventEmitter implements ManagedService {
  readonly name: string;
  private state: ServiceState = 'stopped';
  private child: ProcessHandle | null = null;
  private startedAt: number | null = null;
  private lastExitCode: number | null = null;
  private restarts = 0;
  private wanted = false;
  private restarting = false;
  private enabled = false;
  private detectionTimer: NodeJS.Timeout | null = null;
  private backoffTimer: NodeJS.Timeout | null = null;
  private exitWaiters: Array<() => void> = [];
  private logLines: string[] = [];
  private partial: Record<'stdout' | 'stderr', string> = { stdout: '', stderr: '' };
  private readonly lock = new Mutex();

  private spec: LaunchSpec;
  private restartPolicy: RestartPolicy;
  private readonly detectionWindowMs: number;
  private backoffMs: number;
  private readonly killTimeoutMs: number;
  private readonly maxLogLines: number;
  private readonly launcher: ProcessLauncher;
  private readonly now: () => number;
  private readonly onEnable?: () => void;

  constructor(options: SupervisorOptions) {
    super();
    this.name = options.name;
    this.spec = { command: options.command, cwd: options.cwd, env: options.env, envFile: options.envFile };
    this.restartPolicy = options.restartPolicy ?? 'always';
    this.detectionWindowMs = options.detectionWindowMs ?? 3000;
    this.backoffMs = options.backoffMs ?? 3000;
    this.killTimeoutMs = options.killTimeoutMs ?? 10000;
    this.maxLogLines = options.maxLogLines ?? 1000;
    this.launcher = options.launcher ?? spawnProcess;
    this.now = options.now ?? Date.now;
    this.enabled = options.enabled ?? false;
    this.onEnable = options.onEnable;
  }

  get currentState(): ServiceState {
    return this.state;
  }

  async isEnabled(): Promise<boolean> {
    return this.enabled;
  }

  /**
   * Take over a unit definition. The running process keeps its old command until
   * the next restart.
   */
  async install(unit: ServiceUnit): Promise<boolean> {
    const backoffMs = unit.restartDelaySec * 1000;
    const changed = unit.execStart !== this.spec.command
      || unit.workingDirectory !== this.spec.cwd
      || unit.envFilePath !== this.spec.envFile
      || unit.restartPolicy !== this.restartPolicy
      || backoffMs !== this.backoffMs;
    this.spec = { ...this.spec, command: unit.execStart, cwd: unit.workingDirectory, envFile: unit.envFilePath };
    this.restartPolicy = unit.restartPolicy;
    this.backoffMs = backoffMs;
    return changed;
  }

  private transition(next: ServiceState): void {
    if (next === this.state) return;
    const previous = this.state;
    this.state = next;
    supervisorLogger.info({ service: this.name, from: previous, to: next }, 'Service state changed');
    this.emit('state', next, previous);
  }

  private appendLog(chunk: string, stream: 'stdout' | 'stderr'): void {
    const text = this.partial[stream] + chunk;
    const lines = text.split(/\r?\n/);
    this.partial[stream] = lines.pop() ?? '';
    for (const line of lines) {
      this.logLines.push(line);
      this.emit('log', line);
    }
    if (this.logLines.length > this.maxLogLines) {
      this.logLines.splice(0, this.logLines.length - this.maxLogLines);
    }
  }

  private clearTimers(): void {
    if (this.detectionTimer) {
      clearTimeout(this.detectionTimer);
      this.detectionTimer = null;
    }
    if (this.backoffTimer) {
      clearTimeout(this.backoffTimer);
      this.backoffTimer = null;
    }
  }

  /**
   * `afterCrash` marks the automatic relaunch of a crashed process; a crash loop
   * only ends once such a process survives the detection window. Any other launch
   * starts over from `starting`.
   */
  private launch(afterCrash = false): void {
    if (!afterCrash || this.state !== 'crash-looping') {
      this.transition('starting');
    }

    const child = this.launcher(this.spec);
    this.child = child;
    this.startedAt = this.now();

    child.onOutput((chunk, stream) => this.appendLog(chunk, stream));
    child.onExit((code, signal) => this.handleExit(child, code, signal));

    this.detectionTimer = setTimeout(() => {
      this.detectionTimer = null;
      if (this.child === child) {
        this.transition('running');
      }
    }, this.detectionWindowMs);
  }

  private shouldRestart(code: number | null): boolean {
    if (this.restartPolicy === 'always') return true;
    return code !== 0;
  }

  private handleExit(child: ProcessHandle, code: number | null, signal: NodeJS.Signals | null): void {
    if (this.child !== child) return;

    if (this.detectionTimer) {
      clearTimeout(this.detectionTimer);
      this.detectionTimer = null;
    }

    const uptime = this.startedAt === null ? 0 : this.now() - this.startedAt;
    this.child = null;
    this.startedAt = null;
    this.lastExitCode = code;

    const waiters = this.exitWaiters;
    this.exitWaiters = [];
    waiters.forEach((resolve) => resolve());

    if (!this.wanted) {
      if (!this.restarting) this.transition('stopped');
      return;
    }

    if (!this.shouldRestart(code)) {
      supervisorLogger.info({ service: this.name, code, signal }, 'Process exited; restart policy does not restart it');
      this.wanted = false;
      this.transition('stopped');
      return;
    }

    supervisorLogger.warn({ service: this.name, code, signal, uptimeMs: uptime }, 'Process exited unexpectedly');
    // A process that dies inside the detection window never came up
    const crashed = uptime < Math.max(this.backoffMs, this.detectionWindowMs);
    this.transition(crashed ? 'crash-looping' : 'starting');

    // Constant delay between attempts, repeated for as long as the process keeps failing
    this.backoffTimer = setTimeout(() => {
      this.backoffTimer = null;
      if (!this.wanted || this.child) return;
      this.restarts += 1;
      this.launch(true);
    }, this.backoffMs);
  }

  private async terminate(): Promise<void> {
    const child = this.child;
    if (!child) return;

    const exited = new Promise<void>((resolve) => this.exitWaiters.push(resolve));
    child.kill('SIGTERM');

    const forceKill = setTimeout(() => {
      if (this.child === child) {
        supervisorLogger.warn({ service: this.name }, 'Process ignored SIGTERM; sending SIGKILL');
        child.kill('SIGKILL');
      }
    }, this.killTimeoutMs);

    await exited;
    clearTimeout(forceKill);
  }

  async start(): Promise<void> {
    await this.lock.runExclusive(() => {
      this.wanted = true;
      if (this.child || this.backoffTimer) return;
      this.launch();
    });
  }

  async stop(): Promise<void> {
    await this.lock.runExclusive(async () => {
      this.wanted = false;
      this.clearTimers();
      await this.terminate();
      this.transition('stopped');
    });
  }

  /**
   * Stop the current process and launch a new one. Calls are serialised, so
   * concurrent restarts leave exactly one process running.
   */
  async restart(): Promise<void> {
    await this.lock.runExclusive(async () => {
      this.wanted = false;
      this.restarting = true;
      this.clearTimers();
      try {
        await this.terminate();
      } finally {
        this.restarting = false;
      }
      this.wanted = true;
      this.launch();
    });
  }

  async enable(): Promise<void> {
    this.enabled = true;
    this.onEnable?.();
  }

  async status(): Promise<ServiceStatus> {
    return {
      name: this.name,
      state: this.state,
      pid: this.child?.pid ?? null,
      startedAt: this.startedAt === null ? null : new Date(this.startedAt).toISOString(),
      lastExitCode: this.lastExitCode,
      restarts: this.restarts,
    };
  }

  async logs(options: LogOptions = {}): Promise<string> {
    if (options.lines === undefined) {
      return this.logLines.join('\n');
    }
    return options.lines > 0 ? this.logLines.slice(-options.lines).join('\n') : '';
  }

  streamLogs(onData: (chunk: string) => void): () => void {
    const listener = (line: string) => onData(`${line}\n`);
    this.on('log', listener);
    return () => {
      this.off('log', listener);
    };
  }
}

export function supervisorOptionsFor(target: DeploymentTarget): SupervisorOptions {
  return {
    name: target.unitName,
    command: target.execStart,
    cwd: target.workingDirectory,
    envFile: target.envFilePath,
    restartPolicy: target.restartPolicy,
    backoffMs: target.restartDelaySec * 1000,
  };
}

/** Where the enabled flag of local services outlives the controller */
export interface EnablementStore {
  isServiceEnabled(targetId: number): boolean;
  setServiceEnabled(targetId: number, enabled: boolean): void;
}

/**
 * One in-process supervisor per local target, kept for the life of the controller.
 */
export class SupervisorRegistry {
  private supervisors: Map<number, ProcessSupervisor> = new Map();

  constructor(private readonly overrides: Partial<SupervisorOptions> = {}) {}

  get(target: DeploymentTarget, store?: EnablementStore): ProcessSupervisor {
    let supervisor = this.supervisors.get(target.id);
    if (!supervisor) {
      supervisor = new ProcessSupervisor({
        ...supervisorOptionsFor(target),
        enabled: store?.isServiceEnabled(target.id) ?? false,
        onEnable: store ? () => store.setServiceEnabled(target.id, true) : undefined,
        ...this.overrides,
      });
      this.supervisors.set(target.id, supervisor);
    }
    return supervisor;
  }

  has(targetId: number): boolean {
    return this.supervisors.has(targetId);
  }

  async remove(targetId: number): Promise<void> {
    const supervisor = this.supervisors.get(targetId);
    if (!supervisor) return;
    this.supervisors.delete(targetId);
    await supervisor.stop();
  }

  async stopAll(): Promise<void> {
    await Promise.all(Array.from(this.supervisors.keys()).map((targetId) => this.remove(targetId)));
  }
}

export const supervisors = new SupervisorRegistry();
