import { CommandError } from './errors';
import type { CommandResult, CommandRunner, RunOptions } from './runner';
import type {
  DeploymentTarget,
  LogOptions,
  NewDeploymentTarget,
  ServiceController,
  ServiceState,
  ServiceStatus,
} from './models';

type Responder = (command: string, options: RunOptions) => CommandResult | Error | Promise<CommandResult | Error>;

interface Handler {
  match: string | RegExp;
  respond: Responder;
}

export interface RecordedCommand {
  command: string;
  cwd?: string;
  input?: string;
}

/**
 * In-process stand-in for a target host. Commands are matched against registered
 * handlers (most recent first); unmatched commands succeed with empty output.
 */
export class FakeRunner implements CommandRunner {
  readonly host: string;
  readonly commands: RecordedCommand[] = [];
  connectError: Error | null = null;
  closed = false;
  private handlers: Handler[] = [];
  private streams: Array<{ command: string; onData: (chunk: string) => void; stopped: boolean }> = [];

  constructor(host = 'fake-host') {
    this.host = host;
  }

  on(match: string | RegExp, response: string | CommandResult | Error | Responder): this {
    let respond: Responder;
    if (typeof response === 'function') {
      respond = response;
    } else if (typeof response === 'string') {
      const stdout = response;
      respond = () => ({ stdout, stderr: '', exitCode: 0 });
    } else {
      const fixed = response;
      respond = () => fixed;
    }
    this.handlers.unshift({ match, respond });
    return this;
  }

  /** Make matching commands exit non-zero */
  fail(match: string | RegExp, stderr = 'failed', exitCode = 1): this {
    return this.on(match, (command) => new CommandError(command, exitCode, stderr));
  }

  async connect(): Promise<void> {
    if (this.connectError) throw this.connectError;
  }

  async run(command: string, options: RunOptions = {}): Promise<CommandResult> {
    this.commands.push({ command, cwd: options.cwd, input: options.input });
    const handler = this.handlers.find(({ match }) =>
      typeof match === 'string' ? command.includes(match) : match.test(command),
    );
    const result = handler ? await handler.respond(command, options) : { stdout: '', stderr: '', exitCode: 0 };
    if (result instanceof Error) throw result;
    if (result.stdout) options.onOutput?.(result.stdout, 'stdout');
    return result;
  }

  stream(command: string, onData: (chunk: string) => void): () => void {
    const entry = { command, onData, stopped: false };
    this.streams.push(entry);
    return () => {
      entry.stopped = true;
    };
  }

  /** Push data to every open stream */
  emit(chunk: string): void {
    for (const entry of this.streams) {
      if (!entry.stopped) entry.onData(chunk);
    }
  }

  get openStreams(): number {
    return this.streams.filter((entry) => !entry.stopped).length;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  ran(match: string | RegExp): boolean {
    return this.commands.some(({ command }) =>
      typeof match === 'string' ? command.includes(match) : match.test(command),
    );
  }
}

/**
 * Scriptable service manager. Each restart starts a new process identity; the
 * state it settles in is taken from `afterRestart` (running when empty).
 */
export class FakeService implements ServiceController {
  readonly name: string;
  state: ServiceState = 'running';
  pid: number | null = 100;
  startedAt: string | null = '2026-01-01T00:00:00.000Z';
  restarts = 0;
  readonly actions: string[] = [];
  afterRestart: ServiceState[] = [];
  restartErrors: Error[] = [];
  /** Replaces the next status() results, one per call */
  statusQueue: Array<Partial<ServiceStatus>> = [];
  restartDelayMs = 0;
  maxConcurrentRestarts = 0;
  private activeRestarts = 0;
  private logLines: string[] = [];
  private listeners: Array<(chunk: string) => void> = [];

  constructor(name = 'api.service') {
    this.name = name;
  }

  async start(): Promise<void> {
    this.actions.push('start');
    this.state = 'running';
  }

  async stop(): Promise<void> {
    this.actions.push('stop');
    this.state = 'stopped';
    this.pid = null;
    this.startedAt = null;
  }

  async restart(): Promise<void> {
    this.actions.push('restart');
    this.activeRestarts += 1;
    this.maxConcurrentRestarts = Math.max(this.maxConcurrentRestarts, this.activeRestarts);
    try {
      if (this.restartDelayMs > 0) {
        await new Promise((resolve) => setTimeout(resolve, this.restartDelayMs));
      }
      const error = this.restartErrors.shift();
      if (error) throw error;
      this.restarts += 1;
      this.pid = 100 + this.restarts;
      this.startedAt = new Date(Date.UTC(2026, 0, 1, 0, 0, this.restarts)).toISOString();
      this.state = this.afterRestart.shift() ?? 'running';
    } finally {
      this.activeRestarts -= 1;
    }
  }

  async enable(): Promise<void> {
    this.actions.push('enable');
  }

  async status(): Promise<ServiceStatus> {
    const current: ServiceStatus = {
      name: this.name,
      state: this.state,
      pid: this.pid,
      startedAt: this.startedAt,
      lastExitCode: null,
      restarts: this.restarts,
    };
    return { ...current, ...this.statusQueue.shift() };
  }

  async logs(options: LogOptions = {}): Promise<string> {
    if (options.lines !== undefined && options.lines <= 0) return '';
    const lines = options.lines === undefined ? this.logLines : this.logLines.slice(-options.lines);
    return lines.join('\n');
  }

  streamLogs(onData: (chunk: string) => void): () => void {
    this.listeners.push(onData);
    return () => {
      this.listeners = this.listeners.filter((listener) => listener !== onData);
    };
  }

  writeLog(line: string): void {
    this.logLines.push(line);
    this.listeners.forEach((listener) => listener(`${line}\n`));
  }
}

export function makeNewTarget(overrides: Partial<NewDeploymentTarget> = {}): NewDeploymentTarget {
  const { id: _id, createdAt: _createdAt, updatedAt: _updatedAt, ...target } = makeTarget();
  return { ...target, ...overrides };
}

export function makeTarget(overrides: Partial<DeploymentTarget> = {}): DeploymentTarget {
  return {
    id: 1,
    name: 'api',
    host: '203.0.113.10',
    sshPort: 22,
    sshUser: 'ubuntu',
    transport: 'ssh',
    workingDirectory: '/home/ubuntu/api',
    repositoryUrl: 'https://git.example.test/team/api.git',
    branch: 'main',
    unitName: 'api.service',
    execStart: '/home/ubuntu/api/venv/bin/gunicorn --bind 127.0.0.1:5000 api:app',
    servicePort: 5000,
    domain: 'api.example.test',
    proxy: 'nginx',
    healthPath: '/health',
    installCommand: null,
    envFilePath: '/home/ubuntu/api/.env',
    requiredEnvKeys: ['PORT'],
    restartPolicy: 'always',
    restartDelaySec: 3,
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z',
    ...overrides,
  };
}

/** Call a socket event handler and resolve with what it acknowledged */
export function invoke<R>(
  handler: (data: unknown, callback?: (response: R) => void) => Promise<void>,
  data?: unknown,
): Promise<R> {
  return new Promise((resolve, reject) => {
    handler(data, resolve).catch(reject);
  });
}
