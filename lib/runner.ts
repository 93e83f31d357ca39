import { spawn } from 'child_process';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { CommandError, ConnectivityError } from './errors';
import logger from './logger';
import { quote } from './shell';
import type { DeploymentTarget } from './models';

const runnerLogger = logger.child({ component: 'runner' });

// ssh reserves this exit status for its own failures
const SSH_CONNECTION_FAILURE = 255;

export interface RunOptions {
  cwd?: string;
  timeoutMs?: number;
  /** Written to the command's stdin, then stdin is closed */
  input?: string;
  onOutput?: (chunk: string, stream: 'stdout' | 'stderr') => void;
}

export interface CommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

/**
 * A command channel to the deployment target.
 * Every step of a deployment goes through one of these.
 */
export interface CommandRunner {
  readonly host: string;
  connect(): Promise<void>;
  run(command: string, options?: RunOptions): Promise<CommandResult>;
  /** Start a long-running command such as a log follow; returns a stop function */
  stream(command: string, onData: (chunk: string) => void): () => void;
  close(): Promise<void>;
}

interface SpawnResult extends CommandResult {
  spawnError?: Error;
}

// Execute a process and collect its output while streaming it to the caller
function execute(
  file: string,
  args: string[],
  options: RunOptions & { label: string },
): Promise<SpawnResult> {
  return new Promise((resolve, reject) => {
    let stdout = '';
    let stderr = '';
    let settled = false;

    const child = spawn(file, args, {
      cwd: options.cwd,
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    const timer = options.timeoutMs
      ? setTimeout(() => {
          if (settled) return;
          settled = true;
          child.kill('SIGKILL');
          reject(new CommandError(options.label, null, `Timed out after ${options.timeoutMs}ms`));
        }, options.timeoutMs)
      : null;

    child.stdout.on('data', (data: Buffer) => {
      const output = data.toString();
      stdout += output;
      options.onOutput?.(output, 'stdout');
    });

    child.stderr.on('data', (data: Buffer) => {
      const output = data.toString();
      stderr += output;
      options.onOutput?.(output, 'stderr');
    });

    child.on('error', (error) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      resolve({ stdout, stderr, exitCode: -1, spawnError: error });
    });

    child.on('close', (code) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      resolve({ stdout, stderr, exitCode: code ?? -1 });
    });

    if (options.input !== undefined) {
      child.stdin.end(options.input);
    } else {
      child.stdin.end();
    }
  });
}

/**
 * Runs commands on the machine pushgate itself runs on.
 */
export class LocalRunner implements CommandRunner {
  readonly host = 'localhost';

  async connect(): Promise<void> {
    // Nothing to open for a local shell
  }

  async run(command: string, options: RunOptions = {}): Promise<CommandResult> {
    const result = await execute('sh', ['-c', command], { ...options, label: command });
    if (result.spawnError) {
      throw new CommandError(command, null, `Failed to execute: ${result.spawnError.message}`);
    }
    if (result.exitCode !== 0) {
      throw new CommandError(command, result.exitCode, result.stderr);
    }
    return { stdout: result.stdout, stderr: result.stderr, exitCode: result.exitCode };
  }

  stream(command: string, onData: (chunk: string) => void): () => void {
    const child = spawn('sh', ['-c', command], { stdio: ['ignore', 'pipe', 'pipe'] });
    child.stdout.on('data', (data: Buffer) => onData(data.toString()));
    child.stderr.on('data', (data: Buffer) => onData(data.toString()));
    child.on('error', (error) => runnerLogger.error({ err: error, command }, 'Local stream failed'));
    return () => {
      child.kill();
    };
  }

  async close(): Promise<void> {
    // Nothing to release
  }
}

export interface SshOptions {
  host: string;
  port: number;
  user: string;
  /** Key material, as handed over by the CI secret store */
  privateKey?: string;
  /** Existing key file on disk, used when no key material is given */
  identityFile?: string;
  connectTimeoutSec?: number;
}

/**
 * Arguments for the ssh client, without the remote command.
 */
export function buildSshArgs(options: SshOptions, identityFile?: string): string[] {
  const args = [
    '-p', String(options.port),
    '-o', 'BatchMode=yes',
    '-o', 'StrictHostKeyChecking=accept-new',
    '-o', `ConnectTimeout=${options.connectTimeoutSec ?? 15}`,
  ];
  if (identityFile) {
    args.push('-i', identityFile, '-o', 'IdentitiesOnly=yes');
  }
  args.push(`${options.user}@${options.host}`);
  return args;
}

export function withWorkingDirectory(command: string, cwd?: string): string {
  return cwd ? `cd ${quote(cwd)} && ${command}` : command;
}

/**
 * Runs commands on the target over the system ssh client with public-key auth.
 */
export class SshRunner implements CommandRunner {
  readonly host: string;
  private keyDirectory: string | null = null;
  private identityFile: string | undefined;

  constructor(private readonly options: SshOptions) {
    this.host = options.host;
    this.identityFile = options.identityFile;
  }

  private async prepareIdentity(): Promise<string | undefined> {
    if (!this.options.privateKey || this.keyDirectory) {
      return this.identityFile;
    }
    this.keyDirectory = await fs.mkdtemp(path.join(os.tmpdir(), 'pushgate-ssh-'));
    this.identityFile = path.join(this.keyDirectory, 'id_deploy');
    const key = this.options.privateKey.endsWith('\n') ? this.options.privateKey : `${this.options.privateKey}\n`;
    await fs.writeFile(this.identityFile, key, { mode: 0o600 });
    return this.identityFile;
  }

  async connect(): Promise<void> {
    try {
      await this.run('true', { timeoutMs: ((this.options.connectTimeoutSec ?? 15) + 5) * 1000 });
    } catch (error) {
      if (error instanceof ConnectivityError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConnectivityError(`Cannot open session to ${this.host}: ${reason}`, this.host);
    }
  }

  async run(command: string, options: RunOptions = {}): Promise<CommandResult> {
    const identityFile = await this.prepareIdentity();
    const remoteCommand = withWorkingDirectory(command, options.cwd);
    const args = [...buildSshArgs(this.options, identityFile), remoteCommand];

    const result = await execute('ssh', args, {
      timeoutMs: options.timeoutMs,
      input: options.input,
      onOutput: options.onOutput,
      label: command,
    });

    if (result.spawnError) {
      throw new ConnectivityError(`Failed to start ssh: ${result.spawnError.message}`, this.host);
    }
    if (result.exitCode === SSH_CONNECTION_FAILURE) {
      throw new ConnectivityError(
        `ssh to ${this.options.user}@${this.host}:${this.options.port} failed: ${result.stderr.trim()}`,
        this.host,
      );
    }
    if (result.exitCode !== 0) {
      throw new CommandError(command, result.exitCode, result.stderr);
    }
    return { stdout: result.stdout, stderr: result.stderr, exitCode: result.exitCode };
  }

  stream(command: string, onData: (chunk: string) => void): () => void {
    let child: ReturnType<typeof spawn> | null = null;
    let stopped = false;

    this.prepareIdentity()
      .then((identityFile) => {
        if (stopped) return;
        child = spawn('ssh', [...buildSshArgs(this.options, identityFile), command], {
          stdio: ['ignore', 'pipe', 'pipe'],
        });
        child.stdout?.on('data', (data: Buffer) => onData(data.toString()));
        child.stderr?.on('data', (data: Buffer) => onData(data.toString()));
        child.on('error', (error) => runnerLogger.error({ err: error, host: this.host }, 'ssh stream failed'));
      })
      .catch((error: unknown) => {
        runnerLogger.error({ err: error, host: this.host }, 'Could not prepare ssh identity for stream');
      });

    return () => {
      stopped = true;
      child?.kill();
    };
  }

  async close(): Promise<void> {
    if (this.keyDirectory) {
      await fs.rm(this.keyDirectory, { recursive: true, force: true });
      this.keyDirectory = null;
      this.identityFile = this.options.identityFile;
    }
  }
}

export interface RunnerDefaults {
  privateKey?: string;
  connectTimeoutSec?: number;
}

/**
 * Pick the channel a target is reached through.
 */
export function createRunner(target: DeploymentTarget, defaults: RunnerDefaults = {}): CommandRunner {
  if (target.transport === 'local') {
    return new LocalRunner();
  }
  return new SshRunner({
    host: target.host,
    port: target.sshPort,
    user: target.sshUser,
    privateKey: defaults.privateKey,
    connectTimeoutSec: defaults.connectTimeoutSec,
  });
}

/**
 * Bounds every command on a channel by a shared session deadline.
 */
export class DeadlineRunner implements CommandRunner {
  readonly host: string;

  constructor(
    private readonly inner: CommandRunner,
    private readonly deadline: number,
    private readonly now: () => number = Date.now,
  ) {
    this.host = inner.host;
  }

  private remaining(): number {
    const remaining = this.deadline - this.now();
    if (remaining <= 0) {
      throw new ConnectivityError(`Session to ${this.host} timed out`, this.host);
    }
    return remaining;
  }

  async connect(): Promise<void> {
    this.remaining();
    await this.inner.connect();
  }

  async run(command: string, options: RunOptions = {}): Promise<CommandResult> {
    const remaining = this.remaining();
    const timeoutMs = options.timeoutMs === undefined ? remaining : Math.min(options.timeoutMs, remaining);
    return this.inner.run(command, { ...options, timeoutMs });
  }

  stream(command: string, onData: (chunk: string) => void): () => void {
    return this.inner.stream(command, onData);
  }

  async close(): Promise<void> {
    await this.inner.close();
  }
}
