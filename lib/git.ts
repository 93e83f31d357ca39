import simpleGit, { type SimpleGit } from 'simple-git';
import { quote } from './shell';
import type { CommandRunner } from './runner';
import type { DeploymentTarget } from './models';

export interface CommitInfo {
  hash: string;
  message: string;
}

/**
 * Source-control operations on the target's working copy.
 */
export interface SourceControl {
  isRepository(): Promise<boolean>;
  clone(repositoryUrl: string, branch: string): Promise<void>;
  currentCommit(): Promise<string>;
  describeHead(): Promise<CommitInfo>;
  /** Fast-forward the working copy to the tip of the branch */
  pull(branch: string, onOutput?: (chunk: string) => void): Promise<void>;
  /** Discard local state and move the working copy to the given commit */
  resetTo(commit: string): Promise<void>;
}

/**
 * git on the target, driven through the command channel.
 */
export class RemoteGit implements SourceControl {
  constructor(
    private readonly runner: CommandRunner,
    private readonly workingDirectory: string,
  ) {}

  async isRepository(): Promise<boolean> {
    const { stdout } = await this.runner.run(
      `git -C ${quote(this.workingDirectory)} rev-parse --is-inside-work-tree 2>/dev/null || echo false`,
    );
    return stdout.trim() === 'true';
  }

  async clone(repositoryUrl: string, branch: string): Promise<void> {
    await this.runner.run(
      `git clone --branch ${quote(branch)} --single-branch ${quote(repositoryUrl)} ${quote(this.workingDirectory)}`,
    );
  }

  async currentCommit(): Promise<string> {
    const { stdout } = await this.runner.run('git rev-parse HEAD', { cwd: this.workingDirectory });
    return stdout.trim();
  }

  async describeHead(): Promise<CommitInfo> {
    const { stdout } = await this.runner.run('git log -1 --format=%H%x09%s', { cwd: this.workingDirectory });
    const [hash = '', ...message] = stdout.trim().split('\t');
    return { hash, message: message.join('\t') };
  }

  async pull(branch: string, onOutput?: (chunk: string) => void): Promise<void> {
    await this.runner.run(`git pull --ff-only origin ${quote(branch)}`, {
      cwd: this.workingDirectory,
      onOutput: onOutput ? (chunk) => onOutput(chunk) : undefined,
    });
  }

  async resetTo(commit: string): Promise<void> {
    await this.runner.run(`git reset --hard ${quote(commit)}`, { cwd: this.workingDirectory });
  }
}

/**
 * git on this machine through simple-git, for targets deployed in place.
 */
export class LocalGit implements SourceControl {
  constructor(private readonly workingDirectory: string) {}

  private git(): SimpleGit {
    return simpleGit(this.workingDirectory);
  }

  async isRepository(): Promise<boolean> {
    try {
      return await this.git().checkIsRepo();
    } catch {
      // simple-git refuses to start in a directory that does not exist yet
      return false;
    }
  }

  async clone(repositoryUrl: string, branch: string): Promise<void> {
    await simpleGit().clone(repositoryUrl, this.workingDirectory, ['--branch', branch, '--single-branch']);
  }

  async currentCommit(): Promise<string> {
    return (await this.git().revparse(['HEAD'])).trim();
  }

  async describeHead(): Promise<CommitInfo> {
    const log = await this.git().log(['-1']);
    return { hash: log.latest?.hash ?? '', message: log.latest?.message ?? '' };
  }

  async pull(branch: string, onOutput?: (chunk: string) => void): Promise<void> {
    const result = await this.git().pull('origin', branch, ['--ff-only']);
    onOutput?.(`${result.summary.changes} files changed, ${result.summary.insertions} insertions, ${result.summary.deletions} deletions\n`);
  }

  async resetTo(commit: string): Promise<void> {
    await this.git().reset(['--hard', commit]);
  }
}

export function createSourceControl(target: DeploymentTarget, runner: CommandRunner): SourceControl {
  return target.transport === 'local'
    ? new LocalGit(target.workingDirectory)
    : new RemoteGit(runner, target.workingDirectory);
}
