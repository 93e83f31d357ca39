import { describe, it, expect } from 'vitest';
import { ConnectivityError } from './errors';
import {
  DeadlineRunner,
  LocalRunner,
  SshRunner,
  buildSshArgs,
  createRunner,
  withWorkingDirectory,
} from './runner';
import { FakeRunner, makeTarget } from './testing';

describe('buildSshArgs', () => {
  const options = { host: '203.0.113.10', port: 2222, user: 'deploy' };

  it('runs non-interactively and accepts a new host key once', () => {
    expect(buildSshArgs(options)).toEqual([
      '-p', '2222',
      '-o', 'BatchMode=yes',
      '-o', 'StrictHostKeyChecking=accept-new',
      '-o', 'ConnectTimeout=15',
      'deploy@203.0.113.10',
    ]);
  });

  it('pins the identity file when one is given', () => {
    expect(buildSshArgs({ ...options, connectTimeoutSec: 5 }, '/tmp/key/id_deploy')).toEqual([
      '-p', '2222',
      '-o', 'BatchMode=yes',
      '-o', 'StrictHostKeyChecking=accept-new',
      '-o', 'ConnectTimeout=5',
      '-i', '/tmp/key/id_deploy',
      '-o', 'IdentitiesOnly=yes',
      'deploy@203.0.113.10',
    ]);
  });
});

describe('withWorkingDirectory', () => {
  it('prefixes a cd into the quoted directory', () => {
    expect(withWorkingDirectory('git pull', '/srv/my app')).toBe("cd '/srv/my app' && git pull");
  });

  it('leaves the command alone without a directory', () => {
    expect(withWorkingDirectory('uptime')).toBe('uptime');
  });
});

describe('createRunner', () => {
  it('uses ssh for remote targets', () => {
    const runner = createRunner(makeTarget({ host: '198.51.100.7' }));
    expect(runner).toBeInstanceOf(SshRunner);
    expect(runner.host).toBe('198.51.100.7');
  });

  it('uses a local shell for in-place targets', () => {
    expect(createRunner(makeTarget({ transport: 'local' }))).toBeInstanceOf(LocalRunner);
  });
});

describe('DeadlineRunner', () => {
  const setup = (now: { value: number }) => {
    const inner = new FakeRunner();
    const seen: Array<number | undefined> = [];
    inner.on('uptime', (_command, options) => {
      seen.push(options.timeoutMs);
      return { stdout: 'up', stderr: '', exitCode: 0 };
    });
    const runner = new DeadlineRunner(inner, 5000, () => now.value);
    return { inner, runner, seen };
  };

  it('bounds each command by the time left in the session', async () => {
    const now = { value: 1000 };
    const { runner, seen } = setup(now);

    await runner.run('uptime');
    await runner.run('uptime', { timeoutMs: 1500 });
    now.value = 4500;
    await runner.run('uptime', { timeoutMs: 1500 });

    expect(seen).toEqual([4000, 1500, 500]);
  });

  it('refuses to run once the deadline has passed', async () => {
    const now = { value: 5000 };
    const { inner, runner } = setup(now);

    await expect(runner.run('uptime')).rejects.toThrow('Session to fake-host timed out');
    await expect(runner.connect()).rejects.toBeInstanceOf(ConnectivityError);
    expect(inner.commands).toEqual([]);
  });

  it('closes the inner channel', async () => {
    const { inner, runner } = setup({ value: 0 });
    await runner.close();
    expect(inner.closed).toBe(true);
  });
});
