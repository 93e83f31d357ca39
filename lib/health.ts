import { HealthCheckError } from './errors';
import { executorLogger } from './logger';
import { withRetry } from './retry';
import { quote } from './shell';
import type { CommandRunner } from './runner';
import type { DeploymentTarget } from './models';

export interface ProbeResult {
  ok: boolean;
  statusCode: number | null;
  url: string;
}

export interface ProbeOptions {
  attempts?: number;
  intervalMs?: number;
  timeoutSec?: number;
}

export function healthUrl(target: DeploymentTarget): string | null {
  if (!target.healthPath) return null;
  const pathPart = target.healthPath.startsWith('/') ? target.healthPath : `/${target.healthPath}`;
  return `http://127.0.0.1:${target.servicePort}${pathPart}`;
}

/**
 * One readiness request, made from the target itself so the backend port never
 * has to be reachable from outside.
 */
export async function probeOnce(runner: CommandRunner, url: string, timeoutSec = 5): Promise<ProbeResult> {
  try {
    const { stdout } = await runner.run(
      `curl -s -o /dev/null -w '%{http_code}' --max-time ${timeoutSec} ${quote(url)}`,
    );
    const statusCode = parseInt(stdout.trim(), 10);
    if (Number.isNaN(statusCode) || statusCode === 0) {
      return { ok: false, statusCode: null, url };
    }
    return { ok: statusCode >= 200 && statusCode < 300, statusCode, url };
  } catch (error) {
    executorLogger.debug({ err: error, url }, 'Readiness request failed');
    return { ok: false, statusCode: null, url };
  }
}

/**
 * Poll the readiness endpoint until it answers 2xx. Throws HealthCheckError when
 * every attempt fails.
 */
export async function waitUntilReady(
  runner: CommandRunner,
  target: DeploymentTarget,
  options: ProbeOptions = {},
): Promise<ProbeResult | null> {
  const url = healthUrl(target);
  if (!url) return null;

  return withRetry(async () => {
    const result = await probeOnce(runner, url, options.timeoutSec);
    if (!result.ok) {
      throw new HealthCheckError(
        `Readiness probe ${url} answered ${result.statusCode ?? 'no response'}`,
        { url, statusCode: result.statusCode },
      );
    }
    return result;
  }, {
    maxAttempts: options.attempts ?? 5,
    baseDelayMs: options.intervalMs ?? 1000,
    maxDelayMs: 5000,
  });
}
