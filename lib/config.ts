import path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';

const port = z.coerce.number().int().min(1).max(65535);

const EnvSchema = z.object({
  PORT: port.default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  DATABASE_PATH: z.string().min(1).default(path.join(process.cwd(), 'data', 'pushgate.db')),

  WEBHOOK_SECRET: z.string().min(1).optional(),
  TRACKED_BRANCH: z.string().min(1).default('main'),

  // The two CI secrets: where to deploy and the key to get in with
  DEPLOY_HOST: z.string().min(1).optional(),
  DEPLOY_SSH_KEY: z.string().min(1).optional(),
  DEPLOY_USER: z.string().min(1).default('ubuntu'),
  DEPLOY_PORT: port.default(22),

  SESSION_TIMEOUT_MS: z.coerce.number().int().positive().default(10 * 60 * 1000),
  ROLLBACK_TIMEOUT_MS: z.coerce.number().int().positive().default(5 * 60 * 1000),

  ADMIN_USERNAME: z.string().min(1).default('admin'),
  ADMIN_PASSWORD: z.string().min(8).optional(),

  CERT_RENEW_INTERVAL_MINUTES: z.coerce.number().int().positive().default(12 * 60),
});

export interface Config {
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  database: {
    path: string;
  };
  webhook: {
    secret?: string;
    trackedBranch: string;
  };
  deploy: {
    host?: string;
    privateKey?: string;
    user: string;
    sshPort: number;
    sessionTimeoutMs: number;
    rollbackTimeoutMs: number;
  };
  admin: {
    username: string;
    password?: string;
  };
  certificates: {
    renewIntervalMinutes: number;
  };
}

/**
 * Build the typed configuration from an environment map.
 * Throws a ConfigError listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv): Config {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid environment: ${issues.join('; ')}`, { issues });
  }

  const vars = result.data;
  return {
    port: vars.PORT,
    nodeEnv: vars.NODE_ENV,
    database: {
      path: vars.DATABASE_PATH,
    },
    webhook: {
      secret: vars.WEBHOOK_SECRET,
      trackedBranch: vars.TRACKED_BRANCH,
    },
    deploy: {
      host: vars.DEPLOY_HOST,
      // CI stores often flatten the key onto one line
      privateKey: vars.DEPLOY_SSH_KEY?.replace(/\\n/g, '\n'),
      user: vars.DEPLOY_USER,
      sshPort: vars.DEPLOY_PORT,
      sessionTimeoutMs: vars.SESSION_TIMEOUT_MS,
      rollbackTimeoutMs: vars.ROLLBACK_TIMEOUT_MS,
    },
    admin: {
      username: vars.ADMIN_USERNAME,
      password: vars.ADMIN_PASSWORD,
    },
    certificates: {
      renewIntervalMinutes: vars.CERT_RENEW_INTERVAL_MINUTES,
    },
  };
}
