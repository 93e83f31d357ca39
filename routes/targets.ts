import path from 'path';
import type { Socket } from 'socket.io';
import { z } from 'zod';
import envManager, { mergeBundle, validateBundle } from '../lib/env';
import { ValidationError } from '../lib/errors';
import { onTarget, requireTarget, type AppContext } from '../lib/context';
import { provisionTarget, type ProvisionStep } from '../lib/provision';
import { targetLocks } from '../lib/locks';
import { supervisors } from '../lib/supervisor';
import type { NewDeploymentTarget } from '../lib/models';
import { withAck, type AckHandler } from './ack';

const port = z.coerce.number().int().min(1).max(65535);
const envKey = z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a valid environment variable name');

export const CreateTargetInput = z.object({
  name: z.string().regex(/^[a-z0-9][a-z0-9-]*$/, 'lowercase letters, digits and dashes only'),
  host: z.string().min(1).optional(),
  sshPort: port.optional(),
  sshUser: z.string().min(1).optional(),
  transport: z.enum(['ssh', 'local']).default('ssh'),
  workingDirectory: z.string().startsWith('/'),
  repositoryUrl: z.string().min(1).nullable().default(null),
  branch: z.string().min(1).optional(),
  unitName: z.string().regex(/^[A-Za-z0-9@._-]+$/).optional(),
  execStart: z.string().min(1),
  servicePort: port,
  domain: z.string().regex(/^[a-z0-9.-]+$/i, 'must be a host name').nullable().default(null),
  proxy: z.enum(['caddy', 'nginx']).default('caddy'),
  healthPath: z.string().startsWith('/').nullable().default('/health'),
  installCommand: z.string().min(1).nullable().default(null),
  envFilePath: z.string().startsWith('/').optional(),
  requiredEnvKeys: z.array(envKey).default(['PORT']),
  restartPolicy: z.enum(['always', 'on-failure']).default('always'),
  restartDelaySec: z.coerce.number().int().min(1).max(3600).default(3),
});

const TargetInput = z.object({ targetId: z.coerce.number().int().positive() });

const ProvisionInput = TargetInput.extend({
  secrets: z.record(envKey, z.string()).optional(),
  certbotEmail: z.string().email().optional(),
});

const EnvSetInput = TargetInput.extend({
  values: z.record(envKey, z.string()).default({}),
  remove: z.array(envKey).default([]),
});

export function toNewTarget(
  input: z.output<typeof CreateTargetInput>,
  defaults: AppContext['deployDefaults'],
): NewDeploymentTarget {
  if (input.branch !== undefined && input.branch !== defaults.branch) {
    throw new ValidationError(`branch must be ${defaults.branch}, the branch pushes are accepted for`);
  }
  const host = input.host ?? (input.transport === 'local' ? 'localhost' : defaults.host);
  if (!host) {
    throw new ValidationError('host is required when DEPLOY_HOST is not set');
  }
  return {
    ...input,
    host,
    sshPort: input.sshPort ?? defaults.sshPort,
    sshUser: input.sshUser ?? defaults.user,
    branch: input.branch ?? defaults.branch,
    unitName: input.unitName ?? `${input.name}.service`,
    envFilePath: input.envFilePath ?? path.posix.join(input.workingDirectory, '.env'),
  };
}

export function targetHandlers(ctx: AppContext): Record<string, AckHandler> {
  const { db } = ctx;
  const locks = ctx.locks ?? targetLocks;

  return {
    'target:list': withAck('target:list', z.object({}), () => ({ data: { targets: db.getAllTargets() } })),

    'target:get': withAck('target:get', TargetInput, ({ targetId }) => ({
      data: { target: requireTarget(db, targetId) },
    })),

    'target:create': withAck('target:create', CreateTargetInput, (input) => {
      if (db.getTargetByName(input.name)) {
        throw new ValidationError(`Target ${input.name} already exists`);
      }
      const targetId = db.createTarget(toNewTarget(input, ctx.deployDefaults));
      return { data: { target: requireTarget(db, targetId) }, message: `Target ${input.name} created` };
    }),

    'target:delete': withAck('target:delete', TargetInput, async ({ targetId }) => {
      const target = requireTarget(db, targetId);
      db.deleteTarget(targetId);
      locks.cleanupTarget(targetId);
      await supervisors.remove(targetId);
      return { message: `Target ${target.name} deleted` };
    }),

    'target:provision': withAck('target:provision', ProvisionInput, async ({ targetId, secrets, certbotEmail }) => {
      const target = requireTarget(db, targetId);
      const steps = await locks.withTargetLock(targetId, () => provisionTarget(target, { secrets, certbotEmail }, {
        db,
        runner: ctx.openRunner(target),
        onStep: (step: ProvisionStep) => ctx.io.emit('target:provision-step', { targetId, ...step }),
      }));
      return { data: { steps }, message: `Target ${target.name} provisioned` };
    }),

    // Keys only; values never leave the host
    'env:keys': withAck('env:keys', TargetInput, async ({ targetId }) => ({
      data: { keys: await onTarget(ctx, targetId, (target, runner) => envManager.listKeys(runner, target.envFilePath)) },
    })),

    'env:set': withAck('env:set', EnvSetInput, async ({ targetId, values, remove }) => {
      const keys = await onTarget(ctx, targetId, async (target, runner) => {
        const current = await envManager.readEnvFile(runner, target.envFilePath);
        const validation = validateBundle(mergeBundle(current, values, remove), target.requiredEnvKeys);
        if (!validation.valid) {
          const problems = [...validation.missing.map((key) => `missing ${key}`), ...validation.errors];
          throw new ValidationError(`Environment would be invalid: ${problems.join('; ')}`);
        }
        const merged = await envManager.updateEnvFile(runner, target.envFilePath, values, remove);
        return Object.keys(merged).sort();
      });
      return { data: { keys }, message: 'Environment updated; restart the service to apply it' };
    }),
  };
}

export default (ctx: AppContext, socket: Socket) => {
  for (const [event, handler] of Object.entries(targetHandlers(ctx))) {
    socket.on(event, handler);
  }
};
