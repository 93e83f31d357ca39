import type { Socket } from 'socket.io';
import { z } from 'zod';
import { ProxyManager } from '../lib/proxy';
import { CertificateManager } from '../lib/certs';
import { ValidationError } from '../lib/errors';
import { onTarget, type AppContext } from '../lib/context';
import type { DeploymentTarget } from '../lib/models';
import { withAck, type AckHandler } from './ack';

const TargetInput = z.object({ targetId: z.coerce.number().int().positive() });
const IssueInput = TargetInput.extend({ email: z.string().email().optional() });

function requireDomain(target: DeploymentTarget): string {
  if (!target.domain) {
    throw new ValidationError(`Target ${target.name} has no domain`);
  }
  return target.domain;
}

export function proxyHandlers(ctx: Pick<AppContext, 'db' | 'openRunner'>): Record<string, AckHandler> {
  return {
    'proxy:render': withAck('proxy:render', TargetInput, async ({ targetId }) => ({
      data: {
        config: await onTarget(ctx, targetId, (target, runner) => new ProxyManager(runner, ctx.db).render(target)),
      },
    })),

    'proxy:apply': withAck('proxy:apply', TargetInput, async ({ targetId }) => {
      const result = await onTarget(ctx, targetId, (target, runner) => new ProxyManager(runner, ctx.db).apply(target));
      return {
        data: { result },
        message: result.changed ? `${result.kind} configuration applied` : `${result.kind} configuration unchanged`,
      };
    }),

    'cert:issue': withAck('cert:issue', IssueInput, async ({ targetId, email }) => {
      const result = await onTarget(ctx, targetId, async (target, runner) => {
        const domain = requireDomain(target);
        const certificates = new CertificateManager(runner);
        const issued = await certificates.issue(domain, email ?? ctx.db.getSetting('certbot_email') ?? '');
        // Re-render so nginx picks up the new certificate
        if (issued.issued && target.proxy === 'nginx') {
          await new ProxyManager(runner, ctx.db, { certificates }).apply(target);
        }
        return issued;
      });
      return { data: { result }, message: result.issued ? 'Certificate issued' : 'Certificate already installed' };
    }),

    'cert:renew-dry-run': withAck('cert:renew-dry-run', TargetInput, async ({ targetId }) => {
      const result = await onTarget(ctx, targetId, (target, runner) =>
        new CertificateManager(runner).renewDryRun(requireDomain(target)));
      return { data: { result }, message: 'Renewal dry run passed; installed certificate unchanged' };
    }),
  };
}

export default (ctx: AppContext, socket: Socket) => {
  for (const [event, handler] of Object.entries(proxyHandlers(ctx))) {
    socket.on(event, handler);
  }
};
