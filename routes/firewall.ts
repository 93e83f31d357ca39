import type { Socket } from 'socket.io';
import { z } from 'zod';
import { Firewall, buildRuleSet, renderUfwCommands } from '../lib/firewall';
import { onTarget, requireTarget, type AppContext } from '../lib/context';
import { withAck, type AckHandler } from './ack';

const TargetInput = z.object({ targetId: z.coerce.number().int().positive() });

export function firewallHandlers(ctx: Pick<AppContext, 'db' | 'openRunner'>): Record<string, AckHandler> {
  return {
    'firewall:render': withAck('firewall:render', TargetInput, ({ targetId }) => {
      const target = requireTarget(ctx.db, targetId);
      const ruleSet = buildRuleSet(target.servicePort, { sshPort: target.sshPort });
      return { data: { ruleSet, commands: renderUfwCommands(ruleSet) } };
    }),

    'firewall:apply': withAck('firewall:apply', TargetInput, async ({ targetId }) => {
      const result = await onTarget(ctx, targetId, (target, runner) =>
        new Firewall(runner).apply(buildRuleSet(target.servicePort, { sshPort: target.sshPort })));
      return { data: { result }, message: result.changed ? 'Firewall rules applied' : 'Firewall already up to date' };
    }),
  };
}

export default (ctx: AppContext, socket: Socket) => {
  for (const [event, handler] of Object.entries(firewallHandlers(ctx))) {
    socket.on(event, handler);
  }
};
