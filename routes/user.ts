import type { Socket } from 'socket.io';
import { z } from 'zod';
import { changePassword, currentUser } from '../lib/auth';
import { NotFoundError } from '../lib/errors';
import type { AppContext } from '../lib/context';
import type { PublicUser } from '../lib/models';
import { withAck, type AckHandler } from './ack';

const ChangePasswordInput = z.object({
  currentPassword: z.string().min(1),
  newPassword: z.string().min(1),
});

export function userHandlers(
  ctx: Pick<AppContext, 'db'>,
  session: () => PublicUser | null,
  disconnect: () => void,
): Record<string, AckHandler> {
  const requireUser = (): PublicUser => {
    const user = session();
    if (!user) throw new NotFoundError('User');
    return user;
  };

  return {
    // Get authenticated user's information
    'user:get': withAck('user:get', z.object({}), () => {
      const user = ctx.db.getUserById(requireUser().id);
      if (!user) throw new NotFoundError('User');
      return { data: { user } };
    }),

    'user:change-password': withAck('user:change-password', ChangePasswordInput, ({ currentPassword, newPassword }) => {
      changePassword(ctx.db, requireUser().id, currentPassword, newPassword);
      // Disconnect after a short delay so the acknowledgement is delivered first
      setTimeout(disconnect, 1000);
      return { message: 'Password changed successfully. You will be disconnected for security.' };
    }),
  };
}

export default (ctx: AppContext, socket: Socket) => {
  const handlers = userHandlers(ctx, () => currentUser(socket), () => socket.disconnect(true));
  for (const [event, handler] of Object.entries(handlers)) {
    socket.on(event, handler);
  }
};
