import type { Socket } from 'socket.io';
import { z } from 'zod';
import type { AppContext } from '../lib/context';
import { withAck, type AckHandler } from './ack';

const absolutePath = z.string().startsWith('/', 'must be an absolute path');

// Only the settings the controller reads can be changed
const SettingInput = z.discriminatedUnion('key', [
  z.object({ key: z.literal('caddy_config_path'), value: absolutePath }),
  z.object({ key: z.literal('nginx_site_path'), value: absolutePath }),
  z.object({ key: z.literal('units_directory'), value: absolutePath }),
  z.object({ key: z.literal('certbot_email'), value: z.union([z.string().email(), z.literal('')]) }),
]);

export function settingsHandlers(ctx: Pick<AppContext, 'db'>): Record<string, AckHandler> {
  const { db } = ctx;

  return {
    'settings:get': withAck('settings:get', z.object({}), () => ({ data: { settings: db.getAllSettings() } })),

    'settings:set': withAck('settings:set', SettingInput, ({ key, value }) => {
      db.setSetting(key, value);
      return { data: { settings: db.getAllSettings() }, message: `Setting ${key} updated` };
    }),
  };
}

export default (ctx: AppContext, socket: Socket) => {
  for (const [event, handler] of Object.entries(settingsHandlers(ctx))) {
    socket.on(event, handler);
  }
};
