import { describe, it, expect, beforeEach } from 'vitest';
import { createDatabase, createDbHelpers, type DbHelpers } from '../lib/db';
import { invoke } from '../lib/testing';
import { settingsHandlers } from './settings';
import type { Ack } from './ack';

const DEFAULTS = {
  caddy_config_path: '/etc/caddy/Caddyfile',
  nginx_site_path: '/etc/nginx/sites-available/pushgate.conf',
  units_directory: '/etc/systemd/system',
  certbot_email: '',
};

describe('settings events', () => {
  let db: DbHelpers;
  let handlers: ReturnType<typeof settingsHandlers>;

  beforeEach(() => {
    db = createDbHelpers(createDatabase(':memory:'));
    handlers = settingsHandlers({ db });
  });

  it('lists the current settings', async () => {
    await expect(invoke<Ack>(handlers['settings:get'])).resolves.toEqual({
      success: true,
      data: { settings: DEFAULTS },
    });
  });

  it('changes a setting the controller reads', async () => {
    const ack = await invoke<Ack>(handlers['settings:set'], { key: 'units_directory', value: '/run/systemd/system' });

    expect(ack).toEqual({
      success: true,
      data: { settings: { ...DEFAULTS, units_directory: '/run/systemd/system' } },
      message: 'Setting units_directory updated',
    });
    expect(db.getSetting('units_directory')).toBe('/run/systemd/system');
  });

  it('rejects a relative path', async () => {
    await expect(invoke<Ack>(handlers['settings:set'], { key: 'caddy_config_path', value: 'Caddyfile' }))
      .resolves.toEqual({ success: false, error: 'value: must be an absolute path' });
    expect(db.getSetting('caddy_config_path')).toBe('/etc/caddy/Caddyfile');
  });
});
