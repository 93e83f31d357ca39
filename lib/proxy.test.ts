import { describe, it, expect, beforeEach } from 'vitest';
import { renderCaddyfile, caddyValidateCommand } from './caddy';
import { renderNginxSite } from './nginx';
import { ProxyManager, siteFor, type ProxySite } from './proxy';
import { createDatabase, createDbHelpers, type DbHelpers } from './db';
import { ProxyConfigError } from './errors';
import { FakeRunner, makeNewTarget, makeTarget } from './testing';
import type { DeploymentTarget } from './models';

const API: ProxySite = { name: 'api', domain: 'api.example.test', upstreamPort: 5000 };
const WEB: ProxySite = { name: 'web', domain: 'web.example.test', upstreamPort: 5001 };

describe('renderCaddyfile', () => {
  it('proxies each domain to its loopback port', () => {
    const caddyfile = renderCaddyfile([API, WEB]);

    expect(caddyfile.startsWith('# Managed by pushgate; manual edits are overwritten\n')).toBe(true);
    expect(caddyfile).toContain(
      'api.example.test {\n\treverse_proxy 127.0.0.1:5000 {\n\t\theader_up X-Real-IP {remote_host}\n\t}\n',
    );
    expect(caddyfile).toContain('web.example.test {\n\treverse_proxy 127.0.0.1:5001 {');
  });

  it('validates with the caddyfile adapter', () => {
    expect(caddyValidateCommand('/etc/caddy/Caddyfile')).toBe(
      'caddy validate --config /etc/caddy/Caddyfile --adapter caddyfile',
    );
  });
});

describe('renderNginxSite', () => {
  it('serves plain HTTP until a certificate exists', () => {
    expect(renderNginxSite([API], { tlsDomains: new Set() })).toBe(`# Managed by pushgate; manual edits are overwritten

# Target: api (port 5000)
server {
    listen 80;
    listen [::]:80;
    server_name api.example.test;

    location /.well-known/acme-challenge/ {
        root /var/www/certbot;
    }

    location / {
        proxy_pass http://127.0.0.1:5000;
        proxy_set_header Host $host;
        proxy_set_header X-Real-IP $remote_addr;
        proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for;
        proxy_set_header X-Forwarded-Proto $scheme;
    }
}
`);
  });

  it('redirects to HTTPS and terminates TLS once the certificate exists', () => {
    const lines = renderNginxSite([API], { tlsDomains: new Set(['api.example.test']) })
      .split('\n')
      .map((line) => line.trim());

    expect(lines).toContain('return 301 https://$host$request_uri;');
    expect(lines).toContain('listen 443 ssl;');
    expect(lines).toContain('ssl_certificate /etc/letsencrypt/live/api.example.test/fullchain.pem;');
    expect(lines).toContain('ssl_certificate_key /etc/letsencrypt/live/api.example.test/privkey.pem;');
    expect(lines.filter((line) => line === 'proxy_pass http://127.0.0.1:5000;')).toHaveLength(1);
    expect(lines.filter((line) => line === 'location /.well-known/acme-challenge/ {')).toHaveLength(1);
  });

  it('decides TLS per domain', () => {
    const site = renderNginxSite([API, WEB], { tlsDomains: new Set(['web.example.test']) });

    expect(site.match(/listen 443 ssl;/g)).toHaveLength(1);
    expect(site).toContain('ssl_certificate /etc/letsencrypt/live/web.example.test/fullchain.pem;');
  });
});

describe('siteFor', () => {
  it('needs a domain', () => {
    expect(siteFor(makeTarget())).toEqual(API);
    expect(siteFor(makeTarget({ domain: null }))).toBeNull();
  });
});

describe('ProxyManager', () => {
  let db: DbHelpers;
  let runner: FakeRunner;

  const addTarget = (overrides: Parameters<typeof makeNewTarget>[0] = {}): DeploymentTarget => {
    const id = db.createTarget(makeNewTarget(overrides));
    const target = db.getTargetById(id);
    if (!target) throw new Error('target not stored');
    return target;
  };

  const commands = () => runner.commands.map(({ command }) => command);

  beforeEach(() => {
    db = createDbHelpers(createDatabase(':memory:'));
    runner = new FakeRunner();
  });

  it('renders every site that shares the host and proxy', () => {
    const api = addTarget({ proxy: 'caddy' });
    addTarget({ name: 'web', unitName: 'web.service', proxy: 'caddy', domain: 'web.example.test', servicePort: 5001 });
    addTarget({ name: 'other', unitName: 'other.service', proxy: 'caddy', host: '198.51.100.7', domain: 'other.example.test' });
    addTarget({ name: 'edge', unitName: 'edge.service', proxy: 'nginx', domain: 'edge.example.test' });

    const manager = new ProxyManager(runner, db);

    expect(manager.sitesFor(api).map((site) => site.name)).toEqual(['api', 'web']);
  });

  it('writes, validates and reloads a new Caddyfile', async () => {
    const api = addTarget({ proxy: 'caddy' });
    runner.on('test -f', '__missing__\n');
    const manager = new ProxyManager(runner, db);

    const result = await manager.apply(api);

    expect(result).toEqual({ kind: 'caddy', configPath: '/etc/caddy/Caddyfile', changed: true, backupPath: null });
    expect(commands()).toEqual([
      'sudo test -f /etc/caddy/Caddyfile && sudo cat /etc/caddy/Caddyfile || echo __missing__',
      'sudo mkdir -p /etc/caddy',
      'sudo tee /etc/caddy/Caddyfile > /dev/null',
      'sudo caddy validate --config /etc/caddy/Caddyfile --adapter caddyfile',
      'sudo systemctl reload-or-restart caddy',
    ]);
    expect(runner.commands[2].input).toBe(renderCaddyfile([API]));
  });

  it('leaves an identical config alone', async () => {
    const api = addTarget({ proxy: 'caddy' });
    runner.on('test -f', renderCaddyfile([API]));

    const result = await new ProxyManager(runner, db).apply(api);

    expect(result.changed).toBe(false);
    expect(commands()).toHaveLength(1);
  });

  it('restores the previous config when validation fails', async () => {
    const api = addTarget({ proxy: 'caddy' });
    runner.on('test -f', 'old.example.test {\n}\n').fail('caddy validate', 'unrecognized directive');

    const applying = new ProxyManager(runner, db).apply(api);

    await expect(applying).rejects.toBeInstanceOf(ProxyConfigError);
    expect(commands()).toEqual([
      'sudo test -f /etc/caddy/Caddyfile && sudo cat /etc/caddy/Caddyfile || echo __missing__',
      'sudo cp -p /etc/caddy/Caddyfile /etc/caddy/Caddyfile.bak',
      'sudo mkdir -p /etc/caddy',
      'sudo tee /etc/caddy/Caddyfile > /dev/null',
      'sudo caddy validate --config /etc/caddy/Caddyfile --adapter caddyfile',
      'sudo mv /etc/caddy/Caddyfile.bak /etc/caddy/Caddyfile',
    ]);
  });

  it('enables a new nginx site and serves HTTP until a certificate exists', async () => {
    const api = addTarget();
    runner.on('test -f', '__missing__\n');

    const result = await new ProxyManager(runner, db).apply(api);

    expect(result.configPath).toBe('/etc/nginx/sites-available/pushgate.conf');
    expect(commands()).toContain(
      'sudo ln -sf /etc/nginx/sites-available/pushgate.conf /etc/nginx/sites-enabled/pushgate.conf',
    );
    expect(commands().slice(-2)).toEqual(['sudo nginx -t', 'sudo systemctl reload-or-restart nginx']);
    expect(runner.commands.find(({ command }) => command.includes('tee'))?.input)
      .toBe(renderNginxSite([API], { tlsDomains: new Set() }));
  });

  it('removes a rejected nginx site that had no predecessor', async () => {
    const api = addTarget();
    runner.on('test -f', '__missing__\n').fail('nginx -t', 'emerg');

    await expect(new ProxyManager(runner, db).apply(api)).rejects.toThrow(/^Generated nginx configuration is invalid: /);
    expect(commands().slice(-2)).toEqual([
      'sudo rm -f /etc/nginx/sites-available/pushgate.conf',
      'sudo rm -f /etc/nginx/sites-enabled/pushgate.conf',
    ]);
  });

  it('uses the configured path', () => {
    db.setSetting('caddy_config_path', '/srv/caddy/Caddyfile');
    expect(new ProxyManager(runner, db).configPath('caddy')).toBe('/srv/caddy/Caddyfile');
  });
});
