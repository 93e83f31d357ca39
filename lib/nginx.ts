import type { ProxySite } from './proxy';

export const ACME_WEBROOT = '/var/www/certbot';
export const LETSENCRYPT_LIVE = '/etc/letsencrypt/live';

export interface NginxRenderOptions {
  /** Domains whose certificate is installed; only these get a 443 server block */
  tlsDomains: ReadonlySet<string>;
}

const indent = (lines: string[], depth = 1) => lines.map((line) => (line ? `${'    '.repeat(depth)}${line}` : line));

function httpBlock(site: ProxySite, tls: boolean): string[] {
  // Without a certificate yet, plain HTTP proxies straight to the service
  const root = tls
    ? ['location / {', '    return 301 https://$host$request_uri;', '}']
    : proxyLocation(site);
  return [
    'server {',
    ...indent([
      'listen 80;',
      'listen [::]:80;',
      `server_name ${site.domain};`,
      '',
      'location /.well-known/acme-challenge/ {',
      `    root ${ACME_WEBROOT};`,
      '}',
      '',
      ...root,
    ]),
    '}',
  ];
}

function proxyLocation(site: ProxySite): string[] {
  return [
    'location / {',
    `    proxy_pass http://127.0.0.1:${site.upstreamPort};`,
    '    proxy_set_header Host $host;',
    '    proxy_set_header X-Real-IP $remote_addr;',
    '    proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for;',
    '    proxy_set_header X-Forwarded-Proto $scheme;',
    '}',
  ];
}

function httpsBlock(site: ProxySite): string[] {
  return [
    'server {',
    ...indent([
      'listen 443 ssl;',
      'listen [::]:443 ssl;',
      `server_name ${site.domain};`,
      '',
      `ssl_certificate ${LETSENCRYPT_LIVE}/${site.domain}/fullchain.pem;`,
      `ssl_certificate_key ${LETSENCRYPT_LIVE}/${site.domain}/privkey.pem;`,
      'add_header Strict-Transport-Security "max-age=31536000; includeSubDomains" always;',
      '',
      ...proxyLocation(site),
    ]),
    '}',
  ];
}

/**
 * Render the nginx site file for every site on one host: port 80 answers ACME
 * challenges and redirects, port 443 terminates TLS and proxies to the service.
 */
export function renderNginxSite(sites: ProxySite[], options: NginxRenderOptions): string {
  const blocks = sites.map((site) => {
    const tls = options.tlsDomains.has(site.domain);
    const lines = [`# Target: ${site.name} (port ${site.upstreamPort})`, ...httpBlock(site, tls)];
    if (tls) lines.push('', ...httpsBlock(site));
    return lines.join('\n');
  });
  return `# Managed by pushgate; manual edits are overwritten\n\n${blocks.join('\n\n')}\n`;
}
