import { quote } from './shell';
import type { ProxySite } from './proxy';

function siteBlock(site: ProxySite): string {
  return `# Target: ${site.name} (port ${site.upstreamPort})
${site.domain} {
	reverse_proxy 127.0.0.1:${site.upstreamPort} {
		header_up X-Real-IP {remote_host}
	}

	# Security headers
	header {
		Strict-Transport-Security "max-age=31536000; includeSubDomains"
		X-Content-Type-Options "nosniff"
		X-Frame-Options "DENY"
		Referrer-Policy "strict-origin-when-cross-origin"
	}

	encode gzip
}
`;
}

/**
 * Render the Caddyfile for every site on one host. Caddy obtains and renews the
 * certificates itself.
 */
export function renderCaddyfile(sites: ProxySite[]): string {
  const blocks = ['# Managed by pushgate; manual edits are overwritten\n'];
  for (const site of sites) {
    blocks.push(siteBlock(site));
  }
  return blocks.join('\n');
}

export function caddyValidateCommand(configPath: string): string {
  return `caddy validate --config ${quote(configPath)} --adapter caddyfile`;
}
