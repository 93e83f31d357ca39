import path from 'path';
import { ProxyConfigError, errorMessage } from './errors';
import { proxyLogger } from './logger';
import { caddyValidateCommand, renderCaddyfile } from './caddy';
import { renderNginxSite } from './nginx';
import { CertificateManager } from './certs';
import { quote } from './shell';
import type { CommandRunner } from './runner';
import type { DbHelpers } from './db';
import type { DeploymentTarget, ProxyKind } from './models';

const MISSING = '__missing__';

/**
 * One public host name routed to one local upstream.
 */
export interface ProxySite {
  name: string;
  domain: string;
  upstreamPort: number;
}

export interface ProxyApplyResult {
  kind: ProxyKind;
  configPath: string;
  changed: boolean;
  backupPath: string | null;
}

export interface ProxyManagerOptions {
  sudo?: string;
  certificates?: CertificateManager;
}

export function siteFor(target: DeploymentTarget): ProxySite | null {
  if (!target.domain) return null;
  return { name: target.name, domain: target.domain, upstreamPort: target.servicePort };
}

/**
 * Reverse proxy configuration for one host. Every target on the host that uses
 * the same proxy shares one config file.
 */
export class ProxyManager {
  private readonly sudo: string;
  private readonly certificates: CertificateManager;

  constructor(
    private readonly runner: CommandRunner,
    private readonly db: DbHelpers,
    options: ProxyManagerOptions = {},
  ) {
    this.sudo = options.sudo ?? 'sudo ';
    this.certificates = options.certificates ?? new CertificateManager(runner, { sudo: this.sudo });
  }

  configPath(kind: ProxyKind): string {
    return kind === 'caddy'
      ? this.db.getSetting('caddy_config_path') ?? '/etc/caddy/Caddyfile'
      : this.db.getSetting('nginx_site_path') ?? '/etc/nginx/sites-available/pushgate.conf';
  }

  sitesFor(target: DeploymentTarget): ProxySite[] {
    return this.db.getAllTargets()
      .filter((other) => other.host === target.host && other.proxy === target.proxy)
      .map(siteFor)
      .filter((site): site is ProxySite => site !== null);
  }

  async render(target: DeploymentTarget): Promise<string> {
    const sites = this.sitesFor(target);
    if (target.proxy === 'caddy') {
      return renderCaddyfile(sites);
    }
    const tlsDomains = new Set<string>();
    for (const site of sites) {
      if (await this.certificates.hasCertificate(site.domain)) {
        tlsDomains.add(site.domain);
      }
    }
    return renderNginxSite(sites, { tlsDomains });
  }

  private async readConfig(configPath: string): Promise<string | null> {
    const file = quote(configPath);
    const { stdout } = await this.runner.run(`${this.sudo}test -f ${file} && ${this.sudo}cat ${file} || echo ${MISSING}`);
    return stdout.trim() === MISSING ? null : stdout;
  }

  private validateCommand(kind: ProxyKind, configPath: string): string {
    return kind === 'caddy' ? `${this.sudo}${caddyValidateCommand(configPath)}` : `${this.sudo}nginx -t`;
  }

  // nginx only reads sites that are linked into sites-enabled
  private enabledLink(kind: ProxyKind, configPath: string): string | null {
    if (kind !== 'nginx' || path.posix.basename(path.posix.dirname(configPath)) !== 'sites-available') {
      return null;
    }
    return path.posix.join(path.posix.dirname(path.posix.dirname(configPath)), 'sites-enabled', path.posix.basename(configPath));
  }

  /**
   * Write the rendered config, validate it and reload the proxy. An invalid config
   * is replaced by the previous file before the error is raised.
   */
  async apply(target: DeploymentTarget): Promise<ProxyApplyResult> {
    const kind = target.proxy;
    const configPath = this.configPath(kind);
    const content = await this.render(target);
    const existing = await this.readConfig(configPath);

    if (existing === content) {
      return { kind, configPath, changed: false, backupPath: null };
    }

    const file = quote(configPath);
    const backupPath = existing === null ? null : `${configPath}.bak`;
    if (backupPath) {
      await this.runner.run(`${this.sudo}cp -p ${file} ${quote(backupPath)}`);
    }

    await this.runner.run(`${this.sudo}mkdir -p ${quote(path.posix.dirname(configPath))}`);
    await this.runner.run(`${this.sudo}tee ${file} > /dev/null`, { input: content });

    const link = this.enabledLink(kind, configPath);
    if (link) {
      await this.runner.run(`${this.sudo}ln -sf ${file} ${quote(link)}`);
    }

    try {
      await this.runner.run(this.validateCommand(kind, configPath));
    } catch (error) {
      await this.restore(configPath, backupPath, link);
      throw new ProxyConfigError(`Generated ${kind} configuration is invalid: ${errorMessage(error)}`, {
        configPath,
      });
    }

    await this.runner.run(`${this.sudo}systemctl reload-or-restart ${kind}`);
    proxyLogger.info({ kind, configPath, host: this.runner.host }, 'Proxy configuration applied');
    return { kind, configPath, changed: true, backupPath };
  }

  private async restore(configPath: string, backupPath: string | null, link: string | null) {
    const file = quote(configPath);
    if (backupPath) {
      await this.runner.run(`${this.sudo}mv ${quote(backupPath)} ${file}`);
    } else {
      await this.runner.run(`${this.sudo}rm -f ${file}`);
      if (link) await this.runner.run(`${this.sudo}rm -f ${quote(link)}`);
    }
    proxyLogger.warn({ configPath, restored: backupPath !== null }, 'Invalid proxy configuration rolled back');
  }
}
