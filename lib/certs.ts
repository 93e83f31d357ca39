import { CertificateError, errorMessage } from './errors';
import { proxyLogger } from './logger';
import { ACME_WEBROOT, LETSENCRYPT_LIVE } from './nginx';
import { quote } from './shell';
import type { CommandRunner } from './runner';
import type { DbHelpers } from './db';
import type { DeploymentTarget } from './models';

const MISSING = '__missing__';

export interface IssueResult {
  /** False when a valid certificate was already installed */
  issued: boolean;
  fingerprint: string;
}

export interface DryRunResult {
  fingerprint: string | null;
  output: string;
}

export interface CertificateOptions {
  sudo?: string;
  webroot?: string;
}

export function certificatePath(domain: string): string {
  return `${LETSENCRYPT_LIVE}/${domain}/cert.pem`;
}

/**
 * Parse `openssl x509 -fingerprint -sha256` output ("sha256 Fingerprint=AB:CD:...").
 */
export function parseFingerprint(output: string): string | null {
  const match = output.match(/Fingerprint=([0-9A-Fa-f:]+)/);
  return match ? match[1].toUpperCase() : null;
}

/**
 * Let's Encrypt certificates through certbot on the target host.
 */
export class CertificateManager {
  private readonly sudo: string;
  private readonly webroot: string;

  constructor(private readonly runner: CommandRunner, options: CertificateOptions = {}) {
    this.sudo = options.sudo ?? 'sudo ';
    this.webroot = options.webroot ?? ACME_WEBROOT;
  }

  async hasCertificate(domain: string): Promise<boolean> {
    return (await this.fingerprint(domain)) !== null;
  }

  /** SHA-256 fingerprint of the installed certificate, or null when there is none */
  async fingerprint(domain: string): Promise<string | null> {
    const file = quote(certificatePath(domain));
    const { stdout } = await this.runner.run(
      `${this.sudo}test -f ${file} && ${this.sudo}openssl x509 -noout -fingerprint -sha256 -in ${file} || echo ${MISSING}`,
    );
    return stdout.trim() === MISSING ? null : parseFingerprint(stdout);
  }

  /**
   * Obtain a certificate over the HTTP-01 challenge served from the webroot.
   * Nothing is requested when one is already installed.
   */
  async issue(domain: string, email: string): Promise<IssueResult> {
    const existing = await this.fingerprint(domain);
    if (existing) {
      return { issued: false, fingerprint: existing };
    }

    const contact = email ? `--email ${quote(email)}` : '--register-unsafely-without-email';
    try {
      await this.runner.run(`${this.sudo}mkdir -p ${quote(this.webroot)}`);
      await this.runner.run(
        `${this.sudo}certbot certonly --webroot -w ${quote(this.webroot)} -d ${quote(domain)} ${contact} --agree-tos --non-interactive --keep-until-expiring`,
      );
    } catch (error) {
      throw new CertificateError(`Certificate issuance for ${domain} failed: ${errorMessage(error)}`, { domain });
    }

    const fingerprint = await this.fingerprint(domain);
    if (!fingerprint) {
      throw new CertificateError(`certbot finished but no certificate is installed for ${domain}`, { domain });
    }
    proxyLogger.info({ domain, fingerprint, host: this.runner.host }, 'Certificate issued');
    return { issued: true, fingerprint };
  }

  /**
   * Rehearse a renewal against the CA staging environment and prove the installed
   * certificate is the same before and after.
   */
  async renewDryRun(domain: string): Promise<DryRunResult> {
    const before = await this.fingerprint(domain);

    let output: string;
    try {
      const result = await this.runner.run(
        `${this.sudo}certbot renew --dry-run --non-interactive --cert-name ${quote(domain)}`,
      );
      output = result.stdout;
    } catch (error) {
      throw new CertificateError(`Renewal dry run for ${domain} failed: ${errorMessage(error)}`, { domain });
    }

    const after = await this.fingerprint(domain);
    if (before !== after) {
      throw new CertificateError(`Renewal dry run changed the installed certificate for ${domain}`, {
        domain,
        before,
        after,
      });
    }
    proxyLogger.info({ domain, fingerprint: after, host: this.runner.host }, 'Renewal dry run passed');
    return { fingerprint: after, output };
  }
}

/**
 * Rehearse renewal for every certbot-managed domain. Failures are logged per
 * target and do not stop the others.
 */
export async function renewAllDryRun(
  db: DbHelpers,
  openRunner: (target: DeploymentTarget) => CommandRunner,
): Promise<number> {
  let failures = 0;
  for (const target of db.getAllTargets()) {
    if (!target.domain || target.proxy !== 'nginx') continue;
    const runner = openRunner(target);
    try {
      await runner.connect();
      await new CertificateManager(runner).renewDryRun(target.domain);
    } catch (error) {
      failures += 1;
      proxyLogger.error({ err: error, targetId: target.id, domain: target.domain }, 'Scheduled renewal dry run failed');
    } finally {
      await runner.close();
    }
  }
  return failures;
}
