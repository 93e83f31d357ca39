import { ValidationError } from './errors';
import logger from './logger';
import envManager, { mergeBundle, validateBundle, type EnvManager } from './env';
import { createServiceController } from './services';
import { createSourceControl, type SourceControl } from './git';
import { ProxyManager } from './proxy';
import { CertificateManager } from './certs';
import { Firewall, buildRuleSet } from './firewall';
import type { CommandRunner } from './runner';
import type { DbHelpers } from './db';
import type { DeploymentTarget, ManagedService, SecretsBundle, ServiceUnit } from './models';

const provisionLogger = logger.child({ component: 'provision' });

export type ProvisionStepName =
  | 'validate-secrets'
  | 'source'
  | 'env-file'
  | 'unit'
  | 'enable'
  | 'start'
  | 'proxy'
  | 'certificate'
  | 'firewall';

export type StepOutcome = 'applied' | 'unchanged' | 'skipped';

export interface ProvisionStep {
  step: ProvisionStepName;
  outcome: StepOutcome;
  detail?: string;
}

export interface ProvisionRequest {
  /** Values to add to the env file; omitted keys keep their current values */
  secrets?: SecretsBundle;
  certbotEmail?: string;
}

export interface ProvisionDeps {
  db: DbHelpers;
  runner: CommandRunner;
  env?: EnvManager;
  service?: ManagedService;
  source?: SourceControl;
  proxy?: ProxyManager;
  certificates?: CertificateManager;
  firewall?: Firewall;
  onStep?: (step: ProvisionStep) => void;
}

export function unitFor(target: DeploymentTarget): ServiceUnit {
  return {
    name: target.unitName,
    description: `${target.name} (managed by pushgate)`,
    execStart: target.execStart,
    workingDirectory: target.workingDirectory,
    envFilePath: target.envFilePath,
    restartPolicy: target.restartPolicy,
    restartDelaySec: target.restartDelaySec,
    user: target.sshUser,
  };
}

/**
 * One-time setup of a target host. Every step checks the current state first, so
 * running it again only changes what drifted.
 */
export class Provisioner {
  private readonly steps: ProvisionStep[] = [];
  private readonly env: EnvManager;
  private readonly service: ManagedService;
  private readonly source: SourceControl;
  private readonly proxy: ProxyManager;
  private readonly certificates: CertificateManager;
  private readonly firewall: Firewall;

  constructor(private readonly target: DeploymentTarget, private readonly deps: ProvisionDeps) {
    const { db, runner } = deps;
    this.env = deps.env ?? envManager;
    this.service = deps.service
      ?? createServiceController(target, runner, db);
    this.source = deps.source ?? createSourceControl(target, runner);
    this.certificates = deps.certificates ?? new CertificateManager(runner);
    this.proxy = deps.proxy ?? new ProxyManager(runner, db, { certificates: this.certificates });
    this.firewall = deps.firewall ?? new Firewall(runner);
  }

  private record(step: ProvisionStepName, outcome: StepOutcome, detail?: string) {
    const entry: ProvisionStep = detail === undefined ? { step, outcome } : { step, outcome, detail };
    this.steps.push(entry);
    provisionLogger.info({ targetId: this.target.id, ...entry }, 'Provisioning step finished');
    this.deps.onStep?.(entry);
  }

  async run(request: ProvisionRequest = {}): Promise<ProvisionStep[]> {
    const { target } = this;
    const { runner } = this.deps;

    await runner.connect();

    // Source first: the env file usually lives inside the working copy
    if (await this.source.isRepository()) {
      this.record('source', 'unchanged');
    } else if (target.repositoryUrl) {
      await this.source.clone(target.repositoryUrl, target.branch);
      this.record('source', 'applied', `cloned ${target.branch}`);
    } else {
      throw new ValidationError(`${target.workingDirectory} is not a git working copy and no repository URL is set`);
    }

    const current = await this.env.readEnvFile(runner, target.envFilePath);
    const bundle = mergeBundle(current, request.secrets ?? {});
    const validation = validateBundle(bundle, target.requiredEnvKeys);
    if (!validation.valid) {
      const problems = [
        ...validation.missing.map((key) => `missing ${key}`),
        ...validation.errors,
      ];
      throw new ValidationError(`Secrets bundle is incomplete: ${problems.join('; ')}`, {
        missing: validation.missing,
        errors: validation.errors,
      });
    }
    this.record('validate-secrets', 'unchanged', `${Object.keys(bundle).length} keys`);

    const envChanged = await this.env.writeEnvFile(runner, target.envFilePath, bundle);
    this.record('env-file', envChanged ? 'applied' : 'unchanged');

    const unitChanged = await this.service.install(unitFor(target));
    this.record('unit', unitChanged ? 'applied' : 'unchanged');

    if (await this.service.isEnabled()) {
      this.record('enable', 'unchanged');
    } else {
      await this.service.enable();
      this.record('enable', 'applied');
    }

    const status = await this.service.status();
    if (status.state === 'stopped') {
      await this.service.start();
      this.record('start', 'applied');
    } else if (envChanged || unitChanged) {
      // A running process only picks up a new unit or env file on restart
      await this.service.restart();
      this.record('start', 'applied', 'restarted');
    } else {
      this.record('start', 'unchanged');
    }

    await this.edge(request);

    const firewall = await this.firewall.apply(buildRuleSet(target.servicePort, { sshPort: target.sshPort }));
    this.record('firewall', firewall.changed ? 'applied' : 'unchanged');

    return this.steps;
  }

  private async edge(request: ProvisionRequest) {
    const { target } = this;
    if (!target.domain) {
      this.record('proxy', 'skipped', 'no domain');
      this.record('certificate', 'skipped', 'no domain');
      return;
    }

    const proxy = await this.proxy.apply(target);
    if (target.proxy === 'caddy') {
      this.record('proxy', proxy.changed ? 'applied' : 'unchanged');
      this.record('certificate', 'skipped', 'managed by caddy');
      return;
    }

    const email = request.certbotEmail ?? this.deps.db.getSetting('certbot_email') ?? '';
    const certificate = await this.certificates.issue(target.domain, email);
    // The TLS server block can only be rendered once the certificate exists
    const withTls = certificate.issued ? await this.proxy.apply(target) : proxy;
    this.record('proxy', proxy.changed || withTls.changed ? 'applied' : 'unchanged');
    this.record('certificate', certificate.issued ? 'applied' : 'unchanged', certificate.fingerprint);
  }
}

export async function provisionTarget(
  target: DeploymentTarget,
  request: ProvisionRequest,
  deps: ProvisionDeps,
): Promise<ProvisionStep[]> {
  try {
    return await new Provisioner(target, deps).run(request);
  } finally {
    await deps.runner.close();
  }
}
