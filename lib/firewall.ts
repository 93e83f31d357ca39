import { isIP } from 'net';
import logger from './logger';
import type { CommandRunner } from './runner';

const firewallLogger = logger.child({ component: 'firewall' });

export type Protocol = 'tcp' | 'udp';
export type FirewallAction = 'allow' | 'deny';

export interface FirewallRule {
  port: number;
  protocol: Protocol;
  action: FirewallAction;
  comment?: string;
}

export interface RuleSet {
  defaultIncoming: FirewallAction;
  /** Evaluated in order; the first rule for the port decides */
  rules: FirewallRule[];
}

export interface Connection {
  port: number;
  protocol?: Protocol;
  /** Source address of the connection */
  source: string;
}

/**
 * The edge policy for a host running one backend service: SSH and HTTP(S) in,
 * the backend port only over loopback.
 */
export function buildRuleSet(servicePort: number, options: { sshPort?: number } = {}): RuleSet {
  return {
    defaultIncoming: 'deny',
    rules: [
      { port: options.sshPort ?? 22, protocol: 'tcp', action: 'allow', comment: 'ssh' },
      { port: 80, protocol: 'tcp', action: 'allow', comment: 'http' },
      { port: 443, protocol: 'tcp', action: 'allow', comment: 'https' },
      { port: servicePort, protocol: 'tcp', action: 'deny', comment: 'backend' },
    ],
  };
}

export function isLoopback(source: string): boolean {
  if (source === 'localhost' || source === '::1') return true;
  const v4 = source.startsWith('::ffff:') ? source.slice(7) : source;
  return isIP(v4) === 4 && v4.split('.')[0] === '127';
}

/**
 * Decide a connection the way the host firewall does: loopback is always
 * accepted, then the first matching rule, then the default policy.
 */
export function evaluate(ruleSet: RuleSet, connection: Connection): FirewallAction {
  if (isLoopback(connection.source)) return 'allow';
  const protocol = connection.protocol ?? 'tcp';
  const rule = ruleSet.rules.find((candidate) => candidate.port === connection.port && candidate.protocol === protocol);
  return rule ? rule.action : ruleSet.defaultIncoming;
}

export function ruleCommand(rule: FirewallRule): string {
  const comment = rule.comment ? ` comment '${rule.comment.replace(/'/g, '')}'` : '';
  return `ufw ${rule.action} ${rule.port}/${rule.protocol}${comment}`;
}

export function renderUfwCommands(ruleSet: RuleSet): string[] {
  return [
    `ufw default ${ruleSet.defaultIncoming} incoming`,
    'ufw default allow outgoing',
    ...ruleSet.rules.map(ruleCommand),
    'ufw --force enable',
  ];
}

export interface UfwStatus {
  active: boolean;
  defaultIncoming: FirewallAction | null;
  rules: FirewallRule[];
}

/**
 * Parse `ufw status verbose`. IPv6 duplicates of a rule are folded into it.
 */
export function parseUfwStatus(output: string): UfwStatus {
  const active = /^Status:\s+active/m.test(output);
  const defaults = output.match(/^Default:\s+(allow|deny|reject)\s+\(incoming\)/m);
  const rules: FirewallRule[] = [];

  for (const line of output.split('\n')) {
    const match = line.match(/^(\d+)\/(tcp|udp)(\s+\(v6\))?\s+(ALLOW|DENY|REJECT)\b/);
    if (!match || match[3]) continue;
    rules.push({
      port: parseInt(match[1], 10),
      protocol: match[2] === 'udp' ? 'udp' : 'tcp',
      action: match[4] === 'ALLOW' ? 'allow' : 'deny',
    });
  }

  let defaultIncoming: FirewallAction | null = null;
  if (defaults) {
    defaultIncoming = defaults[1] === 'allow' ? 'allow' : 'deny';
  }
  return { active, defaultIncoming, rules };
}

/**
 * Commands that bring the current ufw state in line with the rule set; empty when
 * nothing needs to change.
 */
export function planUfwChanges(ruleSet: RuleSet, current: UfwStatus): string[] {
  const commands: string[] = [];
  if (current.defaultIncoming !== ruleSet.defaultIncoming) {
    commands.push(`ufw default ${ruleSet.defaultIncoming} incoming`);
  }
  for (const rule of ruleSet.rules) {
    const present = current.rules.some((existing) =>
      existing.port === rule.port && existing.protocol === rule.protocol && existing.action === rule.action);
    if (!present) commands.push(ruleCommand(rule));
  }
  if (!current.active) {
    commands.push('ufw --force enable');
  }
  return commands;
}

export interface FirewallApplyResult {
  commands: string[];
  changed: boolean;
}

/**
 * ufw on the target host.
 */
export class Firewall {
  private readonly sudo: string;

  constructor(private readonly runner: CommandRunner, options: { sudo?: string } = {}) {
    this.sudo = options.sudo ?? 'sudo ';
  }

  async status(): Promise<UfwStatus> {
    const { stdout } = await this.runner.run(`${this.sudo}ufw status verbose`);
    return parseUfwStatus(stdout);
  }

  async apply(ruleSet: RuleSet): Promise<FirewallApplyResult> {
    const commands = planUfwChanges(ruleSet, await this.status());
    for (const command of commands) {
      await this.runner.run(`${this.sudo}${command}`);
    }
    if (commands.length > 0) {
      firewallLogger.info({ host: this.runner.host, commands }, 'Firewall rules applied');
    }
    return { commands, changed: commands.length > 0 };
  }
}
