import path from 'path';
import { supervisorLogger } from './logger';
import { quote } from './shell';
import type { CommandRunner } from './runner';
import type { LogOptions, ManagedService, ServiceState, ServiceStatus, ServiceUnit } from './models';

const SHOW_PROPERTIES = [
  'ActiveState',
  'SubState',
  'MainPID',
  'ExecMainStartTimestamp',
  'ExecMainStatus',
  'ExecMainCode',
  'NRestarts',
  'LoadState',
];

export function unitFileName(name: string): string {
  return name.endsWith('.service') ? name : `${name}.service`;
}

/**
 * Render a systemd unit for the supervised process. The start limit is lifted so
 * systemd keeps retrying at RestartSec for as long as the process keeps failing.
 */
export function renderUnitFile(unit: ServiceUnit): string {
  const identifier = unitFileName(unit.name).replace(/\.service$/, '');
  return `[Unit]
Description=${unit.description}
After=network.target
Wants=network.target
StartLimitIntervalSec=0

[Service]
Type=simple
User=${unit.user}
Group=${unit.user}
WorkingDirectory=${unit.workingDirectory}
EnvironmentFile=${unit.envFilePath}
ExecStart=${unit.execStart}
Restart=${unit.restartPolicy}
RestartSec=${unit.restartDelaySec}
StandardOutput=journal
StandardError=journal
SyslogIdentifier=${identifier}

[Install]
WantedBy=multi-user.target
`;
}

export function parseSystemctlShow(output: string): Record<string, string> {
  const properties: Record<string, string> = {};

  output.split('\n').forEach(line => {
    const [key, ...valueParts] = line.split('=');
    if (key && valueParts.length > 0) {
      properties[key.trim()] = valueParts.join('=').trim();
    }
  });

  return properties;
}

/**
 * Collapse systemd's ActiveState/SubState pair into the four operator states.
 * `activating (auto-restart)` is systemd waiting out RestartSec after a crash.
 */
export function mapSystemdState(activeState: string | undefined, subState: string | undefined): ServiceState {
  switch (activeState) {
    case 'active':
    case 'reloading':
      return 'running';
    case 'activating':
      return subState === 'auto-restart' ? 'crash-looping' : 'starting';
    default:
      return 'stopped';
  }
}

// `systemctl show --timestamp=unix` prints "@<seconds>"
function parseUnixTimestamp(value: string | undefined): string | null {
  if (!value) return null;
  const match = value.match(/^@(\d+)$/);
  if (!match) return null;
  return new Date(parseInt(match[1], 10) * 1000).toISOString();
}

function parseIntOrNull(value: string | undefined): number | null {
  if (value === undefined || value === '' || value === '[not set]') return null;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? null : parsed;
}

export function statusFromProperties(name: string, properties: Record<string, string>): ServiceStatus {
  const state = mapSystemdState(properties.ActiveState, properties.SubState);
  const pid = parseIntOrNull(properties.MainPID);
  const exitCode = properties.ExecMainCode === '0' ? null : parseIntOrNull(properties.ExecMainStatus);
  return {
    name,
    state,
    pid: pid && pid > 0 ? pid : null,
    startedAt: state === 'stopped' ? null : parseUnixTimestamp(properties.ExecMainStartTimestamp),
    lastExitCode: exitCode,
    restarts: parseIntOrNull(properties.NRestarts) ?? 0,
  };
}

export interface SystemdServiceOptions {
  unitsDirectory?: string;
  /** Prefix for privileged commands; empty when already root */
  sudo?: string;
}

/**
 * The host's own service manager driven over a command channel.
 */
export class SystemdService implements ManagedService {
  readonly name: string;
  private readonly unitsDirectory: string;
  private readonly sudo: string;

  constructor(
    private readonly runner: CommandRunner,
    unitName: string,
    options: SystemdServiceOptions = {},
  ) {
    this.name = unitFileName(unitName);
    this.unitsDirectory = options.unitsDirectory ?? '/etc/systemd/system';
    this.sudo = options.sudo ?? 'sudo ';
  }

  get unitPath(): string {
    return path.posix.join(this.unitsDirectory, this.name);
  }

  private async systemctl(action: string): Promise<void> {
    await this.runner.run(`${this.sudo}systemctl ${action} ${quote(this.name)}`);
    supervisorLogger.info({ unit: this.name, host: this.runner.host, action }, 'systemctl command completed');
  }

  async readUnitFile(): Promise<string | null> {
    const { stdout } = await this.runner.run(
      `test -f ${quote(this.unitPath)} && cat ${quote(this.unitPath)} || echo __missing__`,
    );
    return stdout.trim() === '__missing__' ? null : stdout;
  }

  /**
   * Install or update the unit file. Returns false when the installed unit
   * already matches.
   */
  async install(unit: ServiceUnit): Promise<boolean> {
    const content = renderUnitFile(unit);
    const existing = await this.readUnitFile();
    if (existing === content) {
      return false;
    }

    await this.runner.run(`${this.sudo}tee ${quote(this.unitPath)} > /dev/null`, { input: content });
    await this.runner.run(`${this.sudo}chmod 644 ${quote(this.unitPath)}`);
    await this.runner.run(`${this.sudo}systemctl daemon-reload`);
    supervisorLogger.info({ unit: this.name, host: this.runner.host }, 'Installed systemd unit');
    return true;
  }

  async start(): Promise<void> {
    await this.systemctl('start');
  }

  async stop(): Promise<void> {
    await this.systemctl('stop');
  }

  async restart(): Promise<void> {
    await this.systemctl('restart');
  }

  async enable(): Promise<void> {
    await this.systemctl('enable');
  }

  async isEnabled(): Promise<boolean> {
    const { stdout } = await this.runner.run(`systemctl is-enabled ${quote(this.name)} || true`);
    return stdout.trim() === 'enabled';
  }

  async status(): Promise<ServiceStatus> {
    const { stdout } = await this.runner.run(
      `systemctl show ${quote(this.name)} --timestamp=unix --property=${SHOW_PROPERTIES.join(',')}`,
    );
    return statusFromProperties(this.name, parseSystemctlShow(stdout));
  }

  async logs(options: LogOptions = {}): Promise<string> {
    let command = `journalctl -u ${quote(this.name)} --no-pager`;
    if (options.lines !== undefined) {
      command += ` -n ${options.lines}`;
    }
    if (options.since) {
      command += ` --since=${quote(options.since)}`;
    }
    const { stdout } = await this.runner.run(command);
    return stdout;
  }

  streamLogs(onData: (chunk: string) => void): () => void {
    return this.runner.stream(`journalctl -u ${quote(this.name)} -f -n 0 --no-pager`, onData);
  }
}
