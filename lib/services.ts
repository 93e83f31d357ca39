import { supervisors, type SupervisorRegistry } from './supervisor';
import { SystemdService } from './systemctl';
import type { CommandRunner } from './runner';
import type { DbHelpers } from './db';
import type { DeploymentTarget, ManagedService } from './models';

type ServiceStore = Pick<DbHelpers, 'getSetting' | 'isServiceEnabled' | 'setServiceEnabled'>;

/**
 * systemd on remote hosts; targets deployed in place run under the in-process
 * supervisor instead.
 */
export function createServiceController(
  target: DeploymentTarget,
  runner: CommandRunner,
  db: ServiceStore,
  registry: SupervisorRegistry = supervisors,
): ManagedService {
  if (target.transport === 'local') {
    return registry.get(target, db);
  }
  return new SystemdService(runner, target.unitName, { unitsDirectory: db.getSetting('units_directory') });
}

/**
 * Start the supervised process of every enabled local target. systemd brings
 * remote services back on its own.
 */
export async function resumeLocalServices(
  db: ServiceStore & Pick<DbHelpers, 'getAllTargets'>,
  registry: SupervisorRegistry = supervisors,
): Promise<string[]> {
  const resumed: string[] = [];
  for (const target of db.getAllTargets()) {
    if (target.transport !== 'local' || !db.isServiceEnabled(target.id)) continue;
    await registry.get(target, db).start();
    resumed.push(target.name);
  }
  return resumed;
}
