import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import bcrypt from 'bcryptjs';
import { z } from 'zod';
import logger from './logger';
import type {
  DeployStep,
  DeploymentTarget,
  NewDeploymentTarget,
  ProxyKind,
  PublicUser,
  Release,
  ReleaseLogEntry,
  ReleaseStatus,
  RestartPolicy,
  Transport,
  User,
} from './models';

export type DB = Database.Database;

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    username TEXT UNIQUE NOT NULL,
    password_hash TEXT NOT NULL,
    role TEXT DEFAULT 'admin',
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    last_login DATETIME
  );

  CREATE TABLE IF NOT EXISTS targets (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT UNIQUE NOT NULL,
    host TEXT NOT NULL,
    ssh_port INTEGER NOT NULL DEFAULT 22,
    ssh_user TEXT NOT NULL DEFAULT 'ubuntu',
    transport TEXT NOT NULL DEFAULT 'ssh' CHECK (transport IN ('ssh', 'local')),
    working_directory TEXT NOT NULL,
    repository_url TEXT,
    branch TEXT NOT NULL DEFAULT 'main',
    unit_name TEXT NOT NULL,
    exec_start TEXT NOT NULL,
    service_port INTEGER NOT NULL DEFAULT 5000,
    domain TEXT,
    proxy TEXT NOT NULL DEFAULT 'caddy' CHECK (proxy IN ('caddy', 'nginx')),
    health_path TEXT,
    install_command TEXT,
    env_file_path TEXT NOT NULL,
    required_env_keys TEXT NOT NULL DEFAULT '["PORT"]',
    restart_policy TEXT NOT NULL DEFAULT 'always' CHECK (restart_policy IN ('always', 'on-failure')),
    restart_delay_sec INTEGER NOT NULL DEFAULT 3,
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
  );

  CREATE TABLE IF NOT EXISTS releases (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    target_id INTEGER NOT NULL,
    commit_sha TEXT NOT NULL,
    ref TEXT NOT NULL,
    delivery_id TEXT NOT NULL,
    pusher TEXT,
    message TEXT,
    status TEXT NOT NULL DEFAULT 'queued'
      CHECK (status IN ('queued', 'applying', 'live', 'failed', 'rolled_back')),
    previous_commit TEXT,
    applied_commit TEXT,
    failed_step TEXT,
    error TEXT,
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    started_at DATETIME,
    completed_at DATETIME,
    FOREIGN KEY (target_id) REFERENCES targets (id) ON DELETE CASCADE
  );

  CREATE TABLE IF NOT EXISTS push_deliveries (
    delivery_id TEXT PRIMARY KEY,
    target_id INTEGER NOT NULL,
    release_id INTEGER,
    received_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    FOREIGN KEY (target_id) REFERENCES targets (id) ON DELETE CASCADE
  );

  CREATE TABLE IF NOT EXISTS release_logs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    release_id INTEGER NOT NULL,
    step TEXT,
    message TEXT NOT NULL,
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    FOREIGN KEY (release_id) REFERENCES releases (id) ON DELETE CASCADE
  );

  CREATE TABLE IF NOT EXISTS settings (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    key TEXT UNIQUE NOT NULL,
    value TEXT NOT NULL,
    updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
  );

  CREATE TABLE IF NOT EXISTS service_enablement (
    target_id INTEGER PRIMARY KEY,
    enabled_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    FOREIGN KEY (target_id) REFERENCES targets (id) ON DELETE CASCADE
  );

  CREATE INDEX IF NOT EXISTS idx_releases_target ON releases (target_id, id);
  CREATE INDEX IF NOT EXISTS idx_release_logs_release ON release_logs (release_id, id);
`;

const DEFAULT_SETTINGS: Record<string, string> = {
  caddy_config_path: '/etc/caddy/Caddyfile',
  nginx_site_path: '/etc/nginx/sites-available/pushgate.conf',
  units_directory: '/etc/systemd/system',
  certbot_email: '',
};

interface TargetRow {
  id: number;
  name: string;
  host: string;
  ssh_port: number;
  ssh_user: string;
  transport: Transport;
  working_directory: string;
  repository_url: string | null;
  branch: string;
  unit_name: string;
  exec_start: string;
  service_port: number;
  domain: string | null;
  proxy: ProxyKind;
  health_path: string | null;
  install_command: string | null;
  env_file_path: string;
  required_env_keys: string;
  restart_policy: RestartPolicy;
  restart_delay_sec: number;
  created_at: string;
  updated_at: string;
}

interface ReleaseRow {
  id: number;
  target_id: number;
  commit_sha: string;
  ref: string;
  delivery_id: string;
  pusher: string | null;
  message: string | null;
  status: ReleaseStatus;
  previous_commit: string | null;
  applied_commit: string | null;
  failed_step: DeployStep | null;
  error: string | null;
  created_at: string;
  started_at: string | null;
  completed_at: string | null;
}

interface ReleaseLogRow {
  id: number;
  release_id: number;
  step: DeployStep | null;
  message: string;
  created_at: string;
}

const StringList = z.array(z.string());

const RELEASE_COLUMNS: ReadonlyArray<[keyof ReleaseUpdate, string]> = [
  ['status', 'status'],
  ['previousCommit', 'previous_commit'],
  ['appliedCommit', 'applied_commit'],
  ['failedStep', 'failed_step'],
  ['error', 'error'],
];

function toTarget(row: TargetRow): DeploymentTarget {
  return {
    id: row.id,
    name: row.name,
    host: row.host,
    sshPort: row.ssh_port,
    sshUser: row.ssh_user,
    transport: row.transport,
    workingDirectory: row.working_directory,
    repositoryUrl: row.repository_url,
    branch: row.branch,
    unitName: row.unit_name,
    execStart: row.exec_start,
    servicePort: row.service_port,
    domain: row.domain,
    proxy: row.proxy,
    healthPath: row.health_path,
    installCommand: row.install_command,
    envFilePath: row.env_file_path,
    requiredEnvKeys: StringList.parse(JSON.parse(row.required_env_keys)),
    restartPolicy: row.restart_policy,
    restartDelaySec: row.restart_delay_sec,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toRelease(row: ReleaseRow): Release {
  return {
    id: row.id,
    targetId: row.target_id,
    commit: row.commit_sha,
    ref: row.ref,
    deliveryId: row.delivery_id,
    pusher: row.pusher,
    message: row.message,
    status: row.status,
    previousCommit: row.previous_commit,
    appliedCommit: row.applied_commit,
    failedStep: row.failed_step,
    error: row.error,
    createdAt: row.created_at,
    startedAt: row.started_at,
    completedAt: row.completed_at,
  };
}

export interface PushRecord {
  targetId: number;
  deliveryId: string;
  commit: string;
  ref: string;
  pusher?: string | null;
  message?: string | null;
}

export interface ReleaseUpdate {
  status?: ReleaseStatus;
  previousCommit?: string | null;
  appliedCommit?: string | null;
  failedStep?: DeployStep | null;
  error?: string | null;
}

/**
 * Open (or create) the SQLite database and apply the schema.
 * Pass ':memory:' for an ephemeral database.
 */
export function createDatabase(dbPath: string): DB {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma('foreign_keys = ON');
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.exec(SCHEMA);

  const insertDefaultSetting = db.prepare('INSERT OR IGNORE INTO settings (key, value) VALUES (?, ?)');
  for (const [key, value] of Object.entries(DEFAULT_SETTINGS)) {
    insertDefaultSetting.run(key, value);
  }

  return db;
}

// Helper functions for database operations
export function createDbHelpers(db: DB) {
  const now = () => new Date().toISOString();

  const getRelease = (id: number): Release | undefined => {
    const row = db.prepare<[number], ReleaseRow>('SELECT * FROM releases WHERE id = ?').get(id);
    return row ? toRelease(row) : undefined;
  };

  const insertRelease = db.prepare<[number, string, string, string, string | null, string | null, string]>(`
    INSERT INTO releases (target_id, commit_sha, ref, delivery_id, pusher, message, created_at)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `);
  const insertDelivery = db.prepare<[string, number, string]>(
    'INSERT OR IGNORE INTO push_deliveries (delivery_id, target_id, received_at) VALUES (?, ?, ?)',
  );
  const linkDelivery = db.prepare<[number, string]>(
    'UPDATE push_deliveries SET release_id = ? WHERE delivery_id = ?',
  );

  const recordPushTx = db.transaction((push: PushRecord): number | null => {
    const receivedAt = now();
    const delivery = insertDelivery.run(push.deliveryId, push.targetId, receivedAt);
    if (delivery.changes === 0) {
      return null;
    }
    const result = insertRelease.run(
      push.targetId,
      push.commit,
      push.ref,
      push.deliveryId,
      push.pusher ?? null,
      push.message ?? null,
      receivedAt,
    );
    const releaseId = Number(result.lastInsertRowid);
    linkDelivery.run(releaseId, push.deliveryId);
    return releaseId;
  });

  return {
    // Users
    getUserByUsername: (username: string): User | undefined =>
      db.prepare<[string], User>('SELECT * FROM users WHERE username = ?').get(username),

    getUserById: (id: number): PublicUser | undefined =>
      db.prepare<[number], PublicUser>(
        'SELECT id, username, role, created_at, last_login FROM users WHERE id = ?',
      ).get(id),

    getUserWithPassword: (id: number): User | undefined =>
      db.prepare<[number], User>('SELECT * FROM users WHERE id = ?').get(id),

    updateUserLastLogin: (userId: number) =>
      db.prepare('UPDATE users SET last_login = ? WHERE id = ?').run(now(), userId),

    updatePassword: (userId: number, passwordHash: string) =>
      db.prepare('UPDATE users SET password_hash = ? WHERE id = ?').run(passwordHash, userId),

    /**
     * Create the bootstrap operator when no user exists yet.
     * Returns true when an account was created.
     */
    ensureAdmin: (username: string, password: string | undefined): boolean => {
      const row = db.prepare<[], { count: number }>('SELECT COUNT(*) as count FROM users').get();
      if (!row || row.count > 0) return false;
      if (!password) {
        logger.warn('No operators exist and ADMIN_PASSWORD is not set; socket access is closed');
        return false;
      }
      const result = db.prepare(
        'INSERT OR IGNORE INTO users (username, password_hash, role) VALUES (?, ?, ?)',
      ).run(username, bcrypt.hashSync(password, 10), 'admin');
      return result.changes > 0;
    },

    // Local services started with the controller
    isServiceEnabled: (targetId: number): boolean =>
      db.prepare<[number], { target_id: number }>('SELECT target_id FROM service_enablement WHERE target_id = ?')
        .get(targetId) !== undefined,

    setServiceEnabled: (targetId: number, enabled: boolean) => {
      if (enabled) {
        db.prepare('INSERT OR IGNORE INTO service_enablement (target_id, enabled_at) VALUES (?, ?)').run(targetId, now());
      } else {
        db.prepare('DELETE FROM service_enablement WHERE target_id = ?').run(targetId);
      }
    },

    // Targets
    getAllTargets: (): DeploymentTarget[] =>
      db.prepare<[], TargetRow>('SELECT * FROM targets ORDER BY name').all().map(toTarget),

    getTargetById: (id: number): DeploymentTarget | undefined => {
      const row = db.prepare<[number], TargetRow>('SELECT * FROM targets WHERE id = ?').get(id);
      return row ? toTarget(row) : undefined;
    },

    getTargetByName: (name: string): DeploymentTarget | undefined => {
      const row = db.prepare<[string], TargetRow>('SELECT * FROM targets WHERE name = ?').get(name);
      return row ? toTarget(row) : undefined;
    },

    /** Targets following the given branch, used to route push events. */
    getTargetsForBranch: (branch: string): DeploymentTarget[] =>
      db.prepare<[string], TargetRow>('SELECT * FROM targets WHERE branch = ? ORDER BY id')
        .all(branch)
        .map(toTarget),

    createTarget: (target: NewDeploymentTarget): number => {
      const timestamp = now();
      const result = db.prepare(`
        INSERT INTO targets (
          name, host, ssh_port, ssh_user, transport, working_directory, repository_url, branch, unit_name,
          exec_start, service_port, domain, proxy, health_path, install_command, env_file_path,
          required_env_keys, restart_policy, restart_delay_sec, created_at, updated_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        target.name,
        target.host,
        target.sshPort,
        target.sshUser,
        target.transport,
        target.workingDirectory,
        target.repositoryUrl,
        target.branch,
        target.unitName,
        target.execStart,
        target.servicePort,
        target.domain,
        target.proxy,
        target.healthPath,
        target.installCommand,
        target.envFilePath,
        JSON.stringify(target.requiredEnvKeys),
        target.restartPolicy,
        target.restartDelaySec,
        timestamp,
        timestamp,
      );
      return Number(result.lastInsertRowid);
    },

    deleteTarget: (id: number) =>
      db.prepare('DELETE FROM targets WHERE id = ?').run(id),

    // Releases
    /**
     * Record a push delivery and its release atomically.
     * Returns null when the delivery was already seen.
     */
    recordPush: (push: PushRecord): Release | null => {
      const releaseId = recordPushTx(push);
      return releaseId === null ? null : getRelease(releaseId) ?? null;
    },

    getRelease,

    getTargetReleases: (targetId: number, limit: number = 10): Release[] =>
      db.prepare<[number, number], ReleaseRow>(
        'SELECT * FROM releases WHERE target_id = ? ORDER BY id DESC LIMIT ?',
      ).all(targetId, limit).map(toRelease),

    /** Most recent live release older than `beforeId`, the rollback candidate. */
    getLastLiveRelease: (targetId: number, beforeId?: number): Release | undefined => {
      const row = db.prepare<[number, number], ReleaseRow>(`
        SELECT * FROM releases
        WHERE target_id = ? AND status = 'live' AND id < ?
        ORDER BY id DESC LIMIT 1
      `).get(targetId, beforeId ?? Number.MAX_SAFE_INTEGER);
      return row ? toRelease(row) : undefined;
    },

    getReleasesByStatus: (status: ReleaseStatus): Release[] =>
      db.prepare<[string], ReleaseRow>('SELECT * FROM releases WHERE status = ? ORDER BY id')
        .all(status)
        .map(toRelease),

    markReleaseStarted: (id: number) =>
      db.prepare("UPDATE releases SET status = 'applying', started_at = ? WHERE id = ?").run(now(), id),

    updateRelease: (id: number, updates: ReleaseUpdate) => {
      const assignments: string[] = [];
      const values: Array<string | null> = [];
      for (const [key, column] of RELEASE_COLUMNS) {
        const value = updates[key];
        if (value !== undefined) {
          assignments.push(`${column} = ?`);
          values.push(value);
        }
      }
      if (updates.status === 'live' || updates.status === 'failed' || updates.status === 'rolled_back') {
        assignments.push('completed_at = ?');
        values.push(now());
      }
      if (assignments.length === 0) return;
      db.prepare(`UPDATE releases SET ${assignments.join(', ')} WHERE id = ?`).run(...values, id);
    },

    appendReleaseLog: (releaseId: number, step: DeployStep | null, message: string) =>
      db.prepare('INSERT INTO release_logs (release_id, step, message, created_at) VALUES (?, ?, ?, ?)')
        .run(releaseId, step, message, now()),

    getReleaseLogs: (releaseId: number): ReleaseLogEntry[] =>
      db.prepare<[number], ReleaseLogRow>(
        'SELECT * FROM release_logs WHERE release_id = ? ORDER BY id',
      ).all(releaseId).map((row) => ({
        id: row.id,
        releaseId: row.release_id,
        step: row.step,
        message: row.message,
        createdAt: row.created_at,
      })),

    // Settings
    getSetting: (key: string): string | undefined =>
      db.prepare<[string], { value: string }>('SELECT value FROM settings WHERE key = ?').get(key)?.value,

    setSetting: (key: string, value: string) =>
      db.prepare('INSERT OR REPLACE INTO settings (key, value, updated_at) VALUES (?, ?, ?)').run(key, value, now()),

    getAllSettings: (): Record<string, string> =>
      Object.fromEntries(
        db.prepare<[], { key: string; value: string }>('SELECT key, value FROM settings ORDER BY key')
          .all()
          .map((row) => [row.key, row.value]),
      ),
  };
}

export type DbHelpers = ReturnType<typeof createDbHelpers>;
