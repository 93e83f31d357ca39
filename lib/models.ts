export type Transport = 'ssh' | 'local';
export type ProxyKind = 'caddy' | 'nginx';
export type RestartPolicy = 'always' | 'on-failure';

/**
 * Run state of the supervised process as seen by the operator.
 */
export type ServiceState = 'stopped' | 'starting' | 'running' | 'crash-looping';

export type ReleaseStatus = 'queued' | 'applying' | 'live' | 'failed' | 'rolled_back';

/**
 * Steps of the deploy sequence, in order. `rolling_back` only runs after a
 * restart or verification failure.
 */
export type DeployStep =
  | 'connecting'
  | 'fetching'
  | 'installing'
  | 'restarting'
  | 'verifying'
  | 'rolling_back';

/**
 * User model representing the users table
 */
export interface User {
  id: number;
  username: string;
  password_hash: string;
  role: string;
  created_at: string; // ISO date string
  last_login?: string | null; // ISO date string
}

export type PublicUser = Omit<User, 'password_hash'>;

/**
 * The single host (and the service on it) that releases are applied to.
 */
export interface DeploymentTarget {
  id: number;
  name: string;
  host: string;
  sshPort: number;
  sshUser: string;
  transport: Transport;
  workingDirectory: string;
  repositoryUrl: string | null;
  branch: string;
  unitName: string;
  execStart: string;
  servicePort: number;
  domain: string | null;
  proxy: ProxyKind;
  healthPath: string | null;
  installCommand: string | null;
  envFilePath: string;
  requiredEnvKeys: string[];
  restartPolicy: RestartPolicy;
  restartDelaySec: number;
  createdAt: string;
  updatedAt: string;
}

export type NewDeploymentTarget = Omit<DeploymentTarget, 'id' | 'createdAt' | 'updatedAt'>;

export interface Release {
  id: number;
  targetId: number;
  commit: string;
  ref: string;
  deliveryId: string;
  pusher: string | null;
  message: string | null;
  status: ReleaseStatus;
  previousCommit: string | null;
  appliedCommit: string | null;
  failedStep: DeployStep | null;
  error: string | null;
  createdAt: string;
  startedAt: string | null;
  completedAt: string | null;
}

export interface ReleaseLogEntry {
  id: number;
  releaseId: number;
  step: DeployStep | null;
  message: string;
  createdAt: string;
}

/**
 * Definition of the supervised long-running process.
 */
export interface ServiceUnit {
  name: string;
  description: string;
  execStart: string;
  workingDirectory: string;
  envFilePath: string;
  restartPolicy: RestartPolicy;
  restartDelaySec: number;
  user: string;
}

export interface ServiceStatus {
  name: string;
  state: ServiceState;
  pid: number | null;
  /** ISO timestamp of the current process start, the process identity across restarts */
  startedAt: string | null;
  lastExitCode: number | null;
  restarts: number;
}

export interface LogOptions {
  /** Tail length; omit for the whole log */
  lines?: number;
  since?: string;
}

/**
 * Key/value pairs loaded into the service environment at start.
 */
export type SecretsBundle = Record<string, string>;

/**
 * Control surface of a service manager: lifecycle commands plus status and logs
 * for the operator.
 */
export interface ServiceController {
  readonly name: string;
  start(): Promise<void>;
  stop(): Promise<void>;
  restart(): Promise<void>;
  enable(): Promise<void>;
  status(): Promise<ServiceStatus>;
  logs(options?: LogOptions): Promise<string>;
  /** Follow new log output; returns a function that ends the stream */
  streamLogs(onData: (chunk: string) => void): () => void;
}

/**
 * A service controller that can also install its own definition.
 */
export interface ManagedService extends ServiceController {
  /** Returns false when the installed definition already matches */
  install(unit: ServiceUnit): Promise<boolean>;
  isEnabled(): Promise<boolean>;
}
