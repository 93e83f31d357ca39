import 'dotenv/config';
import { createServer } from 'http';
import { Server } from 'socket.io';

import { loadConfig } from './lib/config';
import logger, { socketLogger } from './lib/logger';
import { createDatabase, createDbHelpers } from './lib/db';
import { DeployExecutor } from './lib/executor';
import { PushTrigger } from './lib/trigger';
import { createRunner } from './lib/runner';
import { AuthError, verifyCredentials } from './lib/auth';
import { renewAllDryRun } from './lib/certs';
import TaskScheduler from './lib/scheduler';
import { supervisors } from './lib/supervisor';
import { resumeLocalServices } from './lib/services';
import { targetLocks } from './lib/locks';
import type { AppContext } from './lib/context';
import type { DeploymentTarget } from './lib/models';
import webhook, { WEBHOOK_PATH } from './routes/webhook';
import deploy from './routes/deploy';
import firewall from './routes/firewall';
import proxy from './routes/proxy';
import service from './routes/service';
import settings from './routes/settings';
import targets from './routes/targets';
import user from './routes/user';

function main() {
  const config = loadConfig(process.env);
  const db = createDbHelpers(createDatabase(config.database.path));

  if (db.ensureAdmin(config.admin.username, config.admin.password)) {
    logger.info({ username: config.admin.username }, 'Created bootstrap operator');
  }

  const runnerDefaults = { privateKey: config.deploy.privateKey };
  const openRunner = (target: DeploymentTarget) => createRunner(target, runnerDefaults);

  const executor = new DeployExecutor({
    db,
    createRunner: openRunner,
    sessionTimeoutMs: config.deploy.sessionTimeoutMs,
    rollbackTimeoutMs: config.deploy.rollbackTimeoutMs,
    locks: targetLocks,
  });

  if (!config.webhook.secret) {
    logger.warn('WEBHOOK_SECRET is not set; push deliveries will be rejected');
  }
  const trigger = new PushTrigger({
    db,
    dispatch: (releaseId) => executor.dispatch(releaseId),
    secret: config.webhook.secret,
    trackedBranch: config.webhook.trackedBranch,
  });

  // Socket.IO claims /socket.io/ on the same server; the rest goes to the webhook listener
  const server = createServer(webhook(trigger));
  const io = new Server(server, { cors: { origin: '*' } });
  executor.setSocketServer(io);

  const ctx: AppContext = {
    io,
    db,
    executor,
    openRunner,
    deployDefaults: {
      host: config.deploy.host,
      user: config.deploy.user,
      sshPort: config.deploy.sshPort,
      branch: config.webhook.trackedBranch,
    },
    locks: targetLocks,
  };

  // Authentication middleware
  io.use((socket, next) => {
    const { username, password } = socket.handshake.auth;
    const operator = verifyCredentials(db, username, password);
    if (!operator) {
      socketLogger.warn({ socketId: socket.id }, 'Rejected socket login');
      return next(new AuthError());
    }
    socket.data.user = operator;
    next();
  });

  io.on('connection', (socket) => {
    socketLogger.info({ socketId: socket.id }, 'Operator connected');

    deploy(ctx, socket);
    service(ctx, socket);
    targets(ctx, socket);
    proxy(ctx, socket);
    firewall(ctx, socket);
    settings(ctx, socket);
    user(ctx, socket);

    socket.on('disconnect', (reason) => {
      socketLogger.info({ socketId: socket.id, reason }, 'Operator disconnected');
    });
  });

  const scheduler = new TaskScheduler();
  scheduler.every('certificate-renewal-dry-run', async () => {
    const failures = await renewAllDryRun(db, openRunner);
    if (failures > 0) {
      logger.warn({ failures }, 'Certificate renewal rehearsal found problems');
    }
  }, config.certificates.renewIntervalMinutes);

  server.listen(config.port, () => {
    logger.info({ port: config.port, webhook: WEBHOOK_PATH, env: config.nodeEnv }, 'Pushgate listening');
    const { interrupted, requeued } = executor.recover();
    if (interrupted + requeued > 0) {
      logger.info({ interrupted, requeued }, 'Recovered releases from the previous run');
    }
    resumeLocalServices(db)
      .then((resumed) => {
        if (resumed.length > 0) logger.info({ targets: resumed }, 'Started enabled local services');
      })
      .catch((error: unknown) => logger.error({ err: error }, 'Failed to start enabled local services'));
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down');
    scheduler.cancelAll();
    void supervisors.stopAll()
      .catch((error: unknown) => logger.error({ err: error }, 'Supervised processes did not stop cleanly'))
      .finally(() => {
        io.close((error) => {
          if (error) logger.error({ err: error }, 'Server did not close cleanly');
          process.exit(error ? 1 : 0);
        });
      });
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

try {
  main();
} catch (error) {
  logger.fatal({ err: error }, 'Failed to start');
  process.exit(1);
}
