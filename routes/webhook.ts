import type { IncomingMessage, ServerResponse } from 'http';
import { PushgateError, errorMessage } from '../lib/errors';
import { triggerLogger } from '../lib/logger';
import type { PushTrigger, TriggerOutcome } from '../lib/trigger';

export const WEBHOOK_PATH = '/hooks/push';
const MAX_BODY_BYTES = 1024 * 1024;

const STATUS_BY_CODE: Partial<Record<PushgateError['code'], number>> = {
  SIGNATURE_ERROR: 401,
  VALIDATION_ERROR: 400,
  NOT_FOUND: 404,
};

class PayloadTooLargeError extends Error {}

function readBody(req: IncomingMessage): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let size = 0;
    req.on('data', (chunk: Buffer) => {
      size += chunk.length;
      if (size > MAX_BODY_BYTES) {
        reject(new PayloadTooLargeError(`Body exceeds ${MAX_BODY_BYTES} bytes`));
        req.destroy();
        return;
      }
      chunks.push(chunk);
    });
    req.on('end', () => resolve(Buffer.concat(chunks)));
    req.on('error', reject);
  });
}

function header(req: IncomingMessage, name: string): string | undefined {
  const value = req.headers[name];
  return Array.isArray(value) ? value[0] : value;
}

function send(res: ServerResponse, status: number, body: Record<string, unknown>) {
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(JSON.stringify(body));
}

function respond(res: ServerResponse, outcome: TriggerOutcome) {
  switch (outcome.kind) {
    case 'pong':
      send(res, 200, { success: true, data: 'pong' });
      return;
    case 'duplicate':
      send(res, 200, { success: true, data: { duplicate: true, deliveryId: outcome.deliveryId } });
      return;
    case 'ignored':
      send(res, 202, { success: true, data: { ignored: true, reason: outcome.reason } });
      return;
    case 'queued':
      send(res, 202, {
        success: true,
        data: { releases: outcome.releases.map((release) => ({ id: release.id, targetId: release.targetId })) },
      });
  }
}

async function handlePush(trigger: PushTrigger, req: IncomingMessage, res: ServerResponse) {
  try {
    const body = await readBody(req);
    const outcome = trigger.handle({
      event: header(req, 'x-github-event'),
      deliveryId: header(req, 'x-github-delivery'),
      signature: header(req, 'x-hub-signature-256'),
      body,
    });
    respond(res, outcome);
  } catch (error) {
    if (error instanceof PayloadTooLargeError) {
      send(res, 413, { success: false, error: error.message });
      return;
    }
    const status = error instanceof PushgateError ? STATUS_BY_CODE[error.code] ?? 500 : 500;
    if (status === 500) {
      triggerLogger.error({ err: error }, 'Push delivery failed');
    } else {
      triggerLogger.warn({ status, reason: errorMessage(error) }, 'Push delivery rejected');
    }
    send(res, status, { success: false, error: errorMessage(error) });
  }
}

/**
 * HTTP request listener for CI push events. Socket.IO handles its own path on the
 * same server; everything else lands here.
 */
export default function webhook(trigger: PushTrigger) {
  return (req: IncomingMessage, res: ServerResponse) => {
    const pathname = (req.url ?? '/').split('?')[0];
    if (pathname !== WEBHOOK_PATH) {
      send(res, 404, { success: false, error: 'Not found' });
      return;
    }
    if (req.method !== 'POST') {
      res.setHeader('Allow', 'POST');
      send(res, 405, { success: false, error: 'Method not allowed' });
      return;
    }
    handlePush(trigger, req, res).catch((error: unknown) => {
      triggerLogger.error({ err: error }, 'Push handler crashed');
      if (!res.headersSent) send(res, 500, { success: false, error: 'Internal error' });
    });
  };
}
