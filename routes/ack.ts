import type { z } from 'zod';
import { ValidationError, errorMessage } from '../lib/errors';
import { socketLogger } from '../lib/logger';

export type Ack =
  | { success: true; data?: unknown; message?: string }
  | { success: false; error: string };

export type AckCallback = (response: Ack) => void;

export type AckHandler = (data: unknown, callback?: AckCallback) => Promise<void>;

export interface AckResult {
  data?: unknown;
  message?: string;
}

export function parseInput<S extends z.ZodTypeAny>(schema: S, data: unknown): z.output<S> {
  const result = schema.safeParse(data ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'input'}: ${issue.message}`);
    throw new ValidationError(issues.join('; '), { issues });
  }
  return result.data;
}

/**
 * Wrap an event handler: validate the payload, run it and acknowledge
 * `{ success, data | error }`. Handlers never throw back into Socket.IO.
 */
export function withAck<S extends z.ZodTypeAny>(
  event: string,
  schema: S,
  fn: (input: z.output<S>) => Promise<AckResult> | AckResult,
): AckHandler {
  return async (data, callback) => {
    const reply: AckCallback = callback ?? (() => undefined);
    try {
      const input = parseInput(schema, data);
      const result = await fn(input);
      reply({ success: true, ...result });
    } catch (error) {
      socketLogger.error({ err: error, event }, 'Socket event failed');
      reply({ success: false, error: errorMessage(error) });
    }
  };
}
