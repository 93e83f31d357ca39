import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { parseInput, withAck, type Ack } from './ack';
import { ValidationError } from '../lib/errors';
import { invoke } from '../lib/testing';

const Input = z.object({ targetId: z.coerce.number().int().positive() });

describe('parseInput', () => {
  it('coerces valid input', () => {
    expect(parseInput(Input, { targetId: '4' })).toEqual({ targetId: 4 });
  });

  it('names every invalid field', () => {
    expect(() => parseInput(Input, { targetId: -1 })).toThrow(
      new ValidationError('targetId: Number must be greater than 0'),
    );
  });

  it('treats a missing payload as an empty object', () => {
    expect(parseInput(z.object({}), undefined)).toEqual({});
  });
});

describe('withAck', () => {
  it('acknowledges the result', async () => {
    const handler = withAck('test:echo', Input, ({ targetId }) => ({ data: { targetId }, message: 'ok' }));

    await expect(invoke<Ack>(handler, { targetId: 2 })).resolves.toEqual({
      success: true,
      data: { targetId: 2 },
      message: 'ok',
    });
  });

  it('acknowledges a thrown error instead of raising it', async () => {
    const handler = withAck('test:fail', Input, async () => {
      throw new Error('host unreachable');
    });

    await expect(invoke<Ack>(handler, { targetId: 2 })).resolves.toEqual({ success: false, error: 'host unreachable' });
  });

  it('acknowledges invalid input without calling the handler', async () => {
    let called = false;
    const handler = withAck('test:echo', Input, () => {
      called = true;
      return {};
    });

    await expect(invoke<Ack>(handler, {})).resolves.toEqual({ success: false, error: 'targetId: Expected number, received nan' });
    expect(called).toBe(false);
  });

  it('tolerates a client that did not ask for an acknowledgement', async () => {
    const handler = withAck('test:echo', Input, () => ({}));
    await expect(handler({ targetId: 1 })).resolves.toBeUndefined();
  });
});
