import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createDatabase, createDbHelpers, type DbHelpers } from '../lib/db';
import { invoke } from '../lib/testing';
import { userHandlers } from './user';
import type { Ack } from './ack';

describe('user events', () => {
  let db: DbHelpers;

  beforeEach(() => {
    vi.useFakeTimers();
    db = createDbHelpers(createDatabase(':memory:'));
    db.ensureAdmin('admin', 'test-password');
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  const session = () => {
    const user = db.getUserByUsername('admin');
    if (!user) return null;
    const { password_hash: _hash, ...publicUser } = user;
    return publicUser;
  };

  it('returns the signed-in operator', async () => {
    const handlers = userHandlers({ db }, session, () => undefined);

    const ack = await invoke<Ack>(handlers['user:get']);

    expect(ack).toMatchObject({ success: true, data: { user: { username: 'admin', role: 'admin' } } });
  });

  it('disconnects the socket after a password change', async () => {
    const disconnect = vi.fn();
    const handlers = userHandlers({ db }, session, disconnect);

    const ack = await invoke<Ack>(handlers['user:change-password'], {
      currentPassword: 'test-password',
      newPassword: 'new-test-password',
    });

    expect(ack).toEqual({
      success: true,
      message: 'Password changed successfully. You will be disconnected for security.',
    });
    expect(disconnect).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1000);
    expect(disconnect).toHaveBeenCalledTimes(1);
  });

  it('rejects a session without an operator', async () => {
    const handlers = userHandlers({ db }, () => null, () => undefined);

    await expect(invoke<Ack>(handlers['user:get'])).resolves.toEqual({ success: false, error: 'User not found' });
  });
});
