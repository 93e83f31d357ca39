import { describe, it, expect, beforeEach } from 'vitest';
import bcrypt from 'bcryptjs';
import { createDatabase, createDbHelpers, type DbHelpers } from './db';
import { AuthError, changePassword, verifyCredentials } from './auth';
import { ValidationError } from './errors';

describe('auth', () => {
  let db: DbHelpers;

  beforeEach(() => {
    db = createDbHelpers(createDatabase(':memory:'));
    db.ensureAdmin('admin', 'test-password');
  });

  describe('verifyCredentials', () => {
    it('returns the operator without the hash and records the login', () => {
      const operator = verifyCredentials(db, 'admin', 'test-password');

      expect(operator).toMatchObject({ username: 'admin', role: 'admin' });
      expect(operator).not.toHaveProperty('password_hash');
      expect(typeof db.getUserByUsername('admin')?.last_login).toBe('string');
    });

    it('rejects a wrong password or an unknown user', () => {
      expect(verifyCredentials(db, 'admin', 'wrong-password')).toBeNull();
      expect(verifyCredentials(db, 'nobody', 'test-password')).toBeNull();
    });

    it('rejects credentials that are missing or not strings', () => {
      expect(verifyCredentials(db, undefined, 'test-password')).toBeNull();
      expect(verifyCredentials(db, 'admin', '')).toBeNull();
      expect(verifyCredentials(db, 'admin', 42)).toBeNull();
    });
  });

  describe('changePassword', () => {
    const adminId = () => {
      const user = db.getUserByUsername('admin');
      if (!user) throw new Error('admin missing');
      return user.id;
    };

    it('stores a new hash', () => {
      changePassword(db, adminId(), 'test-password', 'new-test-password');

      const user = db.getUserWithPassword(adminId());
      expect(user && bcrypt.compareSync('new-test-password', user.password_hash)).toBe(true);
      expect(verifyCredentials(db, 'admin', 'test-password')).toBeNull();
    });

    it('requires the current password', () => {
      expect(() => changePassword(db, adminId(), 'wrong-password', 'new-test-password'))
        .toThrow('Current password is incorrect');
    });

    it('refuses a short password', () => {
      expect(() => changePassword(db, adminId(), 'test-password', 'short'))
        .toThrow(new ValidationError('New password must be at least 8 characters long'));
    });

    it('refuses an unknown user', () => {
      expect(() => changePassword(db, 999, 'test-password', 'new-test-password')).toThrow('User not found');
    });
  });

  it('signals an auth failure to Socket.IO clients', () => {
    const error = new AuthError();
    expect(error.message).toBe('Unauthorized User.');
    expect(error.data).toEqual({ code: 'auth/401' });
  });
});
