import bcrypt from 'bcryptjs';
import type { Socket } from 'socket.io';
import { z } from 'zod';
import { ValidationError } from './errors';
import type { DbHelpers } from './db';
import type { PublicUser } from './models';

export const MIN_PASSWORD_LENGTH = 8;

const SessionUser = z.object({
  id: z.number(),
  username: z.string(),
  role: z.string(),
  created_at: z.string(),
  last_login: z.string().nullable().optional(),
});

export class AuthError extends Error {
  readonly data = { code: 'auth/401' };

  constructor() {
    super('Unauthorized User.');
    this.name = 'AuthError';
  }
}

/**
 * Check operator credentials. Returns the user without its hash, or null.
 */
export function verifyCredentials(db: DbHelpers, username: unknown, password: unknown): PublicUser | null {
  if (typeof username !== 'string' || typeof password !== 'string' || !username || !password) {
    return null;
  }
  const user = db.getUserByUsername(username);
  if (!user || !bcrypt.compareSync(password, user.password_hash)) {
    return null;
  }
  db.updateUserLastLogin(user.id);
  const { password_hash: _hash, ...publicUser } = user;
  return publicUser;
}

/** The operator a socket authenticated as */
export function currentUser(socket: Socket): PublicUser | null {
  const result = SessionUser.safeParse(socket.data.user);
  return result.success ? result.data : null;
}

export function changePassword(db: DbHelpers, userId: number, currentPassword: string, newPassword: string): void {
  if (newPassword.length < MIN_PASSWORD_LENGTH) {
    throw new ValidationError(`New password must be at least ${MIN_PASSWORD_LENGTH} characters long`);
  }
  const user = db.getUserWithPassword(userId);
  if (!user) {
    throw new ValidationError('User not found');
  }
  if (!bcrypt.compareSync(currentPassword, user.password_hash)) {
    throw new ValidationError('Current password is incorrect');
  }
  db.updatePassword(userId, bcrypt.hashSync(newPassword, 10));
}
