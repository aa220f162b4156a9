/**
 * =============================================================================
 * USER MODULE - SERVICE
 * =============================================================================
 *
 * User records. The password hash never leaves this module: everything
 * returned to callers is a PublicUser.
 * =============================================================================
 */

import { v4 as uuid } from 'uuid';
import { db, DatabaseService, UserRecord } from '../../shared/database/db';
import { ConflictError, NotFoundError } from '../../shared/types/error.types';
import type { UserRole } from '../../shared/types/api.types';

export type PublicUser = Omit<UserRecord, 'passwordHash'>;

export interface NewUser {
  role: UserRole;
  name: string;
  email: string;
  passwordHash: string;
  company?: string;
  phone?: string;
  mcNumber?: string;
}

export function toPublicUser(user: UserRecord): PublicUser {
  const { passwordHash: _passwordHash, ...rest } = user;
  return rest;
}

export class UserService {
  constructor(private readonly db: DatabaseService) {}

  createUser(user: NewUser): PublicUser {
    const email = user.email.trim().toLowerCase();
    const now = new Date().toISOString();

    const created = this.db.transaction(tx => {
      if (tx.users.some(u => u.email === email)) {
        throw new ConflictError('Email already registered');
      }
      const record: UserRecord = {
        ...user,
        id: uuid(),
        email,
        createdAt: now,
        updatedAt: now
      };
      tx.users.push(record);
      return record;
    });

    return toPublicUser(created);
  }

  /**
   * Full record including the hash, for credential checks only
   */
  findByEmailWithHash(email: string): UserRecord | undefined {
    const normalized = email.trim().toLowerCase();
    return this.db.read(tables => tables.users.find(u => u.email === normalized));
  }

  getProfile(userId: string): PublicUser {
    const user = this.db.read(tables => tables.users.find(u => u.id === userId));
    if (!user) {
      throw new NotFoundError('User');
    }
    return toPublicUser(user);
  }

  listRecent(limit: number): PublicUser[] {
    return this.db
      .read(tables => [...tables.users])
      .reverse()
      .sort((a, b) => b.createdAt.localeCompare(a.createdAt))
      .slice(0, limit)
      .map(toPublicUser);
  }
}

export const userService = new UserService(db);
