/**
 * =============================================================================
 * AUTH SERVICE - Tests
 * =============================================================================
 */

import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { AuthService } from '../modules/auth/auth.service';
import { UserService } from '../modules/user/user.service';
import { DatabaseService } from '../shared/database/db';
import {
  AuthenticationError,
  ConflictError,
  ErrorCode,
  ValidationError
} from '../shared/types/error.types';

const REGISTRATION = {
  name: 'Sam Shipper',
  email: 'Sam@Example.com',
  password: 'placeholder-pass',
  role: 'shipper',
  company: 'Acme Freight'
};

describe('AuthService', () => {
  let users: UserService;
  let auth: AuthService;

  beforeEach(() => {
    users = new UserService(new DatabaseService({ filePath: null }));
    auth = new AuthService(users);
  });

  describe('register', () => {
    it('creates the account and returns a session', async () => {
      const session = await auth.register(REGISTRATION);

      expect(session.user).toMatchObject({
        name: 'Sam Shipper',
        email: 'sam@example.com',
        role: 'shipper',
        company: 'Acme Freight'
      });
      expect(session.user).not.toHaveProperty('passwordHash');
      expect(session.expiresIn).toBe(7 * 24 * 60 * 60);
      expect(auth.verifyToken(session.accessToken)).toEqual({
        userId: session.user.id,
        role: 'shipper'
      });
    });

    it('stores a bcrypt hash, never the password', async () => {
      await auth.register(REGISTRATION);
      const record = users.findByEmailWithHash('sam@example.com');

      expect(record?.passwordHash).toBeDefined();
      expect(record?.passwordHash).not.toBe('placeholder-pass');
      expect(record?.passwordHash.startsWith('$2')).toBe(true);
    });

    it('defaults the role to shipper', async () => {
      const { role: _role, ...withoutRole } = REGISTRATION;
      const session = await auth.register(withoutRole);
      expect(session.user.role).toBe('shipper');
    });

    it('refuses a duplicate email regardless of case', async () => {
      await auth.register(REGISTRATION);
      await expect(auth.register({ ...REGISTRATION, email: 'SAM@example.COM' })).rejects.toThrow(ConflictError);
    });

    it.each([
      ['a short password', { ...REGISTRATION, password: '12345' }],
      ['a malformed email', { ...REGISTRATION, email: 'not-an-email' }],
      ['the admin role', { ...REGISTRATION, role: 'admin' }],
      ['unknown fields', { ...REGISTRATION, isAdmin: true }]
    ])('rejects %s', async (_label, input) => {
      await expect(auth.register(input)).rejects.toThrow(ValidationError);
    });
  });

  describe('login', () => {
    beforeEach(async () => {
      await auth.register({ ...REGISTRATION, role: 'trucker' });
    });

    it('returns a session for valid credentials', async () => {
      const session = await auth.login({ email: 'sam@example.com', password: 'placeholder-pass' });
      expect(auth.verifyToken(session.accessToken).role).toBe('trucker');
    });

    it('gives the same error for a wrong password and an unknown email', async () => {
      await expect(auth.login({ email: 'sam@example.com', password: 'wrong' })).rejects.toMatchObject({
        code: ErrorCode.INVALID_CREDENTIALS,
        message: 'Invalid email or password'
      });
      await expect(auth.login({ email: 'nobody@example.com', password: 'placeholder-pass' })).rejects.toMatchObject({
        code: ErrorCode.INVALID_CREDENTIALS,
        message: 'Invalid email or password'
      });
    });

    it('runs a hash comparison even when no account matches', async () => {
      const compare = jest.spyOn(bcrypt, 'compare');
      try {
        await expect(auth.login({ email: 'nobody@example.com', password: 'placeholder-pass' }))
          .rejects.toBeInstanceOf(AuthenticationError);
        expect(compare).toHaveBeenCalledTimes(1);
      } finally {
        compare.mockRestore();
      }
    });
  });

  describe('verifyToken', () => {
    it('rejects a token signed with another secret', () => {
      const forged = jwt.sign({ userId: '00000000-0000-4000-8000-000000000000', role: 'admin' }, 'other-secret');
      expect(() => auth.verifyToken(forged)).toThrow(AuthenticationError);
    });

    it('reports an expired token', () => {
      const expired = jwt.sign(
        { userId: '00000000-0000-4000-8000-000000000000', role: 'trucker' },
        'test-secret',
        { expiresIn: -10 }
      );

      try {
        auth.verifyToken(expired);
        throw new Error('expected verifyToken to throw');
      } catch (error) {
        expect(error).toBeInstanceOf(AuthenticationError);
        expect(error).toMatchObject({ code: ErrorCode.TOKEN_EXPIRED });
      }
    });

    it('rejects a valid signature over unexpected claims', () => {
      const odd = jwt.sign({ userId: 'not-a-uuid', role: 'dispatcher' }, 'test-secret');
      expect(() => auth.verifyToken(odd)).toThrow(AuthenticationError);
    });
  });

  describe('ensureAdmin', () => {
    it('creates the configured admin once', async () => {
      const created = await auth.ensureAdmin();
      expect(created).toMatchObject({ email: 'admin@example.com', role: 'admin' });

      await expect(auth.ensureAdmin()).resolves.toBeNull();

      const session = await auth.login({ email: 'admin@example.com', password: 'test-admin-password' });
      expect(session.user.role).toBe('admin');
    });
  });
});
