/**
 * =============================================================================
 * AUTH MODULE - SERVICE
 * =============================================================================
 *
 * Email/password registration and login. Issues JWT access tokens that
 * carry the (userId, role) identity every other module trusts.
 *
 * SECURITY:
 * - Passwords hashed with bcrypt
 * - Same error for unknown email and wrong password
 * - Tokens are verified and their claims schema-checked on every request
 * =============================================================================
 */

import bcrypt from 'bcryptjs';
import jwt from 'jsonwebtoken';
import { config } from '../../config/environment';
import { logger } from '../../shared/services/logger.service';
import { AuthenticationError, ErrorCode } from '../../shared/types/error.types';
import type { Actor } from '../../shared/types/api.types';
import { validateSchema } from '../../shared/utils/validation.utils';
import { PublicUser, toPublicUser, userService, UserService } from '../user/user.service';
import { loginSchema, registerSchema, tokenPayloadSchema } from './auth.schema';

export interface AuthSession {
  accessToken: string;
  expiresIn: number;
  user: PublicUser;
}

export class AuthService {
  /** Compared against when no account matches, so both failures cost a hash */
  private decoyHash: Promise<string> | null = null;

  constructor(private readonly users: UserService) {}

  async register(input: unknown): Promise<AuthSession> {
    const data = validateSchema(registerSchema, input);
    const { password, ...profile } = data;

    const passwordHash = await bcrypt.hash(password, config.bcryptRounds);
    const user = this.users.createUser({ ...profile, passwordHash });

    logger.info(`User registered: ${user.id}`, { role: user.role });
    return this.issueSession(user);
  }

  async login(input: unknown): Promise<AuthSession> {
    const { email, password } = validateSchema(loginSchema, input);
    const record = this.users.findByEmailWithHash(email);

    const valid = await bcrypt.compare(password, record ? record.passwordHash : await this.getDecoyHash());
    if (!record || !valid) {
      logger.warn('Failed login attempt', { email });
      throw new AuthenticationError('Invalid email or password', ErrorCode.INVALID_CREDENTIALS);
    }

    logger.info(`User logged in: ${record.id}`);
    return this.issueSession(toPublicUser(record));
  }

  /**
   * Decode a bearer token into the request identity
   */
  verifyToken(token: string): Actor {
    let decoded: unknown;
    try {
      decoded = jwt.verify(token, config.jwt.secret);
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw new AuthenticationError('Token has expired', ErrorCode.TOKEN_EXPIRED);
      }
      throw new AuthenticationError('Invalid token', ErrorCode.INVALID_TOKEN);
    }

    const claims = tokenPayloadSchema.safeParse(decoded);
    if (!claims.success) {
      throw new AuthenticationError('Invalid token', ErrorCode.INVALID_TOKEN);
    }
    return { userId: claims.data.userId, role: claims.data.role };
  }

  /**
   * Create the configured administrator on first start
   */
  async ensureAdmin(): Promise<PublicUser | null> {
    if (this.users.findByEmailWithHash(config.admin.email)) {
      return null;
    }

    const passwordHash = await bcrypt.hash(config.admin.password, config.bcryptRounds);
    const admin = this.users.createUser({
      role: 'admin',
      name: config.admin.name,
      email: config.admin.email,
      passwordHash
    });
    logger.info(`Admin account created: ${admin.email}`);
    return admin;
  }

  private getDecoyHash(): Promise<string> {
    if (!this.decoyHash) {
      this.decoyHash = bcrypt.hash('no-such-account', config.bcryptRounds);
    }
    return this.decoyHash;
  }

  private issueSession(user: PublicUser): AuthSession {
    const accessToken = jwt.sign(
      { userId: user.id, role: user.role },
      config.jwt.secret,
      { expiresIn: config.jwt.expiresInSeconds }
    );
    return { accessToken, expiresIn: config.jwt.expiresInSeconds, user };
  }
}

export const authService = new AuthService(userService);
