/**
 * =============================================================================
 * ENVIRONMENT CONFIGURATION
 * =============================================================================
 *
 * Centralized configuration loaded from environment variables.
 * All config access goes through this file - no direct process.env usage elsewhere.
 *
 * SECURITY:
 * - No secrets are logged or exposed in error messages
 * - Production requires a proper JWT secret and admin password
 * - Development uses auto-generated secrets if not provided
 *
 * FOR BACKEND DEVELOPERS:
 * - Add new config here, not scattered across the codebase
 * - Use getRequired() for mandatory production values
 * - Use getOptional() for values with sensible defaults
 * =============================================================================
 */

import dotenv from 'dotenv';
import { randomBytes } from 'crypto';

// Load .env file
dotenv.config();

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

const nodeEnv = process.env.NODE_ENV || 'development';

/**
 * Get required environment variable (throws if missing in production)
 */
function getRequired(key: string, devDefault?: string): string {
  const value = process.env[key];

  if (value && value.trim() !== '') {
    return value;
  }

  if (nodeEnv !== 'production') {
    if (devDefault) {
      return devDefault;
    }
    // Auto-generate secure secret outside production
    if (nodeEnv !== 'test') {
      console.warn(`⚠️  [CONFIG] ${key} not set, auto-generated for development`);
    }
    return randomBytes(32).toString('hex');
  }

  throw new Error(
    `❌ FATAL: ${key} is required in production!\n` +
    `   Set it in your environment variables or .env file.`
  );
}

/**
 * Get optional environment variable with default
 */
function getOptional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/**
 * Get boolean environment variable
 */
function getBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Get number environment variable
 */
function getNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse CORS origins from comma-separated string
 */
function parseCorsOrigins(value: string): string | string[] {
  if (value === '*') return '*';
  return value.split(',').map(origin => origin.trim()).filter(Boolean);
}

/**
 * Data file location. Under test the store stays in memory unless
 * DATA_FILE is set explicitly.
 */
function resolveDataFile(): string | null {
  const explicit = process.env.DATA_FILE;
  if (explicit && explicit.trim() !== '') return explicit;
  return nodeEnv === 'test' ? null : './data/loadboard.json';
}

// =============================================================================
// CONFIGURATION OBJECT
// =============================================================================

/**
 * Application configuration object
 * All configuration is validated at startup
 */
export const config = {
  // Server
  nodeEnv,
  port: getNumber('PORT', 3000),
  host: getOptional('HOST', '0.0.0.0'),

  // Database (JSON document store)
  database: {
    file: resolveDataFile(),
    saveDebounceMs: getNumber('DATA_SAVE_DEBOUNCE_MS', 100),
  },

  // JWT - SECURITY CRITICAL
  jwt: {
    secret: getRequired('JWT_SECRET'),
    expiresInSeconds: getNumber('JWT_EXPIRES_IN_SECONDS', 7 * 24 * 60 * 60),
  },

  // Password hashing
  bcryptRounds: getNumber('BCRYPT_ROUNDS', nodeEnv === 'test' ? 4 : 10),

  // Seeded administrator (created on first start)
  admin: {
    email: getOptional('ADMIN_EMAIL', 'admin@loadboard.local').toLowerCase(),
    password: getRequired('ADMIN_PASSWORD', nodeEnv === 'production' ? undefined : 'admin123'),
    name: getOptional('ADMIN_NAME', 'Administrator'),
  },

  // Rate Limiting
  rateLimit: {
    windowMs: getNumber('RATE_LIMIT_WINDOW_MS', 15 * 60 * 1000), // 15 minutes
    maxRequests: getNumber('RATE_LIMIT_MAX_REQUESTS', 300),
  },

  // Logging
  logLevel: getOptional('LOG_LEVEL', 'debug'),

  // CORS - Parsed into array for production
  cors: {
    origin: parseCorsOrigins(getOptional('CORS_ORIGIN', '*')),
  },

  // Helpers
  isProduction: nodeEnv === 'production',
  isTest: nodeEnv === 'test',

  // Security Features
  security: {
    enableRateLimiting: getBoolean('ENABLE_RATE_LIMITING', nodeEnv !== 'test'),
    enableRequestLogging: getBoolean('ENABLE_REQUEST_LOGGING', nodeEnv !== 'test'),
  },
} as const;

// =============================================================================
// STARTUP VALIDATION
// =============================================================================

/**
 * Validate configuration at startup
 * Fails fast if critical config is missing
 */
function validateConfig(): void {
  const warnings: string[] = [];
  const errors: string[] = [];

  if (config.isProduction) {
    if (config.cors.origin === '*') {
      warnings.push('CORS_ORIGIN is set to "*" - this should be restricted in production');
    }

    if (!config.security.enableRateLimiting) {
      warnings.push('ENABLE_RATE_LIMITING is false - API is open to abuse');
    }

    if (config.admin.password.length < 12) {
      errors.push('ADMIN_PASSWORD must be at least 12 characters in production');
    }

    if (!config.database.file) {
      errors.push('DATA_FILE is required in production - data would be lost on restart');
    }
  }

  if (warnings.length > 0) {
    console.warn('\n⚠️  Configuration Warnings:');
    warnings.forEach(w => console.warn(`   - ${w}`));
    console.warn('');
  }

  if (errors.length > 0) {
    throw new Error(`Configuration Errors:\n${errors.map(e => `  - ${e}`).join('\n')}`);
  }
}

// Run validation
validateConfig();
