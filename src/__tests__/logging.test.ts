/**
 * =============================================================================
 * LOG REDACTION - Tests
 * =============================================================================
 */

import { maskQueryParams } from '../shared/middleware/request-logger.middleware';
import { sanitizeLogData } from '../shared/services/logger.service';

describe('sanitizeLogData', () => {
  it('redacts credentials at any depth', () => {
    expect(sanitizeLogData({
      email: 'sam@example.com',
      password: 'placeholder-pass',
      user: { id: 'u1', passwordHash: 'hash' },
      headers: { Authorization: 'Bearer abc' },
      tags: ['a', 'b']
    })).toEqual({
      email: 'sam@example.com',
      password: '[REDACTED]',
      user: { id: 'u1', passwordHash: '[REDACTED]' },
      headers: { Authorization: '[REDACTED]' },
      tags: ['a', 'b']
    });
  });

  it('redacts records inside arrays', () => {
    expect(sanitizeLogData({
      users: [{ id: 'u1', passwordHash: 'hash' }, 'plain']
    })).toEqual({
      users: [{ id: 'u1', passwordHash: '[REDACTED]' }, 'plain']
    });
  });
});

describe('maskQueryParams', () => {
  it('masks sensitive query keys only', () => {
    expect(maskQueryParams({ origin: 'Chicago', accessToken: 'abc', apiKey: 'xyz' })).toEqual({
      origin: 'Chicago',
      accessToken: '[MASKED]',
      apiKey: '[MASKED]'
    });
  });
});
