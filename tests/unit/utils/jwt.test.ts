/**
 * JWT Utilities Unit Tests
 *
 * @module tests/unit/utils/jwt.test
 */

import { describe, it, expect, vi } from 'vitest';
import jwt from 'jsonwebtoken';

import { durationToSeconds, type AuthConfig } from '../../../src/config/auth.js';
import { UserRole } from '../../../src/types/index.js';
import {
  extractTokenFromHeader,
  generateAccessToken,
  verifyAccessToken,
} from '../../../src/utils/jwt.js';

describe('JWT Utilities', () => {
  const testConfig: AuthConfig = {
    jwt: {
      secret: 'test-secret',
      expiresIn: '1h',
      algorithm: 'HS256',
      issuer: 'leave-test',
      audience: 'leave-test-api',
    },
    rateLimit: { maxRequests: 100, windowMs: 60000, message: 'Too many requests' },
    environment: 'test',
  };

  const subject = {
    userId: 'user-1',
    email: 'ada@example.com',
    role: UserRole.Employee,
    employeeId: 'emp-1',
  };

  describe('generateAccessToken / verifyAccessToken', () => {
    it('should round-trip the token subject', () => {
      const token = generateAccessToken(subject, { config: testConfig });
      const result = verifyAccessToken(token, { config: testConfig });

      expect(result.valid).toBe(true);
      expect(result.payload).toMatchObject({
        userId: 'user-1',
        email: 'ada@example.com',
        role: UserRole.Employee,
        employeeId: 'emp-1',
        type: 'access',
      });
    });

    it('should set an expiry from the configured duration', () => {
      const token = generateAccessToken(subject, { config: testConfig });
      const result = verifyAccessToken(token, { config: testConfig });

      expect(result.payload).toBeDefined();
      if (result.payload) {
        expect(result.payload.exp - result.payload.iat).toBe(3600);
      }
    });

    it('should reject a token signed with another secret', () => {
      const token = generateAccessToken(subject, {
        config: { ...testConfig, jwt: { ...testConfig.jwt, secret: 'other-secret' } },
      });

      const result = verifyAccessToken(token, { config: testConfig });

      expect(result.valid).toBe(false);
      expect(result.errorCode).toBe('MALFORMED');
    });

    it('should reject a token for another audience', () => {
      const token = generateAccessToken(subject, {
        config: { ...testConfig, jwt: { ...testConfig.jwt, audience: 'someone-else' } },
      });

      expect(verifyAccessToken(token, { config: testConfig }).valid).toBe(false);
    });

    it('should report an expired token', () => {
      vi.useFakeTimers();
      vi.setSystemTime(new Date('2024-06-01T08:00:00Z'));
      const token = generateAccessToken(subject, { config: testConfig });

      vi.setSystemTime(new Date('2024-06-01T09:00:01Z'));
      const result = verifyAccessToken(token, { config: testConfig });

      expect(result.valid).toBe(false);
      expect(result.errorCode).toBe('EXPIRED');
      expect(result.expired).toBe(true);
    });

    it('should reject a signed payload without an employee id', () => {
      const token = jwt.sign(
        { userId: 'user-1', email: 'ada@example.com', role: UserRole.Employee, type: 'access' },
        testConfig.jwt.secret,
        { expiresIn: 60, issuer: testConfig.jwt.issuer, audience: testConfig.jwt.audience }
      );

      const result = verifyAccessToken(token, { config: testConfig });

      expect(result.valid).toBe(false);
      expect(result.errorCode).toBe('MALFORMED');
      expect(result.error).toBe('Invalid token payload structure');
    });

    it('should reject garbage', () => {
      expect(verifyAccessToken('not-a-token', { config: testConfig }).valid).toBe(false);
    });
  });

  describe('extractTokenFromHeader', () => {
    it('should extract a bearer token', () => {
      expect(extractTokenFromHeader('Bearer abc.def.ghi')).toBe('abc.def.ghi');
    });

    it('should reject other schemes and malformed headers', () => {
      expect(extractTokenFromHeader('Basic abc')).toBeNull();
      expect(extractTokenFromHeader('Bearer')).toBeNull();
      expect(extractTokenFromHeader('Bearer a b')).toBeNull();
      expect(extractTokenFromHeader(undefined)).toBeNull();
    });
  });

  describe('durationToSeconds', () => {
    it('should convert durations to seconds', () => {
      expect(durationToSeconds('15m')).toBe(900);
      expect(durationToSeconds('1h')).toBe(3600);
      expect(durationToSeconds('7d')).toBe(604800);
      expect(durationToSeconds('30s')).toBe(30);
    });

    it('should round sub-second durations up to one second', () => {
      expect(durationToSeconds('500ms')).toBe(1);
    });

    it('should return null for anything else', () => {
      expect(durationToSeconds('1.5h')).toBeNull();
      expect(durationToSeconds('forever')).toBeNull();
      expect(durationToSeconds('')).toBeNull();
    });
  });
});
