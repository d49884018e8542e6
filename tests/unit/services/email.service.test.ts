/**
 * Email Service Unit Tests
 *
 * nodemailer is mocked; no SMTP connection is opened.
 *
 * @module tests/unit/services/email.service
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import nodemailer from 'nodemailer';

import type { EmailConfig } from '../../../src/config/email.js';
import { EmailService, isTransientMailError, type MailTransport } from '../../../src/services/email.service.js';

vi.mock('nodemailer');

describe('EmailService', () => {
  let transport: {
    sendMail: Mock;
    verify: Mock;
    close: Mock;
  };

  const config: EmailConfig = {
    host: 'smtp.test.com',
    port: 587,
    secure: false,
    auth: { user: 'mailer', pass: 'test-password' },
    from: 'Leave Desk <leave@example.com>',
    connectionTimeout: 10000,
    socketTimeout: 10000,
    enabled: true,
    environment: 'test',
  };

  const message = {
    to: 'ada@example.com',
    subject: 'Leave approved',
    text: 'Your annual leave was approved.',
    messageId: '<abc@example.com>',
  };

  beforeEach(() => {
    transport = {
      sendMail: vi.fn().mockResolvedValue({ messageId: '<abc@example.com>' }),
      verify: vi.fn().mockResolvedValue(true),
      close: vi.fn(),
    };
  });

  function serviceWith(overrides: Partial<EmailConfig> = {}, mailTransport: MailTransport = transport): EmailService {
    return new EmailService({ ...config, ...overrides }, mailTransport);
  }

  describe('sendEmail', () => {
    it('should send from the configured address with the given Message-ID', async () => {
      const result = await serviceWith().sendEmail(message);

      expect(result).toEqual({ success: true, messageId: '<abc@example.com>', transient: false });
      expect(transport.sendMail).toHaveBeenCalledWith({
        from: 'Leave Desk <leave@example.com>',
        to: 'ada@example.com',
        subject: 'Leave approved',
        text: 'Your annual leave was approved.',
        html: undefined,
        messageId: '<abc@example.com>',
      });
    });

    it('should skip sending when disabled', async () => {
      const result = await serviceWith({ enabled: false }).sendEmail(message);

      expect(result).toEqual({ success: false, error: 'Email service is disabled', transient: false });
      expect(transport.sendMail).not.toHaveBeenCalled();
    });

    it('should refuse an invalid recipient without retrying', async () => {
      const result = await serviceWith().sendEmail({ ...message, to: 'not-an-address' });

      expect(result).toEqual({
        success: false,
        error: 'Invalid recipient email address: not-an-address',
        transient: false,
      });
    });

    it('should refuse an overlong subject', async () => {
      const result = await serviceWith().sendEmail({ ...message, subject: 'x'.repeat(201) });

      expect(result.error).toBe('Email subject must be 200 characters or less');
    });

    it('should classify a 4xx SMTP reply as transient', async () => {
      transport.sendMail.mockRejectedValue(
        Object.assign(new Error('451 Temporary local problem'), { responseCode: 451 })
      );

      const result = await serviceWith().sendEmail(message);

      expect(result).toEqual({ success: false, error: '451 Temporary local problem', transient: true });
    });

    it('should classify a 5xx SMTP reply as permanent', async () => {
      transport.sendMail.mockRejectedValue(
        Object.assign(new Error('550 Mailbox unavailable'), { responseCode: 550 })
      );

      const result = await serviceWith().sendEmail(message);

      expect(result.transient).toBe(false);
    });
  });

  describe('transport', () => {
    it('should create the SMTP transport lazily, once', async () => {
      const createTransport = nodemailer.createTransport as unknown as Mock;
      createTransport.mockReturnValue(transport);
      const service = new EmailService(config);

      expect(createTransport).not.toHaveBeenCalled();

      await service.sendEmail(message);
      await service.sendEmail(message);

      expect(createTransport).toHaveBeenCalledTimes(1);
      expect(createTransport).toHaveBeenCalledWith({
        host: 'smtp.test.com',
        port: 587,
        secure: false,
        auth: { user: 'mailer', pass: 'test-password' },
        connectionTimeout: 10000,
        socketTimeout: 10000,
      });
    });

    it('should verify the connection', async () => {
      expect(await serviceWith().verifyConnection()).toBe(true);

      transport.verify.mockRejectedValue(new Error('ECONNREFUSED'));
      expect(await serviceWith().verifyConnection()).toBe(false);
    });

    it('should close the transport', () => {
      const service = serviceWith();

      service.close();

      expect(transport.close).toHaveBeenCalledTimes(1);
    });
  });

  describe('messageIdDomain', () => {
    it('should use the domain of the sender address', () => {
      expect(serviceWith().messageIdDomain).toBe('example.com');
      expect(serviceWith({ from: 'noreply@leave.test' }).messageIdDomain).toBe('leave.test');
    });
  });
});

describe('isTransientMailError', () => {
  it('should treat connection failures as transient', () => {
    expect(isTransientMailError(Object.assign(new Error('timeout'), { code: 'ETIMEDOUT' }))).toBe(true);
    expect(isTransientMailError('boom')).toBe(true);
  });

  it('should treat envelope and message errors as permanent', () => {
    expect(isTransientMailError(Object.assign(new Error('no recipients'), { code: 'EENVELOPE' }))).toBe(false);
    expect(isTransientMailError(Object.assign(new Error('bad message'), { code: 'EMESSAGE' }))).toBe(false);
  });
});
