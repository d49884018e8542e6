/**
 * Email Service Module
 *
 * Sends email through nodemailer's SMTP transport. A send is a single
 * attempt: retries belong to the side-effect executor, which needs to know
 * whether a failure is worth retrying, so failures are classified here.
 *
 * @module services/email
 */

import nodemailer, { type SendMailOptions } from 'nodemailer';

import { extractAddress, getEmailConfig, type EmailConfig } from '../config/email.js';

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

/**
 * Email sending options
 */
export interface EmailOptions {
  /**
   * Recipient email address
   */
  readonly to: string;

  /**
   * Email subject line
   */
  readonly subject: string;

  /**
   * Plain text email body
   */
  readonly text: string;

  /**
   * Optional HTML email body
   */
  readonly html?: string;

  /**
   * Message-ID header; the same id is sent on every retry of a message
   */
  readonly messageId?: string;
}

/**
 * Email sending result
 */
export interface EmailResult {
  /**
   * Whether email was sent successfully
   */
  readonly success: boolean;

  /**
   * Message ID from SMTP server (if successful)
   */
  readonly messageId?: string;

  /**
   * Error message (if failed)
   */
  readonly error?: string;

  /**
   * Whether a failed send may succeed when retried
   */
  readonly transient: boolean;
}

/**
 * The part of a nodemailer transporter the service uses
 */
export interface MailTransport {
  sendMail(mail: SendMailOptions): Promise<{ messageId: string }>;
  verify(): Promise<true>;
  close(): void;
}

/**
 * SMTP 4xx replies and connection-level failures are transient; 5xx replies
 * and envelope rejections are permanent.
 */
export function isTransientMailError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return true;
  }
  const fields = error as Record<string, unknown>;

  if (typeof fields.responseCode === 'number') {
    return fields.responseCode < 500;
  }
  return fields.code !== 'EENVELOPE' && fields.code !== 'EMESSAGE';
}

/**
 * Email Service Class
 */
export class EmailService {
  private transporter: MailTransport | null;
  private readonly config: EmailConfig;

  constructor(config: EmailConfig = getEmailConfig(), transporter?: MailTransport) {
    this.config = config;
    this.transporter = transporter ?? null;
  }

  get enabled(): boolean {
    return this.config.enabled;
  }

  /**
   * Domain used for generated Message-IDs
   */
  get messageIdDomain(): string {
    return extractAddress(this.config.from)?.split('@')[1] ?? 'leave-orchestrator.local';
  }

  private getTransporter(): MailTransport {
    if (this.transporter) {
      return this.transporter;
    }

    console.log('[EMAIL_SERVICE] Initializing SMTP transport...', {
      host: this.config.host,
      port: this.config.port,
      secure: this.config.secure,
      hasAuth: !!this.config.auth,
    });

    this.transporter = nodemailer.createTransport({
      host: this.config.host,
      port: this.config.port,
      secure: this.config.secure,
      auth: this.config.auth,
      connectionTimeout: this.config.connectionTimeout,
      socketTimeout: this.config.socketTimeout,
    });

    console.log('[EMAIL_SERVICE] SMTP transport initialized successfully');
    return this.transporter;
  }

  /**
   * Send one email
   *
   * @example
   * const result = await emailService.sendEmail({
   *   to: 'employee@example.com',
   *   subject: 'Leave approved',
   *   text: 'Your annual leave was approved.',
   * });
   */
  async sendEmail(options: EmailOptions): Promise<EmailResult> {
    if (!this.config.enabled) {
      console.log('[EMAIL_SERVICE] Email service is disabled, skipping send:', {
        to: options.to,
        subject: options.subject,
      });
      return { success: false, error: 'Email service is disabled', transient: false };
    }

    const validationError = this.validateEmailOptions(options);
    if (validationError) {
      console.error('[EMAIL_SERVICE] Invalid email options:', {
        error: validationError,
        to: options.to,
        subject: options.subject,
      });
      return { success: false, error: validationError, transient: false };
    }

    try {
      const info = await this.getTransporter().sendMail({
        from: this.config.from,
        to: options.to,
        subject: options.subject,
        text: options.text,
        html: options.html,
        messageId: options.messageId,
      });

      console.log('[EMAIL_SERVICE] Email sent successfully:', {
        messageId: info.messageId,
        to: options.to,
        subject: options.subject,
      });

      return { success: true, messageId: info.messageId, transient: false };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const transient = isTransientMailError(error);

      console.error('[EMAIL_SERVICE] Failed to send email:', {
        error: message,
        transient,
        to: options.to,
        subject: options.subject,
      });

      return { success: false, error: message, transient };
    }
  }

  private validateEmailOptions(options: EmailOptions): string | null {
    if (!options.to || options.to.trim().length === 0) {
      return 'Recipient email address is required';
    }

    if (!EMAIL_PATTERN.test(options.to)) {
      return `Invalid recipient email address: ${options.to}`;
    }

    if (!options.subject || options.subject.trim().length === 0) {
      return 'Email subject is required';
    }

    if (options.subject.length > 200) {
      return 'Email subject must be 200 characters or less';
    }

    if (options.text.length === 0) {
      return 'Email body is required';
    }

    return null;
  }

  /**
   * Verify SMTP connection
   */
  async verifyConnection(): Promise<boolean> {
    if (!this.config.enabled) {
      console.log('[EMAIL_SERVICE] Email service is disabled, skipping connection verification');
      return false;
    }

    try {
      console.log('[EMAIL_SERVICE] Verifying SMTP connection...');
      await this.getTransporter().verify();
      console.log('[EMAIL_SERVICE] SMTP connection verified successfully');
      return true;
    } catch (error) {
      console.error('[EMAIL_SERVICE] SMTP connection verification failed:', {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  close(): void {
    if (this.transporter) {
      console.log('[EMAIL_SERVICE] Closing SMTP connection...');
      this.transporter.close();
      this.transporter = null;
      console.log('[EMAIL_SERVICE] SMTP connection closed');
    }
  }
}
