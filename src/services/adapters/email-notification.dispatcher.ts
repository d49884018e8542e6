/**
 * Email channel of the notification dispatcher
 *
 * @module services/adapters/email-notification
 */

import { AdapterError } from '../../types/errors.js';
import type { MessageTemplate } from '../../types/leave.js';
import { digestIdempotencyKey } from '../../utils/idempotency.js';
import type { EmailService } from '../email.service.js';
import { renderMessage } from './messages.js';
import type { MessageContext, NotificationDispatcher } from './types.js';

export class EmailNotificationDispatcher implements NotificationDispatcher {
  readonly channel = 'email';

  constructor(private readonly emailService: EmailService) {}

  async send(
    recipientId: string,
    template: MessageTemplate,
    context: MessageContext,
    idempotencyKey: string
  ): Promise<string> {
    const message = renderMessage(template, context);

    // A stable Message-ID lets receiving servers drop a duplicate delivered by a retry
    const messageId = `<${digestIdempotencyKey(idempotencyKey).slice(0, 32)}@${this.emailService.messageIdDomain}>`;

    const result = await this.emailService.sendEmail({
      to: context.recipient.email,
      subject: message.subject,
      text: message.text,
      messageId,
    });

    if (!result.success) {
      const error = `Email to ${recipientId} failed: ${result.error ?? 'unknown error'}`;
      throw result.transient ? AdapterError.transient(error) : AdapterError.permanent(error);
    }

    return result.messageId ?? messageId;
  }
}
