/**
 * Fans a notification out to every configured channel
 *
 * @module services/adapters/composite-notification
 */

import { AdapterError, toAdapterError } from '../../types/errors.js';
import type { MessageTemplate } from '../../types/leave.js';
import type { MessageContext, NotificationDispatcher } from './types.js';

/**
 * Delivered when at least one channel delivered. Otherwise the failure is
 * transient if any channel failed transiently, permanent if all failed for
 * good.
 */
export class CompositeNotificationDispatcher implements NotificationDispatcher {
  readonly channel: string;

  constructor(private readonly dispatchers: readonly NotificationDispatcher[]) {
    this.channel = dispatchers.map((d) => d.channel).join('+');
  }

  async send(
    recipientId: string,
    template: MessageTemplate,
    context: MessageContext,
    idempotencyKey: string
  ): Promise<string> {
    const delivered: string[] = [];
    const failures: AdapterError[] = [];

    for (const dispatcher of this.dispatchers) {
      try {
        const id = await dispatcher.send(recipientId, template, context, idempotencyKey);
        delivered.push(`${dispatcher.channel}:${id}`);
      } catch (error) {
        const failure = toAdapterError(error);
        console.warn('[NOTIFICATIONS] Channel failed:', {
          channel: dispatcher.channel,
          recipientId,
          template,
          kind: failure.kind,
          error: failure.message,
        });
        failures.push(failure);
      }
    }

    if (delivered.length > 0) {
      return delivered.join(';');
    }

    const message = failures.map((f) => f.message).join('; ') || 'No notification channel configured';
    throw failures.some((f) => f.kind === 'transient')
      ? AdapterError.transient(message)
      : AdapterError.permanent(message);
  }
}
