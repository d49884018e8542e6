/**
 * WhatsApp channel of the notification dispatcher, sent through the Twilio
 * Messages REST API. Long messages are split into chunks Twilio accepts.
 *
 * @module services/adapters/whatsapp-notification
 */

import axios, { type AxiosInstance } from 'axios';

import type { TwilioWhatsAppConfig } from '../../config/integrations.js';
import { AdapterError } from '../../types/errors.js';
import type { MessageTemplate } from '../../types/leave.js';
import { classifyFailure, isRecord } from './failures.js';
import { renderMessage } from './messages.js';
import type { MessageContext, NotificationDispatcher } from './types.js';

export const WHATSAPP_CHUNK_SIZE = 1500;

/**
 * Split text into chunks of at most `size` characters, preferring line
 * breaks, then spaces, as split points
 *
 * @example
 * splitMessage('first line\nsecond line', 12); // ['first line', 'second line']
 */
export function splitMessage(text: string, size: number = WHATSAPP_CHUNK_SIZE): string[] {
  const chunks: string[] = [];
  let rest = text.trim();

  while (rest.length > size) {
    const window = rest.slice(0, size + 1);
    let cut = window.lastIndexOf('\n');
    if (cut <= 0) {
      cut = window.lastIndexOf(' ');
    }
    if (cut <= 0) {
      cut = size;
    }
    chunks.push(rest.slice(0, cut).trimEnd());
    rest = rest.slice(cut).trimStart();
  }

  if (rest.length > 0) {
    chunks.push(rest);
  }
  return chunks;
}

export interface WhatsAppDispatcherOptions {
  readonly timeoutMs: number;

  /**
   * HTTP client; defaults to one bound to the Twilio API base URL
   */
  readonly http?: AxiosInstance;
}

export class WhatsAppNotificationDispatcher implements NotificationDispatcher {
  readonly channel = 'whatsapp';
  private readonly http: AxiosInstance;

  constructor(
    private readonly config: TwilioWhatsAppConfig,
    options: WhatsAppDispatcherOptions
  ) {
    this.http = options.http ?? axios.create({ baseURL: config.baseUrl, timeout: options.timeoutMs });
  }

  async send(
    recipientId: string,
    template: MessageTemplate,
    context: MessageContext,
    idempotencyKey: string
  ): Promise<string> {
    const phone = context.recipient.phone;
    if (!phone) {
      throw AdapterError.permanent(`Employee ${recipientId} has no phone number for WhatsApp`);
    }

    const message = renderMessage(template, context);
    const sids: string[] = [];

    for (const chunk of splitMessage(`*${message.subject}*\n\n${message.text}`)) {
      sids.push(await this.sendChunk(phone, chunk));
    }

    console.log('[WHATSAPP] Message sent:', {
      recipientId,
      template,
      idempotencyKey,
      chunks: sids.length,
    });

    return sids.join(',');
  }

  private async sendChunk(phone: string, body: string): Promise<string> {
    try {
      const response = await this.http.post<unknown>(
        `/Accounts/${encodeURIComponent(this.config.accountSid)}/Messages.json`,
        new URLSearchParams({
          From: `whatsapp:${this.config.fromNumber}`,
          To: `whatsapp:${phone}`,
          Body: body,
        }),
        { auth: { username: this.config.accountSid, password: this.config.authToken } }
      );
      return isRecord(response.data) && typeof response.data.sid === 'string' ? response.data.sid : 'unknown';
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      throw classifyFailure(error, 'WhatsApp send', status);
    }
  }
}
