/**
 * Integrations Configuration Module
 *
 * Identifiers and credentials for the calendar, the leave-tracking
 * spreadsheet and the WhatsApp channel. An integration whose settings are
 * absent is disabled and its side effects are not scheduled.
 *
 * @module config/integrations
 */

import { parseInteger, parseOptionalString } from './env.js';

const TAG = 'INTEGRATIONS_CONFIG';

export interface GoogleCalendarConfig {
  readonly calendarId: string;
  readonly accessToken: string;
  readonly timeZone: string;
}

export interface GoogleSheetsConfig {
  readonly spreadsheetId: string;
  readonly sheetName: string;
  readonly accessToken: string;
}

export interface TwilioWhatsAppConfig {
  readonly accountSid: string;
  readonly authToken: string;

  /**
   * Sender number in E.164 form, without the whatsapp: prefix
   */
  readonly fromNumber: string;

  readonly baseUrl: string;
}

/**
 * Configured integrations. Each is undefined when disabled.
 */
export interface IntegrationsConfig {
  readonly calendar?: GoogleCalendarConfig;
  readonly sheets?: GoogleSheetsConfig;
  readonly whatsapp?: TwilioWhatsAppConfig;

  /**
   * Timeout applied to every outbound API call
   */
  readonly requestTimeoutMs: number;
}

let integrationsConfigInstance: IntegrationsConfig | null = null;

/**
 * Load integration settings from environment variables
 */
export function loadIntegrationsConfig(env: NodeJS.ProcessEnv = process.env): IntegrationsConfig {
  const googleToken = parseOptionalString(env.GOOGLE_API_TOKEN);
  const calendarId = parseOptionalString(env.GOOGLE_CALENDAR_ID);
  const spreadsheetId = parseOptionalString(env.LEAVE_TRACKING_SPREADSHEET_ID);
  const accountSid = parseOptionalString(env.TWILIO_ACCOUNT_SID);
  const authToken = parseOptionalString(env.TWILIO_AUTH_TOKEN);
  const whatsappNumber = parseOptionalString(env.TWILIO_WHATSAPP_NUMBER);

  if ((calendarId || spreadsheetId) && !googleToken) {
    console.warn(`[${TAG}] GOOGLE_API_TOKEN is not set; calendar and spreadsheet sync are disabled`);
  }

  const config: IntegrationsConfig = {
    calendar:
      calendarId && googleToken
        ? {
            calendarId,
            accessToken: googleToken,
            timeZone: parseOptionalString(env.GOOGLE_CALENDAR_TIME_ZONE) ?? 'UTC',
          }
        : undefined,
    sheets:
      spreadsheetId && googleToken
        ? {
            spreadsheetId,
            sheetName: parseOptionalString(env.LEAVE_TRACKING_SHEET_NAME) ?? 'Leave Tracker',
            accessToken: googleToken,
          }
        : undefined,
    whatsapp:
      accountSid && authToken && whatsappNumber
        ? {
            accountSid,
            authToken,
            fromNumber: whatsappNumber.replace(/^whatsapp:/, ''),
            baseUrl: 'https://api.twilio.com/2010-04-01',
          }
        : undefined,
    requestTimeoutMs: parseInteger(
      env.INTEGRATION_REQUEST_TIMEOUT_MS,
      15000,
      1000,
      120000,
      'INTEGRATION_REQUEST_TIMEOUT_MS',
      TAG
    ),
  };

  console.log(`[${TAG}] Integrations configured:`, {
    calendar: config.calendar !== undefined,
    sheets: config.sheets !== undefined,
    whatsapp: config.whatsapp !== undefined,
  });

  return config;
}

export function getIntegrationsConfig(): IntegrationsConfig {
  if (!integrationsConfigInstance) {
    integrationsConfigInstance = loadIntegrationsConfig();
  }
  return integrationsConfigInstance;
}
