/**
 * Service wiring
 *
 * Builds the ledger store, lifecycle engine, side-effect executor and worker
 * from configuration. Adapters are only created for integrations that are
 * configured, and the engine only schedules effects for those channels.
 *
 * @module container
 */

import type { EmailConfig } from './config/email.js';
import type { IntegrationsConfig } from './config/integrations.js';
import type { LeaveConfig } from './config/leave.js';
import { CompositeNotificationDispatcher } from './services/adapters/composite-notification.dispatcher.js';
import { EmailNotificationDispatcher } from './services/adapters/email-notification.dispatcher.js';
import { GoogleCalendarAdapter } from './services/adapters/google-calendar.adapter.js';
import { GoogleSheetsAdapter } from './services/adapters/google-sheets.adapter.js';
import type { NotificationDispatcher } from './services/adapters/types.js';
import { WhatsAppNotificationDispatcher } from './services/adapters/whatsapp-notification.dispatcher.js';
import { createApprovalPolicy } from './services/approval-policy.js';
import { EmailService, type MailTransport } from './services/email.service.js';
import { InMemoryLedgerStore } from './services/in-memory-ledger.store.js';
import { LeaveContextService } from './services/leave-context.service.js';
import { LeaveReportService } from './services/leave-report.service.js';
import { LeaveLifecycleEngine } from './services/leave.service.js';
import type { LedgerStore } from './services/ledger-store.js';
import { PostgresLedgerStore } from './services/postgres-ledger.store.js';
import { SideEffectExecutor, type EffectAdapters } from './services/side-effect-executor.service.js';
import { SideEffectWorker } from './services/side-effect-worker.js';
import type { SleepFn } from './utils/backoff.js';

export interface ServiceConfiguration {
  readonly leave: LeaveConfig;
  readonly integrations: IntegrationsConfig;
  readonly email: EmailConfig;

  /**
   * Use the Postgres ledger; otherwise an in-memory one
   */
  readonly useDatabase: boolean;
}

export interface ServiceOverrides {
  readonly store?: LedgerStore;
  readonly mailTransport?: MailTransport;
  readonly sleep?: SleepFn;
  readonly now?: () => Date;
}

export interface LeaveServices {
  readonly store: LedgerStore;
  readonly engine: LeaveLifecycleEngine;
  readonly executor: SideEffectExecutor;
  readonly worker: SideEffectWorker;
  readonly context: LeaveContextService;
  readonly reports: LeaveReportService;
  readonly emailService: EmailService;
}

function buildAdapters(
  config: ServiceConfiguration,
  emailService: EmailService
): EffectAdapters {
  const timeoutMs = config.integrations.requestTimeoutMs;
  const dispatchers: NotificationDispatcher[] = [];

  if (emailService.enabled) {
    dispatchers.push(new EmailNotificationDispatcher(emailService));
  }
  if (config.integrations.whatsapp) {
    dispatchers.push(
      new WhatsAppNotificationDispatcher(config.integrations.whatsapp, { timeoutMs })
    );
  }

  return {
    calendar: config.integrations.calendar
      ? new GoogleCalendarAdapter(config.integrations.calendar, { timeoutMs })
      : undefined,
    spreadsheet: config.integrations.sheets
      ? new GoogleSheetsAdapter(config.integrations.sheets, { timeoutMs })
      : undefined,
    notifications: dispatchers.length > 0 ? new CompositeNotificationDispatcher(dispatchers) : undefined,
  };
}

export function createLeaveServices(
  config: ServiceConfiguration,
  overrides: ServiceOverrides = {}
): LeaveServices {
  const store = overrides.store ?? (config.useDatabase ? new PostgresLedgerStore() : new InMemoryLedgerStore());
  const emailService = new EmailService(config.email, overrides.mailTransport);
  const adapters = buildAdapters(config, emailService);

  let worker: SideEffectWorker | null = null;

  const engine = new LeaveLifecycleEngine({
    store,
    policy: createApprovalPolicy({
      maxDays: config.leave.autoApproveMaxDays,
      leaveTypes: config.leave.autoApproveTypes,
    }),
    channels: {
      calendar: adapters.calendar !== undefined,
      spreadsheet: adapters.spreadsheet !== undefined,
      notifications: adapters.notifications !== undefined,
    },
    teamAbsenceThreshold: config.leave.teamAbsenceThreshold,
    maxSpanDays: config.leave.maxSpanDays,
    settlementRetries: config.leave.settlementRetries,
    now: overrides.now,
    onEffectsScheduled: () => worker?.kick(),
  });

  const executor = new SideEffectExecutor({
    store,
    settler: engine,
    adapters,
    config: config.leave.sideEffects,
    sleep: overrides.sleep,
    now: overrides.now,
  });

  worker = new SideEffectWorker(executor, {
    pollIntervalMs: config.leave.sideEffects.pollIntervalMs,
    redriveAfterMs: config.leave.sideEffects.redriveAfterMs,
  });

  console.log('[CONTAINER] Leave services created:', {
    store: store.constructor.name,
    calendar: adapters.calendar !== undefined,
    spreadsheet: adapters.spreadsheet !== undefined,
    notifications: adapters.notifications?.channel ?? 'none',
    timestamp: new Date().toISOString(),
  });

  return {
    store,
    engine,
    executor,
    worker,
    context: new LeaveContextService(store, engine, overrides.now),
    reports: new LeaveReportService(store, engine, overrides.now),
    emailService,
  };
}
