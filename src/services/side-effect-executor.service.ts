/**
 * Side-Effect Executor
 *
 * Runs the side-effect records the lifecycle engine scheduled. Records are
 * leased one at a time before they run, so concurrent drains never execute
 * the same record at once, and every outcome is written under the lease
 * token of its claim. Transient failures are retried in-process with exponential backoff;
 * once the attempts run out the record waits as failed_retryable for a
 * re-drive. Permanent failures stop at once. After every completion the
 * owning request is settled.
 *
 * @module services/side-effect-executor
 */

import {
  AdapterError,
  InvalidTransitionError,
  LeaseLostError,
  NotFoundError,
  toAdapterError,
} from '../types/errors.js';
import {
  SideEffectKind,
  SideEffectStatus,
  isApprovedState,
  type Employee,
  type LeaveRequest,
  type SideEffectRecord,
} from '../types/leave.js';
import type { SideEffectConfig } from '../config/leave.js';
import { computeBackoffDelay, sleep as defaultSleep, type SleepFn } from '../utils/backoff.js';
import { digestIdempotencyKey } from '../utils/idempotency.js';
import type {
  CalendarAdapter,
  LeaveSheetRow,
  NotificationDispatcher,
  SpreadsheetAdapter,
} from './adapters/types.js';
import type { LeaveLifecycleEngine } from './leave.service.js';
import type { LedgerStore } from './ledger-store.js';

export interface EffectAdapters {
  readonly calendar?: CalendarAdapter;
  readonly spreadsheet?: SpreadsheetAdapter;
  readonly notifications?: NotificationDispatcher;
}

export interface SideEffectExecutorOptions {
  readonly store: LedgerStore;
  readonly settler: Pick<LeaveLifecycleEngine, 'settle'>;
  readonly adapters: EffectAdapters;
  readonly config: Pick<SideEffectConfig, 'maxAttempts' | 'baseDelayMs' | 'maxDelayMs' | 'leaseMs' | 'batchSize'>;
  readonly sleep?: SleepFn;
  readonly now?: () => Date;
}

export interface DrainSummary {
  readonly claimed: number;
  readonly succeeded: number;
  readonly failedRetryable: number;
  readonly failedPermanent: number;
  readonly abandoned: number;

  /**
   * Records whose settlement could not be completed
   */
  readonly settlementErrors: number;

  /**
   * Records whose outcome was discarded because the lease had passed to
   * another claim or an operator
   */
  readonly leaseLost: number;
}

/**
 * Outcome of one adapter invocation
 */
type Invocation =
  | { readonly kind: 'done'; readonly result: string }
  | { readonly kind: 'stale'; readonly reason: string };

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class SideEffectExecutor {
  private readonly store: LedgerStore;
  private readonly settler: Pick<LeaveLifecycleEngine, 'settle'>;
  private readonly adapters: EffectAdapters;
  private readonly config: SideEffectExecutorOptions['config'];
  private readonly sleep: SleepFn;
  private readonly now: () => Date;

  constructor(options: SideEffectExecutorOptions) {
    this.store = options.store;
    this.settler = options.settler;
    this.adapters = options.adapters;
    this.config = options.config;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Claim and run up to `limit` due records, one claim at a time
   */
  async drain(limit: number = this.config.batchSize): Promise<DrainSummary> {
    const counts = {
      claimed: 0,
      succeeded: 0,
      failedRetryable: 0,
      failedPermanent: 0,
      abandoned: 0,
      settlementErrors: 0,
      leaseLost: 0,
    };

    while (counts.claimed < limit) {
      const [record] = await this.store.claimDueEffects(1, this.config.leaseMs, this.now());
      if (!record) {
        break;
      }
      counts.claimed++;

      const completed = await this.runLeased(record);
      if (!completed) {
        counts.leaseLost++;
        continue;
      }

      if (completed.abandoned) {
        counts.abandoned++;
      } else if (completed.status === SideEffectStatus.Succeeded) {
        counts.succeeded++;
      } else if (completed.status === SideEffectStatus.FailedRetryable) {
        counts.failedRetryable++;
      } else if (completed.status === SideEffectStatus.FailedPermanent) {
        counts.failedPermanent++;
      }

      if (!(await this.settle(completed.requestId))) {
        counts.settlementErrors++;
      }
    }

    if (counts.claimed > 0) {
      console.log('[SIDE_EFFECTS] Drain finished:', {
        ...counts,
        timestamp: new Date().toISOString(),
      });
    }

    return counts;
  }

  /**
   * Run a single record now. A record that is no longer pending is returned
   * unchanged, so calling this twice never repeats a completed effect.
   */
  async executeRecord(effectId: string): Promise<SideEffectRecord> {
    const record = await this.requireEffect(effectId);
    if (record.status !== SideEffectStatus.Pending || record.abandoned) {
      return record;
    }

    const claimed = await this.store.claimEffect(effectId, this.config.leaseMs, this.now());
    if (!claimed) {
      console.log('[SIDE_EFFECTS] Record is leased by another worker:', {
        effectId,
        requestId: record.requestId,
        lockedUntil: record.lockedUntil?.toISOString(),
      });
      return record;
    }

    const completed = await this.runLeased(claimed);
    if (!completed) {
      return this.requireEffect(effectId);
    }
    await this.settle(completed.requestId);
    return completed;
  }

  /**
   * Put a failed record back in the queue under its original key
   */
  async redrive(effectId: string, operatorId: string): Promise<SideEffectRecord> {
    const record = await this.requireEffect(effectId);

    if (
      record.abandoned ||
      (record.status !== SideEffectStatus.FailedRetryable && record.status !== SideEffectStatus.FailedPermanent)
    ) {
      throw new InvalidTransitionError(`Side effect ${effectId} is not in a failed state`, {
        effectId,
        status: record.status,
        abandoned: record.abandoned,
      });
    }

    const updated = await this.store.completeEffect(effectId, { status: SideEffectStatus.Pending });

    console.log('[SIDE_EFFECTS] Record re-driven:', {
      effectId,
      requestId: record.requestId,
      kind: record.kind,
      previousStatus: record.status,
      operatorId,
      timestamp: new Date().toISOString(),
    });

    await this.settle(record.requestId);
    return updated;
  }

  /**
   * Give up on a failed record. The request settles as if it had succeeded.
   */
  async abandon(effectId: string, operatorId: string, note: string): Promise<SideEffectRecord> {
    const record = await this.requireEffect(effectId);

    if (record.abandoned || record.status === SideEffectStatus.Succeeded) {
      throw new InvalidTransitionError(`Side effect ${effectId} cannot be abandoned`, {
        effectId,
        status: record.status,
        abandoned: record.abandoned,
      });
    }

    const updated = await this.store.completeEffect(effectId, {
      status: record.status,
      abandoned: true,
      result: `abandoned by ${operatorId}${note.trim() ? `: ${note.trim()}` : ''}`,
    });

    console.warn('[SIDE_EFFECTS] Record abandoned:', {
      effectId,
      requestId: record.requestId,
      kind: record.kind,
      operatorId,
      note,
      timestamp: new Date().toISOString(),
    });

    await this.settle(record.requestId);
    return updated;
  }

  /**
   * Re-drive every failed_retryable record last touched at least
   * `olderThanMs` ago
   *
   * @returns Number of records re-driven
   */
  async redriveRetryable(olderThanMs: number): Promise<number> {
    const cutoff = this.now().getTime() - olderThanMs;
    const due = (await this.store.listEffectsByStatus(SideEffectStatus.FailedRetryable)).filter(
      (record) => !record.abandoned && record.updatedAt.getTime() <= cutoff
    );

    for (const record of due) {
      await this.redrive(record.id, 'scheduler');
    }
    return due.length;
  }

  listEffects(status: SideEffectStatus): Promise<SideEffectRecord[]> {
    return this.store.listEffectsByStatus(status);
  }

  private async requireEffect(effectId: string): Promise<SideEffectRecord> {
    const record = await this.store.getEffect(effectId);
    if (!record) {
      throw new NotFoundError('side_effect', effectId);
    }
    return record;
  }

  /**
   * Run a claimed record
   *
   * @returns null when the lease was lost before the outcome was written
   */
  private async runLeased(record: SideEffectRecord): Promise<SideEffectRecord | null> {
    try {
      return await this.run(record);
    } catch (error) {
      if (!(error instanceof LeaseLostError)) {
        throw error;
      }
      console.warn('[SIDE_EFFECTS] Lease lost, outcome discarded:', {
        effectId: record.id,
        requestId: record.requestId,
        kind: record.kind,
        timestamp: new Date().toISOString(),
      });
      return null;
    }
  }

  /**
   * Attempt a record until it succeeds, fails for good or runs out of
   * attempts, and persist the outcome under the record's lease
   */
  private async run(record: SideEffectRecord): Promise<SideEffectRecord> {
    let attempts = record.attempts;

    for (let attempt = 1; ; attempt++) {
      attempts++;

      let invocation: Invocation;
      try {
        invocation = await this.invoke(record);
      } catch (error) {
        const failure = toAdapterError(error);
        const exhausted = attempt >= this.config.maxAttempts;

        console.warn('[SIDE_EFFECTS] Attempt failed:', {
          effectId: record.id,
          requestId: record.requestId,
          kind: record.kind,
          attempt,
          failure: failure.kind,
          error: failure.message,
        });

        if (failure.kind === 'permanent' || exhausted) {
          return this.store.completeEffect(record.id, {
            status:
              failure.kind === 'permanent' ? SideEffectStatus.FailedPermanent : SideEffectStatus.FailedRetryable,
            attempts,
            lastError: failure.message,
            leaseToken: record.leaseToken,
          });
        }

        await this.sleep(computeBackoffDelay(attempt, this.config.baseDelayMs, this.config.maxDelayMs));
        continue;
      }

      if (invocation.kind === 'stale') {
        console.log('[SIDE_EFFECTS] Stale record resolved without running:', {
          effectId: record.id,
          requestId: record.requestId,
          kind: record.kind,
          reason: invocation.reason,
        });
        return this.store.completeEffect(record.id, {
          status: record.status,
          attempts: record.attempts,
          abandoned: true,
          result: invocation.reason,
          leaseToken: record.leaseToken,
        });
      }

      const completed = await this.store.completeEffect(record.id, {
        status: SideEffectStatus.Succeeded,
        attempts,
        lastError: null,
        result: invocation.result,
        leaseToken: record.leaseToken,
      });

      console.log('[SIDE_EFFECTS] Record succeeded:', {
        effectId: record.id,
        requestId: record.requestId,
        kind: record.kind,
        attempts,
        result: invocation.result,
      });

      return completed;
    }
  }

  private async invoke(record: SideEffectRecord): Promise<Invocation> {
    const request = await this.store.getRequest(record.requestId);
    if (!request) {
      throw AdapterError.permanent(`Request ${record.requestId} no longer exists`);
    }
    const employee = await this.store.getEmployee(request.employeeId);
    if (!employee) {
      throw AdapterError.permanent(`Employee ${request.employeeId} no longer exists`);
    }

    switch (record.kind) {
      case SideEffectKind.CalendarCreate: {
        // Reverted before the block was placed
        if (!isApprovedState(request.state)) {
          return { kind: 'stale', reason: `request is ${request.state}` };
        }
        const calendar = this.requireAdapter(this.adapters.calendar, record.kind);
        return { kind: 'done', result: await calendar.createBusyBlock(employee, request, record.idempotencyKey) };
      }

      case SideEffectKind.CalendarDelete:
        return this.deleteBusyBlock(record, request);

      case SideEffectKind.SheetSync: {
        const spreadsheet = this.requireAdapter(this.adapters.spreadsheet, record.kind);
        const range = await spreadsheet.recordLeave(
          this.toSheetRow(request, employee, record),
          record.idempotencyKey
        );
        return { kind: 'done', result: range };
      }

      case SideEffectKind.NotifyEmployee:
      case SideEffectKind.NotifyApprover: {
        const notifications = this.requireAdapter(this.adapters.notifications, record.kind);
        if (!record.template || !record.recipientId) {
          throw AdapterError.permanent(`Notification ${record.id} has no template or recipient`);
        }
        const recipient = await this.store.getEmployee(record.recipientId);
        if (!recipient) {
          throw AdapterError.permanent(`Recipient ${record.recipientId} no longer exists`);
        }
        const messageId = await notifications.send(
          recipient.id,
          record.template,
          { request, employee, recipient },
          record.idempotencyKey
        );
        return { kind: 'done', result: messageId };
      }
    }
  }

  /**
   * The event to delete is the one placed by the latest calendar_create
   * scheduled before this delete. Its id is derived from that record's key,
   * so it is known even if the create timed out without reporting back.
   */
  private async deleteBusyBlock(record: SideEffectRecord, request: LeaveRequest): Promise<Invocation> {
    const creates = (await this.store.listEffects(request.id)).filter(
      (e) => e.kind === SideEffectKind.CalendarCreate && e.scheduledAtVersion < record.scheduledAtVersion
    );
    const create = creates.sort((a, b) => b.scheduledAtVersion - a.scheduledAtVersion)[0];

    if (!create) {
      return { kind: 'done', result: 'no calendar block' };
    }
    if (create.status === SideEffectStatus.Pending && !create.abandoned) {
      throw AdapterError.transient(`Calendar block ${create.id} has not been resolved yet`);
    }
    if (create.abandoned && create.status !== SideEffectStatus.Succeeded && create.attempts === 0) {
      return { kind: 'done', result: 'no calendar block' };
    }

    const eventId = create.result ?? digestIdempotencyKey(create.idempotencyKey);
    const calendar = this.requireAdapter(this.adapters.calendar, record.kind);
    await calendar.deleteBusyBlock(eventId);
    return { kind: 'done', result: eventId };
  }

  private requireAdapter<T>(adapter: T | undefined, kind: SideEffectKind): T {
    if (!adapter) {
      throw AdapterError.permanent(`No adapter configured for ${kind}`);
    }
    return adapter;
  }

  private toSheetRow(request: LeaveRequest, employee: Employee, record: SideEffectRecord): LeaveSheetRow {
    return {
      requestId: request.id,
      employeeName: employee.name,
      leaveType: request.leaveType,
      start: request.span.start,
      end: request.span.end,
      days: request.days,
      state: record.template ?? request.state,
      recordedAt: this.now().toISOString(),
    };
  }

  /**
   * @returns false when settlement failed; the failure is logged and the
   * request is settled again on its next completion or re-drive
   */
  private async settle(requestId: string): Promise<boolean> {
    try {
      await this.settler.settle(requestId);
      return true;
    } catch (error) {
      console.error('[SIDE_EFFECTS] Settlement failed:', {
        requestId,
        error: describeError(error),
        timestamp: new Date().toISOString(),
      });
      return false;
    }
  }
}
