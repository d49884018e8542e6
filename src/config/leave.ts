/**
 * Leave Engine Configuration Module
 *
 * Approval policy, conflict thresholds and side-effect execution tuning.
 *
 * @module config/leave
 */

import { isLeaveType, type LeaveType } from '../types/leave.js';
import { parseDecimal, parseInteger, parseList } from './env.js';

const TAG = 'LEAVE_CONFIG';

/**
 * Side-effect retry and polling settings
 */
export interface SideEffectConfig {
  /**
   * In-process attempts per drain before a record becomes failed_retryable
   */
  readonly maxAttempts: number;

  /**
   * First backoff delay; doubled on every further attempt
   */
  readonly baseDelayMs: number;

  readonly maxDelayMs: number;

  /**
   * Execution lease a draining worker holds on a claimed record
   */
  readonly leaseMs: number;

  /**
   * Records claimed per drain
   */
  readonly batchSize: number;

  readonly pollIntervalMs: number;

  /**
   * Age after which failed_retryable records are re-driven automatically.
   * 0 disables scheduled re-drive.
   */
  readonly redriveAfterMs: number;
}

/**
 * Leave engine configuration
 */
export interface LeaveConfig {
  /**
   * Fraction of a team that may be absent before approval escalates
   */
  readonly teamAbsenceThreshold: number;

  /**
   * Longest span accepted for one request
   */
  readonly maxSpanDays: number;

  /**
   * Standard-tier requests up to this many days are approved automatically.
   * 0 disables auto-approval.
   */
  readonly autoApproveMaxDays: number;

  readonly autoApproveTypes: readonly LeaveType[];

  /**
   * Bound on re-read-and-retry loops for internal settlement transitions
   */
  readonly settlementRetries: number;

  readonly sideEffects: SideEffectConfig;
}

let leaveConfigInstance: LeaveConfig | null = null;

function parseLeaveTypes(value: string | undefined): LeaveType[] {
  const types: LeaveType[] = [];
  for (const entry of parseList(value)) {
    const normalized = entry.toLowerCase();
    if (isLeaveType(normalized)) {
      types.push(normalized);
    } else {
      console.warn(`[${TAG}] Ignoring unknown leave type in LEAVE_AUTO_APPROVE_TYPES: ${entry}`);
    }
  }
  return types;
}

/**
 * Load leave engine configuration from environment variables
 */
export function loadLeaveConfig(env: NodeJS.ProcessEnv = process.env): LeaveConfig {
  const baseDelayMs = parseInteger(
    env.SIDE_EFFECT_BASE_DELAY_MS,
    500,
    0,
    60000,
    'SIDE_EFFECT_BASE_DELAY_MS',
    TAG
  );
  const maxDelayMs = parseInteger(
    env.SIDE_EFFECT_MAX_DELAY_MS,
    30000,
    0,
    600000,
    'SIDE_EFFECT_MAX_DELAY_MS',
    TAG
  );

  const config: LeaveConfig = {
    teamAbsenceThreshold: parseDecimal(
      env.LEAVE_TEAM_ABSENCE_THRESHOLD,
      0.3,
      0,
      1,
      'LEAVE_TEAM_ABSENCE_THRESHOLD',
      TAG
    ),
    maxSpanDays: parseInteger(env.LEAVE_MAX_SPAN_DAYS, 90, 1, 366, 'LEAVE_MAX_SPAN_DAYS', TAG),
    autoApproveMaxDays: parseDecimal(
      env.LEAVE_AUTO_APPROVE_MAX_DAYS,
      0,
      0,
      366,
      'LEAVE_AUTO_APPROVE_MAX_DAYS',
      TAG
    ),
    autoApproveTypes: parseLeaveTypes(env.LEAVE_AUTO_APPROVE_TYPES),
    settlementRetries: parseInteger(
      env.LEAVE_SETTLEMENT_RETRIES,
      5,
      1,
      50,
      'LEAVE_SETTLEMENT_RETRIES',
      TAG
    ),
    sideEffects: {
      maxAttempts: parseInteger(
        env.SIDE_EFFECT_MAX_ATTEMPTS,
        5,
        1,
        50,
        'SIDE_EFFECT_MAX_ATTEMPTS',
        TAG
      ),
      baseDelayMs,
      maxDelayMs: Math.max(baseDelayMs, maxDelayMs),
      leaseMs: parseInteger(env.SIDE_EFFECT_LEASE_MS, 300000, 1000, 3600000, 'SIDE_EFFECT_LEASE_MS', TAG),
      batchSize: parseInteger(env.SIDE_EFFECT_BATCH_SIZE, 25, 1, 1000, 'SIDE_EFFECT_BATCH_SIZE', TAG),
      pollIntervalMs: parseInteger(
        env.SIDE_EFFECT_POLL_INTERVAL_MS,
        5000,
        100,
        3600000,
        'SIDE_EFFECT_POLL_INTERVAL_MS',
        TAG
      ),
      redriveAfterMs: parseInteger(
        env.SIDE_EFFECT_REDRIVE_AFTER_MS,
        0,
        0,
        604800000,
        'SIDE_EFFECT_REDRIVE_AFTER_MS',
        TAG
      ),
    },
  };

  console.log(`[${TAG}] Leave engine configuration loaded:`, {
    teamAbsenceThreshold: config.teamAbsenceThreshold,
    maxSpanDays: config.maxSpanDays,
    autoApproveMaxDays: config.autoApproveMaxDays,
    autoApproveTypes: config.autoApproveTypes,
    sideEffects: config.sideEffects,
  });

  return config;
}

/**
 * Get leave engine configuration singleton
 */
export function getLeaveConfig(): LeaveConfig {
  if (!leaveConfigInstance) {
    leaveConfigInstance = loadLeaveConfig();
  }
  return leaveConfigInstance;
}
