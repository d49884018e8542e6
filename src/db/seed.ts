/**
 * Database Seeding Module
 *
 * Seeds a small development organisation (an HR admin, a manager and their
 * team) with leave balances, and prints a development access token for each
 * seeded person. Idempotent: employees are upserted by id.
 *
 * Usage: npm run build && npm run seed
 *
 * @module db/seed
 */

import { PostgresLedgerStore } from '../services/postgres-ledger.store.js';
import type { EmployeeSeed } from '../services/ledger-store.js';
import { UserRole } from '../types/index.js';
import { LeaveType } from '../types/leave.js';
import { generateAccessToken } from '../utils/jwt.js';
import { initializePool, shutdown } from './index.js';

interface SeedPerson extends EmployeeSeed {
  readonly role: UserRole;
}

const TEAM_ID = 'team-platform';

const SEED_PEOPLE: readonly SeedPerson[] = [
  {
    id: 'emp-hr-1',
    name: 'Hana Reyes',
    email: 'hr@example.com',
    teamId: 'team-people',
    role: UserRole.HRAdmin,
    balances: { [LeaveType.Annual]: 25, [LeaveType.Sick]: 10 },
  },
  {
    id: 'emp-mgr-1',
    name: 'Mateo Lind',
    email: 'manager@example.com',
    teamId: TEAM_ID,
    managerId: 'emp-hr-1',
    role: UserRole.Manager,
    balances: { [LeaveType.Annual]: 25, [LeaveType.Sick]: 10 },
  },
  {
    id: 'emp-1',
    name: 'Ada Okafor',
    email: 'ada@example.com',
    phone: '+15550100001',
    teamId: TEAM_ID,
    managerId: 'emp-mgr-1',
    role: UserRole.Employee,
    balances: { [LeaveType.Annual]: 20, [LeaveType.Sick]: 10 },
  },
  {
    id: 'emp-2',
    name: 'Bram de Vries',
    email: 'bram@example.com',
    teamId: TEAM_ID,
    managerId: 'emp-mgr-1',
    role: UserRole.Employee,
    balances: { [LeaveType.Annual]: 20, [LeaveType.Sick]: 10 },
  },
  {
    id: 'emp-3',
    name: 'Chen Wei',
    email: 'chen@example.com',
    teamId: TEAM_ID,
    managerId: 'emp-mgr-1',
    role: UserRole.Employee,
    balances: { [LeaveType.Annual]: 5, [LeaveType.Sick]: 10 },
  },
];

/**
 * Upsert the development organisation
 *
 * @returns Number of employees written
 */
export async function seedEmployees(store: PostgresLedgerStore): Promise<number> {
  const startTime = Date.now();

  // Managers first so manager references resolve
  const ordered = [...SEED_PEOPLE].sort((a, b) => Number(a.managerId !== undefined) - Number(b.managerId !== undefined));

  for (const person of ordered) {
    const { role: _role, ...seed } = person;
    await store.upsertEmployee(seed);
  }

  console.log('[SEED] Employees seeded:', {
    count: ordered.length,
    executionTimeMs: Date.now() - startTime,
    timestamp: new Date().toISOString(),
  });

  return ordered.length;
}

async function main(): Promise<void> {
  console.log('[SEED] Starting database seed...');
  initializePool();

  try {
    await seedEmployees(new PostgresLedgerStore());

    for (const person of SEED_PEOPLE) {
      const token = generateAccessToken({
        userId: `user-${person.id}`,
        email: person.email,
        role: person.role,
        employeeId: person.id,
      });
      console.log(`[SEED] ${person.role} ${person.name} (${person.id}): ${token}`);
    }

    console.log('[SEED] Seed completed');
  } finally {
    await shutdown({ timeout: 5000 });
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error: unknown) => {
    console.error('[SEED] FATAL: Seed failed:', {
      error: error instanceof Error ? error.message : String(error),
      timestamp: new Date().toISOString(),
    });
    process.exit(1);
  });
}
