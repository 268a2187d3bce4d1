import { sql } from 'drizzle-orm';
import {
  pgTable,
  pgEnum,
  serial,
  integer,
  text,
  numeric,
  boolean,
  timestamp,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';
import { CASH_TRANSACTION_KINDS, PAYMENT_METHODS } from './ledger.store';

export const paymentMethodEnum = pgEnum('payment_method', PAYMENT_METHODS);

export const cashTransactionKindEnum = pgEnum('cash_transaction_kind', CASH_TRANSACTION_KINDS);

// ── Employees ───────────────────────────────────────────────────
// Owned by staff management; the ledger only reads the name and writes cash_balance.

export const employees = pgTable('employees', {
  id: serial('id').primaryKey(),
  fullName: text('full_name').notNull(),
  cashBalance: numeric('cash_balance', { precision: 12, scale: 2 }).notNull().default('0'),
});

// ── Cash Shifts ─────────────────────────────────────────────────

export const cashShifts = pgTable(
  'cash_shifts',
  {
    id: serial('id').primaryKey(),
    employeeId: integer('employee_id')
      .notNull()
      .references(() => employees.id),
    startTime: timestamp('start_time', { withTimezone: true }).notNull().defaultNow(),
    endTime: timestamp('end_time', { withTimezone: true }),
    startCash: numeric('start_cash', { precision: 12, scale: 2 }).notNull().default('0'),
    endCashActual: numeric('end_cash_actual', { precision: 12, scale: 2 }),
    isClosed: boolean('is_closed').notNull().default(false),
    // Frozen by close; null while the shift is open.
    totalSalesCash: numeric('total_sales_cash', { precision: 12, scale: 2 }),
    totalSalesCard: numeric('total_sales_card', { precision: 12, scale: 2 }),
    serviceIn: numeric('service_in', { precision: 12, scale: 2 }),
    serviceOut: numeric('service_out', { precision: 12, scale: 2 }),
  },
  (table) => [
    uniqueIndex('uq_cash_shifts_open_employee')
      .on(table.employeeId)
      .where(sql`${table.isClosed} = false`),
    index('idx_cash_shifts_employee_start').on(table.employeeId, table.startTime),
  ],
);

// ── Cash Transactions (append-only) ─────────────────────────────

export const cashTransactions = pgTable(
  'cash_transactions',
  {
    id: serial('id').primaryKey(),
    shiftId: integer('shift_id')
      .notNull()
      .references(() => cashShifts.id),
    amount: numeric('amount', { precision: 12, scale: 2 }).notNull(),
    kind: cashTransactionKindEnum('kind').notNull(),
    comment: text('comment').notNull().default(''),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    index('idx_cash_transactions_shift_kind').on(table.shiftId, table.kind),
    index('idx_cash_transactions_created').on(table.createdAt),
  ],
);

// ── Orders ──────────────────────────────────────────────────────
// Owned by the order subsystem. The ledger writes cash_shift_id (once),
// is_cash_turned_in and completed_at.

export const orders = pgTable(
  'orders',
  {
    id: serial('id').primaryKey(),
    paymentMethod: paymentMethodEnum('payment_method').notNull(),
    totalPrice: numeric('total_price', { precision: 12, scale: 2 }).notNull(),
    isCashTurnedIn: boolean('is_cash_turned_in').notNull().default(false),
    cashShiftId: integer('cash_shift_id').references(() => cashShifts.id),
    courierId: integer('courier_id').references(() => employees.id),
    waiterId: integer('waiter_id').references(() => employees.id),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    completedAt: timestamp('completed_at', { withTimezone: true }),
  },
  (table) => [
    index('idx_orders_cash_shift').on(table.cashShiftId),
    index('idx_orders_courier_pending').on(table.courierId, table.isCashTurnedIn),
    index('idx_orders_waiter_pending').on(table.waiterId, table.isCashTurnedIn),
    index('idx_orders_completed_at').on(table.completedAt),
  ],
);
