// src/db/drizzle-ledger.store.ts
import { and, asc, count, desc, eq, gt, gte, inArray, isNotNull, isNull, lte, or, sum, type SQL } from 'drizzle-orm';
import type Decimal from 'decimal.js';
import type { Database } from '@/config/database';
import { formatMoney, toMoney, toMoneyOrNull } from '@/utils/money';
import { cashShifts, cashTransactions, employees, orders } from './schema';
import type {
    CashTransactionRecord,
    EmployeeRecord,
    JournalEntry,
    LedgerStore,
    LedgerTx,
    LockOptions,
    MoneyByKind,
    MoneyByPaymentMethod,
    NewCashTransaction,
    NewShift,
    OrderLedgerPatch,
    OrderRecord,
    PageRequest,
    ShiftClosePatch,
    ShiftFilter,
    ShiftRecord,
    TimeRange,
    WorkerOrderTotals,
    WorkerRole,
} from './ledger.store';

type DrizzleTx = Parameters<Parameters<Database['transaction']>[0]>[0];

// ── Row mappers (numeric columns arrive as strings) ─────────────

const toEmployee = (row: typeof employees.$inferSelect): EmployeeRecord => ({
    id: row.id,
    fullName: row.fullName,
    cashBalance: toMoney(row.cashBalance),
});

const toShift = (row: typeof cashShifts.$inferSelect): ShiftRecord => ({
    id: row.id,
    employeeId: row.employeeId,
    startTime: row.startTime,
    endTime: row.endTime,
    startCash: toMoney(row.startCash),
    endCashActual: toMoneyOrNull(row.endCashActual),
    isClosed: row.isClosed,
    totalSalesCash: toMoneyOrNull(row.totalSalesCash),
    totalSalesCard: toMoneyOrNull(row.totalSalesCard),
    serviceIn: toMoneyOrNull(row.serviceIn),
    serviceOut: toMoneyOrNull(row.serviceOut),
});

const toTransaction = (row: typeof cashTransactions.$inferSelect): CashTransactionRecord => ({
    id: row.id,
    shiftId: row.shiftId,
    amount: toMoney(row.amount),
    kind: row.kind,
    comment: row.comment,
    createdAt: row.createdAt,
});

const toOrder = (row: typeof orders.$inferSelect): OrderRecord => ({
    id: row.id,
    paymentMethod: row.paymentMethod,
    totalPrice: toMoney(row.totalPrice),
    isCashTurnedIn: row.isCashTurnedIn,
    cashShiftId: row.cashShiftId,
    courierId: row.courierId,
    waiterId: row.waiterId,
    createdAt: row.createdAt,
    completedAt: row.completedAt,
});

const expectRow = <T>(row: T | undefined, what: string): T => {
    if (row === undefined) {
        throw new Error(`${what} affected no rows`);
    }
    return row;
};

class DrizzleLedgerTx implements LedgerTx {
    constructor(private readonly tx: DrizzleTx) {}

    // ── employees ──

    async findEmployee(id: number, options: LockOptions = {}): Promise<EmployeeRecord | null> {
        const query = this.tx.select().from(employees).where(eq(employees.id, id)).limit(1);
        const [row] = options.forUpdate ? await query.for('update') : await query;
        return row ? toEmployee(row) : null;
    }

    async setEmployeeBalance(id: number, balance: Decimal): Promise<EmployeeRecord> {
        const [row] = await this.tx
            .update(employees)
            .set({ cashBalance: formatMoney(balance) })
            .where(eq(employees.id, id))
            .returning();
        return toEmployee(expectRow(row, `Balance update of employee ${id}`));
    }

    async listDebtors(): Promise<EmployeeRecord[]> {
        const rows = await this.tx
            .select()
            .from(employees)
            .where(gt(employees.cashBalance, '0'))
            .orderBy(desc(employees.cashBalance), asc(employees.id));
        return rows.map(toEmployee);
    }

    // ── shifts ──

    async findShift(id: number, options: LockOptions = {}): Promise<ShiftRecord | null> {
        const query = this.tx.select().from(cashShifts).where(eq(cashShifts.id, id)).limit(1);
        const [row] = options.forUpdate ? await query.for('update') : await query;
        return row ? toShift(row) : null;
    }

    async findOpenShiftByEmployee(employeeId: number): Promise<ShiftRecord | null> {
        const [row] = await this.tx
            .select()
            .from(cashShifts)
            .where(and(eq(cashShifts.employeeId, employeeId), eq(cashShifts.isClosed, false)))
            .limit(1);
        return row ? toShift(row) : null;
    }

    async findAnyOpenShift(): Promise<ShiftRecord | null> {
        const [row] = await this.tx
            .select()
            .from(cashShifts)
            .where(eq(cashShifts.isClosed, false))
            .orderBy(asc(cashShifts.id))
            .limit(1);
        return row ? toShift(row) : null;
    }

    async insertShift(shift: NewShift): Promise<ShiftRecord> {
        const [row] = await this.tx
            .insert(cashShifts)
            .values({
                employeeId: shift.employeeId,
                startCash: formatMoney(shift.startCash),
                startTime: shift.startTime,
                isClosed: false,
            })
            .returning();
        return toShift(expectRow(row, 'Shift insert'));
    }

    async closeShift(id: number, patch: ShiftClosePatch): Promise<ShiftRecord> {
        const [row] = await this.tx
            .update(cashShifts)
            .set({
                endTime: patch.endTime,
                endCashActual: formatMoney(patch.endCashActual),
                isClosed: patch.isClosed,
                totalSalesCash: formatMoney(patch.totalSalesCash),
                totalSalesCard: formatMoney(patch.totalSalesCard),
                serviceIn: formatMoney(patch.serviceIn),
                serviceOut: formatMoney(patch.serviceOut),
            })
            .where(and(eq(cashShifts.id, id), eq(cashShifts.isClosed, false)))
            .returning();
        return toShift(expectRow(row, `Close of shift ${id}`));
    }

    async listShifts(filter: ShiftFilter, page: PageRequest): Promise<{ rows: ShiftRecord[]; total: number }> {
        const conditions: SQL[] = [];
        if (filter.employeeId !== undefined) conditions.push(eq(cashShifts.employeeId, filter.employeeId));
        if (filter.isClosed !== undefined) conditions.push(eq(cashShifts.isClosed, filter.isClosed));
        if (filter.startedFrom) conditions.push(gte(cashShifts.startTime, filter.startedFrom));
        if (filter.startedTo) conditions.push(lte(cashShifts.startTime, filter.startedTo));
        const where = conditions.length > 0 ? and(...conditions) : undefined;

        const rows = await this.tx
            .select()
            .from(cashShifts)
            .where(where)
            .orderBy(desc(cashShifts.startTime), desc(cashShifts.id))
            .limit(page.limit)
            .offset(page.offset);
        const [totalRow] = await this.tx.select({ value: count() }).from(cashShifts).where(where);

        return { rows: rows.map(toShift), total: totalRow?.value ?? 0 };
    }

    // ── transactions ──

    async insertTransaction(transaction: NewCashTransaction): Promise<CashTransactionRecord> {
        const [row] = await this.tx
            .insert(cashTransactions)
            .values({
                shiftId: transaction.shiftId,
                amount: formatMoney(transaction.amount),
                kind: transaction.kind,
                comment: transaction.comment,
            })
            .returning();
        return toTransaction(expectRow(row, 'Cash transaction insert'));
    }

    async listTransactions(shiftId: number): Promise<CashTransactionRecord[]> {
        const rows = await this.tx
            .select()
            .from(cashTransactions)
            .where(eq(cashTransactions.shiftId, shiftId))
            .orderBy(asc(cashTransactions.createdAt), asc(cashTransactions.id));
        return rows.map(toTransaction);
    }

    async sumTransactionsByKind(shiftId: number): Promise<MoneyByKind[]> {
        const rows = await this.tx
            .select({ kind: cashTransactions.kind, total: sum(cashTransactions.amount) })
            .from(cashTransactions)
            .where(eq(cashTransactions.shiftId, shiftId))
            .groupBy(cashTransactions.kind);
        return rows.map((row) => ({ kind: row.kind, total: toMoney(row.total) }));
    }

    async listJournal(range: TimeRange): Promise<JournalEntry[]> {
        const rows = await this.tx
            .select({ transaction: cashTransactions, employeeName: employees.fullName })
            .from(cashTransactions)
            .leftJoin(cashShifts, eq(cashTransactions.shiftId, cashShifts.id))
            .leftJoin(employees, eq(cashShifts.employeeId, employees.id))
            .where(and(gte(cashTransactions.createdAt, range.start), lte(cashTransactions.createdAt, range.end)))
            .orderBy(desc(cashTransactions.createdAt), desc(cashTransactions.id));
        return rows.map((row) => ({ ...toTransaction(row.transaction), employeeName: row.employeeName }));
    }

    // ── orders ──

    async findOrder(id: number, options: LockOptions = {}): Promise<OrderRecord | null> {
        const query = this.tx.select().from(orders).where(eq(orders.id, id)).limit(1);
        const [row] = options.forUpdate ? await query.for('update') : await query;
        return row ? toOrder(row) : null;
    }

    async findOrdersAwaitingCash(ids: readonly number[]): Promise<OrderRecord[]> {
        if (ids.length === 0) return [];
        const rows = await this.tx
            .select()
            .from(orders)
            .where(
                and(
                    inArray(orders.id, [...ids]),
                    eq(orders.paymentMethod, 'cash'),
                    eq(orders.isCashTurnedIn, false),
                ),
            )
            .orderBy(asc(orders.id))
            .for('update');
        return rows.map(toOrder);
    }

    async updateOrder(id: number, patch: OrderLedgerPatch): Promise<OrderRecord> {
        const [row] = await this.tx.update(orders).set(patch).where(eq(orders.id, id)).returning();
        return toOrder(expectRow(row, `Ledger update of order ${id}`));
    }

    async listPendingOrders(employeeId: number): Promise<OrderRecord[]> {
        const rows = await this.tx
            .select()
            .from(orders)
            .where(
                and(
                    eq(orders.paymentMethod, 'cash'),
                    eq(orders.isCashTurnedIn, false),
                    isNotNull(orders.completedAt),
                    or(
                        eq(orders.courierId, employeeId),
                        and(isNull(orders.courierId), eq(orders.waiterId, employeeId)),
                    ),
                ),
            )
            .orderBy(asc(orders.completedAt), asc(orders.id));
        return rows.map(toOrder);
    }

    async sumOrdersByPaymentMethod(shiftId: number): Promise<MoneyByPaymentMethod[]> {
        const rows = await this.tx
            .select({ paymentMethod: orders.paymentMethod, total: sum(orders.totalPrice) })
            .from(orders)
            .where(eq(orders.cashShiftId, shiftId))
            .groupBy(orders.paymentMethod);
        return rows.map((row) => ({ paymentMethod: row.paymentMethod, total: toMoney(row.total) }));
    }

    async sumCollectedCash(shiftId: number): Promise<Decimal> {
        const [row] = await this.tx
            .select({ total: sum(orders.totalPrice) })
            .from(orders)
            .where(
                and(
                    eq(orders.cashShiftId, shiftId),
                    eq(orders.paymentMethod, 'cash'),
                    eq(orders.isCashTurnedIn, true),
                ),
            );
        return toMoney(row?.total);
    }

    async sumRevenueByPaymentMethod(range: TimeRange): Promise<MoneyByPaymentMethod[]> {
        const rows = await this.tx
            .select({ paymentMethod: orders.paymentMethod, total: sum(orders.totalPrice) })
            .from(orders)
            .where(and(gte(orders.completedAt, range.start), lte(orders.completedAt, range.end)))
            .groupBy(orders.paymentMethod);
        return rows.map((row) => ({ paymentMethod: row.paymentMethod, total: toMoney(row.total) }));
    }

    async sumOrdersByWorker(range: TimeRange): Promise<WorkerOrderTotals[]> {
        const completedInRange = and(gte(orders.completedAt, range.start), lte(orders.completedAt, range.end));
        const totals = {
            employeeId: employees.id,
            fullName: employees.fullName,
            orderCount: count(orders.id),
            total: sum(orders.totalPrice),
        };

        const couriers = await this.tx
            .select(totals)
            .from(orders)
            .innerJoin(employees, eq(orders.courierId, employees.id))
            .where(completedInRange)
            .groupBy(employees.id, employees.fullName);
        const waiters = await this.tx
            .select(totals)
            .from(orders)
            .innerJoin(employees, eq(orders.waiterId, employees.id))
            .where(and(completedInRange, isNull(orders.courierId)))
            .groupBy(employees.id, employees.fullName);

        const toTotals = (role: WorkerRole) => (row: (typeof couriers)[number]): WorkerOrderTotals => ({
            employeeId: row.employeeId,
            fullName: row.fullName,
            role,
            orderCount: row.orderCount,
            total: toMoney(row.total),
        });
        return [...couriers.map(toTotals('courier')), ...waiters.map(toTotals('waiter'))];
    }
}

/**
 * Postgres-backed store. Each unit of work is a `db.transaction`; per-key
 * serialization comes from the `forUpdate` row locks requested by the services
 * and from the partial unique index on open shifts.
 */
export class DrizzleLedgerStore implements LedgerStore {
    constructor(private readonly db: Database) {}

    transaction<T>(work: (tx: LedgerTx) => Promise<T>): Promise<T> {
        return this.db.transaction((tx) => work(new DrizzleLedgerTx(tx)));
    }
}
