// src/db/ledger.store.ts
import type Decimal from 'decimal.js';

export const PAYMENT_METHODS = ['cash', 'card'] as const;
export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

export const CASH_TRANSACTION_KINDS = ['manual_in', 'manual_out', 'handover_in'] as const;
export type CashTransactionKind = (typeof CASH_TRANSACTION_KINDS)[number];

/** Kinds a cashier may record by hand; `handover_in` is written only by the handover flow. */
export const MANUAL_TRANSACTION_KINDS = ['manual_in', 'manual_out'] as const;
export type ManualTransactionKind = (typeof MANUAL_TRANSACTION_KINDS)[number];

export interface EmployeeRecord {
    id: number;
    fullName: string;
    cashBalance: Decimal;
}

export interface ShiftRecord {
    id: number;
    employeeId: number;
    startTime: Date;
    endTime: Date | null;
    startCash: Decimal;
    endCashActual: Decimal | null;
    isClosed: boolean;
    totalSalesCash: Decimal | null;
    totalSalesCard: Decimal | null;
    serviceIn: Decimal | null;
    serviceOut: Decimal | null;
}

export interface CashTransactionRecord {
    id: number;
    shiftId: number;
    amount: Decimal;
    kind: CashTransactionKind;
    comment: string;
    createdAt: Date;
}

export interface OrderRecord {
    id: number;
    paymentMethod: PaymentMethod;
    totalPrice: Decimal;
    isCashTurnedIn: boolean;
    cashShiftId: number | null;
    courierId: number | null;
    waiterId: number | null;
    createdAt: Date;
    completedAt: Date | null;
}

export interface NewShift {
    employeeId: number;
    startCash: Decimal;
    startTime: Date;
}

/** Fields written by CloseShift. Nothing else ever updates a shift. */
export interface ShiftClosePatch {
    endTime: Date;
    endCashActual: Decimal;
    isClosed: true;
    totalSalesCash: Decimal;
    totalSalesCard: Decimal;
    serviceIn: Decimal;
    serviceOut: Decimal;
}

export interface NewCashTransaction {
    shiftId: number;
    amount: Decimal;
    kind: CashTransactionKind;
    comment: string;
}

export type OrderLedgerPatch = Partial<Pick<OrderRecord, 'cashShiftId' | 'isCashTurnedIn' | 'completedAt'>>;

export interface ShiftFilter {
    employeeId?: number;
    isClosed?: boolean;
    startedFrom?: Date;
    startedTo?: Date;
}

export interface PageRequest {
    limit: number;
    offset: number;
}

export interface MoneyByPaymentMethod {
    paymentMethod: PaymentMethod;
    total: Decimal;
}

export interface MoneyByKind {
    kind: CashTransactionKind;
    total: Decimal;
}

/** Whose attribution put an order on a worker: the courier, or the waiter of an order without one. */
export type WorkerRole = 'courier' | 'waiter';

export interface WorkerOrderTotals {
    employeeId: number;
    fullName: string;
    role: WorkerRole;
    orderCount: number;
    total: Decimal;
}

export interface JournalEntry extends CashTransactionRecord {
    /** Owner of the shift the entry belongs to. */
    employeeName: string | null;
}

export interface TimeRange {
    start: Date;
    end: Date;
}

export interface LockOptions {
    /** Take a row lock (`FOR UPDATE`) held until the surrounding transaction ends. */
    forUpdate?: boolean;
}

/**
 * Data access inside one store transaction. Every method sees the writes made
 * earlier in the same transaction; nothing is visible to others until commit.
 */
export interface LedgerTx {
    // employees
    findEmployee(id: number, options?: LockOptions): Promise<EmployeeRecord | null>;
    setEmployeeBalance(id: number, balance: Decimal): Promise<EmployeeRecord>;
    listDebtors(): Promise<EmployeeRecord[]>;

    // shifts
    findShift(id: number, options?: LockOptions): Promise<ShiftRecord | null>;
    findOpenShiftByEmployee(employeeId: number): Promise<ShiftRecord | null>;
    /** Lowest-id open shift, used as the fallback attribution target. */
    findAnyOpenShift(): Promise<ShiftRecord | null>;
    insertShift(shift: NewShift): Promise<ShiftRecord>;
    closeShift(id: number, patch: ShiftClosePatch): Promise<ShiftRecord>;
    listShifts(filter: ShiftFilter, page: PageRequest): Promise<{ rows: ShiftRecord[]; total: number }>;

    // transactions
    insertTransaction(transaction: NewCashTransaction): Promise<CashTransactionRecord>;
    listTransactions(shiftId: number): Promise<CashTransactionRecord[]>;
    sumTransactionsByKind(shiftId: number): Promise<MoneyByKind[]>;
    listJournal(range: TimeRange): Promise<JournalEntry[]>;

    // orders
    findOrder(id: number, options?: LockOptions): Promise<OrderRecord | null>;
    /** Locks and returns the cash orders among `ids` whose cash has not reached a drawer yet. */
    findOrdersAwaitingCash(ids: readonly number[]): Promise<OrderRecord[]>;
    updateOrder(id: number, patch: OrderLedgerPatch): Promise<OrderRecord>;
    /** Completed cash orders the employee still holds the money for (as courier, or as waiter without a courier). */
    listPendingOrders(employeeId: number): Promise<OrderRecord[]>;
    sumOrdersByPaymentMethod(shiftId: number): Promise<MoneyByPaymentMethod[]>;
    sumCollectedCash(shiftId: number): Promise<Decimal>;
    sumRevenueByPaymentMethod(range: TimeRange): Promise<MoneyByPaymentMethod[]>;
    /**
     * Orders completed in range grouped per courier, plus per waiter for orders
     * without a courier. One row per employee and role.
     */
    sumOrdersByWorker(range: TimeRange): Promise<WorkerOrderTotals[]>;
}

export interface LedgerStore {
    /**
     * Runs `work` in one atomic unit: committed when it resolves, fully rolled
     * back when it throws (the error is rethrown).
     */
    transaction<T>(work: (tx: LedgerTx) => Promise<T>): Promise<T>;
}
