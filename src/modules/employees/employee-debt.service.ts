// src/modules/employees/employee-debt.service.ts
import type Decimal from 'decimal.js';
import type { EmployeeRecord, LedgerTx, OrderRecord } from '@/db/ledger.store';
import type { LedgerDependencies } from '@/services';
import logger, { type LogContext } from '@/utils/logger';
import { clampNonNegative, formatMoney } from '@/utils/money';
import { EmployeeNotFoundError, OrderNotFoundError, rethrowAsServiceError } from '@/utils/ledgerErrors';

export interface DebtRegistration {
    orderId: number;
    employeeId: number;
    /** false when the order was not paid in cash and nothing changed. */
    registered: boolean;
    cashBalance: Decimal;
}

/** The single write path for balances; the result is clamped at zero. */
export const applyBalanceChange = async (tx: LedgerTx, employee: EmployeeRecord, delta: Decimal): Promise<EmployeeRecord> => {
    const requested = employee.cashBalance.plus(delta);
    if (requested.isNegative()) {
        logger.warn(`Balance of employee ${employee.id} clamped at zero`, {
            function: 'applyBalanceChange',
            employeeId: employee.id,
            requested: formatMoney(requested),
        });
    }
    return tx.setEmployeeBalance(employee.id, clampNonNegative(requested));
};

/**
 * Books the order's total as cash the employee now owes. Caller holds the order
 * lock; the employee row is locked here. Non-cash orders are left untouched.
 */
export const registerDebtInTx = async (tx: LedgerTx, order: OrderRecord, employeeId: number): Promise<DebtRegistration> => {
    const employee = await tx.findEmployee(employeeId, { forUpdate: true });
    if (!employee) {
        throw new EmployeeNotFoundError(employeeId);
    }
    if (order.paymentMethod !== 'cash') {
        return { orderId: order.id, employeeId, registered: false, cashBalance: employee.cashBalance };
    }

    const updated = await applyBalanceChange(tx, employee, order.totalPrice);
    await tx.updateOrder(order.id, { isCashTurnedIn: false });
    return { orderId: order.id, employeeId, registered: true, cashBalance: updated.cashBalance };
};

export const createEmployeeDebtService = ({ store }: Pick<LedgerDependencies, 'store'>) => {
    const registerDebt = async (orderId: number, employeeId: number): Promise<DebtRegistration> => {
        const logContext: LogContext = { function: 'registerDebt', orderId, employeeId };
        try {
            const registration = await store.transaction(async (tx) => {
                const order = await tx.findOrder(orderId, { forUpdate: true });
                if (!order) {
                    throw new OrderNotFoundError(orderId);
                }
                return registerDebtInTx(tx, order, employeeId);
            });

            if (registration.registered) {
                logger.info(`Debt registered, balance now ${formatMoney(registration.cashBalance)}`, logContext);
            } else {
                logger.debug('Order not paid in cash, no debt registered', logContext);
            }
            return registration;
        } catch (error) {
            return rethrowAsServiceError(error, logContext, 'Failed to register debt');
        }
    };

    /** Employees holding cash, largest balance first. */
    const listDebtors = async (): Promise<EmployeeRecord[]> => {
        const logContext: LogContext = { function: 'listDebtors' };
        try {
            return await store.transaction((tx) => tx.listDebtors());
        } catch (error) {
            return rethrowAsServiceError(error, logContext, 'Failed to retrieve debtors');
        }
    };

    const listPendingOrders = async (employeeId: number): Promise<OrderRecord[]> => {
        const logContext: LogContext = { function: 'listPendingOrders', employeeId };
        try {
            return await store.transaction(async (tx) => {
                const employee = await tx.findEmployee(employeeId);
                if (!employee) {
                    throw new EmployeeNotFoundError(employeeId);
                }
                return tx.listPendingOrders(employeeId);
            });
        } catch (error) {
            return rethrowAsServiceError(error, logContext, 'Failed to retrieve pending orders');
        }
    };

    return { registerDebt, listDebtors, listPendingOrders };
};

export type EmployeeDebtService = ReturnType<typeof createEmployeeDebtService>;
