// src/modules/handovers/handover.service.ts
import type Decimal from 'decimal.js';
import type { CashTransactionRecord } from '@/db/ledger.store';
import type { LedgerDependencies } from '@/services';
import { publishAfterCommit } from '@/modules/notifications/ledger-events';
import { applyBalanceChange } from '@/modules/employees/employee-debt.service';
import logger, { type LogContext } from '@/utils/logger';
import { formatMoney, sumMoney } from '@/utils/money';
import {
    EmployeeNotFoundError,
    NoEligibleOrdersError,
    ShiftClosedError,
    ShiftNotFoundError,
    rethrowAsServiceError,
} from '@/utils/ledgerErrors';

export interface HandoverResult {
    amount: Decimal;
    /** Orders actually settled; ids that were unknown or already turned in are left out. */
    orderIds: number[];
    transaction: CashTransactionRecord;
}

export const handoverComment = (employeeName: string, orderIds: readonly number[]): string =>
    `Cash handover: ${employeeName} (orders: ${orderIds.join(', ')})`;

export const createHandoverService = ({ store, events }: Pick<LedgerDependencies, 'store' | 'events'>) => {
    /**
     * Moves the cash an employee collected into the cashier's drawer. Everything
     * from order selection to the handover_in entry commits or rolls back as one.
     */
    const processHandover = async (
        cashierShiftId: number,
        employeeId: number,
        orderIds: readonly number[]
    ): Promise<HandoverResult> => {
        const logContext: LogContext = { function: 'processHandover', shiftId: cashierShiftId, employeeId, orderIds };
        try {
            const result = await store.transaction(async (tx): Promise<HandoverResult> => {
                // Lock order is orders, shift, employee, the same as order completion.
                const orders = await tx.findOrdersAwaitingCash(orderIds);

                const shift = await tx.findShift(cashierShiftId, { forUpdate: true });
                if (!shift) {
                    throw new ShiftNotFoundError(cashierShiftId);
                }
                if (shift.isClosed) {
                    throw new ShiftClosedError(cashierShiftId);
                }

                const employee = await tx.findEmployee(employeeId, { forUpdate: true });
                if (!employee) {
                    throw new EmployeeNotFoundError(employeeId);
                }

                if (orders.length === 0) {
                    throw new NoEligibleOrdersError(orderIds);
                }

                const amount = sumMoney(orders.map((order) => order.totalPrice));
                for (const order of orders) {
                    await tx.updateOrder(order.id, {
                        isCashTurnedIn: true,
                        ...(order.cashShiftId === null ? { cashShiftId: cashierShiftId } : {}),
                    });
                }

                await applyBalanceChange(tx, employee, amount.negated());

                const settledIds = orders.map((order) => order.id);
                const transaction = await tx.insertTransaction({
                    shiftId: cashierShiftId,
                    amount,
                    kind: 'handover_in',
                    comment: handoverComment(employee.fullName, settledIds),
                });
                return { amount, orderIds: settledIds, transaction };
            });

            logger.info(`Handover of ${formatMoney(result.amount)} accepted`, {
                ...logContext,
                orderIds: result.orderIds,
                transactionId: result.transaction.id,
            });
            await publishAfterCommit(events, {
                type: 'cash.handover.processed',
                shiftId: cashierShiftId,
                employeeId,
                orderIds: result.orderIds,
                amount: formatMoney(result.amount),
                occurredAt: result.transaction.createdAt.toISOString(),
            });
            return result;
        } catch (error) {
            if (error instanceof NoEligibleOrdersError) {
                logger.warn('Handover rejected: no eligible orders', logContext);
            }
            return rethrowAsServiceError(error, logContext, 'Failed to process handover');
        }
    };

    return { processHandover };
};

export type HandoverService = ReturnType<typeof createHandoverService>;
