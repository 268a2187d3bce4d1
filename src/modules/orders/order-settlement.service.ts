// src/modules/orders/order-settlement.service.ts
import type { LedgerTx, OrderRecord, ShiftRecord } from '@/db/ledger.store';
import type { LedgerDependencies } from '@/services';
import { publishAfterCommit } from '@/modules/notifications/ledger-events';
import { registerDebtInTx } from '@/modules/employees/employee-debt.service';
import logger, { type LogContext } from '@/utils/logger';
import { OrderAlreadyCompletedError, OrderNotFoundError, rethrowAsServiceError } from '@/utils/ledgerErrors';

export interface OrderCompletion {
    orderId: number;
    cashShiftId: number | null;
    /** Courier or waiter now owing the order's cash; null when nobody does. */
    debtorId: number | null;
    isCashTurnedIn: boolean;
}

/** Locks a candidate shift and returns it only if it is still open. */
const lockIfOpen = async (tx: LedgerTx, candidate: ShiftRecord | null): Promise<ShiftRecord | null> => {
    if (!candidate) return null;
    const locked = await tx.findShift(candidate.id, { forUpdate: true });
    return locked && !locked.isClosed ? locked : null;
};

/**
 * Attaches the (already locked) order to a shift: the preferred employee's open
 * shift, else any open shift. An order that already has a shift keeps it.
 * Returns the shift id, or null when no shift is open anywhere.
 */
export const linkOrderInTx = async (
    tx: LedgerTx,
    order: OrderRecord,
    preferredEmployeeId: number | null
): Promise<number | null> => {
    if (order.cashShiftId !== null) {
        return order.cashShiftId;
    }

    let target: ShiftRecord | null = null;
    if (preferredEmployeeId !== null) {
        target = await lockIfOpen(tx, await tx.findOpenShiftByEmployee(preferredEmployeeId));
    }
    if (!target) {
        target = await lockIfOpen(tx, await tx.findAnyOpenShift());
    }
    if (!target) {
        return null;
    }

    await tx.updateOrder(order.id, { cashShiftId: target.id });
    return target.id;
};

export const createOrderSettlementService = ({
    store,
    events,
    clock,
}: Pick<LedgerDependencies, 'store' | 'events' | 'clock'>) => {
    const reportUnlinked = async (orderId: number, logContext: LogContext): Promise<void> => {
        logger.warn(`No open shift to attribute order ${orderId} to; left unlinked`, logContext);
        await publishAfterCommit(events, { type: 'order.unlinked', orderId, occurredAt: clock().toISOString() });
    };

    const linkOrderToShift = async (orderId: number, preferredEmployeeId: number | null): Promise<number | null> => {
        const logContext: LogContext = { function: 'linkOrderToShift', orderId, employeeId: preferredEmployeeId };
        try {
            const shiftId = await store.transaction(async (tx) => {
                const order = await tx.findOrder(orderId, { forUpdate: true });
                if (!order) {
                    throw new OrderNotFoundError(orderId);
                }
                return linkOrderInTx(tx, order, preferredEmployeeId);
            });

            if (shiftId === null) {
                await reportUnlinked(orderId, logContext);
            } else {
                logger.info(`Order linked to shift ${shiftId}`, { ...logContext, shiftId });
            }
            return shiftId;
        } catch (error) {
            return rethrowAsServiceError(error, logContext, 'Failed to link order to shift');
        }
    };

    /**
     * Settles a freshly completed order: link it to a shift, then book its cash as a
     * debt of the courier (or the waiter when there is no courier). With neither,
     * the cash went straight into a drawer and the order is marked turned in.
     */
    const completeOrder = async (orderId: number, actingEmployeeId: number | null): Promise<OrderCompletion> => {
        const logContext: LogContext = { function: 'completeOrder', orderId, employeeId: actingEmployeeId };
        try {
            const completion = await store.transaction(async (tx): Promise<OrderCompletion> => {
                const order = await tx.findOrder(orderId, { forUpdate: true });
                if (!order) {
                    throw new OrderNotFoundError(orderId);
                }
                if (order.completedAt !== null) {
                    throw new OrderAlreadyCompletedError(orderId);
                }

                const cashShiftId = await linkOrderInTx(tx, order, actingEmployeeId);

                let debtorId: number | null = null;
                let settledInDrawer = false;
                if (order.paymentMethod === 'cash') {
                    debtorId = order.courierId ?? order.waiterId;
                    if (debtorId !== null) {
                        await registerDebtInTx(tx, order, debtorId);
                    } else {
                        settledInDrawer = true;
                    }
                }

                const completed = await tx.updateOrder(orderId, {
                    completedAt: clock(),
                    ...(settledInDrawer ? { isCashTurnedIn: true } : {}),
                });
                return { orderId, cashShiftId, debtorId, isCashTurnedIn: completed.isCashTurnedIn };
            });

            if (completion.cashShiftId === null) {
                await reportUnlinked(orderId, logContext);
            }
            logger.info('Order completed', { ...logContext, ...completion });
            return completion;
        } catch (error) {
            return rethrowAsServiceError(error, logContext, 'Failed to complete order');
        }
    };

    return { linkOrderToShift, completeOrder };
};

export type OrderSettlementService = ReturnType<typeof createOrderSettlementService>;
