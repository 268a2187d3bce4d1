import type Decimal from 'decimal.js';
import type { LedgerStore, LedgerTx, ShiftRecord } from '@/db/ledger.store';
import logger, { type LogContext } from '@/utils/logger';
import { ZERO } from '@/utils/money';
import { assertNever } from '@/utils/assertNever';
import { ShiftNotFoundError, rethrowAsServiceError } from '@/utils/ledgerErrors';

/** X while the shift is open (provisional), Z once it is closed (final). */
export type ReportType = 'X' | 'Z';

export interface ShiftStatistics {
    shiftId: number;
    employeeId: number;
    reportType: ReportType;
    startTime: Date;
    startCash: Decimal;
    /** Business view: every order attributed to the shift, turned in or not. */
    salesCash: Decimal;
    salesCard: Decimal;
    totalSales: Decimal;
    serviceIn: Decimal;
    serviceOut: Decimal;
    /** Informational only; the handed-over orders already count in collectedCashOrders. */
    handoverIn: Decimal;
    /** Drawer view: linked cash orders whose money reached the drawer. */
    collectedCashOrders: Decimal;
    theoreticalCash: Decimal;
}

/**
 * Computes the X/Z figures for `shift` inside an existing unit of work. Read-only;
 * CloseShift calls it under the shift lock so the frozen totals match the report.
 *
 * theoreticalCash = startCash + collectedCashOrders + serviceIn − serviceOut
 */
export const buildShiftStatistics = async (tx: LedgerTx, shift: ShiftRecord): Promise<ShiftStatistics> => {
    const [salesByMethod, transactionsByKind, collectedCashOrders] = await Promise.all([
        tx.sumOrdersByPaymentMethod(shift.id),
        tx.sumTransactionsByKind(shift.id),
        tx.sumCollectedCash(shift.id),
    ]);

    let salesCash = ZERO;
    let salesCard = ZERO;
    for (const { paymentMethod, total } of salesByMethod) {
        switch (paymentMethod) {
            case 'cash':
                salesCash = salesCash.plus(total);
                break;
            case 'card':
                salesCard = salesCard.plus(total);
                break;
            default:
                assertNever(paymentMethod);
        }
    }

    let serviceIn = ZERO;
    let serviceOut = ZERO;
    let handoverIn = ZERO;
    for (const { kind, total } of transactionsByKind) {
        switch (kind) {
            case 'manual_in':
                serviceIn = serviceIn.plus(total);
                break;
            case 'manual_out':
                serviceOut = serviceOut.plus(total);
                break;
            case 'handover_in':
                handoverIn = handoverIn.plus(total);
                break;
            default:
                assertNever(kind);
        }
    }

    return {
        shiftId: shift.id,
        employeeId: shift.employeeId,
        reportType: shift.isClosed ? 'Z' : 'X',
        startTime: shift.startTime,
        startCash: shift.startCash,
        salesCash,
        salesCard,
        totalSales: salesCash.plus(salesCard),
        serviceIn,
        serviceOut,
        handoverIn,
        collectedCashOrders,
        theoreticalCash: shift.startCash.plus(collectedCashOrders).plus(serviceIn).minus(serviceOut),
    };
};

export const createShiftStatisticsService = ({ store }: { store: LedgerStore }) => {
    /** X-report for an open shift, recomputed Z-report for a closed one. */
    const computeShiftStatistics = async (shiftId: number): Promise<ShiftStatistics> => {
        const logContext: LogContext = { function: 'computeShiftStatistics', shiftId };
        try {
            const statistics = await store.transaction(async (tx) => {
                const shift = await tx.findShift(shiftId);
                if (!shift) {
                    throw new ShiftNotFoundError(shiftId);
                }
                return buildShiftStatistics(tx, shift);
            });
            logger.debug(`Shift statistics computed`, { ...logContext, reportType: statistics.reportType });
            return statistics;
        } catch (error) {
            return rethrowAsServiceError(error, logContext, 'Failed to compute shift statistics');
        }
    };

    return { computeShiftStatistics };
};

export type ShiftStatisticsService = ReturnType<typeof createShiftStatisticsService>;
