// src/modules/shifts/shift.service.ts
import type Decimal from 'decimal.js';
import type { ShiftFilter, ShiftRecord } from '@/db/ledger.store';
import { isUniqueViolation } from '@/db/pg-errors';
import type { LedgerDependencies } from '@/services';
import { publishAfterCommit } from '@/modules/notifications/ledger-events';
import logger, { type LogContext } from '@/utils/logger';
import { formatMoney, parseMoneyAmount } from '@/utils/money';
import {
    AlreadyOpenError,
    EmployeeNotFoundError,
    InvalidAmountError,
    ShiftAlreadyClosedError,
    ShiftNotFoundError,
    rethrowAsServiceError,
} from '@/utils/ledgerErrors';
import { buildShiftStatistics, type ShiftStatistics } from './shift-statistics.service';
import { presentShiftReport } from './shift.presenter';

const OPEN_SHIFT_INDEX = 'uq_cash_shifts_open_employee';

export interface OpenShiftInput {
    employeeId: number;
    startCash: Decimal.Value;
}

export interface CloseShiftResult {
    shift: ShiftRecord;
    /** Z-report frozen at close. */
    report: ShiftStatistics;
    /** endCashActual − theoreticalCash; negative means a shortage. */
    difference: Decimal;
}

export interface ShiftQuery extends ShiftFilter {
    page: number;
    limit: number;
}

export const createShiftService = ({ store, events, clock }: Pick<LedgerDependencies, 'store' | 'events' | 'clock'>) => {
    /**
     * Opens a shift for the employee. The employee row is locked so two concurrent
     * opens serialize; the partial unique index backs the same rule at the database.
     */
    const openShift = async (data: OpenShiftInput): Promise<ShiftRecord> => {
        const { employeeId } = data;
        const logContext: LogContext = { function: 'openShift', employeeId };
        const startCash = parseMoneyAmount(data.startCash, 'Start cash');
        if (startCash.isNegative()) {
            throw new InvalidAmountError('Start cash cannot be negative.');
        }

        try {
            const shift = await store.transaction(async (tx) => {
                const employee = await tx.findEmployee(employeeId, { forUpdate: true });
                if (!employee) {
                    throw new EmployeeNotFoundError(employeeId);
                }
                const existing = await tx.findOpenShiftByEmployee(employeeId);
                if (existing) {
                    logger.warn(`Employee already has open shift ${existing.id}`, logContext);
                    throw new AlreadyOpenError(employeeId, existing.id);
                }
                return tx.insertShift({ employeeId, startCash, startTime: clock() });
            });

            logger.info(`Cash shift ${shift.id} opened with ${formatMoney(startCash)}`, { ...logContext, shiftId: shift.id });
            await publishAfterCommit(events, {
                type: 'shift.opened',
                shiftId: shift.id,
                employeeId,
                startCash: formatMoney(shift.startCash),
                occurredAt: shift.startTime.toISOString(),
            });
            return shift;
        } catch (error) {
            if (isUniqueViolation(error, OPEN_SHIFT_INDEX)) {
                logger.warn('Concurrent open rejected by unique index', logContext);
                throw new AlreadyOpenError(employeeId);
            }
            return rethrowAsServiceError(error, logContext, 'Failed to open shift');
        }
    };

    const getOpenShift = async (employeeId: number): Promise<ShiftRecord | null> => {
        const logContext: LogContext = { function: 'getOpenShift', employeeId };
        try {
            return await store.transaction((tx) => tx.findOpenShiftByEmployee(employeeId));
        } catch (error) {
            return rethrowAsServiceError(error, logContext, 'Failed to retrieve open shift');
        }
    };

    /** Fallback attribution target: the open shift with the lowest id, if any. */
    const getAnyOpenShift = async (): Promise<ShiftRecord | null> => {
        const logContext: LogContext = { function: 'getAnyOpenShift' };
        try {
            return await store.transaction((tx) => tx.findAnyOpenShift());
        } catch (error) {
            return rethrowAsServiceError(error, logContext, 'Failed to retrieve open shift');
        }
    };

    const getShift = async (shiftId: number): Promise<ShiftRecord> => {
        const logContext: LogContext = { function: 'getShift', shiftId };
        try {
            const shift = await store.transaction((tx) => tx.findShift(shiftId));
            if (!shift) {
                throw new ShiftNotFoundError(shiftId);
            }
            return shift;
        } catch (error) {
            return rethrowAsServiceError(error, logContext, 'Failed to retrieve shift');
        }
    };

    const listShifts = async (query: ShiftQuery): Promise<{ shifts: ShiftRecord[]; totalResults: number }> => {
        const { page, limit, ...filter } = query;
        const logContext: LogContext = { function: 'listShifts', page, limit };
        try {
            const { rows, total } = await store.transaction((tx) =>
                tx.listShifts(filter, { limit, offset: (page - 1) * limit })
            );
            logger.debug(`Shift query returned ${rows.length} of ${total}`, logContext);
            return { shifts: rows, totalResults: total };
        } catch (error) {
            return rethrowAsServiceError(error, logContext, 'Failed to retrieve shifts');
        }
    };

    /**
     * Closes the shift: computes the Z figures under the shift lock, freezes them
     * on the row and reports the drawer difference. A shift closes exactly once.
     */
    const closeShift = async (shiftId: number, data: { endCashActual: Decimal.Value }): Promise<CloseShiftResult> => {
        const logContext: LogContext = { function: 'closeShift', shiftId };
        const endCashActual = parseMoneyAmount(data.endCashActual, 'Counted cash');
        if (endCashActual.isNegative()) {
            throw new InvalidAmountError('Counted cash cannot be negative.');
        }

        try {
            const result = await store.transaction(async (tx): Promise<CloseShiftResult> => {
                const shift = await tx.findShift(shiftId, { forUpdate: true });
                if (!shift) {
                    throw new ShiftNotFoundError(shiftId);
                }
                if (shift.isClosed) {
                    throw new ShiftAlreadyClosedError(shiftId);
                }

                const statistics = await buildShiftStatistics(tx, shift);
                const closed = await tx.closeShift(shiftId, {
                    endTime: clock(),
                    endCashActual,
                    isClosed: true,
                    totalSalesCash: statistics.salesCash,
                    totalSalesCard: statistics.salesCard,
                    serviceIn: statistics.serviceIn,
                    serviceOut: statistics.serviceOut,
                });
                const report: ShiftStatistics = { ...statistics, reportType: 'Z' };
                return { shift: closed, report, difference: endCashActual.minus(statistics.theoreticalCash) };
            });

            const { shift, report, difference } = result;
            const closeContext = { ...logContext, employeeId: shift.employeeId, difference: formatMoney(difference) };
            if (difference.isZero()) {
                logger.info(`Cash shift ${shiftId} closed, drawer balanced`, closeContext);
            } else {
                logger.warn(`Cash shift ${shiftId} closed with a drawer difference`, closeContext);
            }

            await publishAfterCommit(events, {
                type: 'shift.closed',
                shiftId,
                employeeId: shift.employeeId,
                endCashActual: formatMoney(endCashActual),
                difference: formatMoney(difference),
                report: presentShiftReport(report),
                occurredAt: (shift.endTime ?? clock()).toISOString(),
            });
            return result;
        } catch (error) {
            return rethrowAsServiceError(error, logContext, 'Failed to close shift');
        }
    };

    return { openShift, getOpenShift, getAnyOpenShift, getShift, listShifts, closeShift };
};

export type ShiftService = ReturnType<typeof createShiftService>;
