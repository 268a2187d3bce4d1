// src/modules/reports/workers-report.service.ts
import Decimal from 'decimal.js';
import type { WorkerRole } from '@/db/ledger.store';
import type { LedgerDependencies } from '@/services';
import logger, { type LogContext } from '@/utils/logger';
import { MONEY_SCALE, ZERO } from '@/utils/money';
import { getDayRange } from '@/utils/date.utils';
import { rethrowAsServiceError } from '@/utils/ledgerErrors';

export interface WorkerStatistics {
    employeeId: number;
    fullName: string;
    role: WorkerRole;
    orderCount: number;
    total: Decimal;
    /** total / orderCount, rounded half up to cents. */
    averageTicket: Decimal;
}

export interface WorkersReport {
    dateFrom: string;
    dateTo: string;
    /** Highest total first. */
    workers: WorkerStatistics[];
}

export const createWorkersReportService = ({ store, clock }: Pick<LedgerDependencies, 'store' | 'clock'>) => {
    /**
     * Completed orders per courier, and per waiter for orders served without a
     * courier, over whole days. An employee who did both appears once per role.
     */
    const getWorkersReport = async (query: { dateFrom?: string; dateTo?: string }): Promise<WorkersReport> => {
        const logContext: LogContext = { function: 'getWorkersReport', ...query };
        try {
            const range = getDayRange(query.dateFrom, query.dateTo, clock());
            const totals = await store.transaction((tx) => tx.sumOrdersByWorker(range));

            const workers = totals
                .map(
                    (row): WorkerStatistics => ({
                        ...row,
                        averageTicket:
                            row.orderCount > 0
                                ? row.total.dividedBy(row.orderCount).toDecimalPlaces(MONEY_SCALE, Decimal.ROUND_HALF_UP)
                                : ZERO,
                    })
                )
                .sort(
                    (a, b) =>
                        b.total.comparedTo(a.total) || a.employeeId - b.employeeId || a.role.localeCompare(b.role)
                );

            logger.debug(`Workers report built for ${workers.length} rows`, {
                ...logContext,
                dateFrom: range.dateFrom,
                dateTo: range.dateTo,
            });
            return { dateFrom: range.dateFrom, dateTo: range.dateTo, workers };
        } catch (error) {
            return rethrowAsServiceError(error, logContext, 'Failed to build workers report');
        }
    };

    return { getWorkersReport };
};

export type WorkersReportService = ReturnType<typeof createWorkersReportService>;
