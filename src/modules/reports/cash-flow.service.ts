// src/modules/reports/cash-flow.service.ts
import type Decimal from 'decimal.js';
import type { JournalEntry } from '@/db/ledger.store';
import type { LedgerDependencies } from '@/services';
import logger, { type LogContext } from '@/utils/logger';
import { ZERO } from '@/utils/money';
import { assertNever } from '@/utils/assertNever';
import { getDayRange } from '@/utils/date.utils';
import { rethrowAsServiceError } from '@/utils/ledgerErrors';

export interface CashFlowReport {
    dateFrom: string;
    dateTo: string;
    /** Revenue of orders completed within the range. */
    cashRevenue: Decimal;
    cardRevenue: Decimal;
    totalRevenue: Decimal;
    /** Sum of manual_out entries in the journal. */
    totalExpenses: Decimal;
    /** Drawer movements within the range, newest first. */
    journal: JournalEntry[];
}

export const createCashFlowReportService = ({ store, clock }: Pick<LedgerDependencies, 'store' | 'clock'>) => {
    /** Whole days, inclusive; both dates default to today. */
    const getCashFlowReport = async (query: { dateFrom?: string; dateTo?: string }): Promise<CashFlowReport> => {
        const logContext: LogContext = { function: 'getCashFlowReport', ...query };
        try {
            const range = getDayRange(query.dateFrom, query.dateTo, clock());
            const [revenueByMethod, journal] = await store.transaction((tx) =>
                Promise.all([tx.sumRevenueByPaymentMethod(range), tx.listJournal(range)])
            );

            let cashRevenue = ZERO;
            let cardRevenue = ZERO;
            for (const { paymentMethod, total } of revenueByMethod) {
                switch (paymentMethod) {
                    case 'cash':
                        cashRevenue = cashRevenue.plus(total);
                        break;
                    case 'card':
                        cardRevenue = cardRevenue.plus(total);
                        break;
                    default:
                        assertNever(paymentMethod);
                }
            }

            const totalExpenses = journal
                .filter((entry) => entry.kind === 'manual_out')
                .reduce((sum, entry) => sum.plus(entry.amount), ZERO);

            logger.debug(`Cash-flow report built with ${journal.length} journal entries`, {
                ...logContext,
                dateFrom: range.dateFrom,
                dateTo: range.dateTo,
            });
            return {
                dateFrom: range.dateFrom,
                dateTo: range.dateTo,
                cashRevenue,
                cardRevenue,
                totalRevenue: cashRevenue.plus(cardRevenue),
                totalExpenses,
                journal,
            };
        } catch (error) {
            return rethrowAsServiceError(error, logContext, 'Failed to build cash-flow report');
        }
    };

    return { getCashFlowReport };
};

export type CashFlowReportService = ReturnType<typeof createCashFlowReportService>;
