// src/modules/cash-transactions/cash-transaction.service.ts
import type Decimal from 'decimal.js';
import type { CashTransactionKind, CashTransactionRecord } from '@/db/ledger.store';
import type { LedgerDependencies } from '@/services';
import { publishAfterCommit } from '@/modules/notifications/ledger-events';
import logger, { type LogContext } from '@/utils/logger';
import { formatMoney, parseMoneyAmount } from '@/utils/money';
import { InvalidAmountError, ShiftClosedError, ShiftNotFoundError, rethrowAsServiceError } from '@/utils/ledgerErrors';

export interface RecordTransactionInput {
    amount: Decimal.Value;
    kind: CashTransactionKind;
    comment?: string;
}

export const createCashTransactionService = ({ store, events }: Pick<LedgerDependencies, 'store' | 'events'>) => {
    /** Appends one entry to an open shift's drawer log. Entries are never edited afterwards. */
    const recordTransaction = async (shiftId: number, data: RecordTransactionInput): Promise<CashTransactionRecord> => {
        const logContext: LogContext = { function: 'recordTransaction', shiftId, kind: data.kind };
        const amount = parseMoneyAmount(data.amount);
        if (amount.lte(0)) {
            throw new InvalidAmountError();
        }

        try {
            const transaction = await store.transaction(async (tx) => {
                const shift = await tx.findShift(shiftId, { forUpdate: true });
                if (!shift) {
                    throw new ShiftNotFoundError(shiftId);
                }
                if (shift.isClosed) {
                    logger.warn(`Rejected ${data.kind} on closed shift`, logContext);
                    throw new ShiftClosedError(shiftId);
                }
                return tx.insertTransaction({ shiftId, amount, kind: data.kind, comment: data.comment ?? '' });
            });

            logger.info(`Recorded ${transaction.kind} of ${formatMoney(transaction.amount)}`, {
                ...logContext,
                transactionId: transaction.id,
            });
            await publishAfterCommit(events, {
                type: 'cash.transaction.recorded',
                shiftId,
                transactionId: transaction.id,
                kind: transaction.kind,
                amount: formatMoney(transaction.amount),
                occurredAt: transaction.createdAt.toISOString(),
            });
            return transaction;
        } catch (error) {
            return rethrowAsServiceError(error, logContext, 'Failed to record cash transaction');
        }
    };

    /** Oldest first. */
    const listTransactions = async (shiftId: number): Promise<CashTransactionRecord[]> => {
        const logContext: LogContext = { function: 'listTransactions', shiftId };
        try {
            return await store.transaction(async (tx) => {
                const shift = await tx.findShift(shiftId);
                if (!shift) {
                    throw new ShiftNotFoundError(shiftId);
                }
                return tx.listTransactions(shiftId);
            });
        } catch (error) {
            return rethrowAsServiceError(error, logContext, 'Failed to retrieve cash transactions');
        }
    };

    return { recordTransaction, listTransactions };
};

export type CashTransactionService = ReturnType<typeof createCashTransactionService>;
