// src/modules/cash-transactions/cash-transaction.controller.ts
import { Request, Response } from 'express';
import httpStatus from 'http-status';
import catchAsync from '@/utils/catchAsync';
import { getValidated } from '@/middleware/validate.middleware';
import type { Services } from '@/services';
import { ShiftIdParamsDto } from '@/modules/shifts/dto/shift-params.dto';
import { presentTransaction } from '@/modules/shifts/shift.presenter';
import { RecordTransactionDto } from './dto/record-transaction.dto';

export const createCashTransactionController = ({ cashTransactionService }: Pick<Services, 'cashTransactionService'>) => {
    const recordTransaction = catchAsync(async (req: Request, res: Response) => {
        const { shiftId } = getValidated(req, ShiftIdParamsDto, 'params');
        const { amount, kind, comment } = getValidated(req, RecordTransactionDto);
        const transaction = await cashTransactionService.recordTransaction(shiftId, { amount, kind, comment });
        res.status(httpStatus.CREATED).send(presentTransaction(transaction));
    });

    const getTransactions = catchAsync(async (req: Request, res: Response) => {
        const { shiftId } = getValidated(req, ShiftIdParamsDto, 'params');
        const transactions = await cashTransactionService.listTransactions(shiftId);
        res.status(httpStatus.OK).send(transactions.map(presentTransaction));
    });

    return { recordTransaction, getTransactions };
};
