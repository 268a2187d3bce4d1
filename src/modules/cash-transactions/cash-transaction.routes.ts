// src/modules/cash-transactions/cash-transaction.routes.ts
import express, { Router } from 'express';
import validateRequest from '@/middleware/validate.middleware';
import { generalRateLimiter } from '@/middleware/rateLimit.middleware';
import type { Services } from '@/services';
import { ShiftIdParamsDto } from '@/modules/shifts/dto/shift-params.dto';
import { createCashTransactionController } from './cash-transaction.controller';
import { RecordTransactionDto } from './dto/record-transaction.dto';

/** Mounted at `/shifts/:shiftId/transactions`. */
export const createCashTransactionRouter = (services: Services): Router => {
    const router = express.Router({ mergeParams: true });
    const controller = createCashTransactionController(services);

    // Params are re-merged per layer, so each route validates them itself.
    router
        .route('/')
        .post(
            generalRateLimiter,
            validateRequest(ShiftIdParamsDto, 'params'),
            validateRequest(RecordTransactionDto),
            controller.recordTransaction
        )
        .get(validateRequest(ShiftIdParamsDto, 'params'), controller.getTransactions);

    return router;
};
