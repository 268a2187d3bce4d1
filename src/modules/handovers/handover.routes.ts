// src/modules/handovers/handover.routes.ts
import express, { Router } from 'express';
import validateRequest from '@/middleware/validate.middleware';
import { generalRateLimiter } from '@/middleware/rateLimit.middleware';
import type { Services } from '@/services';
import { ShiftIdParamsDto } from '@/modules/shifts/dto/shift-params.dto';
import { createHandoverController } from './handover.controller';
import { ProcessHandoverDto } from './dto/process-handover.dto';

/** Mounted at `/shifts/:shiftId/handovers`; the shift is the receiving cashier's. */
export const createHandoverRouter = (services: Services): Router => {
    const router = express.Router({ mergeParams: true });
    const handoverController = createHandoverController(services);

    router.post(
        '/',
        generalRateLimiter,
        validateRequest(ShiftIdParamsDto, 'params'),
        validateRequest(ProcessHandoverDto),
        handoverController.processHandover
    );

    return router;
};
