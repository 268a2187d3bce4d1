// src/modules/shifts/shift.routes.ts
import express, { Router } from 'express';
import validateRequest from '@/middleware/validate.middleware';
import { generalRateLimiter } from '@/middleware/rateLimit.middleware';
import type { Services } from '@/services';
import { createShiftController } from './shift.controller';
import { OpenShiftDto } from './dto/open-shift.dto';
import { CloseShiftDto } from './dto/close-shift.dto';
import { ShiftIdParamsDto } from './dto/shift-params.dto';
import { OpenShiftQueryDto, ShiftQueryDto } from './dto/shift-query.dto';

export const createShiftRouter = (services: Services): Router => {
    const router = express.Router();
    const shiftController = createShiftController(services);

    router
        .route('/')
        .post(generalRateLimiter, validateRequest(OpenShiftDto), shiftController.openShift)
        .get(validateRequest(ShiftQueryDto, 'query'), shiftController.getShifts);

    // Must stay above '/:shiftId'
    router.get('/open', validateRequest(OpenShiftQueryDto, 'query'), shiftController.getOpenShift);

    router.get('/:shiftId', validateRequest(ShiftIdParamsDto, 'params'), shiftController.getShift);

    // X-report while open, Z-report once closed
    router.get('/:shiftId/statistics', validateRequest(ShiftIdParamsDto, 'params'), shiftController.getShiftStatistics);

    router.post(
        '/:shiftId/close',
        generalRateLimiter,
        validateRequest(ShiftIdParamsDto, 'params'),
        validateRequest(CloseShiftDto),
        shiftController.closeShift
    );

    return router;
};
