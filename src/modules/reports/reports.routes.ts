// src/modules/reports/reports.routes.ts
import express, { Router } from 'express';
import validateRequest from '@/middleware/validate.middleware';
import type { Services } from '@/services';
import { createReportsController } from './reports.controller';
import { ReportRangeQueryDto } from './dto/report-query.dto';

export const createReportsRouter = (services: Services): Router => {
    const router = express.Router();
    const reportsController = createReportsController(services);

    /**
     * GET /api/v1/reports/cash-flow?dateFrom=YYYY-MM-DD&dateTo=YYYY-MM-DD
     * Revenue by payment method plus the drawer journal for whole days.
     */
    router.get('/cash-flow', validateRequest(ReportRangeQueryDto, 'query'), reportsController.getCashFlowReport);

    /**
     * GET /api/v1/reports/workers?dateFrom=YYYY-MM-DD&dateTo=YYYY-MM-DD
     * Completed orders, total and average ticket per courier and waiter.
     */
    router.get('/workers', validateRequest(ReportRangeQueryDto, 'query'), reportsController.getWorkersReport);

    return router;
};
