// src/modules/employees/employee.routes.ts
import express, { Router } from 'express';
import validateRequest from '@/middleware/validate.middleware';
import type { Services } from '@/services';
import { createEmployeeController } from './employee.controller';
import { EmployeeIdParamsDto } from './dto/employee-params.dto';

export const createEmployeeRouter = (services: Services): Router => {
    const router = express.Router();
    const employeeController = createEmployeeController(services);

    router.get('/debtors', employeeController.getDebtors);

    // What a cashier picks from before a handover
    router.get(
        '/:employeeId/pending-orders',
        validateRequest(EmployeeIdParamsDto, 'params'),
        employeeController.getPendingOrders
    );

    return router;
};
