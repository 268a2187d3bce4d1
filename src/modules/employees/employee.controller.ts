// src/modules/employees/employee.controller.ts
import { Request, Response } from 'express';
import httpStatus from 'http-status';
import catchAsync from '@/utils/catchAsync';
import { getValidated } from '@/middleware/validate.middleware';
import type { Services } from '@/services';
import { presentOrder } from '@/modules/orders/order.presenter';
import { EmployeeIdParamsDto } from './dto/employee-params.dto';
import { presentEmployeeBalance } from './employee.presenter';

export const createEmployeeController = ({ employeeDebtService }: Pick<Services, 'employeeDebtService'>) => {
    const getDebtors = catchAsync(async (_req: Request, res: Response) => {
        const debtors = await employeeDebtService.listDebtors();
        res.status(httpStatus.OK).send(debtors.map(presentEmployeeBalance));
    });

    const getPendingOrders = catchAsync(async (req: Request, res: Response) => {
        const { employeeId } = getValidated(req, EmployeeIdParamsDto, 'params');
        const orders = await employeeDebtService.listPendingOrders(employeeId);
        res.status(httpStatus.OK).send(orders.map(presentOrder));
    });

    return { getDebtors, getPendingOrders };
};
