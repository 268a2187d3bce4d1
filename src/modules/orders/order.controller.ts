// src/modules/orders/order.controller.ts
import { Request, Response } from 'express';
import httpStatus from 'http-status';
import catchAsync from '@/utils/catchAsync';
import { formatMoney } from '@/utils/money';
import { getValidated } from '@/middleware/validate.middleware';
import type { Services } from '@/services';
import { OrderIdParamsDto } from './dto/order-params.dto';
import { CompleteOrderDto, LinkOrderDto, RegisterDebtDto } from './dto/order-settlement.dto';

export const createOrderController = ({
    orderSettlementService,
    employeeDebtService,
}: Pick<Services, 'orderSettlementService' | 'employeeDebtService'>) => {
    const completeOrder = catchAsync(async (req: Request, res: Response) => {
        const { orderId } = getValidated(req, OrderIdParamsDto, 'params');
        const { actingEmployeeId } = getValidated(req, CompleteOrderDto);
        const completion = await orderSettlementService.completeOrder(orderId, actingEmployeeId ?? null);
        res.status(httpStatus.OK).send(completion);
    });

    const linkOrder = catchAsync(async (req: Request, res: Response) => {
        const { orderId } = getValidated(req, OrderIdParamsDto, 'params');
        const { preferredEmployeeId } = getValidated(req, LinkOrderDto);
        const cashShiftId = await orderSettlementService.linkOrderToShift(orderId, preferredEmployeeId ?? null);
        res.status(httpStatus.OK).send({ orderId, cashShiftId });
    });

    const registerDebt = catchAsync(async (req: Request, res: Response) => {
        const { orderId } = getValidated(req, OrderIdParamsDto, 'params');
        const { employeeId } = getValidated(req, RegisterDebtDto);
        const registration = await employeeDebtService.registerDebt(orderId, employeeId);
        res.status(httpStatus.OK).send({ ...registration, cashBalance: formatMoney(registration.cashBalance) });
    });

    return { completeOrder, linkOrder, registerDebt };
};
