// src/modules/handovers/handover.controller.ts
import { Request, Response } from 'express';
import httpStatus from 'http-status';
import catchAsync from '@/utils/catchAsync';
import { formatMoney } from '@/utils/money';
import { getValidated } from '@/middleware/validate.middleware';
import type { Services } from '@/services';
import { ShiftIdParamsDto } from '@/modules/shifts/dto/shift-params.dto';
import { presentTransaction } from '@/modules/shifts/shift.presenter';
import { ProcessHandoverDto } from './dto/process-handover.dto';

export const createHandoverController = ({ handoverService }: Pick<Services, 'handoverService'>) => {
    const processHandover = catchAsync(async (req: Request, res: Response) => {
        const { shiftId } = getValidated(req, ShiftIdParamsDto, 'params');
        const { employeeId, orderIds } = getValidated(req, ProcessHandoverDto);
        const result = await handoverService.processHandover(shiftId, employeeId, orderIds);
        res.status(httpStatus.CREATED).send({
            amount: formatMoney(result.amount),
            orderIds: result.orderIds,
            transaction: presentTransaction(result.transaction),
        });
    });

    return { processHandover };
};
