// src/modules/shifts/shift.controller.ts
import { Request, Response } from 'express';
import httpStatus from 'http-status';
import catchAsync from '@/utils/catchAsync';
import ApiError from '@/utils/ApiError';
import pick from '@/utils/pick';
import { getOptionalBounds } from '@/utils/date.utils';
import { formatMoney } from '@/utils/money';
import { getValidated } from '@/middleware/validate.middleware';
import type { Services } from '@/services';
import { OpenShiftDto } from './dto/open-shift.dto';
import { CloseShiftDto } from './dto/close-shift.dto';
import { ShiftIdParamsDto } from './dto/shift-params.dto';
import { OpenShiftQueryDto, ShiftQueryDto } from './dto/shift-query.dto';
import { presentShift, presentShiftReport } from './shift.presenter';

export const createShiftController = ({
    shiftService,
    shiftStatisticsService,
}: Pick<Services, 'shiftService' | 'shiftStatisticsService'>) => {
    const openShift = catchAsync(async (req: Request, res: Response) => {
        const { employeeId, startCash } = getValidated(req, OpenShiftDto);
        const shift = await shiftService.openShift({ employeeId, startCash: startCash ?? 0 });
        res.status(httpStatus.CREATED).send(presentShift(shift));
    });

    /** With `employeeId`: that employee's open shift. Without: any open shift. */
    const getOpenShift = catchAsync(async (req: Request, res: Response) => {
        const { employeeId } = getValidated(req, OpenShiftQueryDto, 'query');
        const shift =
            employeeId === undefined
                ? await shiftService.getAnyOpenShift()
                : await shiftService.getOpenShift(employeeId);
        if (!shift) {
            throw ApiError.notFound('No open shift found.');
        }
        res.status(httpStatus.OK).send(presentShift(shift));
    });

    const getShifts = catchAsync(async (req: Request, res: Response) => {
        const query = getValidated(req, ShiftQueryDto, 'query');
        const limit = query.limit ?? 10;
        const page = query.page ?? 1;
        const { from, to } = getOptionalBounds(query.dateFrom, query.dateTo);

        const result = await shiftService.listShifts({
            ...pick(query, ['employeeId', 'isClosed']),
            ...(from && { startedFrom: from }),
            ...(to && { startedTo: to }),
            page,
            limit,
        });
        res.status(httpStatus.OK).send({
            results: result.shifts.map(presentShift),
            page,
            limit,
            totalPages: Math.ceil(result.totalResults / limit),
            totalResults: result.totalResults,
        });
    });

    const getShift = catchAsync(async (req: Request, res: Response) => {
        const { shiftId } = getValidated(req, ShiftIdParamsDto, 'params');
        const shift = await shiftService.getShift(shiftId);
        res.status(httpStatus.OK).send(presentShift(shift));
    });

    const getShiftStatistics = catchAsync(async (req: Request, res: Response) => {
        const { shiftId } = getValidated(req, ShiftIdParamsDto, 'params');
        const statistics = await shiftStatisticsService.computeShiftStatistics(shiftId);
        res.status(httpStatus.OK).send(presentShiftReport(statistics));
    });

    const closeShift = catchAsync(async (req: Request, res: Response) => {
        const { shiftId } = getValidated(req, ShiftIdParamsDto, 'params');
        const { endCashActual } = getValidated(req, CloseShiftDto);
        const { shift, report, difference } = await shiftService.closeShift(shiftId, { endCashActual });
        res.status(httpStatus.OK).send({
            shift: presentShift(shift),
            report: presentShiftReport(report),
            difference: formatMoney(difference),
        });
    });

    return { openShift, getOpenShift, getShifts, getShift, getShiftStatistics, closeShift };
};
