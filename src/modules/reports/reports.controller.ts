// src/modules/reports/reports.controller.ts
import { Request, Response } from 'express';
import httpStatus from 'http-status';
import catchAsync from '@/utils/catchAsync';
import pick from '@/utils/pick';
import { formatMoney } from '@/utils/money';
import { getValidated } from '@/middleware/validate.middleware';
import type { JournalEntry } from '@/db/ledger.store';
import type { WorkerStatistics } from './workers-report.service';
import type { Services } from '@/services';
import { ReportRangeQueryDto } from './dto/report-query.dto';

const presentJournalEntry = (entry: JournalEntry) => ({
    id: entry.id,
    shiftId: entry.shiftId,
    createdAt: entry.createdAt.toISOString(),
    kind: entry.kind,
    amount: formatMoney(entry.amount),
    comment: entry.comment,
    employeeName: entry.employeeName ?? 'System',
});

const presentWorker = (worker: WorkerStatistics) => ({
    employeeId: worker.employeeId,
    fullName: worker.fullName,
    role: worker.role,
    orderCount: worker.orderCount,
    total: formatMoney(worker.total),
    averageTicket: formatMoney(worker.averageTicket),
});

export const createReportsController = ({
    cashFlowReportService,
    workersReportService,
}: Pick<Services, 'cashFlowReportService' | 'workersReportService'>) => {
    const getCashFlowReport = catchAsync(async (req: Request, res: Response) => {
        const query = getValidated(req, ReportRangeQueryDto, 'query');
        const report = await cashFlowReportService.getCashFlowReport(pick(query, ['dateFrom', 'dateTo']));
        res.status(httpStatus.OK).send({
            dateFrom: report.dateFrom,
            dateTo: report.dateTo,
            cashRevenue: formatMoney(report.cashRevenue),
            cardRevenue: formatMoney(report.cardRevenue),
            totalRevenue: formatMoney(report.totalRevenue),
            totalExpenses: formatMoney(report.totalExpenses),
            journal: report.journal.map(presentJournalEntry),
        });
    });

    const getWorkersReport = catchAsync(async (req: Request, res: Response) => {
        const query = getValidated(req, ReportRangeQueryDto, 'query');
        const report = await workersReportService.getWorkersReport(pick(query, ['dateFrom', 'dateTo']));
        res.status(httpStatus.OK).send({
            dateFrom: report.dateFrom,
            dateTo: report.dateTo,
            workers: report.workers.map(presentWorker),
        });
    });

    return { getCashFlowReport, getWorkersReport };
};
