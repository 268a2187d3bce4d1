import type { CashTransactionKind, CashTransactionRecord, ShiftRecord } from '@/db/ledger.store';
import { formatMoney, formatMoneyOrNull } from '@/utils/money';
import type { ReportType, ShiftStatistics } from './shift-statistics.service';

export interface ShiftResponse {
    id: number;
    employeeId: number;
    startTime: string;
    endTime: string | null;
    startCash: string;
    endCashActual: string | null;
    isClosed: boolean;
    totalSalesCash: string | null;
    totalSalesCard: string | null;
    serviceIn: string | null;
    serviceOut: string | null;
}

export interface ShiftReportResponse {
    shiftId: number;
    employeeId: number;
    reportType: ReportType;
    startTime: string;
    startCash: string;
    salesCash: string;
    salesCard: string;
    totalSales: string;
    serviceIn: string;
    serviceOut: string;
    handoverIn: string;
    collectedCashOrders: string;
    theoreticalCash: string;
}

export interface CashTransactionResponse {
    id: number;
    shiftId: number;
    amount: string;
    kind: CashTransactionKind;
    comment: string;
    createdAt: string;
}

export const presentShift = (shift: ShiftRecord): ShiftResponse => ({
    id: shift.id,
    employeeId: shift.employeeId,
    startTime: shift.startTime.toISOString(),
    endTime: shift.endTime?.toISOString() ?? null,
    startCash: formatMoney(shift.startCash),
    endCashActual: formatMoneyOrNull(shift.endCashActual),
    isClosed: shift.isClosed,
    totalSalesCash: formatMoneyOrNull(shift.totalSalesCash),
    totalSalesCard: formatMoneyOrNull(shift.totalSalesCard),
    serviceIn: formatMoneyOrNull(shift.serviceIn),
    serviceOut: formatMoneyOrNull(shift.serviceOut),
});

export const presentShiftReport = (report: ShiftStatistics): ShiftReportResponse => ({
    shiftId: report.shiftId,
    employeeId: report.employeeId,
    reportType: report.reportType,
    startTime: report.startTime.toISOString(),
    startCash: formatMoney(report.startCash),
    salesCash: formatMoney(report.salesCash),
    salesCard: formatMoney(report.salesCard),
    totalSales: formatMoney(report.totalSales),
    serviceIn: formatMoney(report.serviceIn),
    serviceOut: formatMoney(report.serviceOut),
    handoverIn: formatMoney(report.handoverIn),
    collectedCashOrders: formatMoney(report.collectedCashOrders),
    theoreticalCash: formatMoney(report.theoreticalCash),
});

export const presentTransaction = (transaction: CashTransactionRecord): CashTransactionResponse => ({
    id: transaction.id,
    shiftId: transaction.shiftId,
    amount: formatMoney(transaction.amount),
    kind: transaction.kind,
    comment: transaction.comment,
    createdAt: transaction.createdAt.toISOString(),
});
