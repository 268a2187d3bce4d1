// src/services.ts
import type { LedgerStore } from '@/db/ledger.store';
import type { LedgerEventPublisher } from '@/modules/notifications/ledger-events';
import { createShiftStatisticsService } from '@/modules/shifts/shift-statistics.service';
import { createShiftService } from '@/modules/shifts/shift.service';
import { createCashTransactionService } from '@/modules/cash-transactions/cash-transaction.service';
import { createEmployeeDebtService } from '@/modules/employees/employee-debt.service';
import { createOrderSettlementService } from '@/modules/orders/order-settlement.service';
import { createHandoverService } from '@/modules/handovers/handover.service';
import { createCashFlowReportService } from '@/modules/reports/cash-flow.service';
import { createWorkersReportService } from '@/modules/reports/workers-report.service';

/** What every ledger service is built from. `clock` is injectable so tests can pin time. */
export interface LedgerDependencies {
    store: LedgerStore;
    events: LedgerEventPublisher;
    clock: () => Date;
}

export const createServices = (deps: LedgerDependencies) => ({
    shiftStatisticsService: createShiftStatisticsService(deps),
    shiftService: createShiftService(deps),
    cashTransactionService: createCashTransactionService(deps),
    employeeDebtService: createEmployeeDebtService(deps),
    orderSettlementService: createOrderSettlementService(deps),
    handoverService: createHandoverService(deps),
    cashFlowReportService: createCashFlowReportService(deps),
    workersReportService: createWorkersReportService(deps),
});

export type Services = ReturnType<typeof createServices>;
