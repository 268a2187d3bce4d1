// src/modules/employees/employee.presenter.ts
import type { EmployeeRecord } from '@/db/ledger.store';
import { formatMoney } from '@/utils/money';

export interface EmployeeBalanceResponse {
    id: number;
    fullName: string;
    cashBalance: string;
}

export const presentEmployeeBalance = (employee: EmployeeRecord): EmployeeBalanceResponse => ({
    id: employee.id,
    fullName: employee.fullName,
    cashBalance: formatMoney(employee.cashBalance),
});
