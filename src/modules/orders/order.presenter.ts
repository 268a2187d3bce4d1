// src/modules/orders/order.presenter.ts
import type { OrderRecord, PaymentMethod } from '@/db/ledger.store';
import { formatMoney } from '@/utils/money';

export interface OrderLedgerResponse {
    id: number;
    paymentMethod: PaymentMethod;
    totalPrice: string;
    isCashTurnedIn: boolean;
    cashShiftId: number | null;
    courierId: number | null;
    waiterId: number | null;
    createdAt: string;
    completedAt: string | null;
}

export const presentOrder = (order: OrderRecord): OrderLedgerResponse => ({
    id: order.id,
    paymentMethod: order.paymentMethod,
    totalPrice: formatMoney(order.totalPrice),
    isCashTurnedIn: order.isCashTurnedIn,
    cashShiftId: order.cashShiftId,
    courierId: order.courierId,
    waiterId: order.waiterId,
    createdAt: order.createdAt.toISOString(),
    completedAt: order.completedAt?.toISOString() ?? null,
});
