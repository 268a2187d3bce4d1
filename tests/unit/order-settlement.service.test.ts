import { createTestContext, type TestContext } from '../utils/test-utils';
import { OrderAlreadyCompletedError, OrderNotFoundError } from '../../src/utils/ledgerErrors';

describe('Order settlement', () => {
    let ctx: TestContext;

    beforeEach(() => {
        ctx = createTestContext();
    });

    describe('linkOrderToShift', () => {
        it('prefers the open shift of the given employee', async () => {
            const a = ctx.store.addEmployee();
            const b = ctx.store.addEmployee();
            await ctx.services.shiftService.openShift({ employeeId: a.id, startCash: 0 });
            const preferred = await ctx.services.shiftService.openShift({ employeeId: b.id, startCash: 0 });
            const order = ctx.store.addOrder({ totalPrice: 10 });

            await expect(ctx.services.orderSettlementService.linkOrderToShift(order.id, b.id)).resolves.toBe(preferred.id);
            expect(ctx.store.order(order.id)?.cashShiftId).toBe(preferred.id);
        });

        it('falls back to the lowest-id open shift', async () => {
            const a = ctx.store.addEmployee();
            const b = ctx.store.addEmployee();
            const idle = ctx.store.addEmployee();
            const first = await ctx.services.shiftService.openShift({ employeeId: a.id, startCash: 0 });
            await ctx.services.shiftService.openShift({ employeeId: b.id, startCash: 0 });
            const order = ctx.store.addOrder({ totalPrice: 10 });

            await expect(ctx.services.orderSettlementService.linkOrderToShift(order.id, idle.id)).resolves.toBe(first.id);
        });

        it('is idempotent once linked', async () => {
            const a = ctx.store.addEmployee();
            const b = ctx.store.addEmployee();
            const original = await ctx.services.shiftService.openShift({ employeeId: a.id, startCash: 0 });
            const order = ctx.store.addOrder({ totalPrice: 10 });
            await ctx.services.orderSettlementService.linkOrderToShift(order.id, a.id);
            await ctx.services.shiftService.closeShift(original.id, { endCashActual: 0 });
            await ctx.services.shiftService.openShift({ employeeId: b.id, startCash: 0 });

            await expect(ctx.services.orderSettlementService.linkOrderToShift(order.id, b.id)).resolves.toBe(original.id);
            expect(ctx.store.order(order.id)?.cashShiftId).toBe(original.id);
        });

        it('leaves the order unlinked and reports it when no shift is open', async () => {
            const order = ctx.store.addOrder({ totalPrice: 10 });

            await expect(ctx.services.orderSettlementService.linkOrderToShift(order.id, null)).resolves.toBeNull();
            expect(ctx.store.order(order.id)?.cashShiftId).toBeNull();
            expect(ctx.events.ofType('order.unlinked').map((event) => event.orderId)).toEqual([order.id]);
        });

        it('rejects unknown orders', async () => {
            await expect(ctx.services.orderSettlementService.linkOrderToShift(5, null)).rejects.toBeInstanceOf(
                OrderNotFoundError
            );
        });
    });

    describe('completeOrder', () => {
        it('books cash collected by a courier as the courier debt', async () => {
            const courier = ctx.store.addEmployee();
            const waiter = ctx.store.addEmployee();
            const order = ctx.store.addOrder({ totalPrice: 150, courierId: courier.id, waiterId: waiter.id });

            const completion = await ctx.services.orderSettlementService.completeOrder(order.id, null);

            expect(completion).toEqual({ orderId: order.id, cashShiftId: null, debtorId: courier.id, isCashTurnedIn: false });
            expect(ctx.store.employee(courier.id)?.cashBalance.toFixed(2)).toBe('150.00');
            expect(ctx.store.employee(waiter.id)?.cashBalance.toFixed(2)).toBe('0.00');
            expect(ctx.store.order(order.id)?.completedAt).not.toBeNull();
        });

        it('books the waiter when there is no courier', async () => {
            const waiter = ctx.store.addEmployee();
            const order = ctx.store.addOrder({ totalPrice: 42, waiterId: waiter.id });

            const completion = await ctx.services.orderSettlementService.completeOrder(order.id, null);

            expect(completion.debtorId).toBe(waiter.id);
            expect(ctx.store.employee(waiter.id)?.cashBalance.toFixed(2)).toBe('42.00');
        });

        it('settles cash paid at the counter straight into the acting cashier shift', async () => {
            const cashier = ctx.store.addEmployee();
            const shift = await ctx.services.shiftService.openShift({ employeeId: cashier.id, startCash: 0 });
            const order = ctx.store.addOrder({ totalPrice: 25 });

            const completion = await ctx.services.orderSettlementService.completeOrder(order.id, cashier.id);

            expect(completion).toEqual({ orderId: order.id, cashShiftId: shift.id, debtorId: null, isCashTurnedIn: true });
            const stats = await ctx.services.shiftStatisticsService.computeShiftStatistics(shift.id);
            expect(stats.collectedCashOrders.toFixed(2)).toBe('25.00');
        });

        it('books nothing for card payments', async () => {
            const courier = ctx.store.addEmployee();
            const order = ctx.store.addOrder({ paymentMethod: 'card', totalPrice: 60, courierId: courier.id });

            const completion = await ctx.services.orderSettlementService.completeOrder(order.id, null);

            expect(completion.debtorId).toBeNull();
            expect(completion.isCashTurnedIn).toBe(false);
            expect(ctx.store.employee(courier.id)?.cashBalance.toFixed(2)).toBe('0.00');
        });

        it('refuses to complete an order twice', async () => {
            const courier = ctx.store.addEmployee();
            const order = ctx.store.addOrder({ totalPrice: 15, courierId: courier.id });
            await ctx.services.orderSettlementService.completeOrder(order.id, null);

            await expect(ctx.services.orderSettlementService.completeOrder(order.id, null)).rejects.toBeInstanceOf(
                OrderAlreadyCompletedError
            );
            expect(ctx.store.employee(courier.id)?.cashBalance.toFixed(2)).toBe('15.00');
        });

        it('rolls back the shift link when booking the debt fails', async () => {
            const cashier = ctx.store.addEmployee();
            const courier = ctx.store.addEmployee();
            await ctx.services.shiftService.openShift({ employeeId: cashier.id, startCash: 0 });
            const order = ctx.store.addOrder({ totalPrice: 15, courierId: courier.id });
            ctx.store.failWhen('setEmployeeBalance');

            await expect(ctx.services.orderSettlementService.completeOrder(order.id, cashier.id)).rejects.toMatchObject({
                statusCode: 500,
            });
            expect(ctx.store.order(order.id)).toMatchObject({ cashShiftId: null, completedAt: null });
            expect(ctx.store.employee(courier.id)?.cashBalance.toFixed(2)).toBe('0.00');
        });
    });
});
