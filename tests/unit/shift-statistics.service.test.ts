import { createTestContext, type TestContext } from '../utils/test-utils';
import { ShiftNotFoundError } from '../../src/utils/ledgerErrors';

describe('Shift statistics', () => {
    let ctx: TestContext;

    beforeEach(() => {
        ctx = createTestContext();
    });

    it('computes theoretical cash from start cash, collected orders and service movements', async () => {
        const cashier = ctx.store.addEmployee();
        const shift = await ctx.services.shiftService.openShift({ employeeId: cashier.id, startCash: 500 });
        ctx.store.addOrder({ totalPrice: 200, isCashTurnedIn: true, cashShiftId: shift.id });
        await ctx.services.cashTransactionService.recordTransaction(shift.id, { amount: 50, kind: 'manual_out' });

        const stats = await ctx.services.shiftStatisticsService.computeShiftStatistics(shift.id);

        expect(stats.reportType).toBe('X');
        expect(stats.collectedCashOrders.toFixed(2)).toBe('200.00');
        expect(stats.serviceOut.toFixed(2)).toBe('50.00');
        expect(stats.theoreticalCash.toFixed(2)).toBe('650.00');
    });

    it('keeps sales and collected cash apart', async () => {
        const cashier = ctx.store.addEmployee();
        const courier = ctx.store.addEmployee();
        const shift = await ctx.services.shiftService.openShift({ employeeId: cashier.id, startCash: 100 });
        ctx.store.addOrder({ totalPrice: '40.25', isCashTurnedIn: true, cashShiftId: shift.id });
        ctx.store.addOrder({ totalPrice: 60, isCashTurnedIn: false, cashShiftId: shift.id, courierId: courier.id });
        ctx.store.addOrder({ paymentMethod: 'card', totalPrice: '19.99', cashShiftId: shift.id });
        ctx.store.addOrder({ totalPrice: 1000, isCashTurnedIn: true, cashShiftId: null });
        await ctx.services.cashTransactionService.recordTransaction(shift.id, { amount: 30, kind: 'manual_in' });

        const stats = await ctx.services.shiftStatisticsService.computeShiftStatistics(shift.id);

        expect(stats.salesCash.toFixed(2)).toBe('100.25');
        expect(stats.salesCard.toFixed(2)).toBe('19.99');
        expect(stats.totalSales.toFixed(2)).toBe('120.24');
        expect(stats.collectedCashOrders.toFixed(2)).toBe('40.25');
        expect(stats.serviceIn.toFixed(2)).toBe('30.00');
        expect(stats.theoreticalCash.toFixed(2)).toBe('170.25');
    });

    it('reports handed-over cash without counting it twice', async () => {
        const cashier = ctx.store.addEmployee();
        const courier = ctx.store.addEmployee({ cashBalance: 150 });
        const shift = await ctx.services.shiftService.openShift({ employeeId: cashier.id, startCash: 0 });
        const order = ctx.store.addOrder({ totalPrice: 150, courierId: courier.id, completedAt: new Date() });
        await ctx.services.handoverService.processHandover(shift.id, courier.id, [order.id]);

        const stats = await ctx.services.shiftStatisticsService.computeShiftStatistics(shift.id);

        expect(stats.handoverIn.toFixed(2)).toBe('150.00');
        expect(stats.collectedCashOrders.toFixed(2)).toBe('150.00');
        expect(stats.theoreticalCash.toFixed(2)).toBe('150.00');
    });

    it('marks the report final once the shift is closed', async () => {
        const cashier = ctx.store.addEmployee();
        const shift = await ctx.services.shiftService.openShift({ employeeId: cashier.id, startCash: 10 });
        await ctx.services.shiftService.closeShift(shift.id, { endCashActual: 10 });

        const stats = await ctx.services.shiftStatisticsService.computeShiftStatistics(shift.id);

        expect(stats.reportType).toBe('Z');
        expect(stats.theoreticalCash.toFixed(2)).toBe('10.00');
    });

    it('rejects unknown shifts', async () => {
        await expect(ctx.services.shiftStatisticsService.computeShiftStatistics(7)).rejects.toBeInstanceOf(
            ShiftNotFoundError
        );
    });

    it('surfaces store failures as internal errors', async () => {
        const cashier = ctx.store.addEmployee();
        const shift = await ctx.services.shiftService.openShift({ employeeId: cashier.id, startCash: 0 });
        ctx.store.failWhen('findShift');

        await expect(ctx.services.shiftStatisticsService.computeShiftStatistics(shift.id)).rejects.toMatchObject({
            statusCode: 500,
            isOperational: false,
            message: 'Failed to compute shift statistics.',
        });
    });
});
