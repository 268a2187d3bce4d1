import { createTestContext, type TestContext } from '../utils/test-utils';

describe('Workers report', () => {
    let ctx: TestContext;
    const at = (day: number, hour: number) => new Date(2024, 4, day, hour, 0, 0);

    beforeEach(() => {
        ctx = createTestContext();
    });

    const rows = async (query: { dateFrom?: string; dateTo?: string } = {}) =>
        (await ctx.services.workersReportService.getWorkersReport(query)).workers.map((worker) => ({
            employeeId: worker.employeeId,
            role: worker.role,
            orderCount: worker.orderCount,
            total: worker.total.toFixed(2),
            averageTicket: worker.averageTicket.toFixed(2),
        }));

    it('attributes orders to the courier, else the waiter, highest total first', async () => {
        const eve = ctx.store.addEmployee({ fullName: 'Eve Courier' });
        const wes = ctx.store.addEmployee({ fullName: 'Wes Waiter' });
        const maya = ctx.store.addEmployee({ fullName: 'Maya Both' });
        ctx.store.addOrder({ totalPrice: 100, courierId: eve.id, waiterId: wes.id, completedAt: at(10, 10) });
        ctx.store.addOrder({ paymentMethod: 'card', totalPrice: '50.50', courierId: eve.id, completedAt: at(10, 11) });
        ctx.store.addOrder({ totalPrice: 30, waiterId: wes.id, completedAt: at(10, 12) });
        ctx.store.addOrder({ totalPrice: 10, waiterId: wes.id, completedAt: at(10, 13) });
        ctx.store.addOrder({ totalPrice: 40, courierId: maya.id, completedAt: at(10, 14) });
        ctx.store.addOrder({ totalPrice: 25, waiterId: maya.id, completedAt: at(10, 15) });
        ctx.store.addOrder({ totalPrice: 999, courierId: eve.id, completedAt: null });
        ctx.store.addOrder({ totalPrice: 500, courierId: eve.id, completedAt: at(9, 20) });
        ctx.store.addOrder({ totalPrice: 7, completedAt: at(10, 16) });

        expect(await rows({ dateFrom: '2024-05-10' })).toEqual([
            { employeeId: eve.id, role: 'courier', orderCount: 2, total: '150.50', averageTicket: '75.25' },
            { employeeId: wes.id, role: 'waiter', orderCount: 2, total: '40.00', averageTicket: '20.00' },
            { employeeId: maya.id, role: 'courier', orderCount: 1, total: '40.00', averageTicket: '40.00' },
            { employeeId: maya.id, role: 'waiter', orderCount: 1, total: '25.00', averageTicket: '25.00' },
        ]);
    });

    it('rounds the average ticket half up to cents', async () => {
        const ola = ctx.store.addEmployee();
        ctx.store.addOrder({ totalPrice: '0.01', courierId: ola.id, completedAt: at(10, 9) });
        ctx.store.addOrder({ totalPrice: '0.02', courierId: ola.id, completedAt: at(10, 9) });

        expect(await rows()).toEqual([
            { employeeId: ola.id, role: 'courier', orderCount: 2, total: '0.03', averageTicket: '0.02' },
        ]);
    });

    it('covers every day of a range and defaults to today', async () => {
        const eve = ctx.store.addEmployee();
        ctx.store.addOrder({ totalPrice: 500, courierId: eve.id, completedAt: at(9, 20) });
        ctx.store.addOrder({ totalPrice: 20, courierId: eve.id, completedAt: at(10, 8) });

        const ranged = await ctx.services.workersReportService.getWorkersReport({ dateFrom: '2024-05-09', dateTo: '2024-05-10' });
        expect(ranged.dateFrom).toBe('2024-05-09');
        expect(ranged.workers[0]?.total.toFixed(2)).toBe('520.00');

        const today = await ctx.services.workersReportService.getWorkersReport({});
        expect(today.dateFrom).toBe('2024-05-10');
        expect(today.workers[0]?.total.toFixed(2)).toBe('20.00');
    });

    it('rejects a range that ends before it starts', async () => {
        await expect(
            ctx.services.workersReportService.getWorkersReport({ dateFrom: '2024-05-10', dateTo: '2024-05-09' })
        ).rejects.toMatchObject({ statusCode: 400 });
    });
});
