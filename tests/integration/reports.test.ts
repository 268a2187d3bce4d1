import request from 'supertest';
import httpStatus from 'http-status';
import type { Express } from 'express';
import { createTestApp, createTestContext, type TestContext } from '../utils/test-utils';

describe('Report routes', () => {
    let ctx: TestContext;
    let app: Express;

    beforeEach(() => {
        ctx = createTestContext();
        app = createTestApp(ctx);
    });

    it('renders the cash-flow report for a day', async () => {
        const cashier = ctx.store.addEmployee({ fullName: 'Cara Cashier' });
        const shift = await ctx.services.shiftService.openShift({ employeeId: cashier.id, startCash: 0 });
        const expense = await ctx.services.cashTransactionService.recordTransaction(shift.id, {
            amount: 15,
            kind: 'manual_out',
            comment: 'Napkins',
        });
        ctx.store.addOrder({ totalPrice: 40, completedAt: new Date(2024, 4, 10, 9, 0, 0) });

        const res = await request(app)
            .get('/api/v1/reports/cash-flow')
            .query({ dateFrom: '2024-05-10', dateTo: '2024-05-10' })
            .expect(httpStatus.OK);

        expect(res.body).toEqual({
            dateFrom: '2024-05-10',
            dateTo: '2024-05-10',
            cashRevenue: '40.00',
            cardRevenue: '0.00',
            totalRevenue: '40.00',
            totalExpenses: '15.00',
            journal: [
                {
                    id: expense.id,
                    shiftId: shift.id,
                    createdAt: expense.createdAt.toISOString(),
                    kind: 'manual_out',
                    amount: '15.00',
                    comment: 'Napkins',
                    employeeName: 'Cara Cashier',
                },
            ],
        });
    });

    it('renders the workers report with cents on the wire', async () => {
        const courier = ctx.store.addEmployee({ fullName: 'Eve Courier' });
        const waiter = ctx.store.addEmployee({ fullName: 'Wes Waiter' });
        ctx.store.addOrder({ totalPrice: 60, courierId: courier.id, waiterId: waiter.id, completedAt: new Date(2024, 4, 10, 9, 0, 0) });
        ctx.store.addOrder({ totalPrice: '12.50', waiterId: waiter.id, completedAt: new Date(2024, 4, 10, 11, 0, 0) });

        const res = await request(app).get('/api/v1/reports/workers').query({ dateFrom: '2024-05-10' }).expect(httpStatus.OK);

        expect(res.body).toEqual({
            dateFrom: '2024-05-10',
            dateTo: '2024-05-10',
            workers: [
                { employeeId: courier.id, fullName: 'Eve Courier', role: 'courier', orderCount: 1, total: '60.00', averageTicket: '60.00' },
                { employeeId: waiter.id, fullName: 'Wes Waiter', role: 'waiter', orderCount: 1, total: '12.50', averageTicket: '12.50' },
            ],
        });
    });

    it('answers 400 for a reversed workers range', async () => {
        const res = await request(app)
            .get('/api/v1/reports/workers')
            .query({ dateFrom: '2024-05-10', dateTo: '2024-05-01' })
            .expect(httpStatus.BAD_REQUEST);
        expect(res.body.message).toBe('dateTo cannot be before dateFrom.');
    });

    it('answers 400 for malformed dates', async () => {
        await request(app).get('/api/v1/reports/cash-flow').query({ dateFrom: 'yesterday' }).expect(httpStatus.BAD_REQUEST);
    });

    it('serves the health check and 404s unknown routes', async () => {
        const health = await request(app).get('/health').expect(httpStatus.OK);
        expect(health.body.status).toBe('UP');

        const missing = await request(app).get('/api/v1/nowhere').expect(httpStatus.NOT_FOUND);
        expect(missing.body).toEqual({ code: 'NOT_FOUND', message: 'Not Found - /api/v1/nowhere' });
    });
});
