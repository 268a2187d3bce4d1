import request from 'supertest';
import httpStatus from 'http-status';
import type { Express } from 'express';
import { createTestApp, createTestContext, TEST_NOW, type TestContext } from '../utils/test-utils';

describe('Shift routes', () => {
    let ctx: TestContext;
    let app: Express;
    let cashierId: number;

    beforeEach(() => {
        ctx = createTestContext();
        app = createTestApp(ctx);
        cashierId = ctx.store.addEmployee({ fullName: 'Cara Cashier' }).id;
    });

    describe('POST /api/v1/shifts', () => {
        it('opens a shift', async () => {
            const res = await request(app)
                .post('/api/v1/shifts')
                .send({ employeeId: cashierId, startCash: 500 })
                .expect(httpStatus.CREATED);

            expect(res.body).toEqual({
                id: 1,
                employeeId: cashierId,
                startTime: TEST_NOW.toISOString(),
                endTime: null,
                startCash: '500.00',
                endCashActual: null,
                isClosed: false,
                totalSalesCash: null,
                totalSalesCard: null,
                serviceIn: null,
                serviceOut: null,
            });
        });

        it('defaults the start cash to zero', async () => {
            const res = await request(app).post('/api/v1/shifts').send({ employeeId: cashierId }).expect(httpStatus.CREATED);
            expect(res.body.startCash).toBe('0.00');
        });

        it('answers 409 with a stable code when a shift is already open', async () => {
            await request(app).post('/api/v1/shifts').send({ employeeId: cashierId, startCash: 0 }).expect(httpStatus.CREATED);

            const res = await request(app)
                .post('/api/v1/shifts')
                .send({ employeeId: cashierId, startCash: 0 })
                .expect(httpStatus.CONFLICT);

            expect(res.body).toEqual({
                code: 'SHIFT_ALREADY_OPEN',
                message: `Employee ${cashierId} already has an open shift.`,
                details: { employeeId: cashierId, shiftId: 1 },
            });
        });

        it('validates the body', async () => {
            const res = await request(app)
                .post('/api/v1/shifts')
                .send({ employeeId: cashierId, startCash: -5 })
                .expect(httpStatus.BAD_REQUEST);

            expect(res.body.code).toBe('BAD_REQUEST');
            expect(res.body.details.errors).toEqual(['Start cash cannot be negative.']);
        });

        it('rejects a start cash past the column limit', async () => {
            const res = await request(app)
                .post('/api/v1/shifts')
                .send({ employeeId: cashierId, startCash: 99999999999999 })
                .expect(httpStatus.BAD_REQUEST);

            expect(res.body.details.errors).toEqual(['Start cash cannot exceed 9999999999.99.']);
            expect(await ctx.services.shiftService.getOpenShift(cashierId)).toBeNull();
        });

        it('rejects unknown properties', async () => {
            await request(app)
                .post('/api/v1/shifts')
                .send({ employeeId: cashierId, startCash: 0, isClosed: true })
                .expect(httpStatus.BAD_REQUEST);
        });

        it('answers 404 for an unknown employee', async () => {
            const res = await request(app).post('/api/v1/shifts').send({ employeeId: 77 }).expect(httpStatus.NOT_FOUND);
            expect(res.body.code).toBe('EMPLOYEE_NOT_FOUND');
        });
    });

    describe('GET /api/v1/shifts/open', () => {
        it('returns the employee open shift or 404', async () => {
            await request(app).get('/api/v1/shifts/open').query({ employeeId: cashierId }).expect(httpStatus.NOT_FOUND);
            await request(app).post('/api/v1/shifts').send({ employeeId: cashierId }).expect(httpStatus.CREATED);

            const res = await request(app).get('/api/v1/shifts/open').query({ employeeId: cashierId }).expect(httpStatus.OK);
            expect(res.body.id).toBe(1);

            const any = await request(app).get('/api/v1/shifts/open').expect(httpStatus.OK);
            expect(any.body.id).toBe(1);
        });
    });

    describe('GET /api/v1/shifts', () => {
        it('returns a page of shifts', async () => {
            await request(app).post('/api/v1/shifts').send({ employeeId: cashierId }).expect(httpStatus.CREATED);

            const res = await request(app)
                .get('/api/v1/shifts')
                .query({ isClosed: 'false', page: 1, limit: 5 })
                .expect(httpStatus.OK);

            expect(res.body).toMatchObject({ page: 1, limit: 5, totalPages: 1, totalResults: 1 });
            expect(res.body.results).toHaveLength(1);
        });

        it('rejects a limit above 100', async () => {
            await request(app).get('/api/v1/shifts').query({ limit: 500 }).expect(httpStatus.BAD_REQUEST);
        });
    });

    describe('shift lifecycle', () => {
        it('records movements, reports and closes', async () => {
            await request(app).post('/api/v1/shifts').send({ employeeId: cashierId, startCash: 500 }).expect(httpStatus.CREATED);
            ctx.store.addOrder({ totalPrice: 200, isCashTurnedIn: true, cashShiftId: 1 });

            const movement = await request(app)
                .post('/api/v1/shifts/1/transactions')
                .send({ amount: 50, kind: 'manual_out', comment: 'Bread delivery' })
                .expect(httpStatus.CREATED);
            expect(movement.body).toMatchObject({ shiftId: 1, amount: '50.00', kind: 'manual_out', comment: 'Bread delivery' });

            const xReport = await request(app).get('/api/v1/shifts/1/statistics').expect(httpStatus.OK);
            expect(xReport.body).toMatchObject({ reportType: 'X', theoreticalCash: '650.00', serviceOut: '50.00' });

            const closed = await request(app)
                .post('/api/v1/shifts/1/close')
                .send({ endCashActual: 655 })
                .expect(httpStatus.OK);
            expect(closed.body.difference).toBe('5.00');
            expect(closed.body.shift).toMatchObject({ isClosed: true, totalSalesCash: '200.00', serviceOut: '50.00' });
            expect(closed.body.report.reportType).toBe('Z');

            const again = await request(app).post('/api/v1/shifts/1/close').send({ endCashActual: 0 }).expect(httpStatus.CONFLICT);
            expect(again.body.code).toBe('SHIFT_ALREADY_CLOSED');

            const late = await request(app)
                .post('/api/v1/shifts/1/transactions')
                .send({ amount: 5, kind: 'manual_in' })
                .expect(httpStatus.CONFLICT);
            expect(late.body.code).toBe('SHIFT_CLOSED');

            const listed = await request(app).get('/api/v1/shifts/1/transactions').expect(httpStatus.OK);
            expect(listed.body).toHaveLength(1);
        });

        it('does not accept handover_in entries by hand', async () => {
            await request(app).post('/api/v1/shifts').send({ employeeId: cashierId }).expect(httpStatus.CREATED);

            const res = await request(app)
                .post('/api/v1/shifts/1/transactions')
                .send({ amount: 10, kind: 'handover_in' })
                .expect(httpStatus.BAD_REQUEST);
            expect(res.body.details.errors).toEqual(['Kind must be either manual_in or manual_out.']);
        });

        it('rejects a movement past the column limit before it reaches the drawer', async () => {
            await request(app).post('/api/v1/shifts').send({ employeeId: cashierId }).expect(httpStatus.CREATED);

            const res = await request(app)
                .post('/api/v1/shifts/1/transactions')
                .send({ amount: 1e12, kind: 'manual_in' })
                .expect(httpStatus.BAD_REQUEST);
            expect(res.body.details.errors).toEqual(['Amount cannot exceed 9999999999.99.']);
            expect(ctx.store.transactionsOf(1)).toHaveLength(0);
        });

        it('answers 404 for unknown shifts and 400 for malformed ids', async () => {
            const missing = await request(app).get('/api/v1/shifts/9').expect(httpStatus.NOT_FOUND);
            expect(missing.body.code).toBe('SHIFT_NOT_FOUND');
            await request(app).get('/api/v1/shifts/abc').expect(httpStatus.BAD_REQUEST);
        });
    });
});
