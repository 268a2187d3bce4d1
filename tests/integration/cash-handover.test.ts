import request from 'supertest';
import httpStatus from 'http-status';
import type { Express } from 'express';
import { createTestApp, createTestContext, type TestContext } from '../utils/test-utils';

describe('Cash collection and handover routes', () => {
    let ctx: TestContext;
    let app: Express;

    beforeEach(() => {
        ctx = createTestContext();
        app = createTestApp(ctx);
    });

    it('follows courier cash from completion to the cashier drawer', async () => {
        const courier = ctx.store.addEmployee({ fullName: 'Eve Courier' });
        const cashier = ctx.store.addEmployee({ fullName: 'Cara Cashier' });
        const order = ctx.store.addOrder({ totalPrice: 150, courierId: courier.id });

        const completed = await request(app).post(`/api/v1/orders/${order.id}/complete`).send({}).expect(httpStatus.OK);
        expect(completed.body).toEqual({ orderId: order.id, cashShiftId: null, debtorId: courier.id, isCashTurnedIn: false });

        const debtors = await request(app).get('/api/v1/employees/debtors').expect(httpStatus.OK);
        expect(debtors.body).toEqual([{ id: courier.id, fullName: 'Eve Courier', cashBalance: '150.00' }]);

        const pending = await request(app).get(`/api/v1/employees/${courier.id}/pending-orders`).expect(httpStatus.OK);
        expect(pending.body.map((row: { id: number }) => row.id)).toEqual([order.id]);
        expect(pending.body[0]).toMatchObject({ totalPrice: '150.00', paymentMethod: 'cash', isCashTurnedIn: false });

        const shift = await request(app).post('/api/v1/shifts').send({ employeeId: cashier.id }).expect(httpStatus.CREATED);

        const handover = await request(app)
            .post(`/api/v1/shifts/${shift.body.id}/handovers`)
            .send({ employeeId: courier.id, orderIds: [order.id] })
            .expect(httpStatus.CREATED);
        expect(handover.body.amount).toBe('150.00');
        expect(handover.body.orderIds).toEqual([order.id]);
        expect(handover.body.transaction).toMatchObject({
            kind: 'handover_in',
            amount: '150.00',
            comment: `Cash handover: Eve Courier (orders: ${order.id})`,
        });

        const after = await request(app).get('/api/v1/employees/debtors').expect(httpStatus.OK);
        expect(after.body).toEqual([]);

        const repeat = await request(app)
            .post(`/api/v1/shifts/${shift.body.id}/handovers`)
            .send({ employeeId: courier.id, orderIds: [order.id] })
            .expect(httpStatus.CONFLICT);
        expect(repeat.body.code).toBe('NO_ELIGIBLE_ORDERS');
    });

    it('requires at least one order id', async () => {
        const res = await request(app)
            .post('/api/v1/shifts/1/handovers')
            .send({ employeeId: 1, orderIds: [] })
            .expect(httpStatus.BAD_REQUEST);
        expect(res.body.details.errors).toEqual(['Select at least one order.']);
    });

    it('links orders and registers debts on request', async () => {
        const waiter = ctx.store.addEmployee({ cashBalance: 5 });
        const order = ctx.store.addOrder({ totalPrice: '12.50', waiterId: waiter.id });

        const link = await request(app).post(`/api/v1/orders/${order.id}/link`).send({}).expect(httpStatus.OK);
        expect(link.body).toEqual({ orderId: order.id, cashShiftId: null });
        expect(ctx.events.ofType('order.unlinked')).toHaveLength(1);

        const debt = await request(app)
            .post(`/api/v1/orders/${order.id}/debt`)
            .send({ employeeId: waiter.id })
            .expect(httpStatus.OK);
        expect(debt.body).toEqual({ orderId: order.id, employeeId: waiter.id, registered: true, cashBalance: '17.50' });
    });

    it('refuses to complete an order twice', async () => {
        const order = ctx.store.addOrder({ totalPrice: 10 });
        await request(app).post(`/api/v1/orders/${order.id}/complete`).send({}).expect(httpStatus.OK);

        const res = await request(app).post(`/api/v1/orders/${order.id}/complete`).send({}).expect(httpStatus.CONFLICT);
        expect(res.body.code).toBe('ORDER_ALREADY_COMPLETED');
    });
});
