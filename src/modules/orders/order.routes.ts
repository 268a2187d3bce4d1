// src/modules/orders/order.routes.ts
import express, { Router } from 'express';
import validateRequest from '@/middleware/validate.middleware';
import { generalRateLimiter } from '@/middleware/rateLimit.middleware';
import type { Services } from '@/services';
import { createOrderController } from './order.controller';
import { OrderIdParamsDto } from './dto/order-params.dto';
import { CompleteOrderDto, LinkOrderDto, RegisterDebtDto } from './dto/order-settlement.dto';

export const createOrderRouter = (services: Services): Router => {
    const router = express.Router();
    const orderController = createOrderController(services);

    router.use(generalRateLimiter);

    /**
     * POST /api/v1/orders/:orderId/complete
     * Called by the order subsystem when an order reaches a completed status.
     */
    router.post(
        '/:orderId/complete',
        validateRequest(OrderIdParamsDto, 'params'),
        validateRequest(CompleteOrderDto),
        orderController.completeOrder
    );

    router.post(
        '/:orderId/link',
        validateRequest(OrderIdParamsDto, 'params'),
        validateRequest(LinkOrderDto),
        orderController.linkOrder
    );

    router.post(
        '/:orderId/debt',
        validateRequest(OrderIdParamsDto, 'params'),
        validateRequest(RegisterDebtDto),
        orderController.registerDebt
    );

    return router;
};
