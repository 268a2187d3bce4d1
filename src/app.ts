// src/app.ts
import 'reflect-metadata'; // Must be imported first for class-transformer/validator
import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import httpStatus from 'http-status';
import { env } from '@/config';
import { errorHandler, errorConverter } from '@/middleware/error.middleware';
import ApiError from '@/utils/ApiError';
import logger from '@/utils/logger';
import type { Services } from '@/services';

import { createShiftRouter } from '@/modules/shifts/shift.routes';
import { createCashTransactionRouter } from '@/modules/cash-transactions/cash-transaction.routes';
import { createHandoverRouter } from '@/modules/handovers/handover.routes';
import { createOrderRouter } from '@/modules/orders/order.routes';
import { createEmployeeRouter } from '@/modules/employees/employee.routes';
import { createReportsRouter } from '@/modules/reports/reports.routes';

/** Builds the HTTP app around already-composed services; nothing here opens connections. */
export const createApp = (services: Services): Express => {
    const app: Express = express();

    // --- Security Middleware ---
    app.set('trust proxy', 1);
    app.use(helmet());

    app.use(cors({
        origin: env.CORS_ORIGIN === '*' ? '*' : env.CORS_ORIGIN.split(','),
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization'],
    }));
    app.options('*', cors());

    // --- Standard Middleware ---
    app.use(express.json({ limit: '20kb' }));

    // --- Logging Middleware ---
    // Morgan output goes to Winston's http level
    const morganFormat = env.NODE_ENV === 'development' ? 'dev' : 'short';
    app.use(morgan(morganFormat, {
        stream: { write: (message) => logger.http(message.trim()) },
        skip: () => env.NODE_ENV === 'test',
    }));

    app.get('/health', (req: Request, res: Response) => {
        res.status(httpStatus.OK).json({ status: 'UP', timestamp: new Date().toISOString() });
    });

    // --- API Routes ---
    const apiRouter = express.Router();

    // Nested shift routers go first so '/:shiftId' does not swallow them
    apiRouter.use('/shifts/:shiftId/transactions', createCashTransactionRouter(services));
    apiRouter.use('/shifts/:shiftId/handovers', createHandoverRouter(services));
    apiRouter.use('/shifts', createShiftRouter(services));
    apiRouter.use('/orders', createOrderRouter(services));
    apiRouter.use('/employees', createEmployeeRouter(services));
    apiRouter.use('/reports', createReportsRouter(services));

    app.use('/api/v1', apiRouter);

    // --- 404 Handler ---
    app.use((req: Request, res: Response, next: NextFunction) => {
        next(new ApiError(httpStatus.NOT_FOUND, `Not Found - ${req.originalUrl}`));
    });

    // --- Global Error Handling ---
    app.use(errorConverter);
    app.use(errorHandler);

    return app;
};

export default createApp;
