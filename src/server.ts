// src/server.ts
import 'reflect-metadata';
import http from 'http';
import { env } from '@/config';
import { db, verifyDatabaseConnection, closeDatabase } from '@/config/database';
import redisClient, { connectRedis } from '@/config/redis';
import { DrizzleLedgerStore } from '@/db/drizzle-ledger.store';
import { RedisLedgerEventPublisher } from '@/modules/notifications/ledger-events';
import { createServices } from '@/services';
import logger from '@/utils/logger';
import { createApp } from './app';

const start = async (): Promise<void> => {
    await verifyDatabaseConnection();
    try {
        await connectRedis();
    } catch (error) {
        // Ledger events are best-effort; the ledger itself runs without Redis
        logger.error('Redis unavailable at start-up, ledger events will not be delivered until it is back.', error);
    }

    const services = createServices({
        store: new DrizzleLedgerStore(db),
        events: new RedisLedgerEventPublisher(redisClient, env.REPORT_DESTINATION),
        clock: () => new Date(),
    });
    const server = http.createServer(createApp(services));

    server.listen(env.PORT, () => {
        logger.info(`🚀 Cash ledger listening on port ${env.PORT} (${env.NODE_ENV})`);
        logger.info(`Ledger events go to channel cash-ledger:${env.REPORT_DESTINATION}`);
    });

    const shutdown = (signal: string): void => {
        logger.info(`${signal} received, shutting down.`);
        server.close((closeError) => {
            if (closeError) {
                logger.error('Error closing HTTP server:', closeError);
            }
            Promise.allSettled([closeDatabase(), redisClient.quit()])
                .then((results) => {
                    results
                        .filter((result): result is PromiseRejectedResult => result.status === 'rejected')
                        .forEach((result) => logger.error('Error during shutdown:', result.reason));
                    process.exit(closeError ? 1 : 0);
                })
                .catch((error: unknown) => {
                    logger.error('Shutdown failed:', error);
                    process.exit(1);
                });
        });
    };

    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
};

start().catch((error: unknown) => {
    logger.error('Failed to start server:', error);
    process.exit(1);
});
