import express from 'express';
import request from 'supertest';
import httpStatus from 'http-status';
import { createRateLimiter } from '../../src/middleware/rateLimit.middleware';
import { errorConverter, errorHandler } from '../../src/middleware/error.middleware';

describe('Rate limiter', () => {
    it('answers 429 with the string error code once the window is used up', async () => {
        const app = express();
        app.use(createRateLimiter({ windowMs: 60 * 1000, limit: 1 }));
        app.get('/ping', (req, res) => {
            res.send({ ok: true });
        });
        app.use(errorConverter);
        app.use(errorHandler);

        await request(app).get('/ping').expect(httpStatus.OK);
        const res = await request(app).get('/ping').expect(httpStatus.TOO_MANY_REQUESTS);

        expect(res.body).toEqual({
            code: 'TOO_MANY_REQUESTS',
            message: 'Too many requests from this IP, please try again later.',
        });
    });
});
