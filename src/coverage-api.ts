import * as Boom from '@hapi/boom';
import cors from 'cors';
import express, { NextFunction, Request, Response } from 'express';
import { moduleLogger } from './logger.js';
import { NetworkCoverageFactory } from './network-coverage-factory.js';

const log = moduleLogger('api');

/**
 * HTTP surface of the agent. Every handler answers with JSON; failures go
 * through `errorHandler` as Boom payloads.
 */
export function createCoverageRouter(factory: NetworkCoverageFactory) {
    const router = express.Router();
    const measurement = factory.measurement;

    router.get('/health', (_req, res) => {
        res.json({ status: 'ok', measuring: measurement.isStarted });
    });

    router.get('/measurement', (_req, res) => {
        res.json(measurement.snapshot());
    });

    router.post('/measurement/start', (_req, res, next) => {
        if (measurement.isStarted) {
            next(Boom.conflict('Coverage measurement already running'));
            return;
        }
        measurement.start();
        res.status(202).json(measurement.snapshot());
    });

    router.post('/measurement/stop', async (_req, res, next) => {
        try {
            const summary = await measurement.stop('user');
            if (!summary) {
                next(Boom.conflict('No coverage measurement running'));
                return;
            }
            res.json(summary);
        } catch (err) {
            next(err);
        }
    });

    router.post('/resend', async (_req, res, next) => {
        try {
            const report = await factory.resender.resendPersistentSessions(false);
            res.json(report);
        } catch (err) {
            next(err);
        }
    });

    return router;
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
    const boom = Boom.isBoom(err) ? err : Boom.badImplementation(err instanceof Error ? err.message : 'Unexpected error');
    if (boom.isServer) {
        log.error({ err }, 'Request failed');
    }
    res.status(boom.output.statusCode).json(boom.output.payload);
}

export function createCoverageApp(factory: NetworkCoverageFactory, clientOrigin = '*') {
    const app = express();
    app.use(cors({ origin: clientOrigin }));
    app.use(express.json());
    app.use(createCoverageRouter(factory));
    app.use(errorHandler);
    return app;
}
