import { createServer } from 'http';
import { Server, Socket } from 'socket.io';
import { loadConfig } from './config.js';
import { createCoverageApp } from './coverage-api.js';
import { initDatabase, openDatabase } from './database.js';
import { LocationSampleSchema, NetworkTypeSampleSchema, RadioTechnologySchema } from './device-feeds.js';
import { moduleLogger } from './logger.js';
import { NetworkCoverageFactory } from './network-coverage-factory.js';
import { OnlineStatusMonitor, endpointOf } from './online-status.js';

const log = moduleLogger('server');
const config = loadConfig();

// Crash Prevention
process.on('uncaughtException', (err) => {
    log.fatal({ err }, 'Uncaught exception');
    // Do not exit!
});
process.on('unhandledRejection', (reason) => {
    log.fatal({ reason }, 'Unhandled rejection');
});

// Initialize System
const db = openDatabase(config.databasePath);
initDatabase(db);

const factory = new NetworkCoverageFactory({ config, db });
const { measurement, feeds, resender } = factory;

const app = createCoverageApp(factory, config.clientOrigin);

const httpServer = createServer(app);
const io = new Server(httpServer, {
    cors: {
        origin: config.clientOrigin,
        methods: ['GET', 'POST']
    }
});

measurement.onUpdate = (snapshot) => io.emit('coverage-update', snapshot);
measurement.onFinished = (summary) => io.emit('coverage-finished', summary);

function resend(isLaunched: boolean) {
    void resender.resendPersistentSessions(isLaunched)
        .then((report) => {
            if (report.sent.length > 0 || report.failed.length > 0 || report.purged > 0) {
                log.info(report, 'Resend sweep finished');
            }
        })
        .catch((err: unknown) => log.error({ err }, 'Resend sweep failed'));
}

// Cold sweep: nothing from a previous process is still measuring
resend(true);

const online = new OnlineStatusMonitor({
    ...endpointOf(config.controlServerUrl),
    intervalMs: config.onlineCheckIntervalMs
});
online.onReconnect = () => resend(false);
online.start();

// --- Socket.IO ---
function rejectPayload(socket: Socket, event: string, issues: unknown) {
    log.warn({ event, issues }, 'Invalid device payload');
    socket.emit('error', { message: `Invalid ${event} payload` });
}

io.on('connection', (socket) => {
    log.info({ id: socket.id }, 'Device connected');
    socket.emit('coverage-update', measurement.snapshot());

    socket.on('location', (data: unknown) => {
        const parsed = LocationSampleSchema.safeParse(data);
        if (!parsed.success) return rejectPayload(socket, 'location', parsed.error.issues);
        feeds.pushLocation(parsed.data);
    });

    socket.on('network-type', (data: unknown) => {
        const parsed = NetworkTypeSampleSchema.safeParse(data);
        if (!parsed.success) return rejectPayload(socket, 'network-type', parsed.error.issues);
        feeds.pushNetworkType(parsed.data);
    });

    socket.on('radio-technology', (data: unknown) => {
        const parsed = RadioTechnologySchema.safeParse(data);
        if (!parsed.success) return rejectPayload(socket, 'radio-technology', parsed.error.issues);
        feeds.setRadioTechnology(parsed.data.technology ?? undefined);
    });

    socket.on('start-measurement', () => {
        if (measurement.isStarted) {
            socket.emit('error', { message: 'Coverage measurement already running' });
            return;
        }
        measurement.start();
    });

    socket.on('stop-measurement', () => {
        void measurement.stop('user').catch((err: unknown) => {
            log.error({ err }, 'Stopping measurement failed');
            socket.emit('error', { message: 'Stopping measurement failed' });
        });
    });

    socket.on('disconnect', () => {
        log.info({ id: socket.id }, 'Device disconnected');
    });
});

httpServer.listen(config.port, () => {
    log.info({ port: config.port }, 'Coverage agent listening');
});

function shutdown() {
    online.stop();
    void measurement.stop('user')
        .catch((err: unknown) => log.error({ err }, 'Final stop failed'))
        .finally(() => {
            db.close();
            process.exit(0);
        });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
