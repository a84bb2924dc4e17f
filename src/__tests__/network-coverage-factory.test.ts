import { AsyncChannel } from '../channel.js';
import { VirtualClock } from '../clock.js';
import { loadConfig } from '../config.js';
import { CoverageDatabase, initDatabase, openDatabase } from '../database.js';
import { TransportClosedError } from '../errors.js';
import { KeepMeasuringActivity } from '../keep-measuring.js';
import { NetworkCoverageFactory } from '../network-coverage-factory.js';
import { DatagramTransport } from '../udp-transport.js';

// Answers every RP01 with an immediate RR01 for the same sequence number
class EchoingPingServer implements DatagramTransport {
    public starts = 0;
    private incoming = new AsyncChannel<Buffer>();

    public async start() {
        this.incoming.fail(new TransportClosedError());
        this.incoming = new AsyncChannel<Buffer>();
        this.starts++;
    }

    public async send(data: Buffer) {
        const reply = Buffer.alloc(8);
        reply.write('RR01', 0, 'ascii');
        reply.writeUInt32BE(data.readUInt32BE(4), 4);
        this.incoming.push(reply);
    }

    public async receive(): Promise<Buffer> {
        const next = await this.incoming.next();
        if (next.done) throw new TransportClosedError();
        return next.value;
    }

    public close() {
        this.incoming.fail(new TransportClosedError());
    }
}

class FakeControlServer {
    public coverageRequests: unknown[] = [];
    public coverageResults: unknown[] = [];
    private issued = 0;

    public fetch = async (input: string, init?: RequestInit): Promise<Response> => {
        const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;

        if (input.endsWith('/coverageRequest')) {
            this.coverageRequests.push(body);
            this.issued++;
            return new Response(JSON.stringify({
                test_uuid: `T${this.issued}`,
                ping_token: Buffer.from('test-token').toString('base64'),
                ping_host: 'ping.example.test',
                ping_port: 444,
                ip_version: 4
            }), { status: 200, headers: { 'Content-Type': 'application/json' } });
        }

        this.coverageResults.push(body);
        return new Response(null, { status: 200 });
    };
}

async function flush() {
    for (let i = 0; i < 20; i++) {
        await new Promise<void>((resolve) => setImmediate(resolve));
    }
}

describe('NetworkCoverageFactory', () => {
    let db: CoverageDatabase;

    beforeEach(() => {
        db = openDatabase(':memory:');
        initDatabase(db);
    });

    afterEach(() => {
        db.close();
    });

    it('chains a sub-session on expiry and stops at the session limit', async () => {
        const clock = new VirtualClock(0);
        const controlServer = new FakeControlServer();
        const transport = new EchoingPingServer();
        const factory = new NetworkCoverageFactory({
            config: loadConfig({
                DEFAULT_MAX_COVERAGE_MEASUREMENT_SECONDS: '10',
                DEFAULT_MAX_COVERAGE_SESSION_SECONDS: '15',
                PING_INTERVAL_MS: '1000'
            }),
            db,
            clock,
            fetch: controlServer.fetch,
            transport,
            keepMeasuring: new KeepMeasuringActivity(() => ({ release: () => undefined }))
        });
        const { measurement, feeds } = factory;

        async function at(instant: number) {
            await clock.advanceTo(instant);
            await flush();
        }

        measurement.start();
        await flush();
        expect(measurement.snapshot().testUUID).toBe('T1');

        await at(1000);
        feeds.pushLocation({ latitude: 0, longitude: 0, horizontalAccuracy: 5, timestamp: 1000 });
        await flush();
        for (const instant of [2000, 3000, 4000, 5000]) await at(instant);
        feeds.pushLocation({ latitude: 0, longitude: 0.001, horizontalAccuracy: 5, timestamp: 5000 });
        await flush();

        for (const instant of [6000, 7000, 8000, 9000, 10000]) await at(instant);

        const chained = measurement.snapshot();
        expect(chained.testUUID).toBe('T2');
        expect(chained.subSessionCount).toBe(2);
        expect(chained.fences.map((f) => [f.dateEntered, f.dateExited, f.sessionUUID])).toEqual([
            [1000, 5000, 'T1'],
            [5000, undefined, 'T2']
        ]);
        expect(controlServer.coverageRequests).toHaveLength(2);
        expect(controlServer.coverageRequests[0]).not.toHaveProperty('loop_uuid');
        expect(controlServer.coverageRequests[1]).toMatchObject({ loop_uuid: 'T1', measurement_type: 'dedicated' });
        expect(transport.starts).toBe(2);

        for (const instant of [11000, 12000, 13000, 14000, 15000]) await at(instant);

        const summary = await measurement.finished();
        expect(summary).toMatchObject({
            testUUID: 'T2',
            stopReason: 'sessionLimitReached',
            startedAt: 0,
            stoppedAt: 15000,
            subSessionCount: 2,
            fenceCount: 2
        });
        expect(measurement.isStarted).toBe(false);

        expect(controlServer.coverageResults).toEqual([
            {
                test_uuid: 'T2',
                fences: [expect.objectContaining({ offset_ms: -5000, duration_ms: 10000, radius_m: 20 })]
            },
            {
                test_uuid: 'T1',
                fences: [expect.objectContaining({ offset_ms: 1000, duration_ms: 4000, radius_m: 20 })]
            }
        ]);
        expect(factory.store.allSessions()).toEqual([]);
    });
});
