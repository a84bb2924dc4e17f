import { loadConfig } from '../config.js';

describe('loadConfig', () => {
    it('applies defaults', () => {
        const config = loadConfig({});

        expect(config.port).toBe(3001);
        expect(config.fenceRadiusMeters).toBe(20);
        expect(config.minimumLocationAccuracyMeters).toBe(10);
        expect(config.pingIntervalMs).toBe(500);
        expect(config.pingFailureReinitThreshold).toBe(5);
        expect(config.maxResendAgeSeconds).toBe(604800);
        expect(config.clientUUID).toBeUndefined();
    });

    it('reads and coerces overrides', () => {
        const config = loadConfig({
            PORT: '4000',
            CONTROL_SERVER_URL: 'https://control.example.test/RMBTControlServer/',
            CLIENT_UUID: 'client-1',
            FENCE_RADIUS_METERS: '35'
        });

        expect(config.port).toBe(4000);
        expect(config.controlServerUrl).toBe('https://control.example.test/RMBTControlServer');
        expect(config.clientUUID).toBe('client-1');
        expect(config.fenceRadiusMeters).toBe(35);
    });

    it('rejects invalid values', () => {
        expect(() => loadConfig({ FENCE_RADIUS_METERS: '-5' })).toThrow();
        expect(() => loadConfig({ CONTROL_SERVER_URL: 'not a url' })).toThrow();
        expect(() => loadConfig({ PING_FAILURE_REINIT_THRESHOLD: '2.5' })).toThrow();
    });
});
