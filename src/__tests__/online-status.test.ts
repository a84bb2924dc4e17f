import net, { AddressInfo } from 'net';
import { OnlineStatusMonitor, endpointOf } from '../online-status.js';

describe('endpointOf', () => {
    it('uses the explicit port or the scheme default', () => {
        expect(endpointOf('https://control.example.test/api')).toEqual({ host: 'control.example.test', port: 443 });
        expect(endpointOf('http://control.example.test/api')).toEqual({ host: 'control.example.test', port: 80 });
        expect(endpointOf('http://127.0.0.1:8080/api')).toEqual({ host: '127.0.0.1', port: 8080 });
    });
});

describe('OnlineStatusMonitor', () => {
    function monitorWith(results: boolean[]) {
        const monitor = new OnlineStatusMonitor({
            host: 'control.example.test',
            port: 443,
            intervalMs: 1000,
            reachable: async () => {
                const next = results.shift();
                if (next === undefined) throw new Error('no more results');
                return next;
            }
        });
        let reconnects = 0;
        monitor.onReconnect = () => reconnects++;
        return { monitor, reconnects: () => reconnects };
    }

    it('fires onReconnect only on an offline to online transition', async () => {
        const { monitor, reconnects } = monitorWith([true, false, false, true, true]);

        for (let i = 0; i < 5; i++) await monitor.check();

        expect(reconnects()).toBe(1);
        expect(monitor.isOnline).toBe(true);
    });

    it('counts a failing check as offline', async () => {
        const { monitor } = monitorWith([]);

        await expect(monitor.check()).resolves.toBe(false);
        expect(monitor.isOnline).toBe(false);
    });

    it('is unknown before the first check', () => {
        const { monitor } = monitorWith([]);
        expect(monitor.isOnline).toBeNull();
    });
});

describe('OnlineStatusMonitor TCP check', () => {
    let server: net.Server;
    let port: number;

    beforeEach(async () => {
        server = net.createServer((socket) => socket.destroy());
        await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', () => resolve()));
        const address: AddressInfo | string | null = server.address();
        if (!address || typeof address === 'string') throw new Error('server has no port');
        port = address.port;
    });

    afterEach(async () => {
        if (server.listening) {
            await new Promise<void>((resolve) => server.close(() => resolve()));
        }
    });

    it('reports a listening endpoint as online', async () => {
        const monitor = new OnlineStatusMonitor({ host: '127.0.0.1', port, intervalMs: 1000 });

        await expect(monitor.check()).resolves.toBe(true);
        expect(monitor.isOnline).toBe(true);
    });

    it('reports a refused connection as offline and reconnects once it listens again', async () => {
        await new Promise<void>((resolve) => server.close(() => resolve()));
        const monitor = new OnlineStatusMonitor({ host: '127.0.0.1', port, intervalMs: 1000 });
        let reconnects = 0;
        monitor.onReconnect = () => reconnects++;

        await expect(monitor.check()).resolves.toBe(false);

        server = net.createServer((socket) => socket.destroy());
        await new Promise<void>((resolve) => server.listen(port, '127.0.0.1', () => resolve()));
        await expect(monitor.check()).resolves.toBe(true);
        expect(reconnects).toBe(1);
    });
});
