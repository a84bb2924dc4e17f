import dgram from 'dgram';
import { AddressInfo } from 'net';
import { TransportClosedError } from '../errors.js';
import { UdpTransport } from '../udp-transport.js';

function bindEcho(port = 0): Promise<dgram.Socket> {
    const echo = dgram.createSocket('udp4');
    echo.on('message', (msg, rinfo) => echo.send(msg, rinfo.port, rinfo.address));
    return new Promise((resolve) => echo.bind(port, '127.0.0.1', () => resolve(echo)));
}

async function unusedPort(): Promise<number> {
    const held = await bindEcho();
    const address: AddressInfo = held.address();
    await new Promise<void>((resolve) => held.close(() => resolve()));
    return address.port;
}

describe('UdpTransport', () => {
    let echo: dgram.Socket | undefined;
    let port: number;

    beforeEach(async () => {
        echo = await bindEcho();
        const address: AddressInfo = echo.address();
        port = address.port;
    });

    afterEach(() => {
        echo?.close();
        echo = undefined;
    });

    it('sends and receives datagrams over a connected socket', async () => {
        const transport = new UdpTransport();
        await transport.start('127.0.0.1', port, 'IPv4');

        await transport.send(Buffer.from('RP01'));
        const reply = await transport.receive();

        expect(reply.toString()).toBe('RP01');
        transport.close();
    });

    it('fails a pending receive when closed', async () => {
        const transport = new UdpTransport();
        await transport.start('127.0.0.1', port);

        const receiving = transport.receive();
        transport.close();

        await expect(receiving).rejects.toBeInstanceOf(TransportClosedError);
    });

    it('recovers once an unreachable server comes back', async () => {
        const deadPort = await unusedPort();
        const transport = new UdpTransport();
        await transport.start('127.0.0.1', deadPort);

        const refused = transport.receive().then(() => undefined, (err: unknown) => err);
        await transport.send(Buffer.from('lost'));
        const err = await refused;
        expect(err).toBeInstanceOf(Error);
        expect(err).not.toBeInstanceOf(TransportClosedError);

        const revived = await bindEcho(deadPort);
        try {
            await transport.send(Buffer.from('back'));
            const reply = await transport.receive();
            expect(reply.toString()).toBe('back');
        } finally {
            transport.close();
            revived.close();
        }
    });

    it('refuses to work before start', async () => {
        const transport = new UdpTransport();

        await expect(transport.receive()).rejects.toBeInstanceOf(TransportClosedError);
        await expect(transport.send(Buffer.from('x'))).rejects.toBeInstanceOf(TransportClosedError);
    });
});
