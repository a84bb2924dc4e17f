import dgram from 'dgram';
import net from 'net';
import { AsyncChannel } from './channel.js';
import { TransportClosedError } from './errors.js';
import { moduleLogger } from './logger.js';
import { IPVersion } from './types.js';

const log = moduleLogger('udp');

/**
 * Connected datagram channel to one ping server.
 * `receive()` rejects with `TransportClosedError` once the transport is closed;
 * a socket error rejects only the receive waiting at that moment.
 */
export interface DatagramTransport {
    start(host: string, port: number, ipVersion?: IPVersion): Promise<void>;
    send(data: Buffer): Promise<void>;
    receive(): Promise<Buffer>;
    close(): void;
}

function socketType(host: string, ipVersion?: IPVersion): dgram.SocketType {
    if (ipVersion === 'IPv6') return 'udp6';
    if (ipVersion === 'IPv4') return 'udp4';
    return net.isIPv6(host) ? 'udp6' : 'udp4';
}

export class UdpTransport implements DatagramTransport {
    private socket?: dgram.Socket;
    private incoming = new AsyncChannel<Buffer>();

    public async start(host: string, port: number, ipVersion?: IPVersion): Promise<void> {
        this.close();

        const socket = dgram.createSocket(socketType(host, ipVersion));
        const incoming = new AsyncChannel<Buffer>();
        this.socket = socket;
        this.incoming = incoming;

        socket.on('message', (msg) => {
            incoming.push(msg);
        });
        // Errors such as ICMP port unreachable leave the socket usable
        socket.on('error', (err) => {
            log.warn({ err }, 'UDP socket error');
            incoming.interrupt(err);
        });
        socket.on('close', () => {
            incoming.fail(new TransportClosedError());
        });

        await new Promise<void>((resolve, reject) => {
            const onError = (err: Error) => reject(err);
            socket.once('error', onError);
            socket.connect(port, host, () => {
                socket.off('error', onError);
                resolve();
            });
        });
        log.debug({ host, port }, 'UDP transport connected');
    }

    public send(data: Buffer): Promise<void> {
        const socket = this.socket;
        if (!socket) return Promise.reject(new TransportClosedError('Transport not started'));

        return new Promise((resolve, reject) => {
            socket.send(data, (err) => {
                if (err) reject(err);
                else resolve();
            });
        });
    }

    public async receive(): Promise<Buffer> {
        if (!this.socket) throw new TransportClosedError('Transport not started');

        const next = await this.incoming.next();
        if (next.done) throw new TransportClosedError();
        return next.value;
    }

    public close() {
        const socket = this.socket;
        if (!socket) return;
        this.socket = undefined;
        this.incoming.fail(new TransportClosedError());
        socket.close();
    }
}
