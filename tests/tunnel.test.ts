import net from 'net';
import WebSocket from 'ws';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createAuthenticator } from '../src/auth';
import { type Dialer, createTunnelDialer } from '../src/dialer';
import { createProxyServer, listen } from '../src/server';
import { StreamReader } from '../src/stream-io';
import { type TunnelEndpoint, createTunnelEndpoint, parseTarget } from '../src/tunnel-endpoint';
import { silentLogger } from '../src/types';
import { type Running, collectUntilEnd, connect, start, startEchoServer } from './helpers';

describe('parseTarget', () => {
    it('parses host:port', () => {
        expect(parseTarget('example.com:443')).toEqual({
            address: { type: 'domain', hostname: 'example.com' },
            port: 443,
        });
    });

    it('recognises IP literals', () => {
        expect(parseTarget('10.1.2.3:22')).toEqual({
            address: { type: 'ipv4', octets: Buffer.from([10, 1, 2, 3]) },
            port: 22,
        });
        expect(parseTarget('[::1]:8080')).toEqual({
            address: { type: 'ipv6', octets: Buffer.from([...new Array<number>(15).fill(0), 1]) },
            port: 8080,
        });
    });

    it.each([null, '', 'example.com', ':80', 'example.com:0', 'example.com:65536', 'example.com:http', '[]:80'])(
        'rejects %j',
        (value) => {
            expect(parseTarget(value)).toBeNull();
        },
    );
});

describe('WebSocket tunnel', () => {
    const cleanup: Array<() => Promise<void>> = [];

    afterEach(async () => {
        for (const close of cleanup.splice(0).reverse()) await close();
    });

    async function startEndpoint(dialer?: Dialer): Promise<string> {
        const endpoint: TunnelEndpoint = createTunnelEndpoint({ dialer, logger: silentLogger });
        const { port } = await listen(endpoint.server, 0, '127.0.0.1');
        cleanup.push(() => endpoint.close());
        return `ws://127.0.0.1:${port}`;
    }

    function closeCode(url: string): Promise<number> {
        return new Promise<number>((resolve, reject) => {
            const ws = new WebSocket(url);
            ws.on('error', reject);
            ws.on('close', (code) => resolve(code));
        });
    }

    /** Proxy dialing through the tunnel; returns a client that has completed CONNECT to `targetPort`. */
    async function connectThroughTunnel(targetPort: number): Promise<{ socket: net.Socket; reader: StreamReader }> {
        const url = await startEndpoint();
        const proxy: Running = await start(
            createProxyServer({
                authenticator: createAuthenticator({ username: 'user', password: 'password' }),
                dialer: createTunnelDialer(url),
                logger: silentLogger,
            }),
        );
        cleanup.push(() => proxy.close());

        const socket = await connect(proxy.port);
        cleanup.push(async () => {
            socket.destroy();
        });
        const reader = new StreamReader(socket);

        socket.write(Buffer.from([0x05, 0x01, 0x00]));
        expect([...(await reader.readExact(2))]).toEqual([0x05, 0x00]);

        socket.write(Buffer.from([0x05, 0x01, 0x00, 0x01, 127, 0, 0, 1, targetPort >> 8, targetPort & 0xff]));
        // the far end's local address is not visible through the tunnel
        expect([...(await reader.readExact(10))]).toEqual([0x05, 0x00, 0x00, 0x01, 0, 0, 0, 0, 0, 0]);
        return { socket, reader };
    }

    it('carries a proxied connection to the target', async () => {
        const echo = await startEchoServer();
        cleanup.push(() => echo.close());
        const { socket, reader } = await connectThroughTunnel(echo.port);

        socket.write('through the tunnel');
        expect((await reader.readExact(18)).toString()).toBe('through the tunnel');
        await vi.waitFor(() => expect(echo.peers).toHaveLength(1));
    });

    it('keeps the return direction open after the client half-closes', async () => {
        // answers only once it has seen end-of-stream
        const target = await start(
            net.createServer({ allowHalfOpen: true }, (socket) => {
                socket.on('error', () => {});
                collectUntilEnd(socket).then(
                    (data) => socket.end(`reply:${data.toString()}`),
                    () => socket.destroy(),
                );
            }),
        );
        cleanup.push(() => target.close());
        const { socket, reader } = await connectThroughTunnel(target.port);

        socket.end('ping');
        expect((await reader.readExact(10)).toString()).toBe('reply:ping');
        expect(await reader.read()).toBeNull();
    });

    it('closes with 1008 when the target is missing', async () => {
        const url = await startEndpoint();
        expect(await closeCode(url)).toBe(1008);
        expect(await closeCode(`${url}/?target=nope`)).toBe(1008);
    });

    it('closes with 1011 when the target cannot be reached', async () => {
        const dial = vi.fn<Dialer['dial']>().mockRejectedValue(new Error('refused'));
        const url = await startEndpoint({ dial });

        expect(await closeCode(`${url}/?target=127.0.0.1:9`)).toBe(1011);
        expect(dial).toHaveBeenCalledWith({ type: 'ipv4', octets: Buffer.from([127, 0, 0, 1]) }, 9);
    });

    it('answers plain HTTP with 426', async () => {
        const url = await startEndpoint();
        const response = await fetch(url.replace('ws://', 'http://'));
        expect(response.status).toBe(426);
    });
});
