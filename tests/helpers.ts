import net from 'net';
import { PassThrough } from 'stream';
import { listen } from '../src/server';
import { StreamReader } from '../src/stream-io';

export interface Running {
    port: number;
    close(): Promise<void>;
}

/** Listens on an ephemeral loopback port; `close` also destroys open connections. */
export async function start(server: net.Server): Promise<Running> {
    const sockets = new Set<net.Socket>();
    server.on('connection', (socket: net.Socket) => {
        sockets.add(socket);
        socket.on('close', () => sockets.delete(socket));
    });
    const { port } = await listen(server, 0, '127.0.0.1');
    return {
        port,
        close: () =>
            new Promise<void>((resolve) => {
                for (const socket of sockets) socket.destroy();
                server.close(() => resolve());
            }),
    };
}

export interface EchoServer extends Running {
    /** Remote ports of every accepted connection. */
    peers: number[];
}

/** Echoes everything back and half-closes when the peer does. */
export async function startEchoServer(): Promise<EchoServer> {
    const peers: number[] = [];
    const server = net.createServer({ allowHalfOpen: true }, (socket) => {
        if (socket.remotePort !== undefined) peers.push(socket.remotePort);
        socket.on('error', () => {});
        socket.pipe(socket);
    });
    return { ...(await start(server)), peers };
}

export function connect(port: number, allowHalfOpen = false): Promise<net.Socket> {
    return new Promise<net.Socket>((resolve, reject) => {
        const socket = net.connect({ port, host: '127.0.0.1', allowHalfOpen }, () => {
            socket.off('error', reject);
            resolve(socket);
        });
        socket.once('error', reject);
    });
}

/** Two connected sockets over loopback, both allowing half-open. */
export async function socketPair(): Promise<[net.Socket, net.Socket]> {
    const server = net.createServer({ allowHalfOpen: true });
    const accepted = new Promise<net.Socket>((resolve) => server.once('connection', resolve));
    const { port } = await listen(server, 0, '127.0.0.1');
    const [left, right] = await Promise.all([connect(port, true), accepted]);
    server.close();
    return [left, right];
}

/** Everything received until the socket closes. */
export function collectUntilClose(socket: net.Socket): Promise<Buffer> {
    return new Promise<Buffer>((resolve) => {
        const chunks: Buffer[] = [];
        socket.on('data', (chunk: Buffer) => chunks.push(chunk));
        socket.on('error', () => {});
        socket.on('close', () => resolve(Buffer.concat(chunks)));
    });
}

/** Everything received until end-of-stream. */
export function collectUntilEnd(socket: net.Socket): Promise<Buffer> {
    return new Promise<Buffer>((resolve, reject) => {
        const chunks: Buffer[] = [];
        socket.on('data', (chunk: Buffer) => chunks.push(chunk));
        socket.once('error', reject);
        socket.once('end', () => resolve(Buffer.concat(chunks)));
    });
}

/** Reader over a fixed byte sequence, already ended. */
export function readerOf(...parts: Array<number[] | Buffer>): StreamReader {
    const stream = new PassThrough();
    for (const part of parts) {
        stream.write(Buffer.from(part));
    }
    stream.end();
    return new StreamReader(stream);
}
