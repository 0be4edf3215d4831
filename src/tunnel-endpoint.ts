import http from 'http';
import { Duplex } from 'stream';
import WebSocket, { WebSocketServer } from 'ws';
import { type Dialer, createDirectDialer } from './dialer';
import { describeError } from './errors';
import { type Address, addressFromIp, formatEndpoint } from './socks5-protocol';
import { relay } from './relay';
import type { Logger } from './types';
import { WebSocketStream } from './ws-stream';

const CLOSE_POLICY_VIOLATION = 1008;
const CLOSE_INTERNAL_ERROR = 1011;

export interface TunnelTarget {
    address: Address;
    port: number;
}

/** Parses `host:port` or `[v6]:port` as sent in the `target` query parameter. */
export function parseTarget(value: string | null): TunnelTarget | null {
    if (!value) return null;
    const separator = value.lastIndexOf(':');
    if (separator <= 0) return null;

    let host = value.slice(0, separator);
    const port = Number(value.slice(separator + 1));
    if (!Number.isInteger(port) || port < 1 || port > 65535) return null;

    if (host.startsWith('[') && host.endsWith(']')) {
        host = host.slice(1, -1);
    }
    if (!host) return null;

    const address: Address = addressFromIp(host) ?? { type: 'domain', hostname: host };
    return { address, port };
}

export interface TunnelEndpoint {
    server: http.Server;
    /** Terminates open tunnels and stops listening. */
    close(): Promise<void>;
}

export interface TunnelEndpointOptions {
    dialer?: Dialer;
    logger?: Logger;
}

/**
 * Far side of the WebSocket tunnel: each WebSocket carries one TCP
 * connection to the host named in `?target=`.
 */
export function createTunnelEndpoint(options: TunnelEndpointOptions = {}): TunnelEndpoint {
    const dialer = options.dialer ?? createDirectDialer();
    const logger = options.logger ?? console;

    const server = http.createServer((_req, res) => {
        res.writeHead(426, { 'Content-Type': 'text/plain' });
        res.end('Expected Upgrade: websocket');
    });
    const wss = new WebSocketServer({ server });

    wss.on('connection', (ws: WebSocket, req: http.IncomingMessage) => {
        handleTunnel(ws, req, dialer, logger).catch((err: unknown) => {
            logger.error(`[TUNNEL] ${describeError(err)}`);
        });
    });

    return {
        server,
        close() {
            for (const client of wss.clients) {
                client.terminate();
            }
            wss.close();
            return new Promise<void>((resolve, reject) => {
                server.close((err) => (err ? reject(err) : resolve()));
            });
        },
    };
}

async function handleTunnel(ws: WebSocket, req: http.IncomingMessage, dialer: Dialer, logger: Logger) {
    const url = new URL(req.url ?? '/', 'http://localhost');
    const target = parseTarget(url.searchParams.get('target'));
    if (!target) {
        logger.error(`[TUNNEL] Missing or invalid target: ${url.search}`);
        ws.close(CLOSE_POLICY_VIOLATION, 'Missing target param');
        return;
    }

    // buffers whatever the client sends while the TCP connection is opening
    const stream = new WebSocketStream(ws);
    stream.on('error', (err) => {
        logger.error(`[TUNNEL] WebSocket error: ${err.message}`);
    });

    const { address, port } = target;
    const endpoint = formatEndpoint(address, port);
    logger.log(`[TUNNEL] Connecting to ${endpoint}`);

    let socket: Duplex;
    try {
        ({ stream: socket } = await dialer.dial(address, port));
    } catch (err) {
        logger.error(`[TUNNEL] Error connecting to ${endpoint}: ${describeError(err)}`);
        ws.close(CLOSE_INTERNAL_ERROR, 'Connect failed');
        return;
    }
    socket.on('error', (err: Error) => {
        logger.error(`[TUNNEL] Socket error: ${err.message}`);
    });

    try {
        const result = await relay(stream, socket);
        logger.log(
            `[TUNNEL] ${endpoint} closed (ws -> tcp: ${result.clientToRemote} bytes, tcp -> ws: ${result.remoteToClient} bytes)`,
        );
    } finally {
        socket.destroy();
        stream.destroy();
    }
}
