import net from 'net';
import { Duplex } from 'stream';
import WebSocket from 'ws';
import {
    type Address,
    type BoundAddress,
    addressFromIp,
    formatAddress,
    formatEndpoint,
} from './socks5-protocol';
import { WebSocketStream } from './ws-stream';

export interface OutboundConnection {
    stream: Duplex;
    /** Local end of the outbound connection, when the transport exposes one. */
    bound: BoundAddress | null;
}

export interface Dialer {
    dial(address: Address, port: number): Promise<OutboundConnection>;
}

/** Plain TCP; domain names go through the system resolver. */
export function createDirectDialer(): Dialer {
    return {
        dial(address, port) {
            return new Promise<OutboundConnection>((resolve, reject) => {
                const socket = net.createConnection({
                    host: hostOf(address),
                    port,
                    allowHalfOpen: true,
                });
                // stays attached: later errors belong to the relay, which reads them off the stream
                socket.on('error', reject);
                socket.once('connect', () => {
                    resolve({ stream: socket, bound: boundAddressOf(socket) });
                });
            });
        },
    };
}

/**
 * Tunnels each connection through a WebSocket endpoint, which opens the TCP
 * connection on its side. The local bound address is not visible from here.
 * Half-close crosses the tunnel as an end marker, see {@link WebSocketStream}.
 */
export function createTunnelDialer(url: string): Dialer {
    return {
        dial(address, port) {
            return new Promise<OutboundConnection>((resolve, reject) => {
                hostOf(address);
                const target = new URL(url);
                target.searchParams.set('target', formatEndpoint(address, port));

                const ws = new WebSocket(target);
                ws.on('error', reject);
                ws.once('open', () => {
                    ws.off('error', reject);
                    resolve({ stream: new WebSocketStream(ws), bound: null });
                });
            });
        },
    };
}

// an empty name would make net fall back to localhost
function hostOf(address: Address): string {
    const host = formatAddress(address);
    if (!host) {
        throw new Error('empty host name');
    }
    return host;
}

export function boundAddressOf(socket: net.Socket): BoundAddress | null {
    const { localAddress, localPort } = socket;
    if (localAddress === undefined || localPort === undefined) return null;
    const address = addressFromIp(localAddress);
    return address ? { address, port: localPort } : null;
}
