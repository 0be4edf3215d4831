import net from 'net';
import type { Authenticator } from './auth';
import type { Dialer } from './dialer';
import { describeError } from './errors';
import { SessionState, Socks5Session } from './socks5';
import type { Logger } from './types';

export interface ProxyServerOptions {
    authenticator: Authenticator;
    dialer: Dialer;
    logger?: Logger;
}

/**
 * TCP listener running one {@link Socks5Session} per accepted socket. A failed
 * session is logged and closed; the listener is not affected.
 */
export function createProxyServer(options: ProxyServerOptions): net.Server {
    const logger = options.logger ?? console;
    const sessionOptions = { ...options, logger };

    return net.createServer({ allowHalfOpen: true }, (socket) => {
        socket.on('error', (err) => {
            logger.error(`[SOCKS5] Socket error: ${err.message}`);
        });

        const session = new Socks5Session(socket, sessionOptions);
        session.run().catch((err: unknown) => {
            logger.error(`[SOCKS5] client error (${SessionState[session.state]}): ${describeError(err)}`);
        });
    });
}

export function listen(server: net.Server, port: number, host: string): Promise<net.AddressInfo> {
    return new Promise<net.AddressInfo>((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, host, () => {
            server.off('error', reject);
            const address = server.address();
            if (address === null || typeof address === 'string') {
                reject(new Error(`unexpected listen address: ${address}`));
                return;
            }
            resolve(address);
        });
    });
}
