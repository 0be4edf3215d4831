import { createAuthenticator } from './auth';
import { config } from './config';
import { createDirectDialer, createTunnelDialer } from './dialer';
import { describeError } from './errors';
import { createProxyServer, listen } from './server';

const server = createProxyServer({
    authenticator: createAuthenticator({ username: config.USERNAME, password: config.PASSWORD }),
    dialer: config.TUNNEL_URL ? createTunnelDialer(config.TUNNEL_URL) : createDirectDialer(),
});

server.on('error', (err) => {
    console.error('[SERVER] Accept error:', err.message);
});

listen(server, config.PORT, config.HOST)
    .then(({ address, port }) => {
        console.log(`SOCKS5 proxy running on ${address}:${port}`);
        if (config.TUNNEL_URL) {
            console.log(`Outbound connections tunneled via ${config.TUNNEL_URL}`);
        }
    })
    .catch((err: unknown) => {
        console.error(`[SERVER] Failed to listen on ${config.HOST}:${config.PORT}: ${describeError(err)}`);
        process.exitCode = 1;
    });
