import { config } from './config';
import { describeError } from './errors';
import { createTunnelEndpoint } from './tunnel-endpoint';

const { server } = createTunnelEndpoint();

server.listen(config.TUNNEL_PORT, config.TUNNEL_HOST, () => {
    console.log(`Tunnel endpoint listening on ${config.TUNNEL_HOST}:${config.TUNNEL_PORT}`);
});

server.on('error', (err) => {
    console.error(`[TUNNEL] Server error: ${describeError(err)}`);
    process.exitCode = 1;
});
