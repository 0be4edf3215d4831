import { Socket } from 'net';
import { Duplex } from 'stream';
import type { Authenticator } from './auth';
import type { Dialer, OutboundConnection } from './dialer';
import {
    AuthenticationFailedError,
    ConnectError,
    NoAcceptableMethodError,
    ProtocolVersionError,
    UnsupportedCommandError,
} from './errors';
import { type RelayResult, relay } from './relay';
import {
    AUTH_METHOD_NO_ACCEPTABLE,
    AUTH_METHOD_USERNAME_PASSWORD,
    type AuthRequest,
    ReplyCode,
    type Request,
    commandCode,
    decodeAuthRequest,
    decodeGreeting,
    decodeRequest,
    encodeAuthResult,
    encodeMethodSelection,
    encodeReply,
    formatEndpoint,
    selectMethod,
} from './socks5-protocol';
import { StreamReader, writeChunk } from './stream-io';
import type { Logger } from './types';

export enum SessionState {
    Greeting,
    Authentication,
    Request,
    Connect,
    Relay,
}

export interface SessionOptions {
    authenticator: Authenticator;
    dialer: Dialer;
    logger: Logger;
}

/**
 * One client connection, driven from greeting to the end of the relay.
 * States only move forward. Any failure ends the session, leaving `state` at
 * the phase that failed; both streams are destroyed either way.
 */
export class Socks5Session {
    private _state = SessionState.Greeting;
    private readonly reader: StreamReader;
    private remote: Duplex | null = null;

    constructor(
        private readonly client: Socket,
        private readonly options: SessionOptions,
    ) {
        this.reader = new StreamReader(client);
    }

    get state(): SessionState {
        return this._state;
    }

    private get peer(): string {
        return `${this.client.remoteAddress}:${this.client.remotePort}`;
    }

    async run(): Promise<RelayResult> {
        try {
            const method = await this.negotiateMethod();
            if (method === AUTH_METHOD_USERNAME_PASSWORD) {
                this._state = SessionState.Authentication;
                await this.authenticate();
            }

            this._state = SessionState.Request;
            const request = await this.readRequest();

            this._state = SessionState.Connect;
            const target = formatEndpoint(request.address, request.port);
            const connection = await this.connect(request, target);

            this._state = SessionState.Relay;
            const result = await relay(this.client, connection.stream);
            this.options.logger.log(
                `[SOCKS5] ${target} closed (client -> remote: ${result.clientToRemote} bytes, remote -> client: ${result.remoteToClient} bytes)`,
            );
            return result;
        } finally {
            this.client.destroy();
            this.remote?.destroy();
        }
    }

    private async negotiateMethod(): Promise<number> {
        const { methods } = await decodeGreeting(this.reader);
        this.options.logger.log(`[SOCKS5] ${this.peer} offered methods: [${methods.join(', ')}]`);

        const method = selectMethod(methods);
        await writeChunk(this.client, encodeMethodSelection(method));
        if (method === AUTH_METHOD_NO_ACCEPTABLE) {
            throw new NoAcceptableMethodError(methods);
        }
        return method;
    }

    private async authenticate() {
        let credentials: AuthRequest;
        try {
            credentials = await decodeAuthRequest(this.reader);
        } catch (err) {
            if (!(err instanceof ProtocolVersionError)) throw err;
            await writeChunk(this.client, encodeAuthResult(false));
            throw new AuthenticationFailedError('invalid auth version', { cause: err });
        }

        const { username, password } = credentials;
        const granted = this.options.authenticator.authenticate(username, password);
        await writeChunk(this.client, encodeAuthResult(granted));
        if (!granted) {
            throw new AuthenticationFailedError(`invalid credentials for user '${username}'`);
        }
        this.options.logger.log(`[SOCKS5] Authenticated user '${username}'`);
    }

    private async readRequest(): Promise<Request> {
        const request = await decodeRequest(this.reader);
        if (request.command.type !== 'connect') {
            await writeChunk(this.client, encodeReply(ReplyCode.CommandNotSupported));
            throw new UnsupportedCommandError(commandCode(request.command));
        }
        return request;
    }

    private async connect(request: Request, target: string): Promise<OutboundConnection> {
        this.options.logger.log(`[SOCKS5] Connecting to ${target}`);

        let connection: OutboundConnection;
        try {
            connection = await this.options.dialer.dial(request.address, request.port);
        } catch (err) {
            await writeChunk(this.client, encodeReply(ReplyCode.GeneralFailure));
            throw new ConnectError(target, err);
        }

        const { stream, bound } = connection;
        this.remote = stream;
        stream.on('error', (err: Error) => {
            this.options.logger.error(`[SOCKS5] Remote ${target} error: ${err.message}`);
        });

        await writeChunk(this.client, encodeReply(ReplyCode.Succeeded, bound));
        this.options.logger.log(
            bound
                ? `[SOCKS5] Connected to ${target}, bound ${formatEndpoint(bound.address, bound.port)}`
                : `[SOCKS5] Connected to ${target}`,
        );
        return connection;
    }
}
