export class Socks5Error extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'Socks5Error';
    }
}

/** Unexpected VER byte in a SOCKS5 message or RFC 1929 sub-negotiation. */
export class ProtocolVersionError extends Socks5Error {
    constructor(
        public readonly expected: number,
        public readonly actual: number,
    ) {
        super(`unsupported version: expected 0x${hex(expected)}, got 0x${hex(actual)}`);
        this.name = 'ProtocolVersionError';
    }
}

export class MalformedRequestError extends Socks5Error {
    constructor(message: string) {
        super(message);
        this.name = 'MalformedRequestError';
    }
}

export class UnsupportedAddressTypeError extends Socks5Error {
    constructor(public readonly addressType: number) {
        super(`unsupported ATYP: 0x${hex(addressType)}`);
        this.name = 'UnsupportedAddressTypeError';
    }
}

export class NoAcceptableMethodError extends Socks5Error {
    constructor(public readonly offered: readonly number[]) {
        super('no acceptable method');
        this.name = 'NoAcceptableMethodError';
    }
}

export class AuthenticationFailedError extends Socks5Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'AuthenticationFailedError';
    }
}

export class UnsupportedCommandError extends Socks5Error {
    constructor(public readonly code: number) {
        super(`only CONNECT is supported (got command 0x${hex(code)})`);
        this.name = 'UnsupportedCommandError';
    }
}

export class ConnectError extends Socks5Error {
    constructor(target: string, cause: unknown) {
        super(`failed to connect to ${target}: ${describeError(cause)}`, { cause });
        this.name = 'ConnectError';
    }
}

/** Read/write failure, or end-of-stream in the middle of a frame. */
export class TransportError extends Socks5Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'TransportError';
    }
}

/**
 * A relay direction failed with something other than an I/O error. The
 * original fault is kept as `cause`.
 */
export class RelayFaultError extends Socks5Error {
    constructor(direction: string, cause: unknown) {
        super(`${direction} relay faulted: ${describeError(cause)}`, { cause });
        this.name = 'RelayFaultError';
    }
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

export function describeError(err: unknown): string {
    if (err instanceof Error) {
        return `${err.name}: ${err.message}`;
    }
    return String(err);
}

function hex(value: number): string {
    return value.toString(16).toUpperCase().padStart(2, '0');
}
