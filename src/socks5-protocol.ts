/**
 * SOCKS5 wire format (RFC 1928) and the username/password sub-negotiation
 * (RFC 1929).
 *
 * Decoders pull exactly the bytes each field needs from a {@link ByteSource}
 * and check version bytes before reading anything that depends on them.
 * Encoders are pure.
 */

import * as ipaddr from 'ipaddr.js';
import {
    MalformedRequestError,
    ProtocolVersionError,
    UnsupportedAddressTypeError,
} from './errors';
import type { ByteSource } from './stream-io';

export const SOCKS_VERSION = 5;
export const AUTH_VERSION = 1;
export const RSV = 0;

export const AUTH_METHOD_NO_AUTH = 0x00;
export const AUTH_METHOD_GSSAPI = 0x01;
export const AUTH_METHOD_USERNAME_PASSWORD = 0x02;
export const AUTH_METHOD_NO_ACCEPTABLE = 0xff;

export const CMD_CONNECT = 1;
export const CMD_BIND = 2;
export const CMD_UDP_ASSOCIATE = 3;

export const ATYP_IPV4 = 1;
export const ATYP_DOMAINNAME = 3;
export const ATYP_IPV6 = 4;

export const AUTH_STATUS_SUCCESS = 0x00;
export const AUTH_STATUS_FAILURE = 0x01;

export enum ReplyCode {
    Succeeded = 0x00,
    GeneralFailure = 0x01,
    ConnectionNotAllowed = 0x02,
    NetworkUnreachable = 0x03,
    HostUnreachable = 0x04,
    ConnectionRefused = 0x05,
    TtlExpired = 0x06,
    CommandNotSupported = 0x07,
    AddressTypeNotSupported = 0x08,
}

export type IpAddress =
    | { type: 'ipv4'; octets: Buffer }
    | { type: 'ipv6'; octets: Buffer };

export type Address = IpAddress | { type: 'domain'; hostname: string };

export type Command =
    | { type: 'connect' }
    | { type: 'bind' }
    | { type: 'udp-associate' }
    | { type: 'unknown'; code: number };

export interface Greeting {
    methods: number[];
}

export interface AuthRequest {
    username: string;
    password: string;
}

export interface Request {
    command: Command;
    address: Address;
    port: number;
}

export interface BoundAddress {
    address: IpAddress;
    port: number;
}

export interface Reply {
    code: ReplyCode;
    bound: BoundAddress;
}

const UNSPECIFIED_BOUND: BoundAddress = {
    address: { type: 'ipv4', octets: Buffer.alloc(4) },
    port: 0,
};

// --- Greeting / method selection ---

export async function decodeGreeting(input: ByteSource): Promise<Greeting> {
    const [version, methodCount] = await input.readExact(2);
    if (version !== SOCKS_VERSION) {
        throw new ProtocolVersionError(SOCKS_VERSION, version);
    }
    const methods = await input.readExact(methodCount);
    return { methods: [...methods] };
}

export function encodeGreeting(methods: readonly number[]): Buffer {
    if (methods.length > 255) {
        throw new RangeError(`too many methods: ${methods.length}`);
    }
    return Buffer.from([SOCKS_VERSION, methods.length, ...methods]);
}

/**
 * Username/password wins over no-auth when a client offers both; anything
 * else is not acceptable.
 */
export function selectMethod(methods: readonly number[]): number {
    if (methods.includes(AUTH_METHOD_USERNAME_PASSWORD)) return AUTH_METHOD_USERNAME_PASSWORD;
    if (methods.includes(AUTH_METHOD_NO_AUTH)) return AUTH_METHOD_NO_AUTH;
    return AUTH_METHOD_NO_ACCEPTABLE;
}

export function encodeMethodSelection(method: number): Buffer {
    return Buffer.from([SOCKS_VERSION, method]);
}

export async function decodeMethodSelection(input: ByteSource): Promise<number> {
    const [version, method] = await input.readExact(2);
    if (version !== SOCKS_VERSION) {
        throw new ProtocolVersionError(SOCKS_VERSION, version);
    }
    return method;
}

// --- RFC 1929 ---

export async function decodeAuthRequest(input: ByteSource): Promise<AuthRequest> {
    const [version, usernameLength] = await input.readExact(2);
    if (version !== AUTH_VERSION) {
        throw new ProtocolVersionError(AUTH_VERSION, version);
    }
    const username = await input.readExact(usernameLength);
    const [passwordLength] = await input.readExact(1);
    const password = await input.readExact(passwordLength);

    // invalid UTF-8 becomes U+FFFD rather than failing the exchange
    return {
        username: username.toString('utf8'),
        password: password.toString('utf8'),
    };
}

export function encodeAuthRequest({ username, password }: AuthRequest): Buffer {
    const user = lengthPrefixed(Buffer.from(username, 'utf8'), 'username');
    const pass = lengthPrefixed(Buffer.from(password, 'utf8'), 'password');
    return Buffer.concat([Buffer.from([AUTH_VERSION]), user, pass]);
}

export function encodeAuthResult(success: boolean): Buffer {
    return Buffer.from([AUTH_VERSION, success ? AUTH_STATUS_SUCCESS : AUTH_STATUS_FAILURE]);
}

export async function decodeAuthResult(input: ByteSource): Promise<boolean> {
    const [version, status] = await input.readExact(2);
    if (version !== AUTH_VERSION) {
        throw new ProtocolVersionError(AUTH_VERSION, version);
    }
    return status === AUTH_STATUS_SUCCESS;
}

// --- Request ---

export function commandFromCode(code: number): Command {
    switch (code) {
        case CMD_CONNECT:
            return { type: 'connect' };
        case CMD_BIND:
            return { type: 'bind' };
        case CMD_UDP_ASSOCIATE:
            return { type: 'udp-associate' };
        default:
            return { type: 'unknown', code };
    }
}

export function commandCode(command: Command): number {
    switch (command.type) {
        case 'connect':
            return CMD_CONNECT;
        case 'bind':
            return CMD_BIND;
        case 'udp-associate':
            return CMD_UDP_ASSOCIATE;
        case 'unknown':
            return command.code;
    }
}

export async function decodeRequest(input: ByteSource): Promise<Request> {
    const [version, cmd, rsv, atyp] = await input.readExact(4);
    if (version !== SOCKS_VERSION) {
        throw new ProtocolVersionError(SOCKS_VERSION, version);
    }
    if (rsv !== RSV) {
        throw new MalformedRequestError(`reserved byte must be 0x00, got 0x${rsv.toString(16)}`);
    }

    const address = await decodeAddress(atyp, input);
    const port = (await input.readExact(2)).readUInt16BE(0);

    return { command: commandFromCode(cmd), address, port };
}

export function encodeRequest({ command, address, port }: Request): Buffer {
    return Buffer.concat([
        Buffer.from([SOCKS_VERSION, commandCode(command), RSV]),
        encodeAddress(address),
        encodePort(port),
    ]);
}

async function decodeAddress(atyp: number, input: ByteSource): Promise<Address> {
    switch (atyp) {
        case ATYP_IPV4:
            return { type: 'ipv4', octets: await input.readExact(4) };
        case ATYP_DOMAINNAME: {
            const [length] = await input.readExact(1);
            const name = await input.readExact(length);
            return { type: 'domain', hostname: name.toString('utf8') };
        }
        case ATYP_IPV6:
            return { type: 'ipv6', octets: await input.readExact(16) };
        default:
            throw new UnsupportedAddressTypeError(atyp);
    }
}

/** ATYP followed by the address bytes. */
export function encodeAddress(address: Address): Buffer {
    switch (address.type) {
        case 'ipv4':
            return Buffer.concat([Buffer.from([ATYP_IPV4]), fixedLength(address.octets, 4)]);
        case 'ipv6':
            return Buffer.concat([Buffer.from([ATYP_IPV6]), fixedLength(address.octets, 16)]);
        case 'domain':
            return Buffer.concat([
                Buffer.from([ATYP_DOMAINNAME]),
                lengthPrefixed(Buffer.from(address.hostname, 'utf8'), 'domain name'),
            ]);
    }
}

// --- Reply ---

export function encodeReply(code: ReplyCode, bound?: BoundAddress | null): Buffer {
    const { address, port } = bound ?? UNSPECIFIED_BOUND;
    return Buffer.concat([
        Buffer.from([SOCKS_VERSION, code, RSV]),
        encodeAddress(address),
        encodePort(port),
    ]);
}

export async function decodeReply(input: ByteSource): Promise<Reply> {
    const [version, code, rsv, atyp] = await input.readExact(4);
    if (version !== SOCKS_VERSION) {
        throw new ProtocolVersionError(SOCKS_VERSION, version);
    }
    if (rsv !== RSV) {
        throw new MalformedRequestError(`reserved byte must be 0x00, got 0x${rsv.toString(16)}`);
    }
    const address = await decodeAddress(atyp, input);
    if (address.type === 'domain') {
        throw new UnsupportedAddressTypeError(atyp);
    }
    const port = (await input.readExact(2)).readUInt16BE(0);
    return { code, bound: { address, port } };
}

// --- Addresses ---

/** Host string suitable for logging and for `net.connect`. */
export function formatAddress(address: Address): string {
    if (address.type === 'domain') return address.hostname;
    return ipaddr.fromByteArray([...address.octets]).toString();
}

export function formatEndpoint(address: Address, port: number): string {
    return address.type === 'ipv6'
        ? `[${formatAddress(address)}]:${port}`
        : `${formatAddress(address)}:${port}`;
}

/**
 * Converts a textual IP, as reported by `socket.localAddress`, into an IP
 * address of the same family (an IPv4-mapped IPv6 address stays IPv6).
 * Returns null for anything that is not an IP literal.
 */
export function addressFromIp(text: string): IpAddress | null {
    if (!ipaddr.isValid(text)) return null;
    const parsed = ipaddr.parse(text);
    const octets = Buffer.from(parsed.toByteArray());
    return parsed.kind() === 'ipv4' ? { type: 'ipv4', octets } : { type: 'ipv6', octets };
}

function encodePort(port: number): Buffer {
    if (!Number.isInteger(port) || port < 0 || port > 0xffff) {
        throw new RangeError(`invalid port: ${port}`);
    }
    const buf = Buffer.alloc(2);
    buf.writeUInt16BE(port, 0);
    return buf;
}

function fixedLength(octets: Buffer, length: number): Buffer {
    if (octets.length !== length) {
        throw new RangeError(`expected ${length} address bytes, got ${octets.length}`);
    }
    return octets;
}

function lengthPrefixed(value: Buffer, field: string): Buffer {
    if (value.length > 255) {
        throw new RangeError(`${field} is longer than 255 bytes`);
    }
    return Buffer.concat([Buffer.from([value.length]), value]);
}
