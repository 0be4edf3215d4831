import dotenv from 'dotenv';
import { ConfigError } from './errors';

dotenv.config();

export interface Config {
    HOST: string;
    PORT: number;
    USERNAME: string;
    PASSWORD: string;
    /** Outbound connections go through this WebSocket tunnel when set. */
    TUNNEL_URL?: string;
    TUNNEL_HOST: string;
    TUNNEL_PORT: number;
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): Config {
    return {
        HOST: env.HOST || '127.0.0.1',
        PORT: parsePort(env, 'PORT', 8080),
        USERNAME: env.PROXY_USERNAME ?? 'user',
        PASSWORD: env.PROXY_PASSWORD ?? 'password',
        TUNNEL_URL: env.TUNNEL_URL || undefined,
        TUNNEL_HOST: env.TUNNEL_HOST || '127.0.0.1',
        TUNNEL_PORT: parsePort(env, 'TUNNEL_PORT', 8081),
    };
}

function parsePort(env: Env, name: string, fallback: number): number {
    const raw = env[name];
    if (!raw) return fallback;
    const port = Number(raw);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
        throw new ConfigError(`${name} must be an integer between 0 and 65535, got "${raw}"`);
    }
    return port;
}

export const config = loadConfig();
