import { Duplex } from 'stream';
import { RelayFaultError, TransportError } from './errors';
import { StreamReader, shutdownRead, shutdownWrite, writeChunk } from './stream-io';

export interface RelayResult {
    clientToRemote: number;
    remoteToClient: number;
}

/**
 * Copies bytes both ways until each side has reached end-of-stream or
 * failed. Resolves only after both directions are done; the first failure,
 * if any, is thrown after that.
 */
export async function relay(client: Duplex, remote: Duplex): Promise<RelayResult> {
    const [up, down] = await Promise.allSettled([
        pump(client, remote, 'client -> remote'),
        pump(remote, client, 'remote -> client'),
    ]);

    if (up.status === 'rejected') throw up.reason;
    if (down.status === 'rejected') throw down.reason;
    return { clientToRemote: up.value, remoteToClient: down.value };
}

async function pump(source: Duplex, destination: Duplex, direction: string): Promise<number> {
    const reader = new StreamReader(source);
    let total = 0;
    try {
        for (let chunk = await reader.read(); chunk !== null; chunk = await reader.read()) {
            await writeChunk(destination, chunk);
            total += chunk.length;
        }
        return total;
    } catch (err) {
        if (err instanceof TransportError) throw err;
        throw new RelayFaultError(direction, err);
    } finally {
        // the peer sees EOF on this direction only; the other keeps running
        shutdownWrite(destination);
        shutdownRead(source);
    }
}
