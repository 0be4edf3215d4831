import { Readable, Writable } from 'stream';
import { TransportError } from './errors';

/** Anything the codec can pull an exact number of bytes from. */
export interface ByteSource {
    readExact(size: number): Promise<Buffer>;
}

/**
 * Pull-based reader over a paused Node stream.
 *
 * Bytes not yet requested stay in the stream's own buffer, so whatever the
 * client pipelines after the handshake is still there for the relay.
 *
 * Listens for the stream's events once, for the reader's lifetime: a
 * `readable` listener added while bytes are buffered is emitted again on the
 * next tick, which must not happen while a partial frame waits for the rest.
 */
export class StreamReader implements ByteSource {
    private waiter: (() => void) | null = null;

    constructor(private readonly stream: Readable) {
        const wake = () => {
            const waiter = this.waiter;
            this.waiter = null;
            waiter?.();
        };
        stream.on('readable', wake);
        stream.on('end', wake);
        // the error itself is picked up by throwIfErrored on the next pass
        stream.on('error', wake);
        stream.on('close', wake);
    }

    async readExact(size: number): Promise<Buffer> {
        if (size === 0) return Buffer.alloc(0);

        for (;;) {
            this.throwIfErrored();
            const chunk: unknown = this.stream.read(size);
            if (Buffer.isBuffer(chunk)) {
                if (chunk.length < size) {
                    throw new TransportError(`connection closed after ${chunk.length} of ${size} bytes`);
                }
                return chunk;
            }
            if (this.stream.readableEnded || this.stream.destroyed) {
                throw new TransportError(`connection closed while waiting for ${size} bytes`);
            }
            await this.waitForData();
        }
    }

    /** Next available chunk, or null once the stream has ended. */
    async read(): Promise<Buffer | null> {
        for (;;) {
            this.throwIfErrored();
            const chunk: unknown = this.stream.read();
            if (Buffer.isBuffer(chunk)) return chunk;
            if (this.stream.readableEnded || this.stream.destroyed) return null;
            await this.waitForData();
        }
    }

    private throwIfErrored() {
        const err = this.stream.errored;
        if (err) {
            throw new TransportError(`read failed: ${err.message}`, { cause: err });
        }
    }

    // read() has just returned null, which leaves needReadable set: the next
    // push, end-of-stream or error emits an event that resolves this
    private waitForData(): Promise<void> {
        return new Promise<void>((resolve) => {
            this.waiter = resolve;
        });
    }
}

export function writeChunk(stream: Writable, chunk: Uint8Array): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        if (stream.destroyed || stream.writableEnded) {
            reject(new TransportError('write failed: stream is closed'));
            return;
        }
        stream.write(chunk, (err) => {
            if (err) {
                reject(new TransportError(`write failed: ${err.message}`, { cause: err }));
            } else {
                resolve();
            }
        });
    });
}

/** Half-close: sends FIN after everything already written, keeps the read side open. */
export function shutdownWrite(stream: Writable) {
    if (!stream.destroyed && !stream.writableEnded) {
        stream.end();
    }
}

/** Stop consuming a stream; whatever still arrives is left unread. */
export function shutdownRead(stream: Readable) {
    if (!stream.destroyed) {
        stream.pause();
    }
}
