import { Duplex } from 'stream';
import WebSocket, { type RawData } from 'ws';

/** Text frame that ends one direction; data always travels in binary frames. */
export const END_OF_STREAM = 'eof';

/**
 * Byte stream over an open WebSocket that keeps TCP half-close semantics.
 * Ending the writable side sends {@link END_OF_STREAM} and leaves the socket
 * open, so the peer can keep sending until it ends as well. The WebSocket is
 * closed once both directions have ended, or when the stream is destroyed.
 */
export class WebSocketStream extends Duplex {
    private remoteEnded = false;

    constructor(private readonly ws: WebSocket) {
        super({ allowHalfOpen: true });

        ws.on('message', (data: RawData, isBinary: boolean) => {
            if (this.remoteEnded || this.destroyed) return;
            const chunk = toBuffer(data);
            if (!isBinary) {
                if (chunk.toString() === END_OF_STREAM) this.endReadable();
                return;
            }
            if (!this.push(chunk)) ws.pause();
        });
        // a close without the end marker still ends the readable side
        ws.on('close', () => this.endReadable());
        ws.on('error', (err: Error) => this.destroy(err));

        this.once('end', () => this.closeIfDone());
        this.once('finish', () => this.closeIfDone());
    }

    _read() {
        if (this.ws.isPaused) this.ws.resume();
    }

    _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void) {
        this.ws.send(chunk, { binary: true }, callback);
    }

    _final(callback: (error?: Error | null) => void) {
        this.ws.send(END_OF_STREAM, { binary: false }, callback);
    }

    _destroy(err: Error | null, callback: (error: Error | null) => void) {
        if (this.ws.readyState === WebSocket.OPEN) {
            if (err) {
                this.ws.terminate();
            } else {
                this.ws.close(1000);
            }
        }
        callback(err);
    }

    private endReadable() {
        if (this.remoteEnded || this.destroyed) return;
        this.remoteEnded = true;
        this.push(null);
    }

    private closeIfDone() {
        if (this.readableEnded && this.writableFinished && this.ws.readyState === WebSocket.OPEN) {
            this.ws.close(1000);
        }
    }
}

function toBuffer(data: RawData): Buffer {
    if (Buffer.isBuffer(data)) return data;
    if (Array.isArray(data)) return Buffer.concat(data);
    return Buffer.from(data);
}
