/**
 * Duplex stand-in for a control socket while it carries TLS.
 *
 * TLS is layered on this relay instead of on the socket itself so the socket
 * survives the TLS layer: after CCC the relay is detached and the socket goes
 * back to carrying plaintext. Ending or destroying the relay never ends the
 * socket.
 */

import type * as net from 'net';
import { Duplex } from 'stream';

export class SocketRelay extends Duplex {
    private attached = true;

    constructor(private readonly socket: net.Socket) {
        super();
        socket.on('data', this.forward);
        socket.on('end', this.forwardEnd);
    }

    private readonly forward = (chunk: Buffer): void => {
        if (!this.push(chunk)) {
            this.socket.pause();
        }
    };

    private readonly forwardEnd = (): void => {
        this.push(null);
    };

    override _read(): void {
        if (this.attached) {
            this.socket.resume();
        }
    }

    override _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
        if (!this.attached) {
            callback();
            return;
        }
        this.socket.write(chunk, callback);
    }

    override _final(callback: (error?: Error | null) => void): void {
        callback();
    }

    override _destroy(error: Error | null, callback: (error?: Error | null) => void): void {
        this.detach();
        callback(error);
    }

    /** Stop relaying in both directions; the socket is left flowing. */
    detach(): void {
        if (!this.attached) {
            return;
        }
        this.attached = false;
        this.socket.off('data', this.forward);
        this.socket.off('end', this.forwardEnd);
        this.socket.resume();
    }
}
