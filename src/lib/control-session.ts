/**
 * FTP control connection
 *
 * ControlSessionBase holds what every session shares: the per-session lock,
 * the command/reply exchange, login, and the data-connection wrapper hook.
 * FtpControlSession is the socket-backed implementation.
 */

import * as net from 'net';
import * as tls from 'tls';
import { StringDecoder } from 'string_decoder';
import { SessionLock } from './session-lock.js';
import { ReplyParser, StatusResponse } from './status-response.js';
import { encodeHostPort, parsePassiveReply } from './host-port.js';
import { FtpAuthError, FtpCancelledError, FtpProtocolError, FtpReplyError, SecureModeError } from './errors.js';
import { SocketRelay } from './socket-relay.js';
import type { ControlSession, DataConnectionWrapper, SessionConfig, TlsRole, TransportMode } from './types.js';

const TLS_RECORD_HEADER = 5;

/**
 * A TLS record header (content type 20-23, major version 3) at the start of
 * the buffer. Plaintext replies always start with a digit.
 */
function startsWithTlsRecord(data: Buffer): boolean {
    return data.length >= 2 && data[0] >= 0x14 && data[0] <= 0x17 && data[1] === 0x03;
}

export function maskCommand(line: string): string {
    return /^PASS\b/i.test(line) ? 'PASS ***' : line;
}

export abstract class ControlSessionBase implements ControlSession {
    private readonly lock = new SessionLock();
    private dataWrapper?: DataConnectionWrapper;
    private abandonedReplies = 0;

    protected constructor(
        readonly id: string,
        readonly mode: TransportMode,
        readonly debug: boolean
    ) {}

    protected abstract writeLine(line: string): Promise<void>;
    protected abstract nextReply(signal?: AbortSignal): Promise<StatusResponse>;

    abstract secureControl(options: tls.ConnectionOptions): Promise<void>;
    abstract clearControl(): Promise<void>;
    abstract getControlTlsSession(): Buffer | undefined;
    abstract openDataConnection(command: string): Promise<net.Socket>;

    synchronize<T>(task: () => Promise<T>): Promise<T> {
        return this.lock.run(task);
    }

    async exchange(line: string): Promise<StatusResponse> {
        this.log(`📤 [${this.id}] ${maskCommand(line)}`);
        await this.writeLine(line);
        return this.readReply();
    }

    async exchangeVoid(line: string): Promise<StatusResponse> {
        const response = await this.exchange(line);
        if (!response.isPositiveCompletion()) {
            throw new FtpReplyError(maskCommand(line), response);
        }
        return response;
    }

    /**
     * A read cancelled through `signal` still owes the server one reply. That
     * reply is dropped when it arrives so the next command reads its own.
     */
    async readReply(signal?: AbortSignal): Promise<StatusResponse> {
        const response = await this.nextReply(signal);
        for (const line of response.lines) {
            this.log(`📨 [${this.id}] ${line}`);
        }
        return response;
    }

    sendCommand(line: string): Promise<StatusResponse> {
        return this.synchronize(() => this.exchange(line));
    }

    sendVoidCommand(line: string): Promise<StatusResponse> {
        return this.synchronize(() => this.exchangeVoid(line));
    }

    login(username: string = 'anonymous', password?: string, account?: string): Promise<StatusResponse> {
        return this.synchronize(async () => {
            let response = await this.exchange(`USER ${username}`);

            if (response.isPositiveIntermediate()) {
                const secret = password ?? (username === 'anonymous' ? 'anonymous@' : '');
                response = await this.exchange(`PASS ${secret}`);
            }

            if (response.isPositiveIntermediate()) {
                if (account === undefined) {
                    throw new FtpAuthError('PASS', response);
                }
                response = await this.exchange(`ACCT ${account}`);
            }

            if (!response.isPositiveCompletion()) {
                throw new FtpAuthError('USER', response);
            }

            this.log(`🔑 [${this.id}] Logged in as ${username}`);
            return response;
        });
    }

    setDataConnectionWrapper(wrapper?: DataConnectionWrapper): void {
        this.dataWrapper = wrapper;
    }

    protected wrapDataConnection(raw: net.Socket, role: TlsRole): Promise<net.Socket> {
        return this.dataWrapper ? this.dataWrapper(raw, role) : Promise.resolve(raw);
    }

    protected abandonReply(): void {
        this.abandonedReplies++;
    }

    /** True when the reply belongs to a cancelled read. */
    protected discardsReply(response: StatusResponse): boolean {
        if (this.abandonedReplies === 0) {
            return false;
        }
        this.abandonedReplies--;
        this.log(`🗑️ [${this.id}] Dropped late reply: ${response.firstLine}`);
        return true;
    }

    protected log(message: string): void {
        if (this.debug) {
            console.log(message);
        }
    }
}

interface ReplyWaiter {
    resolve: (response: StatusResponse) => void;
    reject: (error: Error) => void;
}

export class FtpControlSession extends ControlSessionBase {
    private readonly parser = new ReplyParser();
    private readonly replies: StatusResponse[] = [];
    private readonly waiters: ReplyWaiter[] = [];
    private lineBuffer = '';
    private decoder = new StringDecoder('utf8');
    private failure?: Error;

    private relay?: SocketRelay;
    private secureSocket?: tls.TLSSocket;
    private stripTlsRecords = false;
    private rawBacklog: Buffer = Buffer.alloc(0);

    private constructor(private readonly socket: net.Socket, private readonly config: SessionConfig) {
        super(config.id, config.mode, config.debug);
        socket.on('data', this.onRawData);
        socket.on('error', error => this.fail(error));
        socket.on('close', () => this.fail(new FtpProtocolError('Control connection closed')));
    }

    /**
     * Open the control connection and read the server greeting.
     */
    static async connect(config: SessionConfig): Promise<FtpControlSession> {
        const socket = await new Promise<net.Socket>((resolve, reject) => {
            const candidate = net.createConnection({ host: config.host, port: config.port }, () => {
                candidate.off('error', reject);
                resolve(candidate);
            });
            candidate.once('error', reject);
        });

        const session = new FtpControlSession(socket, config);
        const greeting = await session.readReply();
        if (!greeting.isPositiveCompletion()) {
            socket.destroy();
            throw new FtpReplyError('connect', greeting, 'a 220 greeting');
        }

        session.log(`📞 [${config.id}] Connected to ${config.host}:${config.port} (${config.mode})`);
        return session;
    }

    get secured(): boolean {
        return this.secureSocket !== undefined;
    }

    protected async writeLine(line: string): Promise<void> {
        if (this.failure) {
            throw this.failure;
        }
        const stream: net.Socket = this.secureSocket ?? this.socket;
        await new Promise<void>((resolve, reject) => {
            stream.write(`${line}\r\n`, error => (error ? reject(error) : resolve()));
        });
    }

    protected nextReply(signal?: AbortSignal): Promise<StatusResponse> {
        const queued = this.replies.shift();
        if (queued) {
            return Promise.resolve(queued);
        }
        if (this.failure) {
            return Promise.reject(this.failure);
        }
        if (signal?.aborted) {
            this.abandonReply();
            return Promise.reject(new FtpCancelledError('reply'));
        }

        return new Promise<StatusResponse>((resolve, reject) => {
            const onAbort = (): void => {
                const index = this.waiters.indexOf(waiter);
                if (index >= 0) {
                    this.waiters.splice(index, 1);
                    this.abandonReply();
                    reject(new FtpCancelledError('reply'));
                }
            };
            const waiter: ReplyWaiter = {
                resolve: response => {
                    signal?.removeEventListener('abort', onAbort);
                    resolve(response);
                },
                reject: error => {
                    signal?.removeEventListener('abort', onAbort);
                    reject(error);
                }
            };
            this.waiters.push(waiter);
            signal?.addEventListener('abort', onAbort, { once: true });
        });
    }

    async secureControl(options: tls.ConnectionOptions): Promise<void> {
        if (this.secureSocket) {
            throw new SecureModeError('AUTH', 'control channel is already protected');
        }

        this.socket.off('data', this.onRawData);
        const relay = new SocketRelay(this.socket);
        const servername = net.isIP(this.config.host) ? undefined : this.config.host;

        const secureSocket = await new Promise<tls.TLSSocket>((resolve, reject) => {
            const candidate = tls.connect({ host: this.config.host, servername, ...options, socket: relay }, () => {
                candidate.off('error', reject);
                resolve(candidate);
            });
            candidate.once('error', reject);
        }).catch((error: Error) => {
            this.fail(error);
            throw error;
        });

        this.relay = relay;
        this.secureSocket = secureSocket;
        this.decoder = new StringDecoder('utf8');
        secureSocket.on('data', this.onSecureData);
        secureSocket.on('error', this.onSecureError);
        this.log(`🔒 [${this.id}] Control channel protected (${secureSocket.getProtocol() ?? 'TLS'})`);
    }

    async clearControl(): Promise<void> {
        const secureSocket = this.secureSocket;
        const relay = this.relay;
        if (!secureSocket || !relay) {
            return;
        }

        secureSocket.off('data', this.onSecureData);
        secureSocket.off('error', this.onSecureError);
        secureSocket.on('error', error => this.log(`⚠️ [${this.id}] TLS shutdown: ${error.message}`));

        // close_notify goes out through the relay before it is detached
        await new Promise<void>(resolve => {
            secureSocket.end(() => resolve());
        });
        relay.detach();
        secureSocket.destroy();

        this.secureSocket = undefined;
        this.relay = undefined;
        this.decoder = new StringDecoder('utf8');
        this.stripTlsRecords = true;
        this.socket.on('data', this.onRawData);
        this.log(`🔓 [${this.id}] Control channel back to plaintext`);
    }

    getControlTlsSession(): Buffer | undefined {
        return this.secureSocket?.getSession();
    }

    async openDataConnection(command: string): Promise<net.Socket> {
        if (this.mode === 'passive') {
            const target = parsePassiveReply(await this.exchange('PASV'));
            const raw = await connectTo(target.host, target.port);
            const response = await this.exchange(command);
            if (!response.isPreliminary()) {
                raw.destroy();
                throw new FtpReplyError(command, response, 'a preliminary reply');
            }
            return this.wrapDataConnection(raw, 'client');
        }

        const localHost = (this.socket.localAddress ?? '127.0.0.1').replace(/^::ffff:/, '');
        const listener = await listenOn(localHost);
        try {
            const address = listener.address();
            if (address === null || typeof address === 'string') {
                throw new FtpProtocolError('Data listener has no port');
            }
            await this.exchangeVoid(`PORT ${encodeHostPort({ host: localHost, port: address.port })}`);

            const accepted = new Promise<net.Socket>(resolve => listener.once('connection', resolve));
            const response = await this.exchange(command);
            if (!response.isPreliminary()) {
                throw new FtpReplyError(command, response, 'a preliminary reply');
            }
            return this.wrapDataConnection(await accepted, 'server');
        } finally {
            listener.close();
        }
    }

    async quit(): Promise<StatusResponse> {
        const response = await this.sendCommand('QUIT');
        (this.secureSocket ?? this.socket).end();
        return response;
    }

    close(): void {
        this.secureSocket?.destroy();
        this.socket.destroy();
    }

    private readonly onRawData = (chunk: Buffer): void => {
        let data = chunk;
        if (this.stripTlsRecords) {
            // the server's close_notify may trail the CCC reply
            data = Buffer.concat([this.rawBacklog, chunk]);
            while (data.length > 0 && (data.length < 2 || startsWithTlsRecord(data))) {
                if (data.length < TLS_RECORD_HEADER || data.length < TLS_RECORD_HEADER + data.readUInt16BE(3)) {
                    this.rawBacklog = data;
                    return;
                }
                data = data.subarray(TLS_RECORD_HEADER + data.readUInt16BE(3));
            }
            this.rawBacklog = Buffer.alloc(0);
            if (data.length === 0) {
                return;
            }
            this.stripTlsRecords = false;
        }
        this.consume(this.decoder.write(data));
    };

    private readonly onSecureData = (chunk: Buffer): void => {
        this.consume(this.decoder.write(chunk));
    };

    private readonly onSecureError = (error: Error): void => {
        this.fail(error);
    };

    private consume(text: string): void {
        this.lineBuffer += text;

        let newline = this.lineBuffer.indexOf('\n');
        while (newline >= 0) {
            const line = this.lineBuffer.slice(0, newline).replace(/\r$/, '');
            this.lineBuffer = this.lineBuffer.slice(newline + 1);
            newline = this.lineBuffer.indexOf('\n');

            if (line.length === 0 && !this.parser.inProgress) {
                continue;
            }

            try {
                const response = this.parser.push(line);
                if (response) {
                    this.deliver(response);
                }
            } catch (error) {
                this.fail(error instanceof Error ? error : new FtpProtocolError(String(error)));
                return;
            }
        }
    }

    private deliver(response: StatusResponse): void {
        if (this.discardsReply(response)) {
            return;
        }
        const waiter = this.waiters.shift();
        if (waiter) {
            waiter.resolve(response);
        } else {
            this.replies.push(response);
        }
    }

    private fail(error: Error): void {
        if (this.failure) {
            return;
        }
        this.failure = error;
        this.log(`🔌 [${this.id}] ${error.message}`);
        for (const waiter of this.waiters.splice(0)) {
            waiter.reject(error);
        }
    }
}

function connectTo(host: string, port: number): Promise<net.Socket> {
    return new Promise<net.Socket>((resolve, reject) => {
        const socket = net.createConnection({ host, port }, () => {
            socket.off('error', reject);
            resolve(socket);
        });
        socket.once('error', reject);
    });
}

function listenOn(host: string): Promise<net.Server> {
    return new Promise<net.Server>((resolve, reject) => {
        const server = net.createServer();
        server.once('error', reject);
        server.listen(0, host, () => {
            server.off('error', reject);
            resolve(server);
        });
    });
}
