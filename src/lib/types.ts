/**
 * Shared types for the FXP core
 */

import type * as net from 'net';
import type * as tls from 'tls';
import type { StatusResponse } from './status-response.js';

export type TransportMode = 'active' | 'passive';
export type TlsRole = 'client' | 'server';
export type AuthMechanism = 'TLS' | 'SSL';
export type ProtectionLevel = 'P' | 'E' | 'S' | 'C';
export type CertificateVerification = 'verify' | 'permissive';

/** How the two servers agree on a data connection. */
export type FxpNegotiation = 'PASV' | 'CPSV' | 'SSCN';

export type DataConnectionWrapper = (raw: net.Socket, role: TlsRole) => Promise<net.Socket>;

/**
 * One authenticated control connection. Everything above this interface
 * (command set, secure mode controller, coordinator) only talks FTP through
 * these methods.
 *
 * `exchange`, `exchangeVoid`, `readReply` and `openDataConnection` assume the
 * caller already holds the session lock via `synchronize`; `sendCommand`,
 * `sendVoidCommand` and `login` take it themselves.
 */
export interface ControlSession {
    readonly id: string;
    readonly mode: TransportMode;
    readonly debug: boolean;

    synchronize<T>(task: () => Promise<T>): Promise<T>;

    exchange(line: string): Promise<StatusResponse>;
    exchangeVoid(line: string): Promise<StatusResponse>;
    readReply(signal?: AbortSignal): Promise<StatusResponse>;

    sendCommand(line: string): Promise<StatusResponse>;
    sendVoidCommand(line: string): Promise<StatusResponse>;
    login(username?: string, password?: string, account?: string): Promise<StatusResponse>;

    /** Wrap the control stream in TLS as the client. */
    secureControl(options: tls.ConnectionOptions): Promise<void>;
    /** Drop TLS from the control stream after a successful CCC. */
    clearControl(): Promise<void>;
    /** TLS session of the control channel, for data channel resumption. */
    getControlTlsSession(): Buffer | undefined;

    setDataConnectionWrapper(wrapper?: DataConnectionWrapper): void;
    openDataConnection(command: string): Promise<net.Socket>;
}

export interface SessionConfig {
    id: string;
    host: string;
    port: number;
    mode: TransportMode;
    debug: boolean;
}

export interface SecureOptions {
    /** PEM client certificate, also served when this side plays TLS server. */
    certificate?: string | Buffer;
    privateKey?: string | Buffer;
    ca?: string | Buffer;
    verification: CertificateVerification;
}

export interface FtpCommandHandler {
    readonly name: string;

    execute(session: ControlSession, args?: string): Promise<StatusResponse>;
    executeLocked(session: ControlSession, args?: string): Promise<StatusResponse>;
}
