/**
 * TLS state of one control session
 *
 * Attached to a session by composition: the controller issues the security
 * commands through the session and installs itself as the session's
 * data-connection wrapper.
 *
 * Control-channel and data-channel protection are tracked separately.
 * AUTH/CCC move `controlSecure`; PROT moves `protection`. Only `protection`
 * decides whether a data connection gets TLS, so a CCC leaves data
 * connections encrypted until PROT C.
 */

import type * as net from 'net';
import * as tls from 'tls';
import { FTP_COMMANDS } from '../commands/index.js';
import { FxpModeConflictError, SecureModeError } from './errors.js';
import type { StatusResponse } from './status-response.js';
import type {
    AuthMechanism,
    ControlSession,
    FxpNegotiation,
    ProtectionLevel,
    SecureOptions,
    TlsRole
} from './types.js';

export class SecureModeController {
    private controlSecure = false;
    private protection: ProtectionLevel = 'C';
    private sscn = false;
    private claimed?: FxpNegotiation;

    constructor(
        readonly session: ControlSession,
        private readonly options: SecureOptions = { verification: 'verify' }
    ) {
        session.setDataConnectionWrapper((raw, role) => this.wrapDataConnection(raw, role));
    }

    /** Control channel currently under TLS. */
    get secure(): boolean {
        return this.controlSecure;
    }

    get protectionLevel(): ProtectionLevel {
        return this.protection;
    }

    /** Data connections will be wrapped in TLS. */
    get dataProtected(): boolean {
        return this.protection === 'P';
    }

    get sscnEnabled(): boolean {
        return this.sscn;
    }

    get negotiation(): FxpNegotiation | undefined {
        return this.claimed;
    }

    /**
     * AUTH TLS/SSL, handshake as client, login over the encrypted channel,
     * then PBSZ 0 and PROT P. A completed handshake says nothing about the
     * credentials: a rejected login still throws FtpAuthError.
     */
    async negotiateTLS(
        mechanism: AuthMechanism = 'TLS',
        username: string = 'anonymous',
        password?: string,
        account?: string
    ): Promise<StatusResponse> {
        await this.session.synchronize(async () => {
            await FTP_COMMANDS.AUTH.executeLocked(this.session, mechanism);
            await this.session.secureControl(this.tlsOptions());
        });
        this.controlSecure = true;

        const login = await this.session.login(username, password, account);
        await this.setProtectionBufferSize(0);
        await this.setProtectionLevel('P');
        return login;
    }

    async setProtectionBufferSize(size: number = 0): Promise<StatusResponse> {
        return FTP_COMMANDS.PBSZ.execute(this.session, String(size));
    }

    async setProtectionLevel(level: ProtectionLevel): Promise<StatusResponse> {
        const response = await FTP_COMMANDS.PROT.execute(this.session, level);
        this.protection = level;
        return response;
    }

    /**
     * CCC. A refusal is a normal outcome and comes back as the reply.
     */
    async clearCommandChannel(): Promise<StatusResponse> {
        return this.session.synchronize(async () => {
            const response = await FTP_COMMANDS.CCC.executeLocked(this.session);
            if (response.isPositiveCompletion()) {
                await this.session.clearControl();
                this.controlSecure = false;
            }
            return response;
        });
    }

    /**
     * SSCN ON makes the server the TLS client of the next data handshake,
     * OFF (the default) the TLS server. Refused locally unless PROT P is in
     * force; nothing is sent in that case.
     */
    async toggleSSCN(on: boolean): Promise<StatusResponse> {
        const command = on ? 'SSCN ON' : 'SSCN OFF';
        if (!this.dataProtected) {
            throw new SecureModeError(command, 'requires PROT P');
        }

        const response = await FTP_COMMANDS.SSCN.execute(this.session, on ? 'ON' : 'OFF');
        if (response.isPositiveCompletion()) {
            this.sscn = on;
        }
        return response;
    }

    /**
     * CPSV: PASV whose listener leaves the TLS handshake to the connecting
     * side. Needs PROT P like SSCN.
     */
    async negotiatePassiveDataPort(): Promise<StatusResponse> {
        if (!this.dataProtected) {
            throw new SecureModeError('CPSV', 'requires PROT P');
        }
        return FTP_COMMANDS.CPSV.execute(this.session);
    }

    /**
     * Commit this session to one negotiation style. CPSV and SSCN leave
     * server-side state behind, so they cannot be mixed on one session.
     */
    claimNegotiation(variant: FxpNegotiation): void {
        this.assertClaimable(variant);
        this.claimed = variant;
    }

    /** Throws FxpModeConflictError where claimNegotiation would. */
    assertClaimable(variant: FxpNegotiation): void {
        if (this.claimed !== undefined && this.claimed !== variant) {
            throw new FxpModeConflictError(this.session.id, this.claimed, variant);
        }
    }

    /**
     * Drop the claim, turning SSCN back off if it was left on.
     */
    async releaseNegotiation(): Promise<void> {
        if (this.sscn) {
            await this.toggleSSCN(false);
        }
        this.claimed = undefined;
    }

    /**
     * Plain stream back when data protection is off; otherwise a finished
     * TLS handshake. `role` follows the transport mode, except that a server
     * under SSCN ON handshakes as client, so this side then plays server.
     */
    async wrapDataConnection(raw: net.Socket, role: TlsRole): Promise<net.Socket> {
        if (!this.dataProtected) {
            return raw;
        }

        const effective = this.handshakeRole(role);
        try {
            return effective === 'client' ? await this.connectAsClient(raw) : await this.acceptAsServer(raw);
        } catch (error) {
            raw.destroy();
            throw error;
        }
    }

    /** Role this side takes in a data handshake the session requested as `role`. */
    handshakeRole(role: TlsRole): TlsRole {
        return this.sscn ? 'server' : role;
    }

    private connectAsClient(raw: net.Socket): Promise<tls.TLSSocket> {
        const host = (raw.remoteAddress ?? '').replace(/^::ffff:/, '');

        return new Promise<tls.TLSSocket>((resolve, reject) => {
            const secure = tls.connect(
                {
                    ...this.tlsOptions(),
                    host,
                    socket: raw,
                    session: this.session.getControlTlsSession()
                },
                () => {
                    secure.off('error', reject);
                    resolve(secure);
                }
            );
            secure.once('error', reject);
        });
    }

    private acceptAsServer(raw: net.Socket): Promise<tls.TLSSocket> {
        const { certificate, privateKey } = this.options;
        if (!certificate || !privateKey) {
            throw new SecureModeError('data connection', 'TLS server role needs a certificate and private key');
        }

        return new Promise<tls.TLSSocket>((resolve, reject) => {
            const secure = new tls.TLSSocket(raw, {
                isServer: true,
                secureContext: tls.createSecureContext({ cert: certificate, key: privateKey })
            });
            secure.once('secure', () => {
                secure.off('error', reject);
                resolve(secure);
            });
            secure.once('error', reject);
        });
    }

    private tlsOptions(): tls.ConnectionOptions {
        return {
            rejectUnauthorized: this.options.verification !== 'permissive',
            ca: this.options.ca,
            cert: this.options.certificate,
            key: this.options.privateKey
        };
    }
}
