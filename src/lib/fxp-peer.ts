/**
 * One side of an FXP transfer: a session with its command set and its
 * SecureModeController attached.
 */

import { FtpControlSession } from './control-session.js';
import { FxpCommandSet } from './fxp-command-set.js';
import { SecureModeController } from './secure-mode-controller.js';
import type { SiteConfig } from './config.js';
import type { ControlSession, SecureOptions } from './types.js';

export interface FxpPeer {
    readonly session: ControlSession;
    readonly commands: FxpCommandSet;
    readonly security: SecureModeController;
}

export interface ConnectedPeer extends FxpPeer {
    readonly session: FtpControlSession;
}

/** A peer plus the file path on that server. */
export interface TransferEndpoint {
    peer: FxpPeer;
    path: string;
}

export function createFxpPeer(session: ControlSession, options?: SecureOptions): FxpPeer {
    return {
        session,
        commands: new FxpCommandSet(session),
        security: new SecureModeController(session, options)
    };
}

/**
 * Connect and log in, through AUTH TLS/SSL when the site asks for it.
 * The caller owns the returned session and must quit or close it.
 */
export async function connectPeer(site: SiteConfig, options: SecureOptions): Promise<ConnectedPeer> {
    const session = await FtpControlSession.connect(site.session);
    const peer: ConnectedPeer = {
        session,
        commands: new FxpCommandSet(session),
        security: new SecureModeController(session, options)
    };

    try {
        if (site.auth) {
            await peer.security.negotiateTLS(site.auth, site.username, site.password, site.account);
        } else {
            await session.login(site.username, site.password, site.account);
        }
    } catch (error) {
        session.close();
        throw error;
    }
    return peer;
}
