/**
 * fxp-relay - Server-to-server FTP transfers (FXP) with TLS/SSL support
 *
 * Library entry point. Sessions are opened and authenticated by the caller;
 * the coordinator only borrows them for one transfer.
 */

export { FtpControlSession, ControlSessionBase } from './lib/control-session.js';
export { FxpCommandSet, listingEntries } from './lib/fxp-command-set.js';
export { SecureModeController } from './lib/secure-mode-controller.js';
export { FxpCoordinator } from './lib/fxp-coordinator.js';
export { createFxpPeer, connectPeer } from './lib/fxp-peer.js';
export { StatusResponse, ReplyParser } from './lib/status-response.js';
export { parseHostPort, encodeHostPort, parsePassiveReply, extractTuple } from './lib/host-port.js';
export { SessionLock } from './lib/session-lock.js';
export { loadEnvironment, parseSiteUrl, loadSecureOptions } from './lib/config.js';
export {
    FtpReplyError,
    FtpAuthError,
    FtpProtocolError,
    FtpCancelledError,
    FxpNegotiationError,
    FxpModeConflictError,
    FxpConfigError,
    SecureModeError
} from './lib/errors.js';

export type {
    FxpOutcome,
    TransferResult,
    TransferOptions,
    TransferPhase,
    TransferSide,
    CoordinatorOptions
} from './lib/fxp-coordinator.js';
export type { FxpPeer, ConnectedPeer, TransferEndpoint } from './lib/fxp-peer.js';
export type { HostPort } from './lib/host-port.js';
export type { SiteConfig, EnvironmentSettings, TlsFiles } from './lib/config.js';
export type {
    ControlSession,
    SessionConfig,
    SecureOptions,
    TransportMode,
    TlsRole,
    AuthMechanism,
    ProtectionLevel,
    CertificateVerification,
    FxpNegotiation,
    DataConnectionWrapper
} from './lib/types.js';
