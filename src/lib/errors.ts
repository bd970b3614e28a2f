/**
 * Error types raised by the FXP core
 *
 * Every error carries the structured context a caller needs to decide on
 * cleanup. Nothing in the core retries; errors go straight to the caller
 * or, inside the coordinator, into an FxpOutcome.
 */

import type { StatusResponse } from './status-response.js';

export class FtpReplyError extends Error {
    constructor(
        public readonly command: string,
        public readonly response: StatusResponse,
        expectation: string = 'a positive completion reply'
    ) {
        super(`${command}: expected ${expectation}, got ${response.firstLine}`);
        this.name = 'FtpReplyError';
    }
}

export class FtpAuthError extends FtpReplyError {
    constructor(command: string, response: StatusResponse) {
        super(command, response, 'login to succeed');
        this.name = 'FtpAuthError';
    }
}

export class FtpProtocolError extends Error {
    constructor(message: string, public readonly line?: string) {
        super(line === undefined ? message : `${message}: ${JSON.stringify(line)}`);
        this.name = 'FtpProtocolError';
    }
}

export class FxpNegotiationError extends Error {
    constructor(message: string, public readonly reply: string) {
        super(`Negotiation error: ${message} (${reply})`);
        this.name = 'FxpNegotiationError';
    }
}

export class SecureModeError extends Error {
    constructor(public readonly operation: string, reason: string) {
        super(`${operation}: ${reason}`);
        this.name = 'SecureModeError';
    }
}

export class FxpModeConflictError extends Error {
    constructor(
        public readonly sessionId: string,
        public readonly claimed: string,
        public readonly requested: string
    ) {
        super(`Session ${sessionId} is committed to ${claimed}; release it before using ${requested}`);
        this.name = 'FxpModeConflictError';
    }
}

export class FtpCancelledError extends Error {
    constructor(public readonly command: string) {
        super(`${command}: wait cancelled`);
        this.name = 'FtpCancelledError';
    }
}

export class FxpConfigError extends Error {
    constructor(message: string, public readonly setting: string) {
        super(`Configuration error (${setting}): ${message}`);
        this.name = 'FxpConfigError';
    }
}
