/**
 * FXP transfer coordination
 *
 * Drives two borrowed sessions through one server-to-server transfer:
 *
 *   IDLE → NEGOTIATED → TRANSFERRING → COMPLETE | SRC_FAILED | DST_FAILED
 *
 * plus NEGOTIATION_FAILED when the servers never agree on a data connection.
 * The source listens (PASV or CPSV), the destination connects (PORT), STOR
 * goes out before RETR, and both completion replies are awaited together.
 * A failed source ends the wait on the destination.
 * Failures come back as an FxpOutcome; nothing is thrown and nothing is
 * retried.
 */

import { encodeHostPort, parsePassiveReply } from './host-port.js';
import { FtpCancelledError, FtpReplyError } from './errors.js';
import type { StatusResponse } from './status-response.js';
import type { FxpPeer, TransferEndpoint } from './fxp-peer.js';
import type { FxpNegotiation } from './types.js';

export type TransferSide = 'source' | 'destination';

export type TransferPhase =
    | 'IDLE'
    | 'NEGOTIATED'
    | 'TRANSFERRING'
    | 'COMPLETE'
    | 'SRC_FAILED'
    | 'DST_FAILED'
    | 'NEGOTIATION_FAILED';

export interface TransferResult {
    sourceResponse: StatusResponse;
    destinationResponse: StatusResponse;
}

export type FxpOutcome =
    | { status: 'ok'; result: TransferResult }
    | { status: 'source-failed'; reason: string; response?: StatusResponse; partial: Partial<TransferResult> }
    | { status: 'destination-failed'; reason: string; response?: StatusResponse; partial: Partial<TransferResult> }
    | { status: 'negotiation-failed'; reason: string; side?: TransferSide; response?: StatusResponse };

export interface TransferOptions {
    /** Bounds the completion waits. An abort counts as that side failing. */
    signal?: AbortSignal;
    onPhase?: (phase: TransferPhase) => void;
}

export interface CoordinatorOptions {
    debug?: boolean;
}

interface Settled {
    response?: StatusResponse;
    error?: Error;
}

class SideStepError extends Error {
    constructor(readonly side: TransferSide, readonly failure: unknown) {
        super(failure instanceof Error ? failure.message : String(failure));
        this.name = 'SideStepError';
    }
}

export class FxpCoordinator {
    constructor(private readonly options: CoordinatorOptions = {}) {}

    /**
     * Plain FXP: PASV on the source, no TLS involved.
     */
    transfer(source: TransferEndpoint, destination: TransferEndpoint, options?: TransferOptions): Promise<FxpOutcome> {
        return this.run('PASV', source, destination, options);
    }

    /**
     * Secure FXP through CPSV. Do not mix with SSCN on the same sessions.
     */
    transferViaCPSV(source: TransferEndpoint, destination: TransferEndpoint, options?: TransferOptions): Promise<FxpOutcome> {
        return this.run('CPSV', source, destination, options);
    }

    /**
     * Secure FXP through SSCN: the source plays TLS server, the destination
     * TLS client. Do not mix with CPSV on the same sessions.
     */
    transferViaSSCN(source: TransferEndpoint, destination: TransferEndpoint, options?: TransferOptions): Promise<FxpOutcome> {
        return this.run('SSCN', source, destination, options);
    }

    private async run(
        variant: FxpNegotiation,
        source: TransferEndpoint,
        destination: TransferEndpoint,
        options: TransferOptions = {}
    ): Promise<FxpOutcome> {
        const enter = (phase: TransferPhase): void => {
            this.log(`🔀 [${source.peer.session.id} → ${destination.peer.session.id}] ${variant} ${phase}`);
            options.onPhase?.(phase);
        };
        enter('IDLE');

        try {
            await this.negotiate(variant, source.peer, destination.peer);
        } catch (error) {
            enter('NEGOTIATION_FAILED');
            return negotiationFailure(error);
        }
        enter('NEGOTIATED');

        // ended early when the source fails or the caller aborts
        const destinationCompletion = new AbortController();
        const unlink = follow(options.signal, destinationCompletion);
        try {
            return await this.exchangeData(source, destination, options.signal, destinationCompletion, enter);
        } finally {
            unlink();
        }
    }

    /**
     * STOR before RETR, then both completions. A source failure is reported
     * as soon as it is known; the destination reply is taken if it is
     * already in, otherwise abandoned.
     */
    private async exchangeData(
        source: TransferEndpoint,
        destination: TransferEndpoint,
        signal: AbortSignal | undefined,
        destinationCompletion: AbortController,
        enter: (phase: TransferPhase) => void
    ): Promise<FxpOutcome> {
        const store = await settle(destination.peer.commands.prepareStore(destination.path));
        if (!store.response?.isPreliminary()) {
            enter('DST_FAILED');
            return {
                status: 'destination-failed',
                reason: describe('STOR', store),
                response: store.response,
                partial: {}
            };
        }

        const retrieve = await settle(source.peer.commands.prepareRetrieve(source.path));
        if (!retrieve.response?.isPreliminary()) {
            destinationCompletion.abort();
            const destinationWait = await settle(destination.peer.commands.awaitTransferCompletion(destinationCompletion.signal));
            enter('SRC_FAILED');
            return {
                status: 'source-failed',
                reason: describe('RETR', retrieve),
                response: retrieve.response,
                partial: { destinationResponse: destinationWait.response }
            };
        }
        enter('TRANSFERRING');

        const destinationPending = settle(destination.peer.commands.awaitTransferCompletion(destinationCompletion.signal));
        const sourceWait = await settle(source.peer.commands.awaitTransferCompletion(signal));

        if (!sourceWait.response?.isTransferComplete()) {
            destinationCompletion.abort();
            const destinationWait = await destinationPending;
            enter('SRC_FAILED');
            return {
                status: 'source-failed',
                reason: describe('source completion', sourceWait),
                response: sourceWait.response,
                partial: { destinationResponse: destinationWait.response }
            };
        }

        const destinationWait = await destinationPending;
        if (!destinationWait.response?.isTransferComplete()) {
            enter('DST_FAILED');
            return {
                status: 'destination-failed',
                reason: describe('destination completion', destinationWait),
                response: destinationWait.response,
                partial: { sourceResponse: sourceWait.response }
            };
        }

        enter('COMPLETE');
        return {
            status: 'ok',
            result: {
                sourceResponse: sourceWait.response,
                destinationResponse: destinationWait.response
            }
        };
    }

    /**
     * Gets the destination pointed at the source's listening port.
     */
    private async negotiate(variant: FxpNegotiation, source: FxpPeer, destination: FxpPeer): Promise<void> {
        await onSide('source', async () => source.security.assertClaimable(variant));
        await onSide('destination', async () => destination.security.assertClaimable(variant));
        source.security.claimNegotiation(variant);
        destination.security.claimNegotiation(variant);

        const passive = await this.requestPassivePort(variant, source, destination);
        const target = await onSide('source', async () => encodeHostPort(parsePassiveReply(passive)));
        await onSide('destination', () => destination.commands.activePort(target));
    }

    /**
     * Everything up to and including the source's passive reply.
     */
    private async requestPassivePort(variant: FxpNegotiation, source: FxpPeer, destination: FxpPeer): Promise<StatusResponse> {
        switch (variant) {
            case 'PASV':
                return onSide('source', () => source.commands.passivePort());

            case 'CPSV':
                await onSide('source', () => ensureProtected(source));
                await onSide('destination', () => ensureProtected(destination));
                return onSide('source', () => source.security.negotiatePassiveDataPort());

            case 'SSCN':
                await onSide('source', () => ensureProtected(source));
                await onSide('destination', () => ensureProtected(destination));
                // source plays TLS server, destination TLS client
                await onSide('source', () => expectCompletion('SSCN OFF', source.security.toggleSSCN(false)));
                await onSide('destination', () => expectCompletion('SSCN ON', destination.security.toggleSSCN(true)));
                return onSide('source', () => source.commands.passivePort());
        }
    }

    private log(message: string): void {
        if (this.options.debug) {
            console.log(message);
        }
    }
}

async function ensureProtected(peer: FxpPeer): Promise<void> {
    if (!peer.security.dataProtected) {
        await peer.security.setProtectionLevel('P');
    }
}

async function expectCompletion(command: string, pending: Promise<StatusResponse>): Promise<StatusResponse> {
    const response = await pending;
    if (!response.isPositiveCompletion()) {
        throw new FtpReplyError(command, response);
    }
    return response;
}

function follow(signal: AbortSignal | undefined, controller: AbortController): () => void {
    if (!signal) {
        return () => {};
    }
    if (signal.aborted) {
        controller.abort();
        return () => {};
    }
    const onAbort = (): void => controller.abort();
    signal.addEventListener('abort', onAbort, { once: true });
    return () => signal.removeEventListener('abort', onAbort);
}

async function onSide<T>(side: TransferSide, task: () => Promise<T>): Promise<T> {
    try {
        return await task();
    } catch (error) {
        throw new SideStepError(side, error);
    }
}

async function settle(pending: Promise<StatusResponse>): Promise<Settled> {
    try {
        return { response: await pending };
    } catch (error) {
        return { error: error instanceof Error ? error : new Error(String(error)) };
    }
}

function describe(step: string, settled: Settled): string {
    if (settled.error instanceof FtpCancelledError) {
        return `${step} cancelled`;
    }
    if (settled.error) {
        return `${step} failed: ${settled.error.message}`;
    }
    return `${step} returned ${settled.response?.firstLine ?? 'nothing'}`;
}

function negotiationFailure(error: unknown): FxpOutcome {
    if (!(error instanceof SideStepError)) {
        return { status: 'negotiation-failed', reason: error instanceof Error ? error.message : String(error) };
    }
    return {
        status: 'negotiation-failed',
        reason: error.message,
        side: error.side,
        response: error.failure instanceof FtpReplyError ? error.failure.response : undefined
    };
}
