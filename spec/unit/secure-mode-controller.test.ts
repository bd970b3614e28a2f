import { describe, test, expect } from 'vitest';
import * as net from 'net';
import { SecureModeController } from '@lib/secure-mode-controller.js';
import { FtpAuthError, FtpReplyError, FxpModeConflictError, SecureModeError } from '@lib/errors.js';
import { ScriptedSession } from '@spec/helpers/scripted-session.js';

function scriptHandshake(session: ScriptedSession): ScriptedSession {
    return session
        .reply('AUTH TLS', '234 AUTH TLS successful')
        .reply('USER alice', '331 Password required')
        .reply('PASS test-secret', '230 Logged in')
        .reply('PBSZ 0', '200 PBSZ=0')
        .reply('PROT P', '200 Protection set to Private');
}

async function negotiated(): Promise<{ session: ScriptedSession; security: SecureModeController }> {
    const session = scriptHandshake(new ScriptedSession());
    const security = new SecureModeController(session, { verification: 'permissive' });
    await security.negotiateTLS('TLS', 'alice', 'test-secret');
    session.sent.length = 0;
    return { session, security };
}

describe('SecureModeController', () => {
    describe('negotiateTLS', () => {
        test('should secure the channel, log in, then set PBSZ 0 and PROT P', async () => {
            const session = scriptHandshake(new ScriptedSession());
            const security = new SecureModeController(session);

            const login = await security.negotiateTLS('TLS', 'alice', 'test-secret');

            expect(login.code).toBe('230');
            expect(session.sent).toEqual(['AUTH TLS', 'USER alice', 'PASS test-secret', 'PBSZ 0', 'PROT P']);
            expect(session.secureCalls).toHaveLength(1);
            expect(session.secureCalls[0].rejectUnauthorized).toBe(true);
            expect(security.secure).toBe(true);
            expect(security.protectionLevel).toBe('P');
        });

        test('should skip certificate checks when permissive', async () => {
            const session = scriptHandshake(new ScriptedSession());

            await new SecureModeController(session, { verification: 'permissive' }).negotiateTLS('TLS', 'alice', 'test-secret');

            expect(session.secureCalls[0].rejectUnauthorized).toBe(false);
        });

        test('should send AUTH SSL when asked', async () => {
            const session = new ScriptedSession().reply('AUTH SSL', '334 Not supported');

            await expect(new SecureModeController(session).negotiateTLS('SSL')).rejects.toThrow(
                'AUTH SSL: expected a positive completion reply, got 334 Not supported'
            );
            expect(session.sent).toEqual(['AUTH SSL']);
        });

        test('should not start TLS when AUTH is refused', async () => {
            const session = new ScriptedSession().reply('AUTH TLS', '504 AUTH not available');
            const security = new SecureModeController(session);

            await expect(security.negotiateTLS()).rejects.toBeInstanceOf(FtpReplyError);
            expect(session.secureCalls).toEqual([]);
            expect(security.secure).toBe(false);
        });

        test('should keep the channel secure but fail on a rejected login', async () => {
            const session = new ScriptedSession()
                .reply('AUTH TLS', '234 AUTH TLS successful')
                .reply('USER alice', '331 Password required')
                .reply('PASS wrong-secret', '530 Login incorrect');
            const security = new SecureModeController(session);

            await expect(security.negotiateTLS('TLS', 'alice', 'wrong-secret')).rejects.toBeInstanceOf(FtpAuthError);
            expect(security.secure).toBe(true);
            expect(security.dataProtected).toBe(false);
            expect(session.sent).not.toContain('PBSZ 0');
        });
    });

    describe('clearCommandChannel', () => {
        test('should drop control TLS but leave data protection alone', async () => {
            const { session, security } = await negotiated();
            session.reply('CCC', '200 Control channel cleared');

            const response = await security.clearCommandChannel();

            expect(response.code).toBe('200');
            expect(session.clearCalls).toBe(1);
            expect(security.secure).toBe(false);
            expect(security.dataProtected).toBe(true);
        });

        test('should return a refusal and stay secure', async () => {
            const { session, security } = await negotiated();
            session.reply('CCC', '534 CCC denied by policy');

            const response = await security.clearCommandChannel();

            expect(response.firstLine).toBe('534 CCC denied by policy');
            expect(session.clearCalls).toBe(0);
            expect(security.secure).toBe(true);
        });
    });

    describe('setProtectionLevel', () => {
        test('should turn data protection off with PROT C', async () => {
            const { session, security } = await negotiated();
            session.reply('PROT C', '200 Protection set to Clear');

            await security.setProtectionLevel('C');

            expect(security.dataProtected).toBe(false);
        });

        test('should keep the old level when PROT is refused', async () => {
            const session = new ScriptedSession().reply('PROT P', '536 Not supported');
            const security = new SecureModeController(session);

            await expect(security.setProtectionLevel('P')).rejects.toBeInstanceOf(FtpReplyError);
            expect(security.protectionLevel).toBe('C');
        });
    });

    describe('toggleSSCN', () => {
        test('should refuse locally without PROT P', async () => {
            const session = new ScriptedSession();
            const security = new SecureModeController(session);

            await expect(security.toggleSSCN(true)).rejects.toThrow(new SecureModeError('SSCN ON', 'requires PROT P'));
            expect(session.sent).toEqual([]);
        });

        test('should record the state after a 2xx reply', async () => {
            const { session, security } = await negotiated();
            session.reply('SSCN ON', '200 SSCN:CLIENT METHOD');

            await security.toggleSSCN(true);

            expect(security.sscnEnabled).toBe(true);
            expect(session.sent).toEqual(['SSCN ON']);
        });

        test('should leave the state alone when the server refuses', async () => {
            const { session, security } = await negotiated();
            session.reply('SSCN ON', '500 SSCN not understood');

            const response = await security.toggleSSCN(true);

            expect(response.code).toBe('500');
            expect(security.sscnEnabled).toBe(false);
        });
    });

    describe('negotiatePassiveDataPort', () => {
        test('should refuse locally without PROT P', async () => {
            const session = new ScriptedSession();

            await expect(new SecureModeController(session).negotiatePassiveDataPort()).rejects.toThrow(
                'CPSV: requires PROT P'
            );
            expect(session.sent).toEqual([]);
        });

        test('should send CPSV under PROT P', async () => {
            const { session, security } = await negotiated();
            session.reply('CPSV', '227 Entering Passive Mode (10,0,0,1,4,1)');

            const response = await security.negotiatePassiveDataPort();

            expect(response.code).toBe('227');
            expect(session.sent).toEqual(['CPSV']);
        });
    });

    describe('negotiation claims', () => {
        test('should allow the same variant twice', () => {
            const security = new SecureModeController(new ScriptedSession());

            security.claimNegotiation('CPSV');
            security.claimNegotiation('CPSV');

            expect(security.negotiation).toBe('CPSV');
        });

        test('should refuse mixing CPSV and SSCN on one session', () => {
            const security = new SecureModeController(new ScriptedSession('site-a'));

            security.claimNegotiation('CPSV');

            expect(() => security.claimNegotiation('SSCN')).toThrow(FxpModeConflictError);
            expect(() => security.claimNegotiation('SSCN')).toThrow(
                'Session site-a is committed to CPSV; release it before using SSCN'
            );
        });

        test('should check a claim without taking it', () => {
            const security = new SecureModeController(new ScriptedSession('site-a'));

            security.assertClaimable('SSCN');
            expect(security.negotiation).toBeUndefined();

            security.claimNegotiation('CPSV');
            expect(() => security.assertClaimable('SSCN')).toThrow(FxpModeConflictError);
            expect(security.negotiation).toBe('CPSV');
        });

        test('should turn SSCN off when the claim is released', async () => {
            const { session, security } = await negotiated();
            session.reply('SSCN ON', '200 SSCN:CLIENT METHOD').reply('SSCN OFF', '200 SSCN:SERVER METHOD');
            security.claimNegotiation('SSCN');
            await security.toggleSSCN(true);

            await security.releaseNegotiation();
            security.claimNegotiation('CPSV');

            expect(session.sent).toEqual(['SSCN ON', 'SSCN OFF']);
            expect(security.sscnEnabled).toBe(false);
            expect(security.negotiation).toBe('CPSV');
        });
    });

    describe('data connection wrapping', () => {
        test('should hand back the raw socket without PROT P', async () => {
            const session = new ScriptedSession();
            new SecureModeController(session);
            const raw = new net.Socket();

            await expect(session.wrapAs(raw, 'client')).resolves.toBe(raw);
            raw.destroy();
        });

        test('should handshake as TLS server in passive mode once SSCN is on', async () => {
            const { session, security } = await negotiated();
            session.reply('SSCN ON', '200 SSCN:CLIENT METHOD');
            await security.toggleSSCN(true);
            const raw = new net.Socket();

            await expect(session.wrapAs(raw, 'client')).rejects.toThrow(
                'data connection: TLS server role needs a certificate and private key'
            );
            expect(raw.destroyed).toBe(true);
        });

        test('should pick the handshake role from mode and SSCN state', async () => {
            const { session, security } = await negotiated();
            session.reply('SSCN ON', '200 SSCN:CLIENT METHOD').reply('SSCN OFF', '200 SSCN:SERVER METHOD');

            expect(security.handshakeRole('client')).toBe('client');
            expect(security.handshakeRole('server')).toBe('server');

            await security.toggleSSCN(true);
            expect(security.handshakeRole('client')).toBe('server');
            expect(security.handshakeRole('server')).toBe('server');

            await security.toggleSSCN(false);
            expect(security.handshakeRole('client')).toBe('client');
        });

        test('should need a certificate for the TLS server role', async () => {
            const { session } = await negotiated();
            const raw = new net.Socket();

            await expect(session.wrapAs(raw, 'server')).rejects.toThrow(
                'data connection: TLS server role needs a certificate and private key'
            );
            expect(raw.destroyed).toBe(true);
        });
    });
});
