import { describe, test, expect } from 'vitest';
import { maskCommand } from '@lib/control-session.js';
import { FtpAuthError, FtpCancelledError, FtpReplyError } from '@lib/errors.js';
import { ScriptedSession } from '@spec/helpers/scripted-session.js';

describe('ControlSessionBase login', () => {
    test('should log in with USER and PASS', async () => {
        const session = new ScriptedSession()
            .reply('USER alice', '331 Password required')
            .reply('PASS test-secret', '230 Logged in');

        const response = await session.login('alice', 'test-secret');

        expect(response.code).toBe('230');
        expect(session.sent).toEqual(['USER alice', 'PASS test-secret']);
    });

    test('should default the anonymous password', async () => {
        const session = new ScriptedSession()
            .reply('USER anonymous', '331 Send email as password')
            .reply('PASS anonymous@', '230 Welcome');

        await session.login();

        expect(session.sent).toEqual(['USER anonymous', 'PASS anonymous@']);
    });

    test('should skip PASS when USER is enough', async () => {
        const session = new ScriptedSession().reply('USER trusted', '230 Logged in without password');

        await session.login('trusted', 'unused');

        expect(session.sent).toEqual(['USER trusted']);
    });

    test('should send ACCT when the server asks for one', async () => {
        const session = new ScriptedSession()
            .reply('USER alice', '331 Password required')
            .reply('PASS test-secret', '332 Need account')
            .reply('ACCT billing', '230 Logged in');

        await session.login('alice', 'test-secret', 'billing');

        expect(session.sent).toEqual(['USER alice', 'PASS test-secret', 'ACCT billing']);
    });

    test('should fail with FtpAuthError when an account is needed but missing', async () => {
        const session = new ScriptedSession()
            .reply('USER alice', '331 Password required')
            .reply('PASS test-secret', '332 Need account');

        await expect(session.login('alice', 'test-secret')).rejects.toThrow(
            'PASS: expected login to succeed, got 332 Need account'
        );
    });

    test('should fail with FtpAuthError on a rejected password', async () => {
        const session = new ScriptedSession()
            .reply('USER alice', '331 Password required')
            .reply('PASS wrong-secret', '530 Login incorrect');

        const login = session.login('alice', 'wrong-secret');

        await expect(login).rejects.toBeInstanceOf(FtpAuthError);
        await expect(login).rejects.toThrow('USER: expected login to succeed, got 530 Login incorrect');
    });
});

describe('ControlSessionBase exchange', () => {
    test('should mask the password in reply errors', async () => {
        const session = new ScriptedSession().reply('PASS', '530 Login incorrect');

        const result = session.sendVoidCommand('PASS test-secret');

        await expect(result).rejects.toBeInstanceOf(FtpReplyError);
        await expect(result).rejects.toThrow('PASS ***: expected a positive completion reply, got 530 Login incorrect');
    });

    test('should hand back any reply from sendCommand', async () => {
        const session = new ScriptedSession().reply('NOOP', '421 Closing');

        const response = await session.sendCommand('NOOP');

        expect(response.firstLine).toBe('421 Closing');
    });

    test('should cancel a pending read on abort', async () => {
        const session = new ScriptedSession();
        const controller = new AbortController();

        const pending = session.readReply(controller.signal);
        controller.abort();

        await expect(pending).rejects.toBeInstanceOf(FtpCancelledError);
        expect(session.pendingWaits).toBe(0);
    });
});

describe('maskCommand', () => {
    test('should only mask PASS', () => {
        expect(maskCommand('PASS hunter')).toBe('PASS ***');
        expect(maskCommand('pass hunter')).toBe('PASS ***');
        expect(maskCommand('PASV')).toBe('PASV');
        expect(maskCommand('USER alice')).toBe('USER alice');
    });
});
