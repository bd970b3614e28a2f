/**
 * RETR command - Source side of an FXP transfer
 *
 * Must follow STOR on the destination. Like STOR it sets TYPE I first and
 * returns the preliminary reply.
 */

import { BaseFtpCommand } from '../lib/base-command.js';
import type { ControlSession } from '../lib/types.js';
import type { StatusResponse } from '../lib/status-response.js';

export class RetrCommand extends BaseFtpCommand {
    readonly name = 'RETR';
    readonly expects = 'any';
    override readonly needsArgs = true;

    protected override async run(session: ControlSession, args: string): Promise<StatusResponse> {
        await session.exchangeVoid('TYPE I');
        return this.send(session, this.format(args));
    }
}
