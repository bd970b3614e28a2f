/**
 * STOR command - Destination side of an FXP transfer
 *
 * Switches to binary first. Both lines go out under one lock so nothing can
 * slip between TYPE I and STOR. Returns the preliminary reply; the final one
 * arrives when the transfer ends.
 */

import { BaseFtpCommand } from '../lib/base-command.js';
import type { ControlSession } from '../lib/types.js';
import type { StatusResponse } from '../lib/status-response.js';

export class StorCommand extends BaseFtpCommand {
    readonly name = 'STOR';
    readonly expects = 'any';
    override readonly needsArgs = true;

    protected override async run(session: ControlSession, args: string): Promise<StatusResponse> {
        await session.exchangeVoid('TYPE I');
        return this.send(session, this.format(args));
    }
}
