/**
 * PORT command - Tell the server where to connect for the next transfer
 */

import { BaseFtpCommand } from '../lib/base-command.js';

export class PortCommand extends BaseFtpCommand {
    readonly name = 'PORT';
    readonly expects = 'completion';
    override readonly needsArgs = true;
}
