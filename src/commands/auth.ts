/**
 * AUTH command - Start TLS (or SSL) on the control channel
 */

import { BaseFtpCommand } from '../lib/base-command.js';

export class AuthCommand extends BaseFtpCommand {
    readonly name = 'AUTH';
    readonly expects = 'completion';
    override readonly needsArgs = true;
}
