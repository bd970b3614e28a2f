/**
 * FEAT command - List the server's extensions
 */

import { BaseFtpCommand } from '../lib/base-command.js';

export class FeatCommand extends BaseFtpCommand {
    readonly name = 'FEAT';
    readonly expects = 'any';
}
