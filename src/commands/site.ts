/**
 * SITE command - Server specific extensions (XDUPE and friends)
 */

import { BaseFtpCommand } from '../lib/base-command.js';

export class SiteCommand extends BaseFtpCommand {
    readonly name = 'SITE';
    readonly expects = 'any';
    override readonly needsArgs = true;
}
