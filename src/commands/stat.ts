/**
 * STAT command - Status over the control channel
 *
 * With `-l <path>` most servers answer with a directory listing wrapped in a
 * 213 multi-line reply, which makes it a cheap LIST without a data connection.
 */

import { BaseFtpCommand } from '../lib/base-command.js';

export class StatCommand extends BaseFtpCommand {
    readonly name = 'STAT';
    readonly expects = 'any';
}
