/**
 * PASV command - Ask the server to listen for a data connection
 *
 * The reply is handed back untouched; the address tuple is parsed by the
 * caller so a malformed reply surfaces as a negotiation error.
 */

import { BaseFtpCommand } from '../lib/base-command.js';

export class PasvCommand extends BaseFtpCommand {
    readonly name = 'PASV';
    readonly expects = 'any';
}
