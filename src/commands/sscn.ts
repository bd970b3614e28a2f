/**
 * SSCN command - Data channel TLS handshake role
 *
 * ON: the server acts as TLS client on the next data connection.
 * OFF: the server acts as TLS server (the default).
 * Known on glftpd, SurgeFTP, Gene6, RaidenFTPD and Serv-U.
 */

import { BaseFtpCommand } from '../lib/base-command.js';

export class SscnCommand extends BaseFtpCommand {
    readonly name = 'SSCN';
    readonly expects = 'any';
    override readonly needsArgs = true;
}
