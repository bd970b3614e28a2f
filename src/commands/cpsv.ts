/**
 * CPSV command - PASV for secure FXP
 *
 * Same reply shape as PASV, but the listening server will not start the TLS
 * handshake on the data connection. The side given PORT (under PROT P) does.
 * Known to be missing on Serv-U.
 */

import { BaseFtpCommand } from '../lib/base-command.js';

export class CpsvCommand extends BaseFtpCommand {
    readonly name = 'CPSV';
    readonly expects = 'any';
}
