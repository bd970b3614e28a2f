/**
 * PROT command - Data channel protection level
 *
 * P = Private (integrity and privacy), E = Confidential, S = Safe,
 * C = Clear. Under TLS only P and C mean anything.
 */

import { BaseFtpCommand } from '../lib/base-command.js';

export class ProtCommand extends BaseFtpCommand {
    readonly name = 'PROT';
    readonly expects = 'completion';
    override readonly needsArgs = true;
}
