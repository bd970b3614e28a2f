/**
 * PBSZ command - Protection buffer size
 *
 * Meaningless for TLS, but servers insist on it (as 0) before PROT.
 */

import { BaseFtpCommand } from '../lib/base-command.js';

export class PbszCommand extends BaseFtpCommand {
    readonly name = 'PBSZ';
    readonly expects = 'completion';
    override readonly needsArgs = true;
}
