/**
 * CCC command - Clear Command Channel
 *
 * Servers may refuse it on policy grounds; the refusal comes back as a reply,
 * not an error.
 */

import { BaseFtpCommand } from '../lib/base-command.js';

export class CccCommand extends BaseFtpCommand {
    readonly name = 'CCC';
    readonly expects = 'any';
}
