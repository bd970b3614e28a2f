/**
 * Command handlers shared by every session. Handlers are stateless; all
 * per-session state lives on the session and its SecureModeController.
 */

import { AuthCommand } from './auth.js';
import { CccCommand } from './ccc.js';
import { CpsvCommand } from './cpsv.js';
import { FeatCommand } from './feat.js';
import { PasvCommand } from './pasv.js';
import { PbszCommand } from './pbsz.js';
import { PortCommand } from './port.js';
import { ProtCommand } from './prot.js';
import { RetrCommand } from './retr.js';
import { SiteCommand } from './site.js';
import { SscnCommand } from './sscn.js';
import { StatCommand } from './stat.js';
import { StorCommand } from './stor.js';

export const FTP_COMMANDS = {
    AUTH: new AuthCommand(),
    CCC: new CccCommand(),
    CPSV: new CpsvCommand(),
    FEAT: new FeatCommand(),
    PASV: new PasvCommand(),
    PBSZ: new PbszCommand(),
    PORT: new PortCommand(),
    PROT: new ProtCommand(),
    RETR: new RetrCommand(),
    SITE: new SiteCommand(),
    SSCN: new SscnCommand(),
    STAT: new StatCommand(),
    STOR: new StorCommand()
} as const;
