/**
 * FXP command wrappers for one control session
 *
 * Every method takes the session lock for its whole command/reply exchange
 * and hands back the raw reply. Interpretation is left to the caller, except
 * where a reply class is part of the contract (PORT must be 2xx).
 */

import type * as net from 'net';
import { FTP_COMMANDS } from '../commands/index.js';
import { FtpReplyError } from './errors.js';
import type { StatusResponse } from './status-response.js';
import type { ControlSession } from './types.js';

const REGULAR_FILE = /^-[r-][w-]/;

export class FxpCommandSet {
    constructor(readonly session: ControlSession) {}

    passivePort(): Promise<StatusResponse> {
        return FTP_COMMANDS.PASV.execute(this.session);
    }

    activePort(addressPortSpec: string): Promise<StatusResponse> {
        return FTP_COMMANDS.PORT.execute(this.session, addressPortSpec);
    }

    /**
     * Destination side. Must be issued before the source's RETR.
     */
    prepareStore(path: string): Promise<StatusResponse> {
        return FTP_COMMANDS.STOR.execute(this.session, path);
    }

    prepareRetrieve(path: string): Promise<StatusResponse> {
        return FTP_COMMANDS.RETR.execute(this.session, path);
    }

    /**
     * Reads the final reply of a running transfer. No timeout of its own;
     * pass a signal to bound it. After a cancelled wait the session drops
     * that reply when it turns up and stays usable.
     */
    awaitTransferCompletion(signal?: AbortSignal): Promise<StatusResponse> {
        return this.session.synchronize(() => this.session.readReply(signal));
    }

    extendedFeatures(): Promise<StatusResponse> {
        return FTP_COMMANDS.FEAT.execute(this.session);
    }

    /**
     * SITE XDUPE. Without a mode the server reports the current one.
     * 0 disables; 1-4 pick how duplicate names are reported.
     */
    extendedDupeMode(mode?: number): Promise<StatusResponse> {
        if (mode === undefined) {
            return FTP_COMMANDS.SITE.execute(this.session, 'XDUPE');
        }
        if (!Number.isInteger(mode) || mode < 0 || mode > 4) {
            return Promise.reject(new RangeError(`XDUPE mode must be 0-4, got ${mode}`));
        }
        return FTP_COMMANDS.SITE.execute(this.session, `XDUPE ${mode}`);
    }

    fastList(path?: string): Promise<StatusResponse> {
        return FTP_COMMANDS.STAT.execute(this.session, path ? `-l ${path}` : '-l');
    }

    async fileExists(path: string): Promise<boolean> {
        const entries = listingEntries(await this.fastList(path));
        return entries.some(entry => REGULAR_FILE.test(entry));
    }

    async pathExists(path: string): Promise<boolean> {
        return listingEntries(await this.fastList(path)).length > 0;
    }

    /**
     * NLST over a data connection. The session opens it (PASV or PORT per
     * its mode) and its SecureModeController, if any, wraps it.
     */
    nameList(path?: string): Promise<string[]> {
        const command = path ? `NLST ${path}` : 'NLST';

        return this.session.synchronize(async () => {
            const stream = await this.session.openDataConnection(command);
            const text = await readAll(stream);
            const response = await this.session.readReply();
            if (!response.isPositiveCompletion()) {
                throw new FtpReplyError(command, response);
            }
            return text.split(/\r?\n/).filter(name => name.length > 0);
        });
    }
}

/**
 * Lines of a STAT -l reply that are not the reply's own banner lines
 * (`213-...`, `213 ...`). A refused STAT has no entries.
 */
export function listingEntries(response: StatusResponse): string[] {
    if (!response.isPositiveCompletion()) {
        return [];
    }
    return response.lines.filter(line => !line.startsWith(response.code));
}

function readAll(stream: net.Socket): Promise<string> {
    return new Promise<string>((resolve, reject) => {
        const chunks: Buffer[] = [];
        stream.on('data', (chunk: Buffer) => chunks.push(chunk));
        stream.once('error', reject);
        stream.once('end', () => resolve(Buffer.concat(chunks).toString('utf8')));
    });
}
