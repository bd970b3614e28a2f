/**
 * Base class for FTP command handlers
 */

import type { ControlSession, FtpCommandHandler } from './types.js';
import type { StatusResponse } from './status-response.js';
import { FtpReplyError } from './errors.js';

/** Reply class a handler insists on; 'any' hands every reply back. */
export type ReplyExpectation = 'any' | 'completion' | 'preliminary';

export abstract class BaseFtpCommand implements FtpCommandHandler {
    abstract readonly name: string;
    abstract readonly expects: ReplyExpectation;
    readonly needsArgs: boolean = false;

    /**
     * Runs the command inside the session lock.
     */
    execute(session: ControlSession, args: string = ''): Promise<StatusResponse> {
        return session.synchronize(() => this.executeLocked(session, args));
    }

    /**
     * Same as execute, for callers that already hold the session lock.
     */
    executeLocked(session: ControlSession, args: string = ''): Promise<StatusResponse> {
        if (this.needsArgs && !args) {
            return Promise.reject(new TypeError(`${this.name} command requires an argument`));
        }
        return this.run(session, args);
    }

    /**
     * Command body; the caller already holds the session lock.
     */
    protected run(session: ControlSession, args: string): Promise<StatusResponse> {
        return this.send(session, this.format(args));
    }

    protected format(args: string): string {
        return args ? `${this.name} ${args}` : this.name;
    }

    protected async send(session: ControlSession, line: string): Promise<StatusResponse> {
        const response = await session.exchange(line);

        if (this.expects === 'completion' && !response.isPositiveCompletion()) {
            throw new FtpReplyError(line, response);
        }
        if (this.expects === 'preliminary' && !response.isPreliminary()) {
            throw new FtpReplyError(line, response, 'a preliminary reply');
        }
        return response;
    }
}
