/**
 * FTP reply model and line parser
 *
 * A reply is one line (`226 Transfer complete`) or a multi-line block that
 * opens with `ddd-` and closes with a line starting `ddd ` for the same code.
 * Lines in between keep whatever prefix the server sent; STAT -l listings
 * rely on that.
 */

import { FtpProtocolError } from './errors.js';

const REPLY_START = /^(\d{3})([ -]|$)/;

export class StatusResponse {
    readonly lines: readonly string[];

    constructor(lines: readonly string[]) {
        if (lines.length === 0 || !REPLY_START.test(lines[0])) {
            throw new FtpProtocolError('Reply must start with a status code', lines[0] ?? '');
        }
        this.lines = [...lines];
    }

    static of(...lines: string[]): StatusResponse {
        return new StatusResponse(lines);
    }

    /** First three characters of the first line. */
    get code(): string {
        return this.lines[0].slice(0, 3);
    }

    get firstLine(): string {
        return this.lines[0];
    }

    /** Text of the first line after the code and separator. */
    get message(): string {
        return this.lines[0].slice(4);
    }

    get text(): string {
        return this.lines.join('\n');
    }

    isPreliminary(): boolean {
        return this.code.startsWith('1');
    }

    isPositiveCompletion(): boolean {
        return this.code.startsWith('2');
    }

    isPositiveIntermediate(): boolean {
        return this.code.startsWith('3');
    }

    /** Only 226 counts; other 2xx codes are not a finished transfer. */
    isTransferComplete(): boolean {
        return this.code === '226';
    }

    toString(): string {
        return this.text;
    }
}

export class ReplyParser {
    private pending: string[] = [];
    private openCode?: string;

    /**
     * Feed one line (without CRLF). Returns the reply once it is complete.
     */
    push(line: string): StatusResponse | undefined {
        if (this.openCode !== undefined) {
            this.pending.push(line);
            if (line.startsWith(`${this.openCode} `) || line === this.openCode) {
                return this.flush();
            }
            return undefined;
        }

        const match = REPLY_START.exec(line);
        if (!match) {
            throw new FtpProtocolError('Unexpected line outside a reply', line);
        }

        this.pending = [line];
        if (match[2] === '-') {
            this.openCode = match[1];
            return undefined;
        }
        return this.flush();
    }

    get inProgress(): boolean {
        return this.openCode !== undefined;
    }

    reset(): void {
        this.pending = [];
        this.openCode = undefined;
    }

    private flush(): StatusResponse {
        const response = new StatusResponse(this.pending);
        this.reset();
        return response;
    }
}
