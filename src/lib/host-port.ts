/**
 * Address/port tuples for PASV, CPSV and PORT
 *
 * Wire form is `h1,h2,h3,h4,p1,p2` with port = p1 * 256 + p2.
 */

import { FxpNegotiationError } from './errors.js';
import type { StatusResponse } from './status-response.js';

export interface HostPort {
    host: string;
    port: number;
}

const COMPONENT = /^\d{1,3}$/;

/**
 * Pull the tuple out of a 227-style reply. Servers usually wrap it in
 * parentheses; some print it bare as the last comma-separated token.
 */
export function extractTuple(reply: string): string {
    const parenthesized = /\(([^)]*)\)/.exec(reply);
    if (parenthesized) {
        return parenthesized[1].trim();
    }

    const bare = reply
        .split(/\s+/)
        .filter(token => token.includes(','))
        .pop();

    if (!bare) {
        throw new FxpNegotiationError('no address tuple in reply', reply);
    }
    return bare.replace(/[.;]+$/, '');
}

export function parseHostPort(tuple: string): HostPort {
    const parts = tuple.split(',').map(part => part.trim());

    if (parts.length !== 6) {
        throw new FxpNegotiationError(`expected 6 components, found ${parts.length}`, tuple);
    }

    const numbers = parts.map(part => {
        if (!COMPONENT.test(part)) {
            throw new FxpNegotiationError(`non-numeric component '${part}'`, tuple);
        }
        const value = Number(part);
        if (value > 255) {
            throw new FxpNegotiationError(`component ${value} out of range`, tuple);
        }
        return value;
    });

    return {
        host: numbers.slice(0, 4).join('.'),
        port: numbers[4] * 256 + numbers[5]
    };
}

export function encodeHostPort({ host, port }: HostPort): string {
    const octets = host.split('.');
    if (octets.length !== 4 || octets.some(octet => !COMPONENT.test(octet) || Number(octet) > 255)) {
        throw new FxpNegotiationError('PORT needs a dotted IPv4 address', host);
    }
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
        throw new FxpNegotiationError(`port ${port} out of range`, host);
    }

    return [...octets.map(Number), Math.floor(port / 256), port % 256].join(',');
}

/**
 * Parse a PASV/CPSV reply. Rejects anything that is not a 2xx reply so a
 * refused PASV never turns into a connection attempt.
 */
export function parsePassiveReply(response: StatusResponse): HostPort {
    if (!response.isPositiveCompletion()) {
        throw new FxpNegotiationError('passive request refused', response.firstLine);
    }
    return parseHostPort(extractTuple(response.firstLine));
}
