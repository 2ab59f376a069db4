import { Buffer } from 'node:buffer';
import net from 'node:net';

import { MAX_DOMAIN_NAME_LENGTH } from './constants';
import { Socks5Error } from './socks5_error';

export type Socks5Destination = {
    host: string;
    port: number;
};

/**
 * Rejects destinations that cannot be put into a SOCKS5 request.
 * Names are never resolved locally, they travel to the SOCKS5 server as they are.
 */
export const checkDestination = ({ host, port }: Socks5Destination): void => {
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
        throw new RangeError(`Invalid destination port: ${port}`);
    }

    if (net.isIP(host) !== 0) return;

    const length = Buffer.byteLength(host, 'utf8');

    if (length === 0) {
        throw new Socks5Error('Destination host name is empty', 'EHOSTNAME');
    }

    if (length > MAX_DOMAIN_NAME_LENGTH) {
        throw new Socks5Error(`Destination host name is ${length} bytes long, at most ${MAX_DOMAIN_NAME_LENGTH} are allowed`, 'EHOSTNAME');
    }
};
