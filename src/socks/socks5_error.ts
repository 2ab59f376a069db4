import { socks5ReplyCodes, socks5ReplyMessages } from './constants';

export type Socks5ErrorCode =
    /** TCP connection to the SOCKS5 endpoint failed. */
    | 'ECONNECT'
    /** The server closed the stream in the middle of the handshake. */
    | 'ESHORTREAD'
    /** The server did not accept the no-authentication method. */
    | 'EAUTHREJECTED'
    /** A reply did not start with version 5. */
    | 'EVERSION'
    /** The CONNECT reply carried a non-zero REP field. */
    | 'EREPLY'
    /** The CONNECT reply carried an unknown address type. */
    | 'EADDRTYPE'
    /** The destination name is empty or longer than 255 bytes. */
    | 'EHOSTNAME'
    /** The negotiation was cancelled by its owner. */
    | 'EABORTED'
    /** The server did not finish the handshake in time. */
    | 'ETIMEDOUT'
    /** Any other handshake failure, such as a reset. */
    | 'EHANDSHAKE';

export class Socks5Error extends Error {
    replyCode?: number;

    constructor(
        message: string,
        public code: Socks5ErrorCode,
        options: { cause?: unknown; replyCode?: number } = {},
    ) {
        super(message, options.cause === undefined ? undefined : { cause: options.cause });
        this.name = Socks5Error.name;
        this.replyCode = options.replyCode;

        Error.captureStackTrace(this, Socks5Error);
    }
}

const REJECTED_PREFIX = 'Socks5 proxy rejected connection - ';

/**
 * Maps a failure reported by the socks package to a `Socks5Error`.
 * The package only reports a message, so the message decides the code.
 */
export const toSocks5Error = (error: unknown, aborted = false): Socks5Error => {
    if (error instanceof Socks5Error) return error;

    const message = error instanceof Error ? error.message : String(error);

    if (aborted) {
        return new Socks5Error('SOCKS5 negotiation was aborted', 'EABORTED', { cause: error });
    }

    if (message.startsWith(REJECTED_PREFIX)) {
        const replyCode = socks5ReplyCodes[message.slice(REJECTED_PREFIX.length)];

        // The package reports a wrong reply version as a rejection too.
        if (replyCode === 0) {
            return new Socks5Error('SOCKS5 server replied to CONNECT with a wrong version', 'EVERSION', { cause: error });
        }

        const reason = (replyCode === undefined ? undefined : socks5ReplyMessages[replyCode]) ?? 'Unknown reply code';
        return new Socks5Error(`SOCKS5 CONNECT failed: ${reason}`, 'EREPLY', { cause: error, replyCode });
    }

    if (message.includes('invalid socks version')) {
        return new Socks5Error('SOCKS5 server replied to the greeting with a wrong version', 'EVERSION', { cause: error });
    }

    if (message.includes('authentication type')) {
        return new Socks5Error('SOCKS5 server did not accept the no-authentication method', 'EAUTHREJECTED', { cause: error });
    }

    if (message === 'Socket closed') {
        return new Socks5Error('SOCKS5 server closed the connection during the handshake', 'ESHORTREAD', { cause: error });
    }

    if (message.includes('timed out')) {
        return new Socks5Error('SOCKS5 server did not finish the handshake in time', 'ETIMEDOUT', { cause: error });
    }

    return new Socks5Error('SOCKS5 handshake failed', 'EHANDSHAKE', { cause: error });
};
