import { Buffer } from 'node:buffer';
import type net from 'node:net';

import { RequestError } from './request_error';
import { requestErrorStatusCodes } from './statuses';

export const DEFAULT_HTTP_PORT = 80;

/**
 * Upper bound for the request line plus headers. Anything longer is answered with 431.
 */
export const MAX_HEAD_SIZE = 64 * 1024;

const CRLF = '\r\n';
const HEAD_TERMINATOR = '\r\n\r\n';
// Heads framed with bare LF are not relayed, but they are complete and get their 400 right away.
const BARE_LF_TERMINATOR = '\n\n';

export type ProxyTarget = {
    host: string;
    port: number;
};

export type ConnectRequest = {
    isConnect: true;
    target: ProxyTarget;
    /**
     * Bytes that followed the CONNECT head in the same reads. They belong to the tunnel.
     */
    trailing: Buffer;
};

export type HttpRequest = {
    isConnect: false;
    method: string;
    uri: string;
    target: ProxyTarget;
    /**
     * The whole buffer with its request line replaced, ready to be written upstream.
     */
    rewritten: Buffer;
};

export type ProxyRequest = ConnectRequest | HttpRequest;

/**
 * Reads from the client until the buffer holds a complete head (CRLF CRLF, or LF LF),
 * the client ends the stream, or the head grows past `maxSize`.
 * Resolves to an empty buffer if the client closed without sending anything.
 * Bytes past the head that arrived in the same chunks are included.
 */
export const readRequestHead = async (socket: net.Socket, maxSize = MAX_HEAD_SIZE): Promise<Buffer> => new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    let received = 0;

    const cleanup = () => {
        socket.removeListener('readable', onReadable);
        socket.removeListener('end', onEnd);
        socket.removeListener('close', onEnd);
        socket.removeListener('error', onError);
    };

    const finish = () => {
        cleanup();
        resolve(Buffer.concat(chunks, received));
    };

    function onReadable() {
        let chunk: Buffer | null;

        while ((chunk = socket.read()) !== null) {
            chunks.push(chunk);
            received += chunk.length;

            const buffer = Buffer.concat(chunks, received);
            if (buffer.includes(HEAD_TERMINATOR) || buffer.includes(BARE_LF_TERMINATOR)) {
                finish();
                return;
            }

            if (received > maxSize) {
                cleanup();
                reject(new RequestError(`Request head exceeds ${maxSize} bytes`, requestErrorStatusCodes.HEAD_TOO_LARGE));
                return;
            }
        }
    }

    function onEnd() {
        finish();
    }

    function onError(error: Error) {
        cleanup();
        reject(error);
    }

    if (socket.destroyed) {
        resolve(Buffer.alloc(0));
        return;
    }

    socket.on('readable', onReadable);
    socket.once('end', onEnd);
    socket.once('close', onEnd);
    socket.once('error', onError);

    onReadable();
});

// Header bytes are handled as latin1 so that every byte maps to exactly one character and back.
const toText = (buffer: Buffer): string => buffer.toString('latin1');

const tokenize = (line: string): string[] => line.split(/[\t\n\v\f\r ]+/).filter((token) => token.length > 0);

/**
 * Text of the head without the terminating blank line. Body bytes are not included.
 */
const getHeadText = (buffer: Buffer): string => {
    const end = buffer.indexOf(HEAD_TERMINATOR);
    return toText(end === -1 ? buffer : buffer.subarray(0, end));
};

const getRequestLine = (headText: string): string => {
    const end = headText.indexOf(CRLF);
    return end === -1 ? headText : headText.slice(0, end);
};

const hasBareLineFeed = (line: string): boolean => line.includes('\n');

/**
 * Host names travel as UTF-8 on the SOCKS5 wire.
 */
const decodeHost = (host: string): string => Buffer.from(host, 'latin1').toString('utf8');

const stripBrackets = (host: string): string => {
    return host.startsWith('[') && host.endsWith(']') ? host.slice(1, -1) : host;
};

/**
 * Parses a decimal port in the range 1-65535. Returns `null` for anything else.
 */
export const parsePort = (text: string): number | null => {
    if (!/^\d{1,5}$/.test(text)) {
        return null;
    }

    const port = Number(text);
    return port > 0 && port <= 65535 ? port : null;
};

export const isConnectRequest = (buffer: Buffer): boolean => {
    return toText(buffer.subarray(0, 'CONNECT'.length)) === 'CONNECT';
};

/**
 * `CONNECT host:port HTTP/1.1` => `{ host, port }`, or `null` if the request line is malformed.
 */
export const parseConnectTarget = (buffer: Buffer): ProxyTarget | null => {
    const requestLine = getRequestLine(getHeadText(buffer));
    if (hasBareLineFeed(requestLine)) {
        return null;
    }

    const tokens = tokenize(requestLine);
    if (tokens.length !== 3) {
        return null;
    }

    const authority = tokens[1];
    const separator = authority.lastIndexOf(':');
    if (separator <= 0 || separator === authority.length - 1) {
        return null;
    }

    const host = stripBrackets(authority.slice(0, separator));
    const port = parsePort(authority.slice(separator + 1));
    if (!host || port === null) {
        return null;
    }

    return { host: decodeHost(host), port };
};

/**
 * Splits a Host header value. A missing or unparsable port means port 80.
 */
export const parseHostHeaderValue = (value: string): ProxyTarget | null => {
    let host: string;
    let port = DEFAULT_HTTP_PORT;

    const closing = value.startsWith('[') ? value.indexOf(']') : -1;

    if (closing !== -1) {
        // [::1] or [::1]:8080
        host = value.slice(1, closing);
        const rest = value.slice(closing + 1);
        if (rest.startsWith(':')) {
            port = parsePort(rest.slice(1)) ?? DEFAULT_HTTP_PORT;
        }
    } else {
        const separator = value.lastIndexOf(':');
        if (separator === -1) {
            host = value;
        } else {
            host = value.slice(0, separator);
            port = parsePort(value.slice(separator + 1)) ?? DEFAULT_HTTP_PORT;
        }
    }

    if (!host) {
        return null;
    }

    return { host: decodeHost(host), port };
};

/**
 * Replaces the request line with `<METHOD> <URI> HTTP/1.1`. Everything after the first CRLF is kept byte for byte.
 */
export const rewriteRequestLine = (buffer: Buffer, method: string, uri: string): Buffer => {
    const lineEnd = buffer.indexOf(CRLF);
    const rest = lineEnd === -1 ? buffer : buffer.subarray(lineEnd + CRLF.length);

    return Buffer.concat([
        Buffer.from(`${method} ${uri} HTTP/1.1${CRLF}`, 'latin1'),
        rest,
    ]);
};

/**
 * Parses an absolute-form or origin-form request. The target comes from the Host header.
 */
export const parseHttpRequest = (buffer: Buffer): Omit<HttpRequest, 'isConnect'> | null => {
    const lines = getHeadText(buffer).split(CRLF);
    if (hasBareLineFeed(lines[0])) {
        return null;
    }

    const tokens = tokenize(lines[0]);
    if (tokens.length !== 3) {
        return null;
    }

    const [method, uri] = tokens;

    const hostLine = lines.slice(1).find((line) => line.toLowerCase().startsWith('host:'));
    if (hostLine === undefined) {
        return null;
    }

    const target = parseHostHeaderValue(hostLine.slice('host:'.length).trim());
    if (!target) {
        return null;
    }

    return {
        method,
        uri,
        target,
        rewritten: rewriteRequestLine(buffer, method, uri),
    };
};

/**
 * Classifies the request head and extracts the target.
 * Throws a 400 `RequestError` if the request cannot be relayed.
 */
export const parseProxyRequest = (buffer: Buffer): ProxyRequest => {
    if (isConnectRequest(buffer)) {
        const target = parseConnectTarget(buffer);
        if (!target) {
            throw new RequestError(`Invalid CONNECT request line "${getRequestLine(getHeadText(buffer))}"`, requestErrorStatusCodes.BAD_REQUEST);
        }

        const end = buffer.indexOf(HEAD_TERMINATOR);
        const trailing = end === -1 ? Buffer.alloc(0) : buffer.subarray(end + HEAD_TERMINATOR.length);

        return { isConnect: true, target, trailing };
    }

    const parsed = parseHttpRequest(buffer);
    if (!parsed) {
        throw new RequestError(`Invalid request "${getRequestLine(getHeadText(buffer))}"`, requestErrorStatusCodes.BAD_REQUEST);
    }

    return { isConnect: false, ...parsed };
};
