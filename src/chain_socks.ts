import { Buffer } from 'node:buffer';
import type net from 'node:net';

import type { SocketAddress } from './config';
import { formatSocketAddress } from './config';
import type { LogLevel } from './logger';
import type { Socket } from './socket';
import type { ProxyTarget } from './http_request';
import { connectUpstream, negotiateSocks5 } from './socks/socks5_client';

/**
 * The part of the server that connection handlers talk to.
 */
export interface HandlerServer {
    log: (level: LogLevel, connectionId: unknown, str: string) => void;
    registerUpstream: (sourceSocket: Socket, targetSocket: net.Socket) => void;
}

export interface HandlerOpts {
    socks: SocketAddress;
}

interface ChainSocksOpts {
    sourceSocket: Socket;
    target: ProxyTarget;
    server: HandlerServer;
    handlerOpts: HandlerOpts;
}

/**
 * Opens a connection to the SOCKS5 server and asks it to CONNECT to the target.
 * If the client closes or ends its side during the handshake, the handshake is aborted.
 * Resolves to the upstream socket, ready for opaque data.
 */
export const chainSocks = async ({
    sourceSocket,
    target,
    server,
    handlerOpts,
}: ChainSocksOpts): Promise<net.Socket> => {
    const { connectionId } = sourceSocket;

    const targetSocket = await connectUpstream(handlerOpts.socks);
    server.registerUpstream(sourceSocket, targetSocket);

    const controller = new AbortController();
    const abort = () => controller.abort();

    // The client is read during the handshake, otherwise its FIN would go unnoticed.
    // What it sends meanwhile is put back for the pump.
    const held: Buffer[] = [];
    const hold = (chunk: Buffer) => {
        held.push(chunk);
    };

    sourceSocket.on('data', hold);
    sourceSocket.once('end', abort);
    sourceSocket.once('close', abort);
    sourceSocket.resume();

    // The client may have left while the upstream connection was opening.
    if (sourceSocket.closed || sourceSocket.readableEnded) {
        abort();
    }

    server.log('verbose', connectionId, `SOCKS5 CONNECT ${formatSocketAddress(target)}`);

    try {
        const bound = await negotiateSocks5(targetSocket, handlerOpts.socks, target, { signal: controller.signal });

        server.log('verbose', connectionId, `SOCKS5 server bound ${bound.host}:${bound.port}`);
    } catch (error) {
        targetSocket.destroy();
        throw error;
    } finally {
        sourceSocket.removeListener('data', hold);
        sourceSocket.removeListener('end', abort);
        sourceSocket.removeListener('close', abort);
    }

    sourceSocket.pause();
    if (held.length > 0) {
        sourceSocket.unshift(Buffer.concat(held));
    }

    return targetSocket;
};
