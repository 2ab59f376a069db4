import net from 'node:net';

import { SocksClient } from 'socks';

import type { SocketAddress } from '../config';
import { formatSocketAddress } from '../config';
import type { Socks5Destination } from './socks5_address';
import { checkDestination } from './socks5_address';
import { Socks5Error, toSocks5Error } from './socks5_error';

/**
 * Address and port the SOCKS5 server reported as bound for the new connection.
 * Most servers send 0.0.0.0:0.
 */
export type Socks5BoundAddress = {
    host: string;
    port: number;
};

export interface NegotiateOptions {
    /**
     * Aborting destroys the socket and fails the negotiation with `EABORTED`.
     */
    signal?: AbortSignal;
}

export interface ConnectSocks5Options extends NegotiateOptions {
    proxy: SocketAddress;
    destination: Socks5Destination;
}

/**
 * Opens a plain TCP connection to the SOCKS5 endpoint.
 * The socket is half-open capable, so the byte pump can forward a FIN in one direction only.
 */
export const connectUpstream = async (proxy: SocketAddress): Promise<net.Socket> => new Promise((resolve, reject) => {
    const socket = net.createConnection({
        host: proxy.host,
        port: proxy.port,
        allowHalfOpen: true,
    });

    const onError = (error: Error) => {
        socket.destroy();
        reject(new Socks5Error(`Failed to connect to SOCKS5 server ${formatSocketAddress(proxy)}`, 'ECONNECT', { cause: error }));
    };

    socket.once('error', onError);
    socket.once('connect', () => {
        socket.removeListener('error', onError);
        resolve(socket);
    });
});

/**
 * Runs the no-authentication greeting and the CONNECT request on an already open socket.
 *
 * ```
 * -> 05 01 00                 <- 05 00
 * -> 05 01 00 ATYP ADDR PORT  <- 05 REP 00 ATYP' BND.ADDR BND.PORT
 * ```
 *
 * Once it resolves, the socket carries opaque data for the destination.
 * The socket is destroyed when the negotiation fails.
 */
export const negotiateSocks5 = async (
    socket: net.Socket,
    proxy: SocketAddress,
    destination: Socks5Destination,
    { signal }: NegotiateOptions = {},
): Promise<Socks5BoundAddress> => {
    // An invalid name is rejected before anything is sent.
    checkDestination(destination);

    if (signal?.aborted) {
        throw new Socks5Error('SOCKS5 negotiation was aborted', 'EABORTED');
    }

    const closeSocket = () => {
        socket.destroy();
    };

    signal?.addEventListener('abort', closeSocket, { once: true });
    // SocksClient waits for 'close' only, which a half-open socket never emits after a FIN.
    socket.once('end', closeSocket);

    try {
        const { remoteHost } = await SocksClient.createConnection({
            proxy: {
                host: proxy.host,
                port: proxy.port,
                type: 5,
            },
            command: 'connect',
            destination: {
                host: destination.host,
                port: destination.port,
            },
            existing_socket: socket,
        });

        if (!remoteHost) {
            socket.destroy();
            throw new Socks5Error('SOCKS5 server replied with an unknown address type', 'EADDRTYPE');
        }

        return { host: remoteHost.host, port: remoteHost.port };
    } catch (error) {
        throw toSocks5Error(error, signal?.aborted);
    } finally {
        signal?.removeEventListener('abort', closeSocket);
        socket.removeListener('end', closeSocket);
    }
};

/**
 * Connects to the SOCKS5 endpoint and asks it to CONNECT to the destination.
 * The socket is destroyed if any step fails.
 */
export const connectSocks5 = async ({ proxy, destination, ...options }: ConnectSocks5Options): Promise<{ socket: net.Socket; bound: Socks5BoundAddress }> => {
    const socket = await connectUpstream(proxy);

    try {
        const bound = await negotiateSocks5(socket, proxy, destination, options);
        return { socket, bound };
    } catch (error) {
        socket.destroy();
        throw error;
    }
};
