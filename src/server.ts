import { EventEmitter } from 'node:events';
import net from 'node:net';
import util from 'node:util';

import type { HandlerServer } from './chain_socks';
import type { RuntimeConfig, RuntimeConfigInput } from './config';
import { createRuntimeConfig, formatSocketAddress } from './config';
import { forwardSocks } from './forward_socks';
import { parseProxyRequest, readRequestHead } from './http_request';
import type { LogLevel } from './logger';
import { log } from './logger';
import type { PumpResult } from './pump';
import { relay } from './relay';
import { RequestError } from './request_error';
import type { Socket } from './socket';
import { Socks5Error } from './socks/socks5_error';
import { createStatusLineResponse } from './statuses';
import { describeError, formatErrorChain } from './utils/format_error_chain';
import { tunnelSocks } from './tunnel_socks';

export type ConnectionStats = {
    /** Total bytes sent to the client. */
    srcTxBytes: number;
    /** Total bytes received from the client. */
    srcRxBytes: number;
    /** Total bytes sent to the SOCKS5 server, `null` if no upstream connection was opened. */
    trgTxBytes: number | null;
    /** Total bytes received from the SOCKS5 server, `null` if no upstream connection was opened. */
    trgRxBytes: number | null;
};

export type ConnectionClosedData = {
    connectionId: number;
    stats: ConnectionStats | undefined;
};

export type RequestFailedData = {
    connectionId: number;
    error: unknown;
};

/**
 * Represents the adapter's listening side.
 *
 * In HTTP mode every accepted connection carries one proxy request, either a CONNECT tunnel
 * or a plain HTTP request, which is relayed through the SOCKS5 server.
 * In forward mode every accepted connection is relayed to the SOCKS5 server as raw TCP.
 *
 * It emits the `connectionClosed` event when a client connection closes, with parameter `ConnectionClosedData`.
 * It emits the `requestFailed` event when a connection could not be relayed, with parameter `RequestFailedData`.
 */
export class Server extends EventEmitter implements HandlerServer {
    readonly config: RuntimeConfig;

    port: number;

    server: net.Server;

    lastHandlerId: number;

    stats: { connectRequestCount: number; httpRequestCount: number; forwardCount: number; };

    connections: Map<number, Socket>;

    /**
     * Initializes a new instance of Server class.
     * @param options Addresses are `host:port` strings or `{ host, port }` objects.
     * @param [options.listen] Where to accept connections. By default `127.0.0.1:8080`, port 0 picks a free port.
     * @param [options.socks] The upstream SOCKS5 server. By default `127.0.0.1:1080`.
     * @param [options.forward] If true, connections are relayed as raw TCP without any HTTP handling.
     */
    constructor(options: RuntimeConfigInput = {}) {
        super();

        this.config = createRuntimeConfig(options);
        this.port = this.config.listen.port;

        this.server = net.createServer({ allowHalfOpen: true });
        this.server.on('connection', this.onConnection.bind(this));
        this.server.on('error', this.onServerError.bind(this));

        this.lastHandlerId = 0;
        this.stats = {
            connectRequestCount: 0,
            httpRequestCount: 0,
            forwardCount: 0,
        };

        this.connections = new Map();
    }

    log(level: LogLevel, connectionId: unknown, str: string): void {
        const logPrefix = connectionId != null ? `${String(connectionId)} | ` : '';
        log.log(level, `ProxyServer[${this.port}]`, '%s', `${logPrefix}${str}`);
    }

    /**
     * Errors emitted once the server is bound come from accepting connections.
     * They are not fatal, the server keeps accepting.
     */
    onServerError(error: NodeJS.ErrnoException): void {
        if (this.server.listening) {
            this.log('warn', null, `Accept failed: ${error}`);
        }
    }

    /**
     * Assigns a unique ID to the socket and keeps the register up to date.
     * Needed for abrupt close of the server.
     */
    registerConnection(socket: Socket): number {
        const unique = this.lastHandlerId++;

        socket.connectionId = unique;
        this.connections.set(unique, socket);

        socket.on('close', () => {
            const data: ConnectionClosedData = {
                connectionId: unique,
                stats: this.getConnectionStats(unique),
            };
            this.emit('connectionClosed', data);

            this.connections.delete(unique);
        });

        return unique;
    }

    /**
     * Remembers the upstream socket of a client connection, for stats and teardown.
     */
    registerUpstream(sourceSocket: Socket, targetSocket: net.Socket): void {
        sourceSocket.upstream = targetSocket;

        // The handler attaches its own listeners asynchronously, errors must not go unhandled meanwhile.
        targetSocket.on('error', (err) => {
            this.log('verbose', sourceSocket.connectionId, `Upstream socket emitted error: ${err.stack || err}`);
        });
    }

    /**
     * Handles incoming sockets.
     */
    onConnection(socket: Socket): void {
        // https://github.com/nodejs/node/issues/23858
        if (!socket.remoteAddress) {
            socket.destroy();
            return;
        }

        const connectionId = this.registerConnection(socket);

        // We need to consume socket errors, because the handlers are attached asynchronously.
        socket.on('error', (err) => {
            this.log('verbose', connectionId, `Source socket emitted error: ${err.stack || err}`);
        });

        this.log('info', connectionId, `New connection from ${socket.remoteAddress}:${socket.remotePort}`);

        this.handleConnection(socket).catch((error: unknown) => {
            this.log('error', connectionId, `Unhandled error in handleConnection(): ${describeError(error)}`);
        });
    }

    /**
     * Runs the handler for the configured mode and reports its outcome.
     */
    async handleConnection(socket: Socket): Promise<void> {
        try {
            const result = await this.dispatch(socket);

            if (result) {
                this.log('info', socket.connectionId, `Proxied ${result.aToB} bytes from client, ${result.bToA} bytes from socks`);
            }
        } catch (error) {
            this.failConnection(socket, error);
        }
    }

    /**
     * Picks the handler for a connection. Resolves to `null` if the client left before sending a request.
     */
    async dispatch(socket: Socket): Promise<PumpResult | null> {
        const { connectionId } = socket;
        const handlerOpts = { socks: this.config.socks };

        if (this.config.forward) {
            this.stats.forwardCount++;
            return relay({ sourceSocket: socket, server: this, handlerOpts });
        }

        const head = await readRequestHead(socket);
        if (head.length === 0) {
            this.log('verbose', connectionId, 'Client closed connection before sending a request');
            socket.end();
            return null;
        }

        const request = parseProxyRequest(head);
        const destination = formatSocketAddress(request.target);

        if (request.isConnect) {
            this.stats.connectRequestCount++;
            this.log('verbose', connectionId, `Using tunnelSocks() => ${destination}`);
            return tunnelSocks({ request, sourceSocket: socket, server: this, handlerOpts });
        }

        this.stats.httpRequestCount++;
        this.log('verbose', connectionId, `Using forwardSocks() => ${request.method} ${request.uri} via ${destination}`);
        return forwardSocks({ request, sourceSocket: socket, server: this, handlerOpts });
    }

    /**
     * Reports a failed connection. Malformed requests get a status line, anything else just closes both sockets.
     */
    failConnection(socket: Socket, error: unknown): void {
        const { connectionId } = socket;

        const data: RequestFailedData = { connectionId: connectionId ?? -1, error };
        this.emit('requestFailed', data);

        socket.upstream?.destroy();

        if (error instanceof RequestError) {
            this.log('warn', connectionId, `Rejecting request with ${error.statusCode}: ${error.message}`);
            this.sendSocketResponse(socket, error.statusCode);
            return;
        }

        if (error instanceof Socks5Error && error.code === 'EABORTED') {
            this.log('verbose', connectionId, 'Client left during the SOCKS5 handshake');
            socket.destroy();
            return;
        }

        this.log('error', connectionId, `Client handling error: ${describeError(error)}`);

        const chain = formatErrorChain(error);
        if (chain.length > 0) {
            this.log('error', connectionId, `Error chain:\n${chain.join('\n')}`);
        }

        socket.destroy();
    }

    /**
     * Sends a bare status line to the client and closes the connection.
     */
    sendSocketResponse(socket: Socket, statusCode: number): void {
        if (socket.destroyed || !socket.writable) {
            socket.destroy();
            return;
        }

        // Unfortunately it's not possible to send RST in Node.js yet.
        // See https://github.com/nodejs/node/issues/27428
        socket.setTimeout(1000, () => {
            socket.destroy();
        });

        // This sends FIN, meaning we still can receive data.
        socket.end(createStatusLineResponse(statusCode));
    }

    /**
     * Starts listening at the address given in the constructor.
     */
    async listen(): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            // Unfortunately server.listen() is not a normal function that fails on error,
            // so we need this trickery
            const onError = (error: NodeJS.ErrnoException) => {
                this.log('error', null, `Listen failed: ${error}`);
                removeListeners();
                reject(error);
            };
            const onListening = () => {
                this.port = (this.server.address() as net.AddressInfo).port;
                this.log('verbose', null, 'Listening...');
                removeListeners();
                resolve();
            };
            const removeListeners = () => {
                this.server.removeListener('error', onError);
                this.server.removeListener('listening', onListening);
            };

            this.server.on('error', onError);
            this.server.on('listening', onListening);
            this.server.listen(this.config.listen.port, this.config.listen.host);
        });
    }

    /**
     * Gets array of IDs of all active connections.
     */
    getConnectionIds(): number[] {
        return [...this.connections.keys()];
    }

    /**
     * Returns the statistics of a specific connection.
     * @param connectionId The ID of the connection.
     * @returns The statistics object, or undefined if the connection does not exist.
     */
    getConnectionStats(connectionId: number): ConnectionStats | undefined {
        const socket = this.connections.get(connectionId);

        if (!socket) return;

        return {
            srcTxBytes: socket.bytesWritten,
            srcRxBytes: socket.bytesRead,
            trgTxBytes: socket.upstream ? socket.upstream.bytesWritten : null,
            trgRxBytes: socket.upstream ? socket.upstream.bytesRead : null,
        };
    }

    /**
     * Forcibly close a specific pending proxy connection.
     */
    closeConnection(connectionId: number): void {
        const socket = this.connections.get(connectionId);
        if (!socket) return;

        socket.destroy();

        this.log('verbose', connectionId, 'Destroyed pending socket');
    }

    /**
     * Forcibly closes pending proxy connections.
     */
    closeConnections(): void {
        for (const socket of this.connections.values()) {
            socket.destroy();
        }

        this.log('verbose', null, `Destroyed ${this.connections.size} pending sockets`);
    }

    /**
     * Closes the proxy server.
     * @param closeConnections If true, pending proxy connections are forcibly closed.
     */
    async close(closeConnections = false): Promise<void> {
        if (closeConnections) {
            this.closeConnections();
        }

        if (!this.server.listening) {
            return;
        }

        await util.promisify(this.server.close).bind(this.server)();
    }
}
