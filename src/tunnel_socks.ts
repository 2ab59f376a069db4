import type { HandlerOpts, HandlerServer } from './chain_socks';
import { chainSocks } from './chain_socks';
import type { ConnectRequest } from './http_request';
import type { PumpResult } from './pump';
import { pump } from './pump';
import type { Socket } from './socket';
import { CONNECTION_ESTABLISHED_RESPONSE } from './statuses';

interface TunnelSocksOpts {
    request: ConnectRequest;
    sourceSocket: Socket;
    server: HandlerServer;
    handlerOpts: HandlerOpts;
}

/**
 * ```
 * Client -> Adapter (CONNECT) -> Upstream (SOCKS5) -> Web
 * Client <- Adapter (CONNECT) <- Upstream (SOCKS5) <- Web
 * ```
 */
export const tunnelSocks = async ({
    request,
    sourceSocket,
    server,
    handlerOpts,
}: TunnelSocksOpts): Promise<PumpResult> => {
    const { target, trailing } = request;

    const targetSocket = await chainSocks({ sourceSocket, target, server, handlerOpts });

    sourceSocket.write(CONNECTION_ESTABLISHED_RESPONSE);

    // Clients may send the first tunnel bytes right behind the CONNECT head.
    if (trailing.length > 0) {
        targetSocket.write(trailing);
    }

    const result = await pump(sourceSocket, targetSocket);

    return { ...result, aToB: result.aToB + trailing.length };
};
