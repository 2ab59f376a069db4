import type { HandlerOpts, HandlerServer } from './chain_socks';
import type { PumpResult } from './pump';
import { pump } from './pump';
import type { Socket } from './socket';
import { connectUpstream } from './socks/socks5_client';

interface RelayOpts {
    sourceSocket: Socket;
    server: HandlerServer;
    handlerOpts: HandlerOpts;
}

/**
 * Forward mode. The client speaks SOCKS5 itself, the adapter neither reads nor writes anything of its own.
 * ```
 * Client -> Adapter (TCP) -> SOCKS5 server
 * Client <- Adapter (TCP) <- SOCKS5 server
 * ```
 */
export const relay = async ({
    sourceSocket,
    server,
    handlerOpts,
}: RelayOpts): Promise<PumpResult> => {
    const targetSocket = await connectUpstream(handlerOpts.socks);
    server.registerUpstream(sourceSocket, targetSocket);

    server.log('info', sourceSocket.connectionId, 'Forwarding connection to SOCKS5 server');

    return pump(sourceSocket, targetSocket);
};
